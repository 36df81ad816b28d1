const HTML_ESCAPES: Record<string, string> = {
  '&': '&amp;',
  '<': '&lt;',
  '>': '&gt;',
  '"': '&quot;',
  "'": '&#39;',
};

export class HtmlUtils {
  static escape(value: string | number | null | undefined): string {
    if (value === null || value === undefined) return '';
    return String(value).replace(/[&<>"']/g, (ch) => HTML_ESCAPES[ch] ?? ch);
  }

  /**
   * Minimal page shell shared by the card page and the admin screens.
   */
  static page(title: string, body: string, styles = ''): string {
    return `<!doctype html>
<html lang="en">
<head>
  <meta charset="utf-8">
  <meta name="viewport" content="width=device-width, initial-scale=1">
  <title>${HtmlUtils.escape(title)}</title>
  <style>
    body { margin: 0; font-family: 'Inter', -apple-system, BlinkMacSystemFont, 'Segoe UI', Roboto, sans-serif; background: #f4f4f6; color: #1b1b1f; }
    main { max-width: 480px; margin: 0 auto; padding: 24px 16px 48px; }
    a { color: inherit; }
    .error { color: #b3261e; }
    .notice { color: #1e6b34; }${styles}
  </style>
</head>
<body>
<main>
${body}
</main>
</body>
</html>
`;
  }
}
