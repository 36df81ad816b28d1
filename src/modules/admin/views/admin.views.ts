import { COUNTER_NAMES, CounterSet } from '../../../app/constants';
import { HtmlUtils } from '../../../common/utils/html.utils';
import { CardStatsRow } from '../admin-stats.service';

const e = HtmlUtils.escape;

const ADMIN_STYLES = `
    main { max-width: 960px; }
    form.stack { display: grid; gap: 10px; max-width: 320px; }
    input { padding: 10px; border-radius: 8px; border: 1px solid #c8c8d0; font: inherit; }
    button { padding: 10px 14px; border-radius: 8px; border: 0; background: #0066ff; color: #fff; font: inherit; cursor: pointer; }
    button.danger { background: #b3261e; }
    table { border-collapse: collapse; width: 100%; background: #fff; }
    th, td { padding: 8px 10px; border-bottom: 1px solid #e4e4ea; text-align: right; }
    th:first-child, td:first-child, th:nth-child(2), td:nth-child(2) { text-align: left; }
    tfoot td { font-weight: 700; }
    nav { display: flex; gap: 12px; align-items: center; margin-bottom: 16px; }`;

const COUNTER_LABELS: Record<(typeof COUNTER_NAMES)[number], string> = {
  contact_shared: 'Contacts saved',
  whatsapp_clicks: 'WhatsApp',
  email_clicks: 'Email',
  map_clicks: 'Map',
  share_clicks: 'Shares',
  nfc_scans: 'NFC / QR',
};

function message(error?: string, notice?: string): string {
  if (error) return `<p class="error" role="alert">${e(error)}</p>`;
  if (notice) return `<p class="notice">${e(notice)}</p>`;
  return '';
}

export function renderLoginPage(options: {
  error?: string;
  resetEnabled: boolean;
}): string {
  const resetLink = options.resetEnabled
    ? '<p><a href="/admin/password-reset">Reset password</a></p>'
    : '';
  return HtmlUtils.page(
    'Admin login',
    `<h1>Admin login</h1>
${message(options.error)}
<form class="stack" method="post" action="/admin/login">
  <label for="password">Password</label>
  <input id="password" name="password" type="password" autocomplete="current-password" required autofocus>
  <button type="submit">Log in</button>
</form>
${resetLink}`,
    ADMIN_STYLES,
  );
}

export function renderPasswordResetPage(options: {
  error?: string;
  notice?: string;
  enabled: boolean;
}): string {
  const form = options.enabled
    ? `<form class="stack" method="post" action="/admin/password-reset">
  <label for="reset_key">Reset key</label>
  <input id="reset_key" name="reset_key" type="password" required>
  <label for="new_password">New password</label>
  <input id="new_password" name="new_password" type="password" autocomplete="new-password" required>
  <label for="confirm_password">Confirm new password</label>
  <input id="confirm_password" name="confirm_password" type="password" autocomplete="new-password" required>
  <button type="submit">Set password</button>
</form>`
    : '<p>Password reset is disabled on this server.</p>';

  return HtmlUtils.page(
    'Reset admin password',
    `<h1>Reset admin password</h1>
${message(options.error, options.notice)}
${form}
<p><a href="/admin/login">Back to login</a></p>`,
    ADMIN_STYLES,
  );
}

export function renderDashboardPage(
  rows: CardStatsRow[],
  totals: CounterSet,
): string {
  const header = COUNTER_NAMES.map((name) => `<th>${e(COUNTER_LABELS[name])}</th>`).join('');
  const body = rows.length
    ? rows
        .map(
          (row) => `<tr>
      <td><a href="/c/${e(encodeURIComponent(row.slug))}">${e(row.slug)}</a></td>
      <td>${e(row.display_name)}</td>
      ${COUNTER_NAMES.map((name) => `<td>${row[name]}</td>`).join('')}
    </tr>`,
        )
        .join('\n')
    : `<tr><td colspan="${COUNTER_NAMES.length + 2}">No cards yet.</td></tr>`;
  const footer = COUNTER_NAMES.map((name) => `<td>${totals[name]}</td>`).join('');

  return HtmlUtils.page(
    'Card statistics',
    `<nav>
  <h1>Card statistics</h1>
  <a href="/admin/export.csv">Export CSV</a>
  <form method="post" action="/admin/logout"><button type="submit">Log out</button></form>
</nav>
<table>
  <thead><tr><th>Slug</th><th>Name</th>${header}</tr></thead>
  <tbody>
    ${body}
  </tbody>
  <tfoot><tr><td>Total</td><td></td>${footer}</tr></tfoot>
</table>
<form method="post" action="/admin/reset-counters" onsubmit="return confirm('Reset every counter to zero?');" style="margin-top: 24px">
  <button class="danger" type="submit">Reset all counters</button>
</form>`,
    ADMIN_STYLES,
  );
}
