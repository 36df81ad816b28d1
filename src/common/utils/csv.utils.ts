export interface CsvHeader<T> {
  key: keyof T & string;
  label: string;
}

export class CsvUtils {
  static escapeValue(value: unknown): string {
    if (value === null || value === undefined) return '';
    const str = String(value);
    if (
      str.includes(',') ||
      str.includes('"') ||
      str.includes('\n') ||
      str.includes('\r')
    ) {
      return `"${str.replace(/"/g, '""')}"`;
    }
    return str;
  }

  /**
   * Header row plus one row per item, CRLF-separated with a trailing CRLF.
   */
  static build<T extends object>(headers: CsvHeader<T>[], rows: T[]): string {
    const headerRow = headers.map((h) => CsvUtils.escapeValue(h.label)).join(',');
    const dataRows = rows.map((row) =>
      headers.map((h) => CsvUtils.escapeValue(row[h.key])).join(','),
    );
    return [headerRow, ...dataRows].join('\r\n') + '\r\n';
  }
}
