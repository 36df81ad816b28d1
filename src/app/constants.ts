/**
 * Tracked actions per card, in the order they appear on the dashboard and in
 * the CSV export.
 */
export const COUNTER_NAMES = [
  'contact_shared',
  'whatsapp_clicks',
  'email_clicks',
  'map_clicks',
  'share_clicks',
  'nfc_scans',
] as const;

export type CounterName = (typeof COUNTER_NAMES)[number];

export type CounterSet = Record<CounterName, number>;

export function isCounterName(value: string): value is CounterName {
  return COUNTER_NAMES.some((name) => name === value);
}

export function emptyCounterSet(): CounterSet {
  return {
    contact_shared: 0,
    whatsapp_clicks: 0,
    email_clicks: 0,
    map_clicks: 0,
    share_clicks: 0,
    nfc_scans: 0,
  };
}

/**
 * Admin session cookie
 */
export const ADMIN_SESSION_COOKIE = 'admin_session';
export const ADMIN_SESSION_SUBJECT = 'admin';

export const MIN_ADMIN_PASSWORD_LENGTH = 8;

/**
 * bcrypt hash prefixes; an ADMIN_PASSWORD starting with one of these is
 * treated as a pre-hashed value
 */
export const BCRYPT_PREFIXES = ['$2a$', '$2b$', '$2y$'] as const;
