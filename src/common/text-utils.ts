const UUID_RE =
  /^[0-9a-f]{8}-[0-9a-f]{4}-[1-8][0-9a-f]{3}-[89ab][0-9a-f]{3}-[0-9a-f]{12}$/i;

/**
 * Postgres rejects malformed uuid literals with an error, so lookups by id
 * check the shape first and treat a malformed id as "no such row".
 */
export function isUuid(value: string): boolean {
  return UUID_RE.test(value);
}

/** Wallet addresses are stored trimmed and lowercase. */
export function normalizeWallet(wallet: string): string {
  return wallet.trim().toLowerCase();
}

export function isBlank(value: string | null | undefined): boolean {
  return value === null || value === undefined || value.trim() === '';
}

/** Escape LIKE metacharacters so user input matches literally. */
export function escapeLike(value: string): string {
  return value.replace(/[\\%_]/g, (ch) => `\\${ch}`);
}

export function truncate(text: string, maxChars: number): string {
  return text.length <= maxChars ? text : text.slice(0, maxChars);
}
