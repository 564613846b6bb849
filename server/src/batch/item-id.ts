export const ITEM_ID_PREFIX = 'user_';
const PREFIXED_ID = /^(?:user|unified)_(\d+)$/;

export function buildItemId(recordId: number): string {
  return `${ITEM_ID_PREFIX}${recordId}`;
}

/**
 * Recovers the record id from a result item id. Both prefixes ever used for
 * submissions are accepted; other ids fall back to their first run of digits.
 */
export function parseItemId(itemId: string): number | null {
  const prefixed = PREFIXED_ID.exec(itemId.trim());
  const digits = prefixed ? prefixed[1] : /\d+/.exec(itemId)?.[0];
  if (digits === undefined) return null;
  const id = Number.parseInt(digits, 10);
  return Number.isSafeInteger(id) ? id : null;
}
