const UUID_PATTERN = /^[0-9a-f]{8}-[0-9a-f]{4}-[0-9a-f]{4}-[0-9a-f]{4}-[0-9a-f]{12}$/i;

/**
 * Ids reach uuid columns; anything else must be rejected before the query
 */
export function isUuid(value: string): boolean {
  return UUID_PATTERN.test(value);
}
