const PLATFORM_EPOCH_MS = 1420070400000n;
const SNOWFLAKE_PATTERN = /^\d{15,20}$/;

export function isSnowflake(id: string): boolean {
  return SNOWFLAKE_PATTERN.test(id);
}

/**
 * Creation time encoded in a platform ID, or null for IDs outside the numeric namespace.
 */
export function snowflakeToDate(id: string): Date | null {
  if (!isSnowflake(id)) {
    return null;
  }
  const ms = (BigInt(id) >> 22n) + PLATFORM_EPOCH_MS;
  return new Date(Number(ms));
}

/** Orders IDs numerically without parsing; a shorter ID is always older. */
export function compareSnowflakes(a: string, b: string): number {
  if (a.length !== b.length) {
    return a.length > b.length ? 1 : -1;
  }
  if (a === b) return 0;
  return a > b ? 1 : -1;
}
