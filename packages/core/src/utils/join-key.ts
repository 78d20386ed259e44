/**
 * Join key normalization
 *
 * Both sides of a match run their source table names through the same
 * function, so "Parks " and "PARKS" meet on "parks".
 */

export function toJoinKey(sourceTableName: string): string {
  return sourceTableName.trim().toLowerCase();
}
