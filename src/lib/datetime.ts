/**
 * Datetimes are stored as `YYYY-MM-DD HH:MM:SS` in UTC so that text order
 * matches time order in range queries.
 */
export function toSqlDatetime(date: Date): string {
  return date.toISOString().slice(0, 19).replace('T', ' ');
}

export function nowSqlDatetime(): string {
  return toSqlDatetime(new Date());
}
