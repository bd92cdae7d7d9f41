/**
 * Read a JSON column. MySQL/MariaDB drivers and SQLite may hand JSON back as
 * text rather than a parsed value; anything that is not a string is returned as is.
 */
export function parseJson(value: unknown): unknown {
  if (typeof value !== 'string') return value;
  const parsed: unknown = JSON.parse(value);
  return parsed;
}
