/**
 * Quotes an SQL identifier or, with `single`, a string literal.
 */
export function quote(s: string, options = { single: false }): string {
  // Replace each quote with two quotes and wrap result in quotes
  if (options.single) {
    return `'${s.replace(/'/g, "''")}'`;
  }
  return `"${s.replace(/"/g, '""')}"`;
}

export const LIKE_ESCAPE_CHAR = '\\';

/**
 * Escapes `%`, `_` and the escape character itself so the text matches
 * literally inside a `LIKE ... ESCAPE '\'` pattern.
 */
export function escapeLikePattern(text: string): string {
  return text.replace(/[\\%_]/g, (ch) => `${LIKE_ESCAPE_CHAR}${ch}`);
}

/**
 * Pattern for a case-insensitive substring match with `LIKE`.
 */
export function toContainsPattern(text: string): string {
  return `%${escapeLikePattern(text)}%`;
}
