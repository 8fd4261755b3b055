/**
 * Canonical reference text for tables and members.
 */

/**
 * 'Table' with embedded quotes doubled.
 *
 * @example
 * quoteTableName("Bob's Sales"); // => "'Bob''s Sales'"
 */
export function quoteTableName(name: string): string {
  return `'${name.replace(/'/g, "''")}'`;
}

/**
 * [Member] with embedded closing brackets doubled.
 */
export function bracketName(name: string): string {
  return `[${name.replace(/\]/g, ']]')}]`;
}

export function qualifiedName(table: string, member: string): string {
  return quoteTableName(table) + bracketName(member);
}

/**
 * Inverse of quoteTableName. Text must include the quotes.
 */
export function unquoteTableName(text: string): string {
  return text.slice(1, -1).replace(/''/g, "'");
}

/**
 * Inverse of bracketName. Text must include the brackets.
 */
export function unbracketName(text: string): string {
  return text.slice(1, -1).replace(/\]\]/g, ']');
}
