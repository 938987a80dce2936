/** Double-quote an identifier for SQLite. */
export function quoteIdentifier(name: string): string {
  return `"${name.replace(/"/g, '""')}"`;
}

/**
 * SQL expression that renders column `name` as a literal in SQLite's own
 * quoting (`quote()`): NULL, numbers, `'text'` with doubled quotes, `X'..'`
 * for blobs.
 *
 * Text holding a backslash is emitted as `CAST(X'<hex>' AS TEXT)` instead,
 * since the splitter reads a backslash inside a literal as an escape and
 * SQLite does not.
 */
export function literalExpression(name: string): string {
  const col = quoteIdentifier(name);
  return (
    `CASE WHEN typeof(${col}) = 'text' AND instr(${col}, char(92)) > 0 ` +
    `THEN 'CAST(X''' || hex(${col}) || ''' AS TEXT)' ` +
    `ELSE quote(${col}) END`
  );
}

export function placeholders(count: number): string {
  return Array.from({ length: count }, () => '?').join(', ');
}
