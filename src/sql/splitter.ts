/**
 * Split a SQL script into individual statements.
 *
 * Single left-to-right scan. Outside a quoted literal, `;` ends a statement
 * and `--` starts a comment that runs to the end of the line. Inside a literal
 * (opened by `'` or `"`), everything is copied verbatim: a backslash copies
 * the next character unread, and a doubled quote char stays inside the
 * literal.
 *
 * Statements are trimmed and empty ones dropped. An unterminated literal
 * swallows the rest of the input, and `/* ... *\/` block comments are kept
 * as statement text.
 */
export function splitSql(sql: string): string[] {
  const statements: string[] = [];
  let current = '';
  let inString = false;
  let quoteChar = '';
  const len = sql.length;

  for (let i = 0; i < len; i++) {
    const ch = sql[i];

    if (inString) {
      current += ch;
      if (ch === '\\' && i + 1 < len) {
        current += sql[++i];
        continue;
      }
      if (ch === quoteChar) {
        if (i + 1 < len && sql[i + 1] === quoteChar) {
          current += sql[++i];
          continue;
        }
        inString = false;
      }
      continue;
    }

    if (ch === '-' && i + 1 < len && sql[i + 1] === '-') {
      const eol = sql.indexOf('\n', i);
      if (eol === -1) break;
      i = eol;
      continue;
    }

    if (ch === "'" || ch === '"') {
      inString = true;
      quoteChar = ch;
      current += ch;
      continue;
    }

    if (ch === ';') {
      const trimmed = current.trim();
      if (trimmed !== '') statements.push(trimmed);
      current = '';
      continue;
    }

    current += ch;
  }

  const trimmed = current.trim();
  if (trimmed !== '') statements.push(trimmed);

  return statements;
}
