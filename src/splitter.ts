/**
 * Statement splitting for raw SQL buffers.
 *
 * Splitting strategy, chosen once per input:
 * 1. semicolons outside string literals, when there is at least one;
 * 2. otherwise blank lines (runs of blank lines count as one boundary);
 * 3. otherwise the whole trimmed text is one statement.
 *
 * Output is positional: offsets point into the original buffer so that an
 * editor can map a cursor back to the statement under it.
 */

export interface Statement {
  /** Statement text with surrounding whitespace trimmed. */
  readonly text: string;
  /** 0-based offset of the first non-whitespace character. */
  readonly startOffset: number;
  /** Offset just past the last non-whitespace character. */
  readonly endOffset: number;
}

const BLANK_LINE_RE = /\n\s*\n/;
const LINE_WHITESPACE = new Set([" ", "\t", "\n"]);

/**
 * Tag every character of `sql` with whether it sits outside a quoted literal.
 * Quote characters themselves count as inside. A backslash inside quotes
 * escapes the next character, and a doubled quote inside the same quote type
 * is an escaped quote rather than a close-then-reopen.
 */
function markOutsideStrings(sql: string): boolean[] {
  const outside = new Array<boolean>(sql.length).fill(false);
  let inSingle = false;
  let inDouble = false;
  let i = 0;

  while (i < sql.length) {
    const char = sql[i];
    const next = sql[i + 1];

    if (char === "\\" && next !== undefined && (inSingle || inDouble)) {
      i += 2;
      continue;
    }
    if ((char === "'" && inSingle && next === "'") || (char === '"' && inDouble && next === '"')) {
      i += 2;
      continue;
    }

    if (char === "'" && !inDouble) {
      inSingle = !inSingle;
    } else if (char === '"' && !inSingle) {
      inDouble = !inDouble;
    } else {
      outside[i] = !inSingle && !inDouble;
    }
    i += 1;
  }

  return outside;
}

function containsDelimiter(sql: string, outside: boolean[]): boolean {
  for (let i = 0; i < sql.length; i++) {
    if (sql[i] === ";" && outside[i]) return true;
  }
  return false;
}

export function hasSemicolonOutsideStrings(sql: string): boolean {
  return containsDelimiter(sql, markOutsideStrings(sql));
}

function pushStatement(statements: Statement[], sql: string, start: number, end: number): void {
  const full = sql.slice(start, end);
  const text = full.trim();
  if (!text) return;
  const startOffset = start + (full.length - full.trimStart().length);
  statements.push({ text, startOffset, endOffset: startOffset + text.length });
}

function splitOnSemicolons(sql: string, outside: boolean[]): Statement[] {
  const statements: Statement[] = [];
  let start = 0;
  for (let i = 0; i < sql.length; i++) {
    if (sql[i] === ";" && outside[i]) {
      pushStatement(statements, sql, start, i);
      start = i + 1;
    }
  }
  pushStatement(statements, sql, start, sql.length);
  return statements;
}

function splitOnBlankLines(sql: string, outside: boolean[]): Statement[] {
  const statements: Statement[] = [];
  let start = 0;
  let lineStart = 0;
  let prevLineEmpty = false;

  for (let i = 0; i < sql.length; i++) {
    const char = sql[i];
    if (char === "\n" && outside[i]) {
      const lineEmpty = sql.slice(lineStart, i).trim() === "";
      if (lineEmpty && !prevLineEmpty) {
        pushStatement(statements, sql, start, i);
        start = i + 1;
      }
      prevLineEmpty = lineEmpty;
      lineStart = i + 1;
    } else if (!LINE_WHITESPACE.has(char)) {
      prevLineEmpty = false;
    }
  }

  pushStatement(statements, sql, start, sql.length);
  return statements;
}

/**
 * Split SQL into statements with their offsets in `sql`.
 * Empty segments (trailing separators, doubled semicolons) are skipped.
 */
export function splitStatements(sql: string): Statement[] {
  if (!sql.trim()) return [];

  const outside = markOutsideStrings(sql);
  if (containsDelimiter(sql, outside)) {
    return splitOnSemicolons(sql, outside);
  }
  if (BLANK_LINE_RE.test(sql)) {
    return splitOnBlankLines(sql, outside);
  }

  const statements: Statement[] = [];
  pushStatement(statements, sql, 0, sql.length);
  return statements;
}

/**
 * Find the statement under a 0-based (row, col) cursor. Between statements
 * the nearest preceding one wins; before the first, the first. A row past the
 * last line puts the cursor at the end of the text.
 */
export function statementAt(sql: string, row: number, col: number): Statement | undefined {
  if (!sql) return undefined;

  const lines = sql.split("\n");
  let offset: number;
  if (row >= lines.length) {
    offset = sql.length;
  } else {
    offset = col;
    for (let i = 0; i < row; i++) offset += lines[i].length + 1;
  }

  const statements = splitStatements(sql);
  if (statements.length === 0) return undefined;

  const containing = statements.find(s => s.startOffset <= offset && offset <= s.endOffset);
  if (containing) return containing;

  for (let i = statements.length - 1; i >= 0; i--) {
    if (offset >= statements[i].startOffset) return statements[i];
  }
  return statements[0];
}

/**
 * True when every non-empty line is a `--` comment. Such statements make some
 * drivers fail with "empty query", so executors skip them.
 */
export function isCommentOnly(text: string): boolean {
  return text
    .trim()
    .split("\n")
    .every(line => {
      const stripped = line.trim();
      return !stripped || stripped.startsWith("--");
    });
}

/**
 * Rewrite blank-line separated statements as semicolon separated ones, since
 * databases expect semicolons between statements. Anything else is returned
 * unchanged.
 */
export function normalizeForExecution(sql: string): string {
  if (!sql.trim()) return sql;
  if (hasSemicolonOutsideStrings(sql)) return sql;
  if (BLANK_LINE_RE.test(sql)) {
    const statements = splitStatements(sql);
    if (statements.length > 1) return statements.map(s => s.text).join("; ");
  }
  return sql;
}
