import { stripLiteralsAndComments } from "./alerts.js";
import { splitStatements } from "./splitter.js";

export type QueryKind = "returnsRows" | "other";

/** Decides whether SQL produces a result set. Dialect-aware adapters can supply their own. */
export interface QueryAnalyzer {
  classify(sql: string): QueryKind;
}

const ROW_KEYWORDS = new Set(["SELECT", "VALUES", "SHOW", "DESCRIBE", "DESC", "EXPLAIN", "PRAGMA", "TABLE"]);
const DML_KEYWORDS = new Set(["INSERT", "UPDATE", "DELETE", "MERGE"]);
const RETURNING_RE = /\bRETURNING\b/i;
const WORD_RE = /[A-Za-z_]+|[()]/g;

/**
 * Keyword heuristic. For a batch the last statement decides, matching what
 * drivers hand back for multi-statement input.
 */
export class KeywordQueryAnalyzer implements QueryAnalyzer {
  classify(sql: string): QueryKind {
    const statements = splitStatements(sql);
    const last = statements[statements.length - 1];
    if (!last) return "other";

    const cleaned = stripLiteralsAndComments(last.text);
    if (RETURNING_RE.test(cleaned)) return "returnsRows";

    const tokens = cleaned.match(WORD_RE) ?? [];
    const first = tokens.find(t => t !== "(")?.toUpperCase();
    if (first === undefined) return "other";
    if (first === "WITH") return hasTopLevelDml(tokens) ? "other" : "returnsRows";
    return ROW_KEYWORDS.has(first) ? "returnsRows" : "other";
  }
}

function hasTopLevelDml(tokens: string[]): boolean {
  let depth = 0;
  for (const token of tokens) {
    if (token === "(") depth++;
    else if (token === ")") depth = Math.max(0, depth - 1);
    else if (depth === 0 && DML_KEYWORDS.has(token.toUpperCase())) return true;
  }
  return false;
}
