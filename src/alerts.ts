import { splitStatements } from "./splitter.js";

/** How eagerly to ask before running a query, from least to most strict. */
export type AlertMode = "off" | "confirm-delete" | "confirm-write";

/** Destructiveness of a query. `delete` is the maximum. */
export type AlertSeverity = "none" | "write" | "delete";

export const ALERT_MODES: readonly AlertMode[] = ["off", "confirm-delete", "confirm-write"];

const SEVERITY_RANK: Record<AlertSeverity, number> = { none: 0, write: 1, delete: 2 };

const DELETE_KEYWORDS = ["DELETE"];
const WRITE_KEYWORDS = [
  "CREATE", "ALTER", "DROP", "TRUNCATE", "RENAME",
  "INSERT", "UPDATE", "MERGE", "REPLACE", "UPSERT", "DELETE",
];

const DELETE_RE = new RegExp(`\\b(?:${DELETE_KEYWORDS.join("|")})\\b`, "i");
const WRITE_RE = new RegExp(`\\b(?:${WRITE_KEYWORDS.join("|")})\\b`, "i");

// Leftmost match wins, so a quote inside a comment or "--" inside a literal
// is consumed by whichever construct opened first. Backslash is not an escape
// here: 'C:\' ends at its second quote, as it does in postgres. A doubled
// quote reads as two adjacent literals.
const LITERAL_OR_COMMENT_RE = /--[^\n]*|\/\*[\s\S]*?\*\/|'[^']*'|"[^"]*"|`[^`]*`|\[[^\]]*\]/g;

const PLACEHOLDERS: Record<string, string> = { "'": "''", '"': '""', "`": "``", "[": "[]" };

/**
 * Strip comments and blank out quoted literals and identifiers so keyword
 * detection doesn't false-positive on values like 'DROP me a line'.
 * Literals become an empty literal of the same kind rather than vanishing,
 * which keeps the word boundaries around them intact.
 */
export function stripLiteralsAndComments(sql: string): string {
  return sql.replace(LITERAL_OR_COMMENT_RE, match => PLACEHOLDERS[match[0]] ?? "");
}

function classifyStatement(statement: string): AlertSeverity {
  const cleaned = stripLiteralsAndComments(statement);
  if (!cleaned.trim()) return "none";
  if (DELETE_RE.test(cleaned)) return "delete";
  if (WRITE_RE.test(cleaned)) return "write";
  return "none";
}

/**
 * Highest severity across every statement of `sql`. Stops at the first
 * DELETE since nothing ranks above it.
 */
export function classifyQueryAlert(sql: string): AlertSeverity {
  let highest: AlertSeverity = "none";
  for (const statement of splitStatements(sql)) {
    const severity = classifyStatement(statement.text);
    if (severity === "delete") return severity;
    if (SEVERITY_RANK[severity] > SEVERITY_RANK[highest]) highest = severity;
  }
  return highest;
}

export function compareSeverity(a: AlertSeverity, b: AlertSeverity): number {
  return SEVERITY_RANK[a] - SEVERITY_RANK[b];
}

export function shouldConfirm(mode: AlertMode, severity: AlertSeverity): boolean {
  switch (mode) {
    case "off":
      return false;
    case "confirm-delete":
      return severity === "delete";
    case "confirm-write":
      return severity === "write" || severity === "delete";
  }
}

/**
 * Parse a user-supplied alert mode: 0/1/2, or a name such as "off",
 * "delete" or "write". Returns undefined for anything unrecognised.
 */
export function parseAlertMode(value: string | number | null | undefined): AlertMode | undefined {
  if (value === null || value === undefined) return undefined;
  if (typeof value === "number") return ALERT_MODES[value];

  const raw = value.trim().toLowerCase();
  switch (raw) {
    case "0": case "off": case "none": case "disable": case "disabled":
      return "off";
    case "1": case "delete": case "destructive": case "danger": case "confirm-delete":
      return "confirm-delete";
    case "2": case "write": case "writes": case "edit": case "update": case "confirm-write":
      return "confirm-write";
    default:
      return undefined;
  }
}

export function formatAlertMode(mode: AlertMode): string {
  switch (mode) {
    case "confirm-delete":
      return "delete";
    case "confirm-write":
      return "write";
    case "off":
      return "off";
  }
}

export interface SafetyResult {
  allowed: boolean;
  reason?: string;
}

/**
 * Gate for read-only connections: any statement carrying a write keyword is
 * refused before it reaches the database. Scans every statement, not just
 * the first token, so `WITH x AS (DELETE ...)` and `SELECT 1; DROP ...` are
 * caught too.
 */
export function checkReadOnly(sql: string, readOnly: boolean): SafetyResult {
  if (!readOnly) return { allowed: true };

  for (const statement of splitStatements(sql)) {
    const match = WRITE_RE.exec(stripLiteralsAndComments(statement.text));
    if (match) {
      return {
        allowed: false,
        reason: `${match[0].toUpperCase()} blocked — this connection is read-only. Set readOnly: false on the connection to allow writes.`,
      };
    }
  }
  return { allowed: true };
}
