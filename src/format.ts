import type { ExecutionOutcome, MultiStatementResult, QueryResult, Value } from "./results.js";

const MAX_CELL_WIDTH = 200;

export type OutputFormat = "table" | "json" | "csv";

export const OUTPUT_FORMATS: readonly OutputFormat[] = ["table", "json", "csv"];

export function isOutputFormat(value: unknown): value is OutputFormat {
  return typeof value === "string" && OUTPUT_FORMATS.some(format => format === value);
}

const blobLabel = (bytes: Uint8Array): string => `[BLOB ${bytes.length} bytes]`;

function renderCell(value: Value): string {
  if (value === null || value === undefined) return "NULL";
  if (value instanceof Uint8Array) return blobLabel(value);
  let text: string;
  if (typeof value === "object") {
    try {
      text = JSON.stringify(value);
    } catch {
      // cyclic or holds a bigint
      text = "[Object]";
    }
  } else {
    text = String(value);
  }
  return text.length > MAX_CELL_WIDTH ? `${text.slice(0, MAX_CELL_WIDTH - 3)}...` : text;
}

function sanitizeJsonValue(value: Value): Value {
  if (value instanceof Uint8Array) return blobLabel(value);
  if (typeof value === "bigint") return value.toString();
  return value ?? null;
}

export function formatOutcome(outcome: ExecutionOutcome, format: OutputFormat = "table"): string {
  switch (outcome.kind) {
    case "query":
      return formatQueryResult(outcome, format);
    case "nonQuery":
      return `Query executed successfully. Rows affected: ${outcome.rowsAffected}`;
    case "multi":
      return formatMultiResult(outcome, format);
  }
}

export function formatQueryResult(result: QueryResult, format: OutputFormat = "table"): string {
  if (result.rows.length === 0) return "No results.";

  switch (format) {
    case "json":
      return JSON.stringify(
        result.rows.map(row => Object.fromEntries(result.columns.map((c, i) => [c, sanitizeJsonValue(row[i])]))),
        null,
        2,
      );
    case "csv":
      return formatCsv(result);
    case "table":
      return formatTable(result);
  }
}

function formatMultiResult(result: MultiStatementResult, format: OutputFormat): string {
  const blocks = result.results.map((r, i) => {
    const header = `-- [${i + 1}] ${r.statement.text.split("\n")[0]}`;
    const body = r.success ? formatOutcome(r.outcome, format) : `Error: ${r.error}`;
    return `${header}\n${body}`;
  });

  const attempted = result.results.length;
  const succeeded = result.results.filter(r => r.success).length;
  let footer = `Executed ${succeeded} of ${attempted} statement${attempted === 1 ? "" : "s"}`;
  if (!result.completed && result.errorIndex !== undefined) {
    footer += `, stopped at statement ${result.errorIndex + 1}`;
  }
  return [...blocks, footer].join("\n\n");
}

const CSV_QUOTE_NEEDED = /[",\n]/;

function csvField(text: string): string {
  return CSV_QUOTE_NEEDED.test(text) ? `"${text.replaceAll('"', '""')}"` : text;
}

function formatCsv(result: QueryResult): string {
  const header = result.columns.map(csvField).join(",");
  const records = result.rows.map(row =>
    result.columns.map((_name, i) => csvField(row[i] === null || row[i] === undefined ? "" : renderCell(row[i]))).join(","),
  );
  return [header, ...records].join("\n");
}

function formatTable(result: QueryResult): string {
  const grid = result.rows.map(row => result.columns.map((_name, i) => renderCell(row[i])));
  const widths = result.columns.map((name, i) => grid.reduce((width, cells) => Math.max(width, cells[i].length), name.length));
  const line = (cells: string[]): string => cells.map((cell, i) => cell.padEnd(widths[i])).join(" | ");

  const n = result.rows.length;
  const footer = result.truncated ? `(${n} rows shown, results truncated)` : `(${n} row${n === 1 ? "" : "s"})`;

  return [line(result.columns), widths.map(w => "─".repeat(w)).join("─┼─"), ...grid.map(line), "", footer].join("\n");
}
