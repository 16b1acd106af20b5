import type { Statement } from "./splitter.js";

export type Value = unknown;

export interface QueryResult {
  kind: "query";
  columns: string[];
  rows: Value[][];
  rowCount: number;
  /** More rows were available than were fetched. */
  truncated: boolean;
}

export interface NonQueryResult {
  kind: "nonQuery";
  rowsAffected: number;
}

export type SingleResult = QueryResult | NonQueryResult;

export type StatementResult =
  | { statement: Statement; success: true; outcome: SingleResult }
  | { statement: Statement; success: false; error: string };

/**
 * Results of a statement batch. `completed` is false exactly when
 * `errorIndex` is set, and `results` holds every attempted statement
 * including the failing one.
 */
export interface MultiStatementResult {
  kind: "multi";
  results: StatementResult[];
  completed: boolean;
  errorIndex?: number;
}

export type ExecutionOutcome = SingleResult | MultiStatementResult;

export function queryResult(columns: string[], rows: Value[][], truncated: boolean): QueryResult {
  return { kind: "query", columns, rows, rowCount: rows.length, truncated };
}

export function nonQueryResult(rowsAffected: number): NonQueryResult {
  return { kind: "nonQuery", rowsAffected };
}

export function completedBatch(results: StatementResult[]): MultiStatementResult {
  return { kind: "multi", results, completed: true };
}

export function failedBatch(results: StatementResult[], errorIndex: number): MultiStatementResult {
  return { kind: "multi", results, completed: false, errorIndex };
}

export function hasError(result: MultiStatementResult): boolean {
  return result.errorIndex !== undefined;
}

export function successfulCount(result: MultiStatementResult): number {
  return result.results.filter(r => r.success).length;
}

/** Row results of the statements that succeeded, in execution order. */
export function queryResults(result: MultiStatementResult): QueryResult[] {
  const out: QueryResult[] = [];
  for (const r of result.results) {
    if (r.success && r.outcome.kind === "query") out.push(r.outcome);
  }
  return out;
}
