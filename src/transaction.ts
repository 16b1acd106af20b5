import { splitStatements } from "./splitter.js";

const BEGIN_RE = /^\s*(BEGIN|START\s+TRANSACTION)(\s+WORK|\s+TRANSACTION)?\s*;?\s*$/i;
const END_RE = /^\s*(COMMIT|ROLLBACK)(\s+WORK|\s+TRANSACTION)?\s*;?\s*$/i;

/** BEGIN, BEGIN WORK, BEGIN TRANSACTION, START TRANSACTION. */
export function isTransactionStart(sql: string): boolean {
  return BEGIN_RE.test(sql);
}

/** COMMIT or ROLLBACK, optionally followed by WORK or TRANSACTION. */
export function isTransactionEnd(sql: string): boolean {
  return END_RE.test(sql);
}

/**
 * Wrap SQL in BEGIN/COMMIT. Input that already opens with BEGIN or START is
 * returned as-is (trimmed).
 */
export function wrapInTransaction(sql: string): string {
  let stripped = sql.trim();
  if (!stripped) return stripped;

  const firstWord = stripped.split(/\s+/)[0].toUpperCase().replace(/;+$/, "");
  if (firstWord === "BEGIN" || firstWord === "START") return stripped;

  if (!stripped.endsWith(";")) stripped += ";";
  return `BEGIN; ${stripped} COMMIT;`;
}

/**
 * Tracks whether the statements executed so far have left a transaction open.
 * Feed it every successfully executed batch; reset it on disconnect.
 */
export class TransactionStateTracker {
  private open = false;

  get inTransaction(): boolean {
    return this.open;
  }

  /** Later statements in the same batch win. */
  onQueryExecuted(sql: string): void {
    for (const statement of splitStatements(sql)) {
      if (isTransactionStart(statement.text)) {
        this.open = true;
      } else if (isTransactionEnd(statement.text)) {
        this.open = false;
      }
    }
  }

  reset(): void {
    this.open = false;
  }
}
