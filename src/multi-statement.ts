import { getErrorMessage } from "./errors.js";
import { completedBatch, failedBatch, type MultiStatementResult, type SingleResult, type StatementResult } from "./results.js";
import { isCommentOnly, splitStatements } from "./splitter.js";

/** Anything that can run one statement, e.g. a TransactionExecutor. */
export interface StatementExecutor {
  execute(sql: string, maxRows?: number): Promise<SingleResult>;
}

/**
 * Runs the statements of a batch one after another through a wrapped
 * executor, stopping at the first failure. Results of statements that
 * already ran are kept.
 */
export class MultiStatementExecutor {
  constructor(private readonly executor: StatementExecutor) {}

  async execute(sql: string, maxRows?: number): Promise<MultiStatementResult> {
    // Comment-only statements make some drivers fail with "empty query".
    const statements = splitStatements(sql).filter(s => !isCommentOnly(s.text));
    const results: StatementResult[] = [];

    for (const [i, statement] of statements.entries()) {
      try {
        const outcome = await this.executor.execute(statement.text, maxRows);
        results.push({ statement, success: true, outcome });
      } catch (e) {
        results.push({ statement, success: false, error: getErrorMessage(e) });
        return failedBatch(results, i);
      }
    }

    return completedBatch(results);
  }
}
