import { KeywordQueryAnalyzer, type QueryAnalyzer } from "./analyzer.js";
import type { ConnectionConfig } from "./config.js";
import { closeQuietly, openConnection, runOnConnection } from "./connection.js";
import type { Connection, DatabaseProvider } from "./drivers/base.js";
import { ExecutionError, getErrorMessage, TransactionControlError, type TransactionCommand } from "./errors.js";
import { silentLogger, type Logger } from "./logger.js";
import { completedBatch, failedBatch, type ExecutionOutcome, type SingleResult, type StatementResult } from "./results.js";
import { isCommentOnly, normalizeForExecution, splitStatements } from "./splitter.js";

export interface AtomicExecutorOptions {
  analyzer?: QueryAnalyzer;
  logger?: Logger;
}

/**
 * Runs a batch all-or-nothing on a dedicated connection: BEGIN, every
 * statement in order, then COMMIT, with ROLLBACK on the first failure.
 *
 * A single statement returns its own result so single-statement callers see
 * the same shape as a plain execute. Several statements return a `multi`
 * outcome; a failing statement is reported in it (with everything attempted
 * so far) rather than thrown. Only BEGIN/COMMIT failures, or the failure of a
 * lone statement, are thrown, after a best-effort ROLLBACK.
 */
export class AtomicBatchExecutor<C extends Connection = Connection> {
  private readonly analyzer: QueryAnalyzer;
  private readonly logger: Logger;

  constructor(
    readonly config: ConnectionConfig,
    readonly provider: DatabaseProvider<C>,
    options: AtomicExecutorOptions = {},
  ) {
    this.analyzer = options.analyzer ?? new KeywordQueryAnalyzer();
    this.logger = options.logger ?? silentLogger;
  }

  async execute(sql: string, maxRows?: number): Promise<ExecutionOutcome> {
    const statements = splitStatements(normalizeForExecution(sql)).filter(s => !isCommentOnly(s.text));
    if (statements.length === 0) return completedBatch([]);

    const conn = await openConnection(this.provider, this.config, this.logger, "atomic");
    try {
      await this.control(conn, "BEGIN");

      if (statements.length === 1) {
        let result: SingleResult;
        try {
          result = await runOnConnection(this.provider, this.analyzer, conn, statements[0].text, maxRows);
        } catch (e) {
          throw ExecutionError.from(e);
        }
        await this.control(conn, "COMMIT");
        return result;
      }

      const results: StatementResult[] = [];
      for (const [i, statement] of statements.entries()) {
        try {
          const outcome = await runOnConnection(this.provider, this.analyzer, conn, statement.text, maxRows);
          results.push({ statement, success: true, outcome });
        } catch (e) {
          results.push({ statement, success: false, error: getErrorMessage(e) });
          await this.rollbackQuietly(conn);
          return failedBatch(results, i);
        }
      }

      await this.control(conn, "COMMIT");
      return completedBatch(results);
    } catch (e) {
      await this.rollbackQuietly(conn);
      throw e;
    } finally {
      await closeQuietly(conn, this.logger);
    }
  }

  private async control(conn: C, command: TransactionCommand): Promise<void> {
    try {
      await this.provider.queryExecutor.executeNonQuery(conn, command);
    } catch (e) {
      throw new TransactionControlError(command, e);
    }
  }

  /** A failed ROLLBACK must not mask the error that caused it. */
  private async rollbackQuietly(conn: C): Promise<void> {
    try {
      await this.control(conn, "ROLLBACK");
    } catch (err) {
      this.logger.warn({ err }, "rollback failed");
    }
  }
}
