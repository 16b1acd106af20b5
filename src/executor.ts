import { KeywordQueryAnalyzer, type QueryAnalyzer } from "./analyzer.js";
import { AtomicBatchExecutor } from "./atomic.js";
import type { ConnectionConfig } from "./config.js";
import { closeQuietly, openConnection, runOnConnection } from "./connection.js";
import type { Connection, DatabaseProvider } from "./drivers/base.js";
import { ExecutionError, QueryCancelledError } from "./errors.js";
import { silentLogger, type Logger } from "./logger.js";
import type { ExecutionOutcome, SingleResult } from "./results.js";
import { normalizeForExecution, splitStatements } from "./splitter.js";
import { isTransactionStart, TransactionStateTracker } from "./transaction.js";

export interface ExecutorOptions {
  analyzer?: QueryAnalyzer;
  logger?: Logger;
}

/**
 * Executes SQL with transaction awareness.
 *
 * Outside a transaction each call gets a fresh connection that is closed
 * afterwards. Once a batch opens a transaction (BEGIN, START TRANSACTION),
 * the connection is kept and reused by later calls until a COMMIT or
 * ROLLBACK ends it.
 *
 * One instance per connection session; calls on the same instance must not
 * overlap. `close()` may be called while a call is in flight.
 *
 * @example
 * ```ts
 * const executor = new TransactionExecutor(config, provider);
 * try {
 *   await executor.execute("BEGIN");
 *   await executor.execute("INSERT INTO t VALUES (1)");
 *   await executor.execute("COMMIT");
 * } finally {
 *   await executor.close();
 * }
 * ```
 */
export class TransactionExecutor<C extends Connection = Connection> {
  private readonly tracker = new TransactionStateTracker();
  private readonly analyzer: QueryAnalyzer;
  private readonly logger: Logger;
  private transactionConnection: C | undefined;
  // Bumped by close(); calls started before a close leave state alone.
  private generation = 0;

  constructor(
    readonly config: ConnectionConfig,
    readonly provider: DatabaseProvider<C>,
    private readonly options: ExecutorOptions = {},
  ) {
    this.analyzer = options.analyzer ?? new KeywordQueryAnalyzer();
    this.logger = options.logger ?? silentLogger;
  }

  get inTransaction(): boolean {
    return this.tracker.inTransaction;
  }

  /** Whether a connection is currently held open for a transaction. */
  get hasPersistentConnection(): boolean {
    return this.transactionConnection !== undefined;
  }

  /**
   * Execute one statement or batch. Driver failures are thrown as
   * ExecutionError carrying the driver's message; failures to connect
   * propagate unchanged.
   */
  async execute(sql: string, maxRows?: number): Promise<SingleResult> {
    const normalized = normalizeForExecution(sql);
    const startsTransaction = splitStatements(normalized).some(s => isTransactionStart(s.text));
    const usePersistent = this.transactionConnection !== undefined || startsTransaction || this.tracker.inTransaction;
    const generation = this.generation;

    let conn: C;
    if (usePersistent) {
      conn = this.transactionConnection ?? (await this.openPersistent(generation));
    } else {
      conn = await openConnection(this.provider, this.config, this.logger, "ephemeral");
    }

    try {
      let result: SingleResult;
      try {
        result = await runOnConnection(this.provider, this.analyzer, conn, normalized, maxRows);
      } catch (e) {
        throw ExecutionError.from(e);
      }

      if (generation === this.generation) {
        this.tracker.onQueryExecuted(normalized);
        if (this.transactionConnection !== undefined && !this.tracker.inTransaction) {
          await this.releaseTransactionConnection();
        }
      }
      return result;
    } finally {
      if (!usePersistent) await closeQuietly(conn, this.logger);
    }
  }

  /**
   * Execute all-or-nothing on a dedicated connection, independent of any
   * transaction this executor holds open.
   */
  async atomicExecute(sql: string, maxRows?: number): Promise<ExecutionOutcome> {
    return new AtomicBatchExecutor(this.config, this.provider, this.options).execute(sql, maxRows);
  }

  /** Close any held connection and forget transaction state. Safe to repeat. */
  async close(): Promise<void> {
    this.generation++;
    await this.releaseTransactionConnection();
    this.tracker.reset();
  }

  private async openPersistent(generation: number): Promise<C> {
    const conn = await openConnection(this.provider, this.config, this.logger, "transaction");
    if (generation !== this.generation) {
      await closeQuietly(conn, this.logger);
      throw new QueryCancelledError("Executor was closed while connecting");
    }
    this.transactionConnection = conn;
    return conn;
  }

  private async releaseTransactionConnection(): Promise<void> {
    const conn = this.transactionConnection;
    if (conn === undefined) return;
    this.transactionConnection = undefined;
    await closeQuietly(conn, this.logger);
    this.logger.debug("transaction connection released");
  }
}
