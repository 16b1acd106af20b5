import { KeywordQueryAnalyzer, type QueryAnalyzer } from "./analyzer.js";
import type { ConnectionConfig } from "./config.js";
import { closeQuietly, openConnection, runOnConnection } from "./connection.js";
import type { Connection, DatabaseProvider } from "./drivers/base.js";
import { ExecutionError, QueryCancelledError } from "./errors.js";
import { silentLogger, type Logger } from "./logger.js";
import type { SingleResult } from "./results.js";

export interface CancellableQueryOptions {
  analyzer?: QueryAnalyzer;
  logger?: Logger;
}

/**
 * A query on its own connection, cancelled by closing that connection. The
 * in-flight driver call then fails, which works the same way for every driver.
 *
 * Library only: the `sqlrun` commands run through `QuerySession`, whose
 * executor keeps a transaction's connection across calls, so they do not use
 * this. It is for clients that run one ad-hoc query outside any session and
 * want to abort it, for instance from a UI's stop button.
 *
 * @example
 * ```ts
 * const query = new CancellableQuery("SELECT * FROM big_table", config, provider);
 * const pending = query.execute(1000);
 * // later, e.g. on Ctrl-C:
 * await query.cancel();
 * ```
 */
export class CancellableQuery<C extends Connection = Connection> {
  private connection: C | undefined;
  private cancelled = false;
  private executing = false;
  private readonly analyzer: QueryAnalyzer;
  private readonly logger: Logger;

  constructor(
    readonly sql: string,
    readonly config: ConnectionConfig,
    readonly provider: DatabaseProvider<C>,
    options: CancellableQueryOptions = {},
  ) {
    this.analyzer = options.analyzer ?? new KeywordQueryAnalyzer();
    this.logger = options.logger ?? silentLogger;
  }

  get isCancelled(): boolean {
    return this.cancelled;
  }

  get isExecuting(): boolean {
    return this.executing;
  }

  async execute(maxRows?: number): Promise<SingleResult> {
    if (this.cancelled) throw new QueryCancelledError();
    this.executing = true;

    try {
      const conn = await openConnection(this.provider, this.config, this.logger, "cancellable");
      if (this.cancelled) {
        await closeQuietly(conn, this.logger);
        throw new QueryCancelledError();
      }
      this.connection = conn;

      try {
        return await runOnConnection(this.provider, this.analyzer, conn, this.sql, maxRows);
      } catch (e) {
        if (this.cancelled) throw new QueryCancelledError();
        throw ExecutionError.from(e);
      }
    } finally {
      this.executing = false;
      await this.releaseConnection();
    }
  }

  /** Returns false if the query was already cancelled. */
  async cancel(): Promise<boolean> {
    if (this.cancelled) return false;
    this.cancelled = true;
    this.logger.info("query cancelled");
    await this.releaseConnection();
    return true;
  }

  private async releaseConnection(): Promise<void> {
    const conn = this.connection;
    if (conn === undefined) return;
    this.connection = undefined;
    await closeQuietly(conn, this.logger);
  }
}
