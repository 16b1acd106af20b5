import { checkReadOnly, classifyQueryAlert, shouldConfirm, type AlertMode, type AlertSeverity } from "./alerts.js";
import type { QueryAnalyzer } from "./analyzer.js";
import type { ConnectionConfig } from "./config.js";
import type { Connection, DatabaseProvider } from "./drivers/base.js";
import { ExecutionError, QueryCancelledError, TransactionControlError } from "./errors.js";
import { TransactionExecutor } from "./executor.js";
import type { QueryHistoryStore } from "./history.js";
import { silentLogger, type Logger } from "./logger.js";
import { MultiStatementExecutor } from "./multi-statement.js";
import type { ExecutionOutcome } from "./results.js";
import { isCommentOnly, splitStatements } from "./splitter.js";

/** Asked before running a query the alert mode flags. Resolve true to run it. */
export type ConfirmFn = (severity: AlertSeverity, sql: string) => Promise<boolean>;

export interface QuerySessionOptions<C extends Connection = Connection> {
  connectionName: string;
  config: ConnectionConfig;
  provider: DatabaseProvider<C>;
  alertMode?: AlertMode;
  /** Default row limit for queries; undefined means unlimited. */
  maxRows?: number;
  /** Without one, every flagged query is declined. */
  confirm?: ConfirmFn;
  history?: QueryHistoryStore;
  analyzer?: QueryAnalyzer;
  logger?: Logger;
}

export interface RunOptions {
  /** Wrap the whole input in BEGIN/COMMIT with rollback on failure. */
  atomic?: boolean;
  maxRows?: number;
}

export type RunOutcome =
  | { status: "empty" }
  | { status: "blocked"; reason: string }
  | { status: "declined"; severity: AlertSeverity }
  | { status: "ok"; outcome: ExecutionOutcome; elapsedMs: number }
  | { status: "failed"; error: string; elapsedMs: number };

const declineAll: ConfirmFn = async () => false;

/**
 * One connection session as seen by an interactive client: owns the
 * transaction-aware executor, applies the read-only gate and the alert
 * mode, picks single, multi-statement or atomic execution, and records
 * history.
 */
export class QuerySession<C extends Connection = Connection> {
  alertMode: AlertMode;
  readonly connectionName: string;
  private readonly executor: TransactionExecutor<C>;
  private readonly readOnly: boolean;
  private readonly maxRows: number | undefined;
  private readonly confirm: ConfirmFn;
  private readonly history: QueryHistoryStore | undefined;
  private readonly logger: Logger;

  constructor(options: QuerySessionOptions<C>) {
    this.connectionName = options.connectionName;
    this.alertMode = options.alertMode ?? "off";
    this.readOnly = options.config.readOnly ?? false;
    this.maxRows = options.maxRows;
    this.confirm = options.confirm ?? declineAll;
    this.history = options.history;
    this.logger = (options.logger ?? silentLogger).child({ connection: options.connectionName });
    this.executor = new TransactionExecutor(options.config, options.provider, {
      analyzer: options.analyzer,
      logger: this.logger,
    });
  }

  get inTransaction(): boolean {
    return this.executor.inTransaction;
  }

  async run(sql: string, options: RunOptions = {}): Promise<RunOutcome> {
    const statements = splitStatements(sql).filter(s => !isCommentOnly(s.text));
    if (statements.length === 0) return { status: "empty" };

    const safety = checkReadOnly(sql, this.readOnly);
    if (!safety.allowed) {
      return { status: "blocked", reason: safety.reason ?? "blocked: connection is read-only" };
    }

    const severity = classifyQueryAlert(sql);
    if (shouldConfirm(this.alertMode, severity) && !(await this.confirm(severity, sql))) {
      this.logger.info({ severity }, "query declined");
      return { status: "declined", severity };
    }

    const maxRows = options.maxRows ?? this.maxRows;
    const started = performance.now();
    let outcome: ExecutionOutcome;
    try {
      if (options.atomic) {
        outcome = await this.executor.atomicExecute(sql, maxRows);
      } else if (statements.length > 1) {
        outcome = await new MultiStatementExecutor(this.executor).execute(sql, maxRows);
      } else {
        outcome = await this.executor.execute(statements[0].text, maxRows);
      }
    } catch (e) {
      if (e instanceof ExecutionError || e instanceof TransactionControlError || e instanceof QueryCancelledError) {
        return { status: "failed", error: e.message, elapsedMs: performance.now() - started };
      }
      throw e;
    }
    const elapsedMs = performance.now() - started;

    await this.recordHistory(sql);
    return { status: "ok", outcome, elapsedMs };
  }

  /** Disconnect: closes any held transaction connection. */
  async close(): Promise<void> {
    await this.executor.close();
  }

  private async recordHistory(sql: string): Promise<void> {
    if (!this.history) return;
    try {
      await this.history.saveQuery(this.connectionName, sql);
    } catch (err) {
      this.logger.warn({ err }, "could not save query history");
    }
  }
}
