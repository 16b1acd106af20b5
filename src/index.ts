export {
  ALERT_MODES,
  checkReadOnly,
  classifyQueryAlert,
  compareSeverity,
  formatAlertMode,
  parseAlertMode,
  shouldConfirm,
  stripLiteralsAndComments,
  type AlertMode,
  type AlertSeverity,
  type SafetyResult,
} from "./alerts.js";
export { KeywordQueryAnalyzer, type QueryAnalyzer, type QueryKind } from "./analyzer.js";
export { AtomicBatchExecutor, type AtomicExecutorOptions } from "./atomic.js";
export { CancellableQuery, type CancellableQueryOptions } from "./cancellable.js";
export { createCLI, type CliDeps } from "./cli.js";
export {
  ConnectionConfigSchema,
  expandEnv,
  loadConfig,
  maskConnectionString,
  resolveConfig,
  resolveConnectionName,
  resolvePath,
  type ConnectionConfig,
  type DriverName,
  type SqlrunConfig,
} from "./config.js";
export { closeQuietly, openConnection, runOnConnection } from "./connection.js";
export { createProvider, type ProviderOptions } from "./drivers/index.js";
export { collectBatches, RowCollector, type Connection, type DatabaseProvider, type FetchedRows, type QueryExecutor } from "./drivers/base.js";
export { SqliteConnection, SqliteProvider, sqliteQueryExecutor } from "./drivers/sqlite.js";
export {
  ConfigError,
  ConnectionError,
  ExecutionError,
  QueryCancelledError,
  SqlrunError,
  TransactionControlError,
  getErrorMessage,
  toError,
  type ErrorCode,
  type TransactionCommand,
} from "./errors.js";
export { TransactionExecutor, type ExecutorOptions } from "./executor.js";
export { formatOutcome, formatQueryResult, isOutputFormat, OUTPUT_FORMATS, type OutputFormat } from "./format.js";
export {
  HISTORY_MAX,
  InMemoryHistoryStore,
  JsonFileHistoryStore,
  type HistoryEntry,
  type QueryHistoryStore,
} from "./history.js";
export { createLogger, silentLogger, type Logger, type LogLevel } from "./logger.js";
export { MultiStatementExecutor, type StatementExecutor } from "./multi-statement.js";
export {
  completedBatch,
  failedBatch,
  hasError,
  nonQueryResult,
  queryResult,
  queryResults,
  successfulCount,
  type ExecutionOutcome,
  type MultiStatementResult,
  type NonQueryResult,
  type QueryResult,
  type SingleResult,
  type StatementResult,
  type Value,
} from "./results.js";
export { QuerySession, type ConfirmFn, type QuerySessionOptions, type RunOptions, type RunOutcome } from "./session.js";
export {
  hasSemicolonOutsideStrings,
  isCommentOnly,
  normalizeForExecution,
  splitStatements,
  statementAt,
  type Statement,
} from "./splitter.js";
export { isTransactionEnd, isTransactionStart, TransactionStateTracker, wrapInTransaction } from "./transaction.js";
