import type { QueryAnalyzer } from "./analyzer.js";
import type { ConnectionConfig } from "./config.js";
import type { Connection, DatabaseProvider } from "./drivers/base.js";
import type { Logger } from "./logger.js";
import { nonQueryResult, queryResult, type SingleResult } from "./results.js";

/**
 * Connect and run the provider's session setup. Setup failures are logged
 * and ignored; connect failures propagate.
 */
export async function openConnection<C extends Connection>(
  provider: DatabaseProvider<C>,
  config: ConnectionConfig,
  logger: Logger,
  purpose: string,
): Promise<C> {
  const conn = await provider.connect(config);
  try {
    await provider.postConnect(conn, config);
  } catch (err) {
    logger.warn({ err, driver: provider.driverName }, "post-connect setup failed; continuing");
  }
  logger.debug({ driver: provider.driverName, purpose }, "connection opened");
  return conn;
}

/** Close failures are not actionable, so they only reach the debug log. */
export async function closeQuietly(conn: Connection, logger: Logger): Promise<void> {
  try {
    await conn.close();
  } catch (err) {
    logger.debug({ err }, "connection close failed");
  }
}

/** Run SQL as rows or as a non-query, as the analyzer decides. */
export async function runOnConnection<C extends Connection>(
  provider: DatabaseProvider<C>,
  analyzer: QueryAnalyzer,
  conn: C,
  sql: string,
  maxRows?: number,
): Promise<SingleResult> {
  if (analyzer.classify(sql) === "returnsRows") {
    const { columns, rows, truncated } = await provider.queryExecutor.executeQuery(conn, sql, maxRows);
    return queryResult(columns, rows, truncated);
  }
  const rowsAffected = await provider.queryExecutor.executeNonQuery(conn, sql);
  return nonQueryResult(rowsAffected);
}
