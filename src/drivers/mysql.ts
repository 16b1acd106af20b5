import mysql, { type Connection as MysqlDriverConnection } from "mysql2/promise";
import { expandEnv, type ConnectionConfig } from "../config.js";
import { ConnectionError, getErrorMessage } from "../errors.js";
import { silentLogger, type Logger } from "../logger.js";
import type { Value } from "../results.js";
import type { Connection, DatabaseProvider, FetchedRows, QueryExecutor } from "./base.js";
import { RowCollector } from "./base.js";

export class MysqlConnection implements Connection {
  private closed = false;

  constructor(readonly conn: MysqlDriverConnection) {}

  async close(): Promise<void> {
    if (this.closed) return;
    this.closed = true;
    await this.conn.end();
  }
}

interface AffectedRows {
  affectedRows: number;
}

function isHeader(value: unknown): value is AffectedRows {
  return typeof value === "object" && value !== null && "affectedRows" in value && typeof value.affectedRows === "number";
}

function isRow(value: unknown): value is Value[] {
  return Array.isArray(value);
}

function fieldName(field: unknown): string {
  return typeof field === "object" && field !== null && "name" in field ? String(field.name) : "";
}

export const mysqlQueryExecutor: QueryExecutor<MysqlConnection> = {
  // Rows arrive as events on the core connection, so nothing past the limit
  // is held. With multipleStatements each statement starts a new result set
  // (a field list, or an OK header for a non-query) and the last one is kept.
  executeQuery(conn, sql, maxRows): Promise<FetchedRows> {
    return new Promise((resolve, reject) => {
      let columns: string[] = [];
      let collector = new RowCollector(maxRows);

      conn.conn.connection
        .query({ sql, rowsAsArray: true })
        .on("fields", fields => {
          columns = Array.isArray(fields) ? fields.map(fieldName) : [];
          collector = new RowCollector(maxRows);
        })
        .on("result", row => {
          if (isRow(row)) {
            collector.add(row);
          } else {
            columns = [];
            collector = new RowCollector(maxRows);
          }
        })
        .on("error", reject)
        .on("end", () => resolve({ columns, rows: collector.rows, truncated: collector.truncated }));
    });
  },

  async executeNonQuery(conn, sql): Promise<number> {
    const [result]: [unknown, unknown] = await conn.conn.query(sql);
    if (isHeader(result)) return result.affectedRows;
    if (!Array.isArray(result)) return 0;
    return result.reduce((sum: number, entry: unknown) => sum + (isHeader(entry) ? entry.affectedRows : 0), 0);
  },
};

export interface MysqlProviderOptions {
  /** max_execution_time applied after connecting, in milliseconds */
  queryTimeout?: number;
  logger?: Logger;
}

export class MysqlProvider implements DatabaseProvider<MysqlConnection> {
  readonly driverName = "mysql";
  readonly queryExecutor = mysqlQueryExecutor;
  private readonly queryTimeout: number;
  private readonly logger: Logger;

  constructor(options: MysqlProviderOptions = {}) {
    this.queryTimeout = options.queryTimeout ?? 0;
    this.logger = options.logger ?? silentLogger;
  }

  async connect(config: ConnectionConfig): Promise<MysqlConnection> {
    try {
      const conn = await mysql.createConnection({
        uri: expandEnv(config.connectionString ?? ""),
        multipleStatements: true,
      });
      this.logger.debug("mysql: connected");
      return new MysqlConnection(conn);
    } catch (e) {
      const msg = getErrorMessage(e);
      if (msg.includes("ECONNREFUSED")) {
        throw new ConnectionError(`Cannot connect to MySQL — connection refused. Is the server running? Check host/port.`, { cause: e });
      }
      if (msg.includes("Access denied")) {
        throw new ConnectionError(`MySQL access denied — wrong username or password. Check your connection string credentials.`, { cause: e });
      }
      if (msg.includes("Unknown database")) {
        throw new ConnectionError(`MySQL database not found. ${msg}`, { cause: e });
      }
      throw new ConnectionError(`MySQL connection failed: ${msg}`, { cause: e });
    }
  }

  async postConnect(conn: MysqlConnection, config: ConnectionConfig): Promise<void> {
    if (this.queryTimeout > 0) {
      await conn.conn.query(`SET SESSION max_execution_time = ${Math.floor(this.queryTimeout)}`);
    }
    if (config.readOnly) {
      await conn.conn.query("SET SESSION TRANSACTION READ ONLY");
    }
  }
}
