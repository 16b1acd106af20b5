import Database from "better-sqlite3";
import { mkdirSync } from "node:fs";
import { dirname } from "node:path";
import { resolvePath, type ConnectionConfig } from "../config.js";
import { ConnectionError, getErrorMessage } from "../errors.js";
import { silentLogger, type Logger } from "../logger.js";
import type { Value } from "../results.js";
import { splitStatements } from "../splitter.js";
import type { Connection, DatabaseProvider, FetchedRows, QueryExecutor } from "./base.js";
import { RowCollector } from "./base.js";

export class SqliteConnection implements Connection {
  constructor(readonly db: Database.Database) {}

  async close(): Promise<void> {
    if (this.db.open) this.db.close();
  }
}

function toRow(row: unknown): Value[] {
  return Array.isArray(row) ? row : [row];
}

// better-sqlite3 prepares one statement at a time, so batches are run
// statement by statement.
export const sqliteQueryExecutor: QueryExecutor<SqliteConnection> = {
  async executeQuery(conn, sql, maxRows): Promise<FetchedRows> {
    const statements = splitStatements(sql);
    const last = statements.pop();
    if (!last) return { columns: [], rows: [], truncated: false };

    for (const statement of statements) conn.db.prepare(statement.text).run();

    const stmt = conn.db.prepare(last.text);
    if (!stmt.reader) {
      stmt.run();
      return { columns: [], rows: [], truncated: false };
    }

    const columns = stmt.columns().map(c => c.name);
    const collector = new RowCollector(maxRows);
    for (const row of stmt.raw(true).iterate()) {
      if (!collector.add(toRow(row))) break;
    }
    return { columns, rows: collector.rows, truncated: collector.truncated };
  },

  async executeNonQuery(conn, sql): Promise<number> {
    let changes = 0;
    for (const statement of splitStatements(sql)) {
      changes += conn.db.prepare(statement.text).run().changes;
    }
    return changes;
  },
};

export interface SqliteProviderOptions {
  /** Busy timeout in milliseconds. */
  queryTimeout?: number;
  logger?: Logger;
}

export class SqliteProvider implements DatabaseProvider<SqliteConnection> {
  readonly driverName = "sqlite";
  readonly queryExecutor = sqliteQueryExecutor;
  private readonly queryTimeout: number;
  private readonly logger: Logger;

  constructor(options: SqliteProviderOptions = {}) {
    this.queryTimeout = options.queryTimeout ?? 0;
    this.logger = options.logger ?? silentLogger;
  }

  async connect(config: ConnectionConfig): Promise<SqliteConnection> {
    const path = resolvePath(config.path ?? ":memory:");
    const readOnly = config.readOnly ?? false;
    try {
      if (path !== ":memory:" && !readOnly) mkdirSync(dirname(path), { recursive: true });
      const db = new Database(path, { readonly: readOnly, fileMustExist: readOnly });
      this.logger.debug({ path, readOnly }, "sqlite: opened database");
      return new SqliteConnection(db);
    } catch (e) {
      throw new ConnectionError(`Failed to open SQLite database at ${path}: ${getErrorMessage(e)}`, { cause: e });
    }
  }

  async postConnect(conn: SqliteConnection): Promise<void> {
    conn.db.pragma("foreign_keys = ON");
    if (this.queryTimeout > 0) conn.db.pragma(`busy_timeout = ${Math.floor(this.queryTimeout)}`);
  }
}
