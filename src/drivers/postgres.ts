import { Client, type FieldDef, type QueryArrayResult } from "pg";
import Cursor from "pg-cursor";
import { expandEnv, type ConnectionConfig } from "../config.js";
import { ConnectionError, getErrorMessage } from "../errors.js";
import { silentLogger, type Logger } from "../logger.js";
import type { Value } from "../results.js";
import { splitStatements } from "../splitter.js";
import type { Connection, DatabaseProvider, FetchedRows, QueryExecutor } from "./base.js";
import { collectBatches, RowCollector } from "./base.js";

export class PostgresConnection implements Connection {
  private closed = false;

  constructor(readonly client: Client) {}

  async close(): Promise<void> {
    if (this.closed) return;
    this.closed = true;
    await this.client.end();
  }
}

// The simple query protocol returns one result per statement for batches.
type ArrayResults = QueryArrayResult | QueryArrayResult[];

function asList(result: ArrayResults): QueryArrayResult[] {
  return Array.isArray(result) ? result : [result];
}

const FETCH_SIZE = 500;

interface CursorBatch {
  rows: Value[][];
  fields: FieldDef[];
}

function readBatch(cursor: Cursor<Value[]>, count: number): Promise<CursorBatch> {
  return new Promise((resolve, reject) => {
    cursor.read(count, (err, rows, result) => {
      if (err) reject(err);
      else resolve({ rows, fields: result.fields });
    });
  });
}

export const postgresQueryExecutor: QueryExecutor<PostgresConnection> = {
  // A cursor takes a single statement, so the leading statements of a batch
  // run first and rows are read from the last one in bounded batches.
  async executeQuery(conn, sql, maxRows): Promise<FetchedRows> {
    const statements = splitStatements(sql);
    const last = statements.pop();
    if (!last) return { columns: [], rows: [], truncated: false };

    for (const statement of statements) await conn.client.query(statement.text);

    const cursor = conn.client.query(new Cursor<Value[]>(last.text, undefined, { rowMode: "array" }));
    const collector = new RowCollector(maxRows);
    let fields: FieldDef[] = [];
    await collectBatches(async count => {
      const batch = await readBatch(cursor, count);
      fields = batch.fields;
      return batch.rows;
    }, collector, FETCH_SIZE);
    // a failed read leaves the cursor finished, so only a successful one closes it
    await cursor.close();
    return { columns: fields.map(f => f.name), rows: collector.rows, truncated: collector.truncated };
  },

  async executeNonQuery(conn, sql): Promise<number> {
    const results = asList(await conn.client.query({ text: sql, rowMode: "array" }));
    return results.reduce((sum, r) => sum + (r.rowCount ?? 0), 0);
  },
};

export interface PostgresProviderOptions {
  /** statement_timeout applied after connecting, in milliseconds */
  queryTimeout?: number;
  logger?: Logger;
}

export class PostgresProvider implements DatabaseProvider<PostgresConnection> {
  readonly driverName = "postgres";
  readonly queryExecutor = postgresQueryExecutor;
  private readonly queryTimeout: number;
  private readonly logger: Logger;

  constructor(options: PostgresProviderOptions = {}) {
    this.queryTimeout = options.queryTimeout ?? 0;
    this.logger = options.logger ?? silentLogger;
  }

  async connect(config: ConnectionConfig): Promise<PostgresConnection> {
    const client = new Client({ connectionString: expandEnv(config.connectionString ?? "") });

    try {
      await client.connect();
    } catch (e) {
      await client.end().catch(err => this.logger.debug({ err }, "postgres: end after failed connect"));
      const msg = getErrorMessage(e);
      if (msg.includes("ECONNREFUSED")) {
        throw new ConnectionError(`Cannot connect to PostgreSQL — connection refused. Is the server running? Check host/port in your connection string.`, { cause: e });
      }
      if (msg.includes("password authentication failed")) {
        throw new ConnectionError(`PostgreSQL authentication failed — wrong password. Check your connection string credentials.`, { cause: e });
      }
      if (msg.includes("does not exist")) {
        throw new ConnectionError(`PostgreSQL database not found. ${msg}`, { cause: e });
      }
      throw new ConnectionError(`PostgreSQL connection failed: ${msg}`, { cause: e });
    }

    return new PostgresConnection(client);
  }

  async postConnect(conn: PostgresConnection, config: ConnectionConfig): Promise<void> {
    if (this.queryTimeout > 0) {
      await conn.client.query(`SET statement_timeout = ${Math.floor(this.queryTimeout)}`);
    }
    if (config.readOnly) {
      await conn.client.query("SET SESSION CHARACTERISTICS AS TRANSACTION READ ONLY");
    }
  }
}
