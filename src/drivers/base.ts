import type { ConnectionConfig } from "../config.js";
import type { Value } from "../results.js";

/** An open database connection. `close()` must be safe to call more than once. */
export interface Connection {
  close(): Promise<void>;
}

export interface FetchedRows {
  columns: string[];
  rows: Value[][];
  /** true if more than `maxRows` rows were available */
  truncated: boolean;
}

export interface QueryExecutor<C extends Connection = Connection> {
  /** Run row-returning SQL. `maxRows` undefined means no limit. */
  executeQuery(conn: C, sql: string, maxRows?: number): Promise<FetchedRows>;

  /** Run anything else and report the affected row count. */
  executeNonQuery(conn: C, sql: string): Promise<number>;
}

export interface DatabaseProvider<C extends Connection = Connection> {
  /** Human-readable driver name */
  readonly driverName: string;

  readonly queryExecutor: QueryExecutor<C>;

  /** Open a connection. Throws ConnectionError with a helpful message on failure. */
  connect(config: ConnectionConfig): Promise<C>;

  /** Session setup after connecting. Best-effort: callers log and ignore failures. */
  postConnect(conn: C, config: ConnectionConfig): Promise<void>;
}

/**
 * Gathers rows as a driver produces them and keeps at most `maxRows`. One row
 * past the limit is enough to know the result was truncated, so drivers that
 * fetch in batches never need to ask for more than that.
 */
export class RowCollector {
  readonly rows: Value[][] = [];
  private overflow = false;

  constructor(private readonly maxRows?: number) {}

  get truncated(): boolean {
    return this.overflow;
  }

  /** Returns false once the limit is passed and fetching can stop. */
  add(row: Value[]): boolean {
    if (this.maxRows !== undefined && this.rows.length >= this.maxRows) {
      this.overflow = true;
      return false;
    }
    this.rows.push(row);
    return true;
  }

  /** How many rows to fetch next: `batchSize`, or fewer near the limit. */
  nextBatchSize(batchSize: number): number {
    if (this.maxRows === undefined) return batchSize;
    return Math.max(1, Math.min(batchSize, this.maxRows + 1 - this.rows.length));
  }
}

/**
 * Pull rows in batches until `read` runs dry or the collector has seen one
 * row past its limit. `read` returning fewer rows than asked for means done.
 */
export async function collectBatches(
  read: (count: number) => Promise<Value[][]>,
  collector: RowCollector,
  batchSize: number,
): Promise<void> {
  while (!collector.truncated) {
    const size = collector.nextBatchSize(batchSize);
    const rows = await read(size);
    for (const row of rows) {
      if (!collector.add(row)) break;
    }
    if (rows.length < size) return;
  }
}
