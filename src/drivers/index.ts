import type { DriverName } from "../config.js";
import type { Logger } from "../logger.js";
import type { Connection, DatabaseProvider } from "./base.js";
import { SqliteProvider } from "./sqlite.js";

export type { Connection, DatabaseProvider, FetchedRows, QueryExecutor } from "./base.js";

export interface ProviderOptions {
  queryTimeout?: number;
  logger?: Logger;
}

/**
 * Build the provider for a driver. The network drivers are imported lazily so
 * a sqlite-only setup never loads pg or mysql2.
 */
export async function createProvider(driver: DriverName, options: ProviderOptions = {}): Promise<DatabaseProvider<Connection>> {
  switch (driver) {
    case "sqlite":
      return new SqliteProvider(options);
    case "postgres": {
      const { PostgresProvider } = await import("./postgres.js");
      return new PostgresProvider(options);
    }
    case "mysql": {
      const { MysqlProvider } = await import("./mysql.js");
      return new MysqlProvider(options);
    }
  }
}
