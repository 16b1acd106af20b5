import { mkdir, readFile, writeFile } from "node:fs/promises";
import { dirname } from "node:path";
import { Type, type Static } from "@sinclair/typebox";
import { Value } from "@sinclair/typebox/value";
import { getErrorMessage } from "./errors.js";
import { silentLogger, type Logger } from "./logger.js";

const HistoryEntrySchema = Type.Object({
  query: Type.String(),
  timestamp: Type.String(),
  connectionName: Type.String(),
});

export type HistoryEntry = Static<typeof HistoryEntrySchema>;

const HistoryFileSchema = Type.Array(HistoryEntrySchema);

export const HISTORY_MAX = 1000;

export interface QueryHistoryStore {
  /** Record a query. Re-running a known query refreshes its timestamp. */
  saveQuery(connectionName: string, query: string): Promise<void>;
  loadForConnection(connectionName: string): Promise<HistoryEntry[]>;
  loadAll(): Promise<HistoryEntry[]>;
  /** Returns the number of entries removed. */
  clearForConnection(connectionName: string): Promise<number>;
}

function upsert(entries: HistoryEntry[], connectionName: string, query: string, now: string): HistoryEntry[] {
  const text = query.trim();
  const rest = entries.filter(e => !(e.connectionName === connectionName && e.query.trim() === text));
  rest.push({ query: text, timestamp: now, connectionName });
  return rest.slice(-HISTORY_MAX);
}

export class InMemoryHistoryStore implements QueryHistoryStore {
  private entries: HistoryEntry[] = [];

  constructor(private readonly clock: () => Date = () => new Date()) {}

  async saveQuery(connectionName: string, query: string): Promise<void> {
    this.entries = upsert(this.entries, connectionName, query, this.clock().toISOString());
  }

  async loadForConnection(connectionName: string): Promise<HistoryEntry[]> {
    return this.entries.filter(e => e.connectionName === connectionName);
  }

  async loadAll(): Promise<HistoryEntry[]> {
    return [...this.entries];
  }

  async clearForConnection(connectionName: string): Promise<number> {
    const before = this.entries.length;
    this.entries = this.entries.filter(e => e.connectionName !== connectionName);
    return before - this.entries.length;
  }
}

/**
 * History kept as a JSON array on disk, newest last. An unreadable or
 * malformed file is treated as empty and replaced on the next save.
 */
export class JsonFileHistoryStore implements QueryHistoryStore {
  constructor(
    private readonly path: string,
    private readonly logger: Logger = silentLogger,
    private readonly clock: () => Date = () => new Date(),
  ) {}

  async saveQuery(connectionName: string, query: string): Promise<void> {
    const entries = await this.read();
    await this.write(upsert(entries, connectionName, query, this.clock().toISOString()));
  }

  async loadForConnection(connectionName: string): Promise<HistoryEntry[]> {
    return (await this.read()).filter(e => e.connectionName === connectionName);
  }

  async loadAll(): Promise<HistoryEntry[]> {
    return this.read();
  }

  async clearForConnection(connectionName: string): Promise<number> {
    const entries = await this.read();
    const kept = entries.filter(e => e.connectionName !== connectionName);
    if (kept.length !== entries.length) await this.write(kept);
    return entries.length - kept.length;
  }

  private async read(): Promise<HistoryEntry[]> {
    let text: string;
    try {
      text = await readFile(this.path, "utf8");
    } catch (err) {
      this.logger.debug({ err, path: this.path }, "history file not readable; starting empty");
      return [];
    }
    try {
      const data: unknown = JSON.parse(text);
      if (Value.Check(HistoryFileSchema, data)) return data;
      this.logger.warn({ path: this.path }, "history file has unexpected shape; ignoring it");
    } catch (err) {
      this.logger.warn({ err: getErrorMessage(err), path: this.path }, "history file is not valid JSON; ignoring it");
    }
    return [];
  }

  private async write(entries: HistoryEntry[]): Promise<void> {
    await mkdir(dirname(this.path), { recursive: true });
    await writeFile(this.path, JSON.stringify(entries, null, 2) + "\n", "utf8");
  }
}
