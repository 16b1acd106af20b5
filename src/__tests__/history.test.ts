import { mkdtemp, readFile, rm, writeFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { afterEach, beforeEach, describe, it, expect } from "vitest";
import { HISTORY_MAX, InMemoryHistoryStore, JsonFileHistoryStore } from "../history.js";

function tickingClock(): () => Date {
  let seconds = 0;
  return () => new Date(Date.UTC(2026, 0, 1, 0, 0, seconds++));
}

describe("InMemoryHistoryStore", () => {
  it("refreshes a repeated query instead of duplicating it", async () => {
    const store = new InMemoryHistoryStore(tickingClock());

    await store.saveQuery("local", "SELECT 1");
    await store.saveQuery("local", "SELECT 2");
    await store.saveQuery("local", "  SELECT 1 ");

    expect(await store.loadForConnection("local")).toEqual([
      { query: "SELECT 2", timestamp: "2026-01-01T00:00:01.000Z", connectionName: "local" },
      { query: "SELECT 1", timestamp: "2026-01-01T00:00:02.000Z", connectionName: "local" },
    ]);
  });

  it("keeps the same query separately per connection", async () => {
    const store = new InMemoryHistoryStore(tickingClock());

    await store.saveQuery("a", "SELECT 1");
    await store.saveQuery("b", "SELECT 1");

    expect(await store.loadAll()).toHaveLength(2);
    expect(await store.clearForConnection("a")).toBe(1);
    expect((await store.loadAll()).map(e => e.connectionName)).toEqual(["b"]);
  });

  it("keeps only the newest entries", async () => {
    const store = new InMemoryHistoryStore(tickingClock());
    for (let i = 0; i < HISTORY_MAX + 5; i++) await store.saveQuery("local", `SELECT ${i}`);

    const all = await store.loadAll();
    expect(all).toHaveLength(HISTORY_MAX);
    expect(all[0].query).toBe("SELECT 5");
  });
});

describe("JsonFileHistoryStore", () => {
  let dir: string;

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), "sqlrun-history-"));
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  it("writes entries to a JSON file, creating its directory", async () => {
    const path = join(dir, "nested", "history.json");
    const store = new JsonFileHistoryStore(path, undefined, tickingClock());

    await store.saveQuery("local", "SELECT 1");

    expect(JSON.parse(await readFile(path, "utf8"))).toEqual([
      { query: "SELECT 1", timestamp: "2026-01-01T00:00:00.000Z", connectionName: "local" },
    ]);
  });

  it("reads back what another instance saved", async () => {
    const path = join(dir, "history.json");
    await new JsonFileHistoryStore(path).saveQuery("local", "SELECT 1");

    const entries = await new JsonFileHistoryStore(path).loadForConnection("local");
    expect(entries.map(e => e.query)).toEqual(["SELECT 1"]);
  });

  it("treats a missing file as empty", async () => {
    expect(await new JsonFileHistoryStore(join(dir, "absent.json")).loadAll()).toEqual([]);
  });

  it("treats malformed content as empty and replaces it on save", async () => {
    const path = join(dir, "history.json");
    await writeFile(path, "not json", "utf8");
    const store = new JsonFileHistoryStore(path);

    expect(await store.loadAll()).toEqual([]);
    await writeFile(path, '{"entries": []}', "utf8");
    expect(await store.loadAll()).toEqual([]);

    await store.saveQuery("local", "SELECT 1");
    expect(await store.loadAll()).toHaveLength(1);
  });

  it("clears one connection's entries", async () => {
    const path = join(dir, "history.json");
    const store = new JsonFileHistoryStore(path);
    await store.saveQuery("a", "SELECT 1");
    await store.saveQuery("b", "SELECT 2");

    expect(await store.clearForConnection("a")).toBe(1);
    expect(await store.clearForConnection("a")).toBe(0);
    expect((await store.loadAll()).map(e => e.query)).toEqual(["SELECT 2"]);
  });
});
