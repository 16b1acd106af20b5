import { describe, it, expect } from "vitest";
import { ExecutionError, QueryCancelledError } from "../errors.js";
import { TransactionExecutor } from "../executor.js";
import { fakeConfig, FakeProvider } from "./fake-provider.js";

describe("TransactionExecutor", () => {
  it("reuses one connection from BEGIN to COMMIT", async () => {
    const provider = new FakeProvider();
    const executor = new TransactionExecutor(fakeConfig, provider);

    await executor.execute("BEGIN");
    expect(executor.inTransaction).toBe(true);
    expect(executor.hasPersistentConnection).toBe(true);
    await executor.execute("INSERT INTO t VALUES (1)");
    await executor.execute("COMMIT");

    expect(provider.connectCount).toBe(1);
    expect(provider.connections[0].executed).toEqual(["BEGIN", "INSERT INTO t VALUES (1)", "COMMIT"]);
    expect(provider.connections[0].closeCount).toBe(1);
    expect(executor.inTransaction).toBe(false);
    expect(executor.hasPersistentConnection).toBe(false);
  });

  it("opens and closes a fresh connection per call outside a transaction", async () => {
    const provider = new FakeProvider();
    const executor = new TransactionExecutor(fakeConfig, provider);

    await executor.execute("SELECT 1");
    await executor.execute("SELECT 2");

    expect(provider.connectCount).toBe(2);
    expect(provider.connections.map(c => c.closeCount)).toEqual([1, 1]);
  });

  it("returns rows for queries and affected counts otherwise", async () => {
    const provider = new FakeProvider({ rows: [[1], [2], [3]] });
    const executor = new TransactionExecutor(fakeConfig, provider);

    expect(await executor.execute("SELECT n FROM t", 2)).toEqual({
      kind: "query",
      columns: ["n"],
      rows: [[1], [2]],
      rowCount: 2,
      truncated: true,
    });
    expect(await executor.execute("UPDATE t SET n = 0")).toEqual({ kind: "nonQuery", rowsAffected: 1 });
  });

  it("closes the ephemeral connection when the statement fails", async () => {
    const provider = new FakeProvider({ failOn: ["BAD"] });
    const executor = new TransactionExecutor(fakeConfig, provider);

    const error = await executor.execute("BAD SQL").catch((e: unknown) => e);

    expect(error).toBeInstanceOf(ExecutionError);
    expect(error).toHaveProperty("message", 'syntax error near "BAD"');
    expect(provider.connections[0].closeCount).toBe(1);
  });

  it("keeps the transaction connection after a failed statement", async () => {
    const provider = new FakeProvider({ failOn: ["BAD"] });
    const executor = new TransactionExecutor(fakeConfig, provider);

    await executor.execute("BEGIN");
    await expect(executor.execute("BAD SQL")).rejects.toBeInstanceOf(ExecutionError);
    expect(executor.inTransaction).toBe(true);
    expect(executor.hasPersistentConnection).toBe(true);

    await executor.execute("ROLLBACK");
    expect(provider.connectCount).toBe(1);
    expect(executor.hasPersistentConnection).toBe(false);
  });

  it("goes persistent for a batch that opens a transaction", async () => {
    const provider = new FakeProvider();
    const executor = new TransactionExecutor(fakeConfig, provider);

    await executor.execute("BEGIN; INSERT INTO t VALUES (1)");

    expect(executor.inTransaction).toBe(true);
    expect(provider.connections[0].closeCount).toBe(0);
    await executor.close();
  });

  it("runs blank-line separated input as a semicolon batch", async () => {
    const provider = new FakeProvider();
    const executor = new TransactionExecutor(fakeConfig, provider);

    await executor.execute("SELECT 1\n\nSELECT 2");

    expect(provider.executed).toEqual(["SELECT 1; SELECT 2"]);
  });

  it("ignores post-connect failures", async () => {
    const provider = new FakeProvider({ failPostConnect: true });
    const executor = new TransactionExecutor(fakeConfig, provider);

    await expect(executor.execute("SELECT 1")).resolves.toEqual({
      kind: "query",
      columns: ["n"],
      rows: [[1]],
      rowCount: 1,
      truncated: false,
    });
  });

  it("lets connect failures through unchanged", async () => {
    const executor = new TransactionExecutor(fakeConfig, new FakeProvider({ failConnect: true }));

    const error = await executor.execute("SELECT 1").catch((e: unknown) => e);

    expect(error).not.toBeInstanceOf(ExecutionError);
    expect(error).toHaveProperty("message", "connection refused");
  });

  describe("close", () => {
    it("can be called twice and leaves no transaction open", async () => {
      const provider = new FakeProvider();
      const executor = new TransactionExecutor(fakeConfig, provider);
      await executor.execute("BEGIN");

      await executor.close();
      await executor.close();

      expect(executor.inTransaction).toBe(false);
      expect(executor.hasPersistentConnection).toBe(false);
      expect(provider.connections[0].closeCount).toBe(1);
    });

    it("abandons a transaction connection still being opened", async () => {
      const provider = new FakeProvider();
      const executor = new TransactionExecutor(fakeConfig, provider);

      const pending = executor.execute("BEGIN").catch((e: unknown) => e);
      await executor.close();

      expect(await pending).toBeInstanceOf(QueryCancelledError);
      expect(provider.connections[0].closeCount).toBe(1);
      expect(executor.hasPersistentConnection).toBe(false);
    });

    it("leaves clean state when called during a running statement", async () => {
      let entered: () => void = () => {};
      let release: () => void = () => {};
      const started = new Promise<void>(resolve => {
        entered = resolve;
      });
      const gate = new Promise<void>(resolve => {
        release = resolve;
      });
      const provider = new FakeProvider({
        beforeExecute: async () => {
          entered();
          await gate;
        },
      });
      const executor = new TransactionExecutor(fakeConfig, provider);

      const pending = executor.execute("BEGIN").catch((e: unknown) => e);
      await started;
      await executor.close();
      release();

      expect(await pending).toBeInstanceOf(ExecutionError);
      expect(executor.inTransaction).toBe(false);
      expect(executor.hasPersistentConnection).toBe(false);
      expect(provider.connections[0].closeCount).toBe(1);
    });
  });
});
