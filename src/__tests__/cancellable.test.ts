import { describe, it, expect } from "vitest";
import { CancellableQuery } from "../cancellable.js";
import { ExecutionError, QueryCancelledError } from "../errors.js";
import { fakeConfig, FakeProvider } from "./fake-provider.js";

describe("CancellableQuery", () => {
  it("runs on a dedicated connection and closes it", async () => {
    const provider = new FakeProvider({ rows: [[1], [2]] });
    const query = new CancellableQuery("SELECT n FROM t", fakeConfig, provider);

    expect(await query.execute(1)).toEqual({ kind: "query", columns: ["n"], rows: [[1]], rowCount: 1, truncated: true });
    expect(provider.connections[0].closeCount).toBe(1);
    expect(query.isExecuting).toBe(false);
  });

  it("refuses to run once cancelled", async () => {
    const provider = new FakeProvider();
    const query = new CancellableQuery("SELECT 1", fakeConfig, provider);

    expect(await query.cancel()).toBe(true);
    expect(await query.cancel()).toBe(false);
    await expect(query.execute()).rejects.toBeInstanceOf(QueryCancelledError);
    expect(provider.connectCount).toBe(0);
  });

  it("reports a driver failure after cancel as a cancellation", async () => {
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
    const query = new CancellableQuery("SELECT pg_sleep(60)", fakeConfig, provider);

    const pending = query.execute().catch((e: unknown) => e);
    await started;
    expect(query.isExecuting).toBe(true);
    expect(await query.cancel()).toBe(true);
    release();

    expect(await pending).toBeInstanceOf(QueryCancelledError);
    expect(query.isCancelled).toBe(true);
    expect(query.isExecuting).toBe(false);
    expect(provider.connections[0].closeCount).toBe(1);
  });

  it("wraps other driver failures in ExecutionError", async () => {
    const query = new CancellableQuery("BAD SQL", fakeConfig, new FakeProvider({ failOn: ["BAD"] }));

    await expect(query.execute()).rejects.toBeInstanceOf(ExecutionError);
  });
});
