import { afterEach, describe, it, expect, vi } from "vitest";
import { confirmWith } from "../io.js";

describe("confirmWith", () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  it("asks through the given question function", async () => {
    const ask = vi.fn(async () => " Yes ");

    expect(await confirmWith(ask, true)("delete", "DELETE FROM t")).toBe(true);
    expect(ask).toHaveBeenCalledWith("This query contains a DELETE. Run it? [y/N] ");
  });

  it("treats anything but y or yes as a no", async () => {
    const ask = vi.fn(async () => "sure");

    expect(await confirmWith(ask, true)("write", "UPDATE t SET a = 1")).toBe(false);
    expect(ask).toHaveBeenCalledWith("This query contains a write. Run it? [y/N] ");
  });

  it("declines without asking when input is not interactive", async () => {
    const write = vi.spyOn(process.stderr, "write").mockImplementation(() => true);
    const ask = vi.fn(async () => "y");

    expect(await confirmWith(ask, false)("delete", "DELETE FROM t")).toBe(false);
    expect(ask).not.toHaveBeenCalled();
    expect(write).toHaveBeenCalledWith("Query needs confirmation but stdin is not a terminal. Re-run with --yes to execute it.\n");
  });
});
