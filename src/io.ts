import { createInterface } from "node:readline/promises";
import { formatOutcome, type OutputFormat } from "./format.js";
import type { ConfirmFn, RunOutcome } from "./session.js";

/** Where the CLI writes. Swapped out in tests. */
export interface CliIO {
  out(text: string): void;
  err(text: string): void;
  setExitCode(code: number): void;
}

export const processIO: CliIO = {
  out: text => process.stdout.write(text + "\n"),
  err: text => process.stderr.write(text + "\n"),
  setExitCode: code => {
    process.exitCode = code;
  },
};

const YES = /^y(es)?$/i;

/**
 * A confirmation that asks through `ask`, such as `rl.question` on an
 * interface that is already reading the terminal. When input is not
 * interactive there is nobody to ask, so the query is declined.
 */
export function confirmWith(
  ask: (question: string) => Promise<string>,
  interactive: boolean = process.stdin.isTTY === true,
): ConfirmFn {
  return async severity => {
    if (!interactive) {
      process.stderr.write("Query needs confirmation but stdin is not a terminal. Re-run with --yes to execute it.\n");
      return false;
    }
    const kind = severity === "delete" ? "a DELETE" : "a write";
    const answer = await ask(`This query contains ${kind}. Run it? [y/N] `);
    return YES.test(answer.trim());
  };
}

/** Ask on a readline interface of its own, for one-shot commands. */
export const promptConfirm: ConfirmFn = (severity, sql) =>
  confirmWith(async question => {
    const rl = createInterface({ input: process.stdin, output: process.stderr });
    try {
      return await rl.question(question);
    } finally {
      rl.close();
    }
  })(severity, sql);

/** Print a session outcome. Returns false when the run should count as a failure. */
export function printRunOutcome(io: CliIO, outcome: RunOutcome, format: OutputFormat): boolean {
  switch (outcome.status) {
    case "empty":
      io.err("Nothing to execute.");
      return false;
    case "blocked":
      io.err(outcome.reason);
      return false;
    case "declined":
      io.err(`Query not executed (${outcome.severity} confirmation declined).`);
      return false;
    case "failed":
      io.err(`Error: ${outcome.error}`);
      return false;
    case "ok":
      io.out(formatOutcome(outcome.outcome, format));
      return outcome.outcome.kind !== "multi" || outcome.outcome.completed;
  }
}
