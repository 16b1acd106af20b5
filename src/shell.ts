import { formatAlertMode, parseAlertMode } from "./alerts.js";
import { getErrorMessage } from "./errors.js";
import type { OutputFormat } from "./format.js";
import { printRunOutcome, type CliIO } from "./io.js";
import type { QuerySession, RunOutcome } from "./session.js";

export type ShellAction = "continue" | "quit";

/**
 * Line handling for the interactive shell. Input accumulates until a line
 * ends with `;` or an empty line is entered, then runs as one query through
 * the session, so a BEGIN in one entry keeps its connection for the next.
 * Lines starting with `:` at the start of an entry are meta-commands.
 */
export class ShellController {
  private buffer: string[] = [];

  constructor(
    private readonly session: QuerySession,
    private readonly io: CliIO,
    private readonly format: OutputFormat = "table",
  ) {}

  get prompt(): string {
    if (this.buffer.length > 0) return "    ...> ";
    return this.session.inTransaction ? "sqlrun(tx)> " : "sqlrun> ";
  }

  /** Text waiting for a terminator. */
  get pending(): string {
    return this.buffer.join("\n");
  }

  async handleLine(line: string): Promise<ShellAction> {
    const trimmed = line.trim();

    if (this.buffer.length === 0 && trimmed.startsWith(":")) {
      return this.meta(trimmed.slice(1).split(/\s+/));
    }
    if (trimmed === "") {
      if (this.buffer.length > 0) await this.flush();
      return "continue";
    }

    this.buffer.push(line);
    if (trimmed.endsWith(";")) await this.flush();
    return "continue";
  }

  /** Run whatever is pending, e.g. when input ends without a terminator. */
  async flush(): Promise<void> {
    const sql = this.pending;
    this.buffer = [];
    if (!sql.trim()) return;
    let outcome: RunOutcome;
    try {
      outcome = await this.session.run(sql);
    } catch (e) {
      // e.g. the connection could not be opened; the shell keeps going
      this.io.err(`Error: ${getErrorMessage(e)}`);
      return;
    }
    printRunOutcome(this.io, outcome, this.format);
  }

  private meta([command, arg]: string[]): ShellAction {
    switch (command.toLowerCase()) {
      case "q":
      case "quit":
      case "exit":
        return "quit";
      case "alert":
      case "alerts": {
        if (!arg) {
          this.io.out(`Query alerts: ${formatAlertMode(this.session.alertMode)}`);
          break;
        }
        const mode = parseAlertMode(arg);
        if (!mode) {
          this.io.err("Usage: :alert off|delete|write");
          break;
        }
        this.session.alertMode = mode;
        this.io.out(`Query alerts set to ${formatAlertMode(mode)}`);
        break;
      }
      case "status":
        this.io.out(
          `Connection: ${this.session.connectionName}\n` +
          `Transaction: ${this.session.inTransaction ? "open" : "none"}\n` +
          `Query alerts: ${formatAlertMode(this.session.alertMode)}`
        );
        break;
      default:
        this.io.err(`Unknown command :${command}. Try :alert, :status or :quit.`);
    }
    return "continue";
  }
}
