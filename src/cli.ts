import { readFile } from "node:fs/promises";
import { createInterface } from "node:readline/promises";
import { Command } from "commander";
import { classifyQueryAlert, formatAlertMode, parseAlertMode, shouldConfirm } from "./alerts.js";
import {
  loadConfig,
  maskConnectionString,
  resolveConnectionName,
  resolvePath,
  type SqlrunConfig,
} from "./config.js";
import { createProvider as defaultCreateProvider } from "./drivers/index.js";
import { getErrorMessage } from "./errors.js";
import { isOutputFormat, type OutputFormat } from "./format.js";
import { JsonFileHistoryStore, type QueryHistoryStore } from "./history.js";
import { confirmWith, printRunOutcome, processIO, promptConfirm, type CliIO } from "./io.js";
import { createLogger, type Logger } from "./logger.js";
import { QuerySession, type ConfirmFn } from "./session.js";
import { ShellController } from "./shell.js";
import { splitStatements, statementAt } from "./splitter.js";

export interface CliDeps {
  io?: CliIO;
  createProvider?: typeof defaultCreateProvider;
  confirm?: ConfirmFn;
  logger?: Logger;
  history?: QueryHistoryStore;
}

type GlobalOptions = {
  config?: string;
};

interface QueryOptions {
  connection?: string;
  format: string;
  limit?: string;
  file?: string;
  atomic?: boolean;
  yes?: boolean;
}

interface SplitOptions {
  file?: string;
  at?: string;
}

interface ClassifyOptions {
  file?: string;
  mode?: string;
}

async function readSql(sql: string | undefined, file: string | undefined): Promise<string> {
  if (sql !== undefined) return sql;
  if (file !== undefined) return readFile(resolvePath(file), "utf8");
  throw new Error("Provide SQL as an argument or with --file <path>.");
}

function parseLimit(raw: string | undefined, cfg: SqlrunConfig): number | undefined {
  if (raw === undefined) return cfg.maxRows;
  const n = Number.parseInt(raw, 10);
  if (Number.isNaN(n) || n < 0) throw new Error(`Invalid --limit "${raw}". Use a non-negative integer.`);
  // 0 means unlimited, still bounded by the configured cap
  return n === 0 ? cfg.maxRows : Math.min(n, cfg.maxRows);
}

function parseCursor(raw: string): { row: number; col: number } {
  const match = /^(\d+):(\d+)$/.exec(raw.trim());
  if (!match) throw new Error(`Invalid --at "${raw}". Use row:col, both 0-based.`);
  return { row: Number(match[1]), col: Number(match[2]) };
}

/**
 * Creates and configures the sqlrun program. Dependencies can be swapped
 * for testing.
 *
 * @example
 * ```ts
 * await createCLI().parseAsync(process.argv);
 * ```
 */
export function createCLI(deps: CliDeps = {}): Command {
  const io = deps.io ?? processIO;
  const createProvider = deps.createProvider ?? defaultCreateProvider;

  const fail = (error: unknown): void => {
    io.err(`Error: ${getErrorMessage(error)}`);
    io.setExitCode(1);
  };

  async function openSession(
    globals: GlobalOptions,
    connection: string | undefined,
    maxRows: (cfg: SqlrunConfig) => number | undefined,
    yes = false,
    confirm: ConfirmFn = deps.confirm ?? promptConfirm,
  ) {
    const cfg = await loadConfig(globals.config);
    const logger = deps.logger ?? createLogger({ level: cfg.logLevel });
    const name = resolveConnectionName(cfg, connection);
    const connCfg = cfg.connections[name];
    const provider = await createProvider(connCfg.driver, { queryTimeout: cfg.queryTimeout, logger });
    return new QuerySession({
      connectionName: name,
      config: connCfg,
      provider,
      alertMode: yes ? "off" : cfg.alertMode,
      maxRows: maxRows(cfg),
      confirm,
      history: deps.history ?? new JsonFileHistoryStore(resolvePath(cfg.historyPath), logger),
      logger,
    });
  }

  const program = new Command();

  program
    .name("sqlrun")
    .version("0.1.0")
    .description("Run SQL with statement splitting, transaction tracking and destructive-query alerts")
    .option("--config <path>", "Config file (default: $SQLRUN_CONFIG or ~/.config/sqlrun/config.json)");

  program
    .command("query")
    .description("Execute SQL against a configured connection")
    .argument("[sql]", "SQL to execute; several statements may be separated by ; or blank lines")
    .option("-c, --connection <name>", "Connection name")
    .option("-f, --format <fmt>", "Output format: table, json, csv", "table")
    .option("-l, --limit <n>", "Max rows per result (0 for the configured maximum)")
    .option("--file <path>", "Read SQL from a file")
    .option("--atomic", "Run everything in one transaction, rolling back on the first error", false)
    .option("-y, --yes", "Skip confirmation for write/delete queries", false)
    .action(async (sql: string | undefined, opts: QueryOptions, cmd: Command) => {
      try {
        if (!isOutputFormat(opts.format)) throw new Error(`Unknown format "${opts.format}". Use table, json or csv.`);
        const format: OutputFormat = opts.format;
        const text = await readSql(sql, opts.file);
        const session = await openSession(
          cmd.optsWithGlobals<GlobalOptions>(),
          opts.connection,
          cfg => parseLimit(opts.limit, cfg),
          opts.yes,
        );
        try {
          const ok = printRunOutcome(io, await session.run(text, { atomic: opts.atomic }), format);
          if (!ok) io.setExitCode(1);
        } finally {
          await session.close();
        }
      } catch (e) {
        fail(e);
      }
    });

  program
    .command("split")
    .description("Show how SQL splits into statements")
    .argument("[sql]", "SQL text")
    .option("--file <path>", "Read SQL from a file")
    .option("--at <row:col>", "Print only the statement under this 0-based cursor")
    .action(async (sql: string | undefined, opts: SplitOptions) => {
      try {
        const text = await readSql(sql, opts.file);
        if (opts.at !== undefined) {
          const { row, col } = parseCursor(opts.at);
          const statement = statementAt(text, row, col);
          if (!statement) {
            io.err("No statement at cursor.");
            io.setExitCode(1);
            return;
          }
          io.out(statement.text);
          return;
        }
        const statements = splitStatements(text);
        if (statements.length === 0) {
          io.out("No statements.");
          return;
        }
        statements.forEach((s, i) => io.out(`[${i + 1}] ${s.startOffset}-${s.endOffset}: ${s.text}`));
      } catch (e) {
        fail(e);
      }
    });

  program
    .command("classify")
    .description("Report how destructive SQL is: none, write or delete")
    .argument("[sql]", "SQL text")
    .option("--file <path>", "Read SQL from a file")
    .option("--mode <mode>", "Also report whether this alert mode would ask first (off, delete, write)")
    .action(async (sql: string | undefined, opts: ClassifyOptions) => {
      try {
        const severity = classifyQueryAlert(await readSql(sql, opts.file));
        if (opts.mode === undefined) {
          io.out(severity);
          return;
        }
        const mode = parseAlertMode(opts.mode);
        if (!mode) throw new Error(`Unknown alert mode "${opts.mode}". Use off, delete or write.`);
        const ask = shouldConfirm(mode, severity);
        io.out(`${severity} (confirmation ${ask ? "required" : "not required"} in ${formatAlertMode(mode)} mode)`);
      } catch (e) {
        fail(e);
      }
    });

  program
    .command("connections")
    .description("List configured database connections")
    .action(async (_opts: unknown, cmd: Command) => {
      try {
        const cfg = await loadConfig(cmd.optsWithGlobals<GlobalOptions>().config);
        const names = Object.keys(cfg.connections);
        if (names.length === 0) {
          io.out("No connections configured.");
          return;
        }
        for (const name of names) {
          const connCfg = cfg.connections[name];
          const isDefault = name === cfg.defaultConnection ? " (default)" : "";
          const mode = connCfg.readOnly ? "read-only" : "read-write";
          io.out(`${name}${isDefault} — ${connCfg.driver} — ${maskConnectionString(connCfg)} — ${mode}`);
        }
      } catch (e) {
        fail(e);
      }
    });

  program
    .command("shell")
    .description("Interactive session; transactions stay open across entries")
    .option("-c, --connection <name>", "Connection name")
    .option("-f, --format <fmt>", "Output format: table, json, csv", "table")
    .action(async (opts: { connection?: string; format: string }, cmd: Command) => {
      try {
        if (!isOutputFormat(opts.format)) throw new Error(`Unknown format "${opts.format}". Use table, json or csv.`);
        const format: OutputFormat = opts.format;
        const rl = createInterface({ input: process.stdin, output: process.stdout, terminal: process.stdin.isTTY });
        try {
          // Confirmations are asked on the shell's own interface so the answer
          // is not also read as SQL.
          const confirm = deps.confirm ?? confirmWith(question => rl.question(question));
          const session = await openSession(cmd.optsWithGlobals<GlobalOptions>(), opts.connection, cfg => cfg.maxRows, false, confirm);
          const shell = new ShellController(session, io, format);
          try {
            rl.setPrompt(shell.prompt);
            rl.prompt();
            for await (const line of rl) {
              if ((await shell.handleLine(line)) === "quit") break;
              rl.setPrompt(shell.prompt);
              rl.prompt();
            }
            await shell.flush();
          } finally {
            await session.close();
          }
        } finally {
          rl.close();
        }
      } catch (e) {
        fail(e);
      }
    });

  return program;
}
