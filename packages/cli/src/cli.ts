/**
 * @settlekit/cli — Command line program.
 *
 * `settlekit <input.csv>` replays the file and prints the final
 * account ledger as CSV on stdout. Rejected rows are logged as
 * warnings; only fatal errors change the exit code.
 */

import type { Readable, Writable } from "node:stream";
import { Command, CommanderError, InvalidArgumentError } from "commander";
import type { ChalkInstance } from "chalk";
import type { Logger } from "pino";
import type { AppConfig } from "./config.js";
import { CliOptionsSchema, loadConfig, resolveSettings } from "./config.js";
import { runReplay } from "./replay-runner.js";
import { formatSummary } from "./summary.js";

export const VERSION = "1.0.0";

export interface CliDeps {
  readonly env: Record<string, string | undefined>;
  readonly stdout: Writable;
  readonly stderr: Writable;
  readonly colors: ChalkInstance;
  readonly openInput: (path: string) => Readable;
  readonly createLogger: (config: AppConfig) => Logger;
}

function parseDecimals(value: string): number {
  const decimals = Number(value);
  if (!/^\d+$/.test(value) || decimals > 18) {
    throw new InvalidArgumentError("Must be an integer between 0 and 18.");
  }
  return decimals;
}

function errorCode(err: unknown): string | undefined {
  if (err instanceof Error && "code" in err && typeof err.code === "string") {
    return err.code;
  }
  return undefined;
}

/**
 * Run the program against `argv` (node-style, program path first).
 * Resolves to the process exit code.
 */
export async function runCli(argv: readonly string[], deps: CliDeps): Promise<number> {
  let exitCode = 0;

  const program = new Command()
    .name("settlekit")
    .description("Replay a transactions CSV into final client balances")
    .version(VERSION)
    .argument("<input>", "transactions CSV file (type,client,tx,amount)")
    .option("--decimals <n>", "fractional digits for amounts", parseDecimals)
    .option("--allow-locked-disputes", "accept dispute, resolve and chargeback on locked accounts")
    .option("--allow-redispute", "accept a new dispute on a charged-back transaction")
    .option("--strict", "abort on the first malformed row")
    .option("--summary", "print a replay summary to stderr")
    .option("--digest", "log the hash of the final ledger state")
    .exitOverride()
    .configureOutput({
      writeOut: (str) => deps.stdout.write(str),
      writeErr: (str) => deps.stderr.write(str),
    })
    .action(async (inputPath: string, rawOptions: unknown) => {
      let config: AppConfig;
      try {
        config = loadConfig(deps.env);
      } catch (err) {
        deps.stderr.write(`Invalid configuration: ${err instanceof Error ? err.message : String(err)}\n`);
        exitCode = 1;
        return;
      }
      const settings = resolveSettings(config, CliOptionsSchema.parse(rawOptions));
      const logger = deps.createLogger(config);

      logger.debug({ input: inputPath, ...settings }, "Replay starting");

      try {
        const summary = await runReplay({
          input: deps.openInput(inputPath),
          output: deps.stdout,
          decimals: settings.decimals,
          policy: settings.policy,
          strict: settings.strict,
          onRejected: (entry) => {
            logger.warn(entry, `Row ${String(entry.row)} rejected: ${entry.message}`);
          },
        });

        if (settings.digest) {
          logger.info({ stateHash: summary.stateHash }, "Ledger state hash");
        }
        if (settings.summary) {
          deps.stderr.write(`${formatSummary(summary, deps.colors)}\n`);
        }
      } catch (err) {
        logger.error({ err, code: errorCode(err) }, "Replay aborted");
        exitCode = 1;
      }
    });

  try {
    await program.parseAsync([...argv]);
  } catch (err) {
    if (err instanceof CommanderError) {
      return err.exitCode;
    }
    throw err;
  }
  return exitCode;
}
