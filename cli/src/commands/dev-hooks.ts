/**
 * dev-hooks — Slack notifications for Claude Code hooks.
 *
 * Usage errors exit 1. Once a command has parsed, nothing it does can fail
 * the process: configuration, network and filesystem problems all end in
 * exit 0, and are only logged to stderr when TOOLSHED_DEBUG is set.
 */

import { Command, Option } from "commander";
import { isDebugEnabled } from "@toolshed/core/config";
import { getHooksConfig } from "@toolshed/core/hooks-config";
import { createLogger, getErrorMessage, type Logger } from "@toolshed/core/logging";
import {
  DEFAULT_OPERATION_TYPE,
  DEFAULT_THRESHOLD_SECONDS,
  sendNotificationHook,
  sendStopHook,
  type FetchLike,
  type HookContext,
} from "@toolshed/core/notifications";
import { createStartFile, runLongOperation, type DurationSource } from "@toolshed/core/timing";
import { VERSION, createBaseProgram, parseInteger, resolveIO, type ProgramOptions } from "./io.js";

export interface DevHooksProgramOptions extends ProgramOptions {
  fetch?: FetchLike;
  /** Epoch milliseconds. */
  now?: () => number;
  logger?: Logger;
}

interface LongOperationOptions {
  duration?: number;
  startFile?: string;
  threshold: number;
  operationType: string;
}

interface PrintConfigOptions {
  bin: string;
  startFile?: string;
  threshold: number;
}

/**
 * Run a hook action, logging and discarding anything it throws.
 */
async function guarded(logger: Logger, name: string, action: () => Promise<void> | void): Promise<void> {
  try {
    await action();
  } catch (err) {
    logger.error(`${name} failed:`, getErrorMessage(err));
  }
}

export function createDevHooksProgram(options: DevHooksProgramOptions = {}): Command {
  const io = resolveIO(options.io);
  const logger =
    options.logger ??
    createLogger({
      silent: !isDebugEnabled(io.env),
      stream: "stderr",
      prefix: "[dev-hooks]",
      debug: true,
    });
  const now = options.now ?? Date.now;
  const ctx: HookContext = { env: io.env, cwd: io.cwd, fetch: options.fetch, logger };

  const program = createBaseProgram("dev-hooks", io, options)
    .description("Claude Code Slack notification hooks")
    .version(VERSION)
    .addHelpText(
      "after",
      `
Environment:
  SLACK_WEBHOOK_URL   Slack incoming-webhook URL
  SLACK_MEMBER_ID     Slack member to mention
  TOOLSHED_DEBUG      set to 1 to log hook failures to stderr

Examples:
  dev-hooks notification
  dev-hooks long-operation --duration 45
  dev-hooks create-start-file --file ~/.claude/bash_start.tmp
  dev-hooks long-operation --start-file ~/.claude/bash_start.tmp --threshold 30`,
    );

  program
    .command("notification")
    .description("Send the waiting-for-input notification")
    .action(async () => {
      await guarded(logger, "notification", async () => {
        const outcome = await sendNotificationHook(ctx);
        logger.debug(`notification: ${outcome.status}`);
      });
    });

  program
    .command("stop")
    .description("Send the stopped / subagent-stopped notification")
    .action(async () => {
      await guarded(logger, "stop", async () => {
        const outcome = await sendStopHook(ctx);
        logger.debug(`stop: ${outcome.status}`);
      });
    });

  program
    .command("long-operation")
    .description("Notify when an operation ran longer than the threshold")
    .addOption(
      new Option("--duration <seconds>", "duration in seconds")
        .argParser(parseInteger)
        .conflicts("startFile"),
    )
    .addOption(new Option("--start-file <path>", "file holding the start timestamp"))
    .addOption(
      new Option("--threshold <seconds>", "minimum duration that triggers a notification")
        .argParser(parseInteger)
        .default(DEFAULT_THRESHOLD_SECONDS),
    )
    .option("--operation-type <type>", "label for the operation", DEFAULT_OPERATION_TYPE)
    .action(async (opts: LongOperationOptions, command: Command) => {
      let source: DurationSource;
      if (opts.startFile !== undefined) {
        source = { kind: "start-file", path: opts.startFile };
      } else if (opts.duration !== undefined) {
        source = { kind: "explicit", seconds: opts.duration };
      } else {
        command.error("Error: Either --duration or --start-file must be specified");
      }

      await guarded(logger, "long-operation", async () => {
        const outcome = await runLongOperation(
          { source, threshold: opts.threshold, operationType: opts.operationType },
          { ...ctx, now },
        );
        logger.debug(`long-operation: ${outcome.status}`);
      });
    });

  program
    .command("create-start-file")
    .description("Record the current time in a start file")
    .requiredOption("--file <path>", "start file to create")
    .action(async (opts: { file: string }) => {
      await guarded(logger, "create-start-file", () => {
        createStartFile(opts.file, now());
      });
    });

  program
    .command("print-config")
    .description("Print the settings.json hooks block that wires these commands into Claude Code")
    .option("--bin <command>", "command used to run dev-hooks", "dev-hooks")
    .option("--start-file <path>", "start file used to time tool calls")
    .addOption(
      new Option("--threshold <seconds>", "long-operation threshold")
        .argParser(parseInteger)
        .default(DEFAULT_THRESHOLD_SECONDS),
    )
    .action((opts: PrintConfigOptions) => {
      const hooks = getHooksConfig({
        bin: opts.bin,
        startFile: opts.startFile,
        threshold: opts.threshold,
      });
      io.stdout(`${JSON.stringify({ hooks }, null, 2)}\n`);
    });

  return program;
}
