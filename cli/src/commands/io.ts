/**
 * Shared plumbing for the CLI programs: where output goes, what the
 * environment is, and how a program is told to throw instead of exiting.
 */

import { Command, InvalidArgumentError } from "commander";
import type { Env } from "@toolshed/core/config";

export const VERSION = "0.1.0";

export interface CliIO {
  stdout: (text: string) => void;
  stderr: (text: string) => void;
  env: Env;
  cwd: string;
}

export interface ProgramOptions {
  io?: Partial<CliIO>;
  /** Throw CommanderError instead of calling process.exit (tests). */
  exitOverride?: boolean;
}

export function resolveIO(io: Partial<CliIO> = {}): CliIO {
  return {
    stdout: io.stdout ?? ((text) => process.stdout.write(text)),
    stderr: io.stderr ?? ((text) => process.stderr.write(text)),
    env: io.env ?? process.env,
    cwd: io.cwd ?? process.cwd(),
  };
}

/**
 * Create the root command with output routed through `io`.
 * Subcommands copy these settings when they are added, so this must run
 * before any `.command()` call.
 */
export function createBaseProgram(name: string, io: CliIO, options: ProgramOptions): Command {
  const program = new Command(name);
  program.configureOutput({
    writeOut: io.stdout,
    writeErr: io.stderr,
  });
  if (options.exitOverride) {
    program.exitOverride();
  }
  return program;
}

/**
 * Option parser for non-negative whole numbers (seconds).
 */
export function parseInteger(value: string): number {
  if (!/^\d+$/.test(value.trim())) {
    throw new InvalidArgumentError("Not a whole number.");
  }
  return Number.parseInt(value, 10);
}
