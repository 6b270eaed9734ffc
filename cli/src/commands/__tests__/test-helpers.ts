/**
 * Shared helpers for CLI program tests.
 */

import { CommanderError, type Command } from "commander";
import type { CliIO } from "../io.js";

export interface CapturedIO {
  io: CliIO;
  stdout: () => string;
  stderr: () => string;
}

export function captureIO(overrides: Partial<Pick<CliIO, "env" | "cwd">> = {}): CapturedIO {
  const out: string[] = [];
  const err: string[] = [];
  return {
    io: {
      stdout: (text) => out.push(text),
      stderr: (text) => err.push(text),
      env: overrides.env ?? {},
      cwd: overrides.cwd ?? "/work/toolshed",
    },
    stdout: () => out.join(""),
    stderr: () => err.join(""),
  };
}

/**
 * Parse `args` as if typed on the command line and return the exit code the
 * process would have ended with.
 */
export async function run(program: Command, args: string[]): Promise<number> {
  try {
    await program.parseAsync(args, { from: "user" });
    return 0;
  } catch (err) {
    if (err instanceof CommanderError) {
      return err.exitCode;
    }
    throw err;
  }
}
