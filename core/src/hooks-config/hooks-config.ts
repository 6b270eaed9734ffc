/**
 * Claude Code hook configuration for dev-hooks.
 *
 * Builds the `hooks` block for ~/.claude/settings.json that wires the
 * dev-hooks subcommands to Claude Code events: Notification and Stop send
 * their notifications, and Bash tool calls are timed with a start file.
 */

import { homedir } from "os";
import { join } from "path";
import { DEFAULT_THRESHOLD_SECONDS } from "../notifications/constants.js";

export interface HookCommand {
  type: "command";
  command: string;
}

export interface HookMatcher {
  matcher: string;
  hooks: HookCommand[];
}

export type HookEvent = "Notification" | "Stop" | "SubagentStop" | "PreToolUse" | "PostToolUse";

export type HooksConfig = Record<HookEvent, HookMatcher[]>;

export interface HooksConfigOptions {
  /** Command used to invoke the CLI. Default "dev-hooks". */
  bin?: string;
  /** Start file used to time Bash tool calls. */
  startFile?: string;
  threshold?: number;
  /** Tool matcher for the timed operations. Default "Bash". */
  toolMatcher?: string;
}

/**
 * Default start-file location, written with `~` on POSIX so the generated
 * settings stay portable between machines.
 */
export function getDefaultStartFile(): string {
  if (process.platform === "win32") {
    return join(homedir(), ".claude", "bash_start.tmp").replace(/\\/g, "/");
  }
  return "~/.claude/bash_start.tmp";
}

function quoteArg(value: string): string {
  return /^[\w~./:@%+=,-]+$/.test(value) ? value : `'${value.replace(/'/g, `'\\''`)}'`;
}

function command(...parts: string[]): HookCommand {
  return { type: "command", command: parts.join(" ") };
}

export function getHooksConfig(options: HooksConfigOptions = {}): HooksConfig {
  const {
    bin = "dev-hooks",
    startFile = getDefaultStartFile(),
    threshold = DEFAULT_THRESHOLD_SECONDS,
    toolMatcher = "Bash",
  } = options;
  const file = quoteArg(startFile);

  return {
    Notification: [{ matcher: "", hooks: [command(bin, "notification")] }],
    Stop: [{ matcher: "", hooks: [command(bin, "stop")] }],
    SubagentStop: [{ matcher: "", hooks: [command(bin, "stop")] }],
    PreToolUse: [
      { matcher: toolMatcher, hooks: [command(bin, "create-start-file", "--file", file)] },
    ],
    PostToolUse: [
      {
        matcher: toolMatcher,
        hooks: [
          command(
            bin,
            "long-operation",
            "--start-file",
            file,
            "--threshold",
            String(threshold),
            "--operation-type",
            quoteArg(toolMatcher),
          ),
        ],
      },
    ],
  };
}
