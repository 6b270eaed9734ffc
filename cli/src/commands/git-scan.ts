/**
 * git-scan — list git checkouts under a directory that are off the default
 * branch or have uncommitted changes.
 *
 * Exit codes: 2 when the root is not a directory, 1 when git is missing.
 */

import { statSync } from "fs";
import * as path from "path";
import chalk from "chalk";
import { Command } from "commander";
import { GitNotFoundError } from "@toolshed/core";
import {
  DEFAULT_BRANCH,
  createGitRunner,
  formatRepoSummary,
  shouldReport,
  toReportEntry,
  walkRepositories,
  type GitRunner,
  type RepoReportEntry,
} from "@toolshed/core/repo-scan";
import { VERSION, createBaseProgram, resolveIO, type ProgramOptions } from "./io.js";

export interface GitScanProgramOptions extends ProgramOptions {
  git?: GitRunner;
  /** Colours for the summary blocks; `--no-color` always wins. */
  palette?: chalk.Chalk;
}

interface ScanCliOptions {
  defaultBranch: string;
  json?: boolean;
  color: boolean;
}

function isDirectory(target: string): boolean {
  try {
    return statSync(target).isDirectory();
  } catch {
    return false;
  }
}

export function createGitScanProgram(options: GitScanProgramOptions = {}): Command {
  const io = resolveIO(options.io);

  return createBaseProgram("git-scan", io, options)
    .description("Report git repositories that are off the default branch or have uncommitted changes")
    .version(VERSION)
    .argument("[root]", "directory to scan", ".")
    .option("--default-branch <name>", "branch treated as the baseline", DEFAULT_BRANCH)
    .option("--json", "print reported repositories as JSON")
    .option("--no-color", "disable coloured output")
    .action((root: string, opts: ScanCliOptions, command: Command) => {
      const start = path.resolve(io.cwd, root);
      if (!isDirectory(start)) {
        command.error(`Not a directory: ${root}`, { exitCode: 2 });
      }

      const git = options.git ?? createGitRunner();
      const palette = opts.color ? (options.palette ?? chalk) : new chalk.Instance({ level: 0 });
      const entries: RepoReportEntry[] = [];

      try {
        for (const result of walkRepositories(start, { git, defaultBranch: opts.defaultBranch })) {
          if (!shouldReport(result)) continue;
          if (opts.json) {
            entries.push(toReportEntry(result));
          } else {
            io.stdout(formatRepoSummary(result, palette));
          }
        }
      } catch (err) {
        if (err instanceof GitNotFoundError) {
          command.error(err.message, { exitCode: 1 });
        }
        throw err;
      }

      if (opts.json) {
        io.stdout(`${JSON.stringify(entries, null, 2)}\n`);
      }
    });
}
