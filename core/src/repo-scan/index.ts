export type { GitResult, GitRunner, BranchInfo, RepoScanResult, ScanOptions } from "./types.js";
export { createGitRunner } from "./git-runner.js";
export { isGitRepo, currentBranch, diffShortstat, branchLabel } from "./git-queries.js";
export {
  DEFAULT_BRANCH,
  relativeRepoPath,
  walkRepositories,
  scanRepositories,
  shouldReport,
} from "./scanner.js";
export type { RepoReportEntry } from "./report.js";
export { formatRepoSummary, toReportEntry } from "./report.js";
