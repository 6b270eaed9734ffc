/**
 * Report formatting tests
 */

import { describe, it, expect } from "@jest/globals";
import chalk from "chalk";
import { formatRepoSummary, toReportEntry } from "./report.js";
import type { RepoScanResult } from "./types.js";

const plain = new chalk.Instance({ level: 0 });

function result(overrides: Partial<RepoScanResult>): RepoScanResult {
  return {
    path: "/work/api",
    relativePath: "api",
    branch: { kind: "branch", name: "main" },
    isDefaultBranch: true,
    diff: null,
    ...overrides,
  };
}

describe("formatRepoSummary", () => {
  it("shows branch and diff for a dirty feature branch", () => {
    const text = formatRepoSummary(
      result({
        branch: { kind: "branch", name: "feature/x" },
        isDefaultBranch: false,
        diff: "1 file changed, 2 insertions(+)",
      }),
      plain,
    );

    expect(text).toBe("api\n  branch: feature/x\n  diff:   1 file changed, 2 insertions(+)\n\n");
  });

  it("omits the branch line on the default branch", () => {
    const text = formatRepoSummary(result({ diff: "3 files changed" }), plain);
    expect(text).toBe("api\n  diff:   3 files changed\n\n");
  });

  it("labels detached and unknown heads", () => {
    expect(
      formatRepoSummary(result({ branch: { kind: "detached", sha: "abc1234" }, isDefaultBranch: false }), plain),
    ).toBe("api\n  branch: DETACHED@abc1234\n\n");
    expect(
      formatRepoSummary(result({ branch: { kind: "detached", sha: null }, isDefaultBranch: false }), plain),
    ).toBe("api\n  branch: DETACHED@?\n\n");
    expect(
      formatRepoSummary(result({ branch: { kind: "unknown" }, isDefaultBranch: false }), plain),
    ).toBe("api\n  branch: UNKNOWN\n\n");
  });

  it("colours the diff red when colour is on", () => {
    const ansi = new chalk.Instance({ level: 1 });
    const text = formatRepoSummary(result({ diff: "1 file changed" }), ansi);
    expect(text.split("\n")[1]).toBe("  diff:   \u001b[31m1 file changed\u001b[39m");
  });
});

describe("toReportEntry", () => {
  it("flattens a result for JSON output", () => {
    expect(
      toReportEntry(
        result({ branch: { kind: "detached", sha: "abc1234" }, isDefaultBranch: false, diff: "1 file changed" }),
      ),
    ).toEqual({ path: "api", branch: "DETACHED@abc1234", detached: true, diff: "1 file changed" });
  });
});
