import { describe, it, expect } from "@jest/globals";
import { getHooksConfig } from "./hooks-config.js";

describe("getHooksConfig", () => {
  it("wires every dev-hooks command to its event", () => {
    const config = getHooksConfig({ startFile: "/tmp/claude/bash_start.tmp" });

    expect(config).toEqual({
      Notification: [{ matcher: "", hooks: [{ type: "command", command: "dev-hooks notification" }] }],
      Stop: [{ matcher: "", hooks: [{ type: "command", command: "dev-hooks stop" }] }],
      SubagentStop: [{ matcher: "", hooks: [{ type: "command", command: "dev-hooks stop" }] }],
      PreToolUse: [
        {
          matcher: "Bash",
          hooks: [{ type: "command", command: "dev-hooks create-start-file --file /tmp/claude/bash_start.tmp" }],
        },
      ],
      PostToolUse: [
        {
          matcher: "Bash",
          hooks: [
            {
              type: "command",
              command:
                "dev-hooks long-operation --start-file /tmp/claude/bash_start.tmp --threshold 30 --operation-type Bash",
            },
          ],
        },
      ],
    });
  });

  it("applies the threshold, binary and tool matcher", () => {
    const config = getHooksConfig({
      bin: "npx dev-hooks",
      startFile: "/tmp/start.tmp",
      threshold: 120,
      toolMatcher: "Task",
    });

    expect(config.PostToolUse[0]?.matcher).toBe("Task");
    expect(config.PostToolUse[0]?.hooks[0]?.command).toBe(
      "npx dev-hooks long-operation --start-file /tmp/start.tmp --threshold 120 --operation-type Task",
    );
  });

  it("quotes start files containing spaces", () => {
    const config = getHooksConfig({ startFile: "/tmp/my dir/start.tmp" });
    expect(config.PreToolUse[0]?.hooks[0]?.command).toBe(
      "dev-hooks create-start-file --file '/tmp/my dir/start.tmp'",
    );
  });

  it("keeps ~ unquoted so the shell expands it", () => {
    const config = getHooksConfig({ startFile: "~/.claude/bash_start.tmp" });
    expect(config.PreToolUse[0]?.hooks[0]?.command).toBe(
      "dev-hooks create-start-file --file ~/.claude/bash_start.tmp",
    );
  });
});
