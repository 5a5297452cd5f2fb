import { describe, expect, it, vi } from "vitest";
import { Config } from "./config/config.js";
import { ConfigError } from "./errors.js";
import {
  APPROVE_PROMPT,
  CANCELLED_TEXT,
  formatDiff,
  INVALID_INPUT_TEXT,
  type AnswerSource,
} from "./permission-prompt.js";
import { PermissionEngine, ruleFromDict, ruleToDict, Verdict, type PermissionRule } from "./permissions.js";

function scriptedAnswers(answers: Array<string | null>): AnswerSource & { prompts: string[] } {
  const queue = [...answers];
  const prompts: string[] = [];
  return {
    prompts,
    async question(prompt) {
      prompts.push(prompt);
      return queue.length > 0 ? (queue.shift() ?? null) : null;
    },
  };
}

const askAll: PermissionRule = { toolPattern: "*", verdict: Verdict.ASK, priority: -1000, description: "ask" };

describe("PermissionEngine.evaluate", () => {
  it("lets the higher priority win regardless of registration order", () => {
    const low: PermissionRule = { toolPattern: "write", verdict: Verdict.DENY, priority: 0, description: "low" };
    const high: PermissionRule = { toolPattern: "write", verdict: Verdict.ALLOW, priority: 10, description: "high" };

    const lowFirst = new PermissionEngine({ useDefaultRules: false, rules: [low, high] });
    const highFirst = new PermissionEngine({ useDefaultRules: false, rules: [high, low] });

    expect(lowFirst.evaluate("write", {})).toBe(Verdict.ALLOW);
    expect(highFirst.evaluate("write", {})).toBe(Verdict.ALLOW);
  });

  it("keeps insertion order for equal priorities", () => {
    const engine = new PermissionEngine({
      useDefaultRules: false,
      rules: [
        { toolPattern: "bash", verdict: Verdict.DENY, priority: 5, description: "first" },
        { toolPattern: "bash", verdict: Verdict.ALLOW, priority: 5, description: "second" },
      ],
    });
    expect(engine.evaluate("bash", {})).toBe(Verdict.DENY);
  });

  it("denies recursive deletes even with an ask-all catch-all", () => {
    const engine = new PermissionEngine({ rules: [askAll] });
    expect(engine.evaluate("bash", { command: "rm -rf /tmp/x" })).toBe(Verdict.DENY);
  });

  it("applies the default policy", () => {
    const engine = new PermissionEngine();
    expect(engine.evaluate("read", { file_path: "/etc/hosts" })).toBe(Verdict.ALLOW);
    expect(engine.evaluate("grep", { pattern: "x" })).toBe(Verdict.ALLOW);
    expect(engine.evaluate("write", { file_path: "src/app.test.ts" })).toBe(Verdict.ALLOW);
    expect(engine.evaluate("write", { file_path: "tests/unit/test_app.py" })).toBe(Verdict.ALLOW);
    expect(engine.evaluate("write", { file_path: "/tmp/scratch.txt" })).toBe(Verdict.ALLOW);
    expect(engine.evaluate("bash", { command: "npm test -- --run" })).toBe(Verdict.ALLOW);
    expect(engine.evaluate("write", { file_path: "src/app.ts" })).toBe(Verdict.ASK);
    expect(engine.evaluate("bash", { command: "git push" })).toBe(Verdict.ASK);
  });

  it("matches path rules against the basename", () => {
    const engine = new PermissionEngine();
    expect(engine.evaluate("write", { file_path: "/repo/pkg/util.spec.js" })).toBe(Verdict.ALLOW);
  });

  it("falls back to ASK when nothing matches", () => {
    const engine = new PermissionEngine({ useDefaultRules: false });
    expect(engine.evaluate("anything", {})).toBe(Verdict.ASK);
  });

  it("re-sorts after addRule", () => {
    const engine = new PermissionEngine();
    engine.addRule({ toolPattern: "bash", commandPattern: "git *", verdict: Verdict.ALLOW, priority: 50, description: "git" });
    expect(engine.evaluate("bash", { command: "git status" })).toBe(Verdict.ALLOW);
    expect(engine.rules[0].priority).toBe(100);
  });
});

describe("PermissionEngine.check", () => {
  it("approves everything when disabled", async () => {
    const engine = new PermissionEngine({ enabled: false });
    expect(await engine.check("bash", "Run command: rm -rf /", { command: "rm -rf /" })).toBe(true);
    expect(engine.history).toEqual([]);
  });

  it("records automatic decisions", async () => {
    const engine = new PermissionEngine();
    expect(await engine.check("bash", "Run command: rm -rf build", { command: "rm -rf build" })).toBe(false);
    expect(await engine.check("write", "Write to /tmp/a (3 chars)", { file_path: "/tmp/a" })).toBe(true);
    expect(engine.history).toEqual([
      { description: "bash: Run command: rm -rf build", verdict: Verdict.DENY },
      { description: "write: Write to /tmp/a (3 chars)", verdict: Verdict.ALLOW },
    ]);
  });

  it("prompts on ASK and accepts yes", async () => {
    const lines: string[] = [];
    const answers = scriptedAnswers(["y"]);
    const engine = new PermissionEngine({ answers, output: (line) => lines.push(line) });

    expect(await engine.check("write", "Write to src/a.ts (5 chars)", { file_path: "src/a.ts" })).toBe(true);
    expect(lines).toEqual(["\n⚠️  Permission required: write", "   Write to src/a.ts (5 chars)"]);
    expect(answers.prompts).toEqual([APPROVE_PROMPT]);
    expect(engine.history).toEqual([{ description: "write: Write to src/a.ts (5 chars)", verdict: Verdict.ALLOW }]);
  });

  it("loops on invalid input until it gets an answer", async () => {
    const lines: string[] = [];
    const answers = scriptedAnswers(["maybe", " NO "]);
    const engine = new PermissionEngine({ answers, output: (line) => lines.push(line) });

    expect(await engine.check("write", "Write to a.ts (1 chars)", { file_path: "a.ts" })).toBe(false);
    expect(lines).toContain(INVALID_INPUT_TEXT);
    expect(answers.prompts).toHaveLength(2);
    expect(engine.history).toEqual([{ description: "write: Write to a.ts (1 chars)", verdict: Verdict.DENY }]);
  });

  it("treats end of input as a denial", async () => {
    const lines: string[] = [];
    const engine = new PermissionEngine({ answers: scriptedAnswers([null]), output: (line) => lines.push(line) });

    expect(await engine.check("bash", "Run command: ls | wc", { command: "ls | wc" })).toBe(false);
    expect(lines[lines.length - 1]).toBe(CANCELLED_TEXT);
  });

  it("denies ASK without an answer source", async () => {
    const engine = new PermissionEngine();
    expect(await engine.check("edit", "Edit a.ts", { file_path: "a.ts" })).toBe(false);
  });

  it("shows the diff and pauses the interaction around the prompt", async () => {
    const lines: string[] = [];
    const calls: string[] = [];
    const engine = new PermissionEngine({
      answers: scriptedAnswers(["yes"]),
      output: (line) => lines.push(line),
      interaction: { pause: () => calls.push("pause"), resume: () => calls.push("resume") },
    });

    await engine.check("edit", "Edit a.ts", { file_path: "a.ts" }, "@@ -1 +1 @@\n-old\n+new\n");

    expect(lines.slice(2)).toEqual(["\n   Changes:", "  @@ -1 +1 @@\n  - old\n  + new", ""]);
    expect(calls).toEqual(["pause", "resume"]);
  });

  it("hides the diff when showDiff is off", async () => {
    const lines: string[] = [];
    const engine = new PermissionEngine({
      showDiff: false,
      answers: scriptedAnswers(["y"]),
      output: (line) => lines.push(line),
    });
    await engine.check("edit", "Edit a.ts", { file_path: "a.ts" }, "+x\n");
    expect(lines).toHaveLength(2);
  });

  it("resumes the interaction when the answer source fails", async () => {
    const resume = vi.fn();
    const engine = new PermissionEngine({
      answers: {
        question: () => Promise.reject(new Error("terminal gone")),
      },
      output: () => {},
      interaction: { pause: vi.fn(), resume },
    });
    await expect(engine.check("edit", "Edit a.ts", {})).rejects.toThrow("terminal gone");
    expect(resume).toHaveBeenCalledTimes(1);
  });
});

describe("formatDiff", () => {
  it("indents headers, additions, removals and context", () => {
    const diff = ["--- a/x.ts", "+++ b/x.ts", "@@ -1,2 +1,2 @@", " same", "-old", "+new", ""].join("\n");
    expect(formatDiff(diff)).toBe(
      ["  --- a/x.ts", "  +++ b/x.ts", "  @@ -1,2 +1,2 @@", "     same", "  - old", "  + new"].join("\n"),
    );
  });
});

describe("rule dicts", () => {
  it("round-trips a rule", () => {
    const rule: PermissionRule = {
      toolPattern: "bash",
      commandPattern: "make *",
      verdict: Verdict.ALLOW,
      priority: 20,
      description: "make targets",
    };
    expect(ruleToDict(rule)).toEqual({
      tool_pattern: "bash",
      command_pattern: "make *",
      permission: "allow",
      priority: 20,
      description: "make targets",
    });
    expect(ruleFromDict(ruleToDict(rule))).toEqual({ ...rule, pathPattern: undefined });
  });

  it("rejects a bad permission", () => {
    expect(() => ruleFromDict({ tool_pattern: "x", permission: "sometimes" })).toThrow(ConfigError);
  });

  it("builds an engine from config", () => {
    const config = new Config({
      approval_enabled: false,
      permission_rules: [{ tool_pattern: "deploy", permission: "DENY", priority: 30 }],
    });
    const engine = PermissionEngine.fromConfig(config);
    expect(engine.enabled).toBe(false);
    expect(engine.evaluate("deploy", {})).toBe(Verdict.DENY);
  });
});
