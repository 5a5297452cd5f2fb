import { describe, expect, it, vi } from "vitest";
import { EventBus, type AgentEvent } from "./agent-events.js";
import type { Logger } from "./logger.js";
import { PermissionEngine, Verdict } from "./permissions.js";
import { DENIED_MESSAGE, ToolExecutor } from "./tool-executor.js";
import { ok, type Tool } from "./tools/types.js";

const createMockLogger = (): Logger => ({
  debug: vi.fn(),
  info: vi.fn(),
  warn: vi.fn(),
  error: vi.fn(),
});

function spyTool(overrides: Partial<Tool> = {}): Tool {
  const execute = vi.fn((input: Record<string, unknown>) => ok(`ran with ${String(input.target)}`));
  return {
    name: "deploy",
    description: "Deploy a target",
    parameters: { target: { type: "string", description: "Target", required: true } },
    approvalDescription: (input) => `Deploy ${String(input.target)}`,
    ...overrides,
    execute,
  };
}

function engineWith(verdict: Verdict): PermissionEngine {
  return new PermissionEngine({
    useDefaultRules: false,
    rules: [{ toolPattern: "deploy", verdict, priority: 0, description: "test" }],
  });
}

describe("ToolExecutor", () => {
  it("runs an approved tool", async () => {
    const tool = spyTool();
    const executor = new ToolExecutor({ tools: [tool], permissions: engineWith(Verdict.ALLOW) });

    expect(await executor.execute("deploy", { target: "staging" })).toEqual({
      success: true,
      output: "ran with staging",
    });
    expect(tool.execute).toHaveBeenCalledTimes(1);
  });

  it("hands the abort signal to the tool", async () => {
    const tool = spyTool();
    const executor = new ToolExecutor({ tools: [tool] });
    const controller = new AbortController();

    await executor.execute("deploy", { target: "staging" }, { abortSignal: controller.signal });

    expect(tool.execute).toHaveBeenCalledWith({ target: "staging" }, { abortSignal: controller.signal });
  });

  it("never runs a denied tool", async () => {
    const tool = spyTool();
    const events = new EventBus();
    const seen: AgentEvent[] = [];
    events.subscribeAll((event) => seen.push(event));
    const executor = new ToolExecutor({ tools: [tool], permissions: engineWith(Verdict.DENY), events });

    const result = await executor.execute("deploy", { target: "prod" });

    expect(result).toEqual({ success: false, output: DENIED_MESSAGE });
    expect(result.error).toBeUndefined();
    expect(tool.execute).not.toHaveBeenCalled();
    expect(seen.map((event) => event.type)).toEqual(["tool_approval_requested", "tool_approval_result"]);
  });

  it("skips approval when the tool does not ask for it", async () => {
    const tool = spyTool({ approvalDescription: () => null });
    const executor = new ToolExecutor({ tools: [tool], permissions: engineWith(Verdict.DENY) });
    expect((await executor.execute("deploy", { target: "dev" })).success).toBe(true);
  });

  it("reports unknown tools", async () => {
    const executor = new ToolExecutor({ tools: [] });
    expect(await executor.execute("teleport", {})).toEqual({
      success: false,
      output: "",
      error: "Unknown tool: teleport",
    });
  });

  it("explains missing parameters with the tool's hint", async () => {
    const tool = spyTool({ missingArgumentHint: "Pass the target environment name." });
    const executor = new ToolExecutor({ tools: [tool] });

    const result = await executor.execute("deploy", { force: true, target: null });

    expect(result.success).toBe(false);
    expect(result.error).toBe(
      [
        "Tool 'deploy' called with missing parameters: target",
        "Provided parameters: ['force', 'target']",
        "Please make sure to provide all required parameters.",
        "",
        "Pass the target environment name.",
      ].join("\n"),
    );
    expect(tool.execute).not.toHaveBeenCalled();
  });

  it("turns a thrown error into a failed result", async () => {
    const tool: Tool = {
      name: "explode",
      description: "Always throws",
      parameters: {},
      execute: () => {
        throw new Error("kaboom");
      },
    };
    const executor = new ToolExecutor({ tools: [tool] });
    expect(await executor.execute("explode", {})).toEqual({
      success: false,
      output: "",
      error: "Error executing explode: kaboom",
    });
  });

  it("logs a failing approval check and still runs the tool", async () => {
    const logger = createMockLogger();
    const tool = spyTool({
      approvalDescription: () => {
        throw new Error("no description");
      },
    });
    const executor = new ToolExecutor({ tools: [tool], permissions: engineWith(Verdict.DENY), logger });

    const result = await executor.execute("deploy", { target: "qa" });

    expect(result.success).toBe(true);
    expect(logger.warn).toHaveBeenCalledWith("Failed to check permission: no description");
  });

  it("still asks when the diff preview fails", async () => {
    const logger = createMockLogger();
    const tool = spyTool({ approvalDiff: () => Promise.reject(new Error("unreadable")) });
    const executor = new ToolExecutor({ tools: [tool], permissions: engineWith(Verdict.DENY), logger });

    expect((await executor.execute("deploy", { target: "qa" })).output).toBe(DENIED_MESSAGE);
    expect(logger.warn).toHaveBeenCalledWith("Failed to prepare diff for deploy: unreadable");
  });

  it("exposes provider-facing definitions", () => {
    const executor = new ToolExecutor({ tools: [spyTool()] });
    expect(executor.getToolDefinitions()).toEqual([
      {
        name: "deploy",
        description: "Deploy a target",
        input_schema: {
          type: "object",
          properties: { target: { type: "string", description: "Target" } },
          required: ["target"],
        },
      },
    ]);
  });
});
