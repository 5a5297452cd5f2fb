/**
 * Custom tools example
 *
 * A tool is a plain object; registering it is a constructor call, not a decorator.
 */

import {
  AgentLoop,
  createBuiltinTools,
  EventBus,
  fail,
  ok,
  PermissionEngine,
  PiAiProvider,
  ToolExecutor,
  ToolRegistry,
  Verdict,
  type Tool,
} from "../src/index.js";

// Custom tool: Get current time
const timeTool: Tool<{ timezone?: string }> = {
  name: "get_time",
  description: "Get the current time",
  parameters: {
    timezone: { type: "string", description: "Timezone, e.g. America/New_York" },
  },
  execute(input) {
    const tz = input.timezone ?? "UTC";
    const now = new Date().toLocaleString("en-US", { timeZone: tz });
    return ok(`Current time (${tz}): ${now}`);
  },
};

// Custom tool: asks for approval before "deploying"
const deployTool: Tool<{ target: string }> = {
  name: "deploy",
  description: "Deploy the project to a target environment",
  parameters: {
    target: { type: "string", description: "Environment name, e.g. staging", required: true },
  },
  missingArgumentHint: "Pass the environment name as 'target'.",
  approvalDescription(input) {
    return `Deploy to ${input.target}`;
  },
  execute(input) {
    if (input.target === "production") {
      return fail("Production deploys are not available from this example");
    }
    return ok(`Deployed to ${input.target}`);
  },
};

async function main() {
  const provider = new PiAiProvider({ provider: "anthropic", model: "claude-sonnet-4-20250514" });
  const events = new EventBus();
  const registry = new ToolRegistry([...createBuiltinTools({ workspaceDir: process.cwd() }), timeTool]);
  registry.register(deployTool);

  // Staging deploys are pre-approved; everything else still falls through to ASK
  const permissions = new PermissionEngine();
  permissions.addRule({
    toolPattern: "deploy",
    verdict: Verdict.ALLOW,
    priority: 20,
    description: "Allow deploy tool",
  });

  const loop = new AgentLoop({
    provider,
    executor: new ToolExecutor({ tools: registry, permissions, events }),
    events,
    systemPrompt: `You are an assistant with the following tools available:
- read/write/edit/bash/glob/grep: workspace operations
- get_time: Get current time
- deploy: Deploy the project

Help the user complete their tasks.`,
  });

  console.log("Custom Tools Example\n");

  const unsubscribe = events.subscribe("tool_execution_completed", (event) => {
    console.log(`[${event.toolName}] ${event.success ? "ok" : "failed"} -> ${event.outputPreview}`);
  });

  const answer = await loop.run("What time is it in Tokyo? Then deploy to staging.");
  console.log(`\n${answer}`);
  console.log(`\nDone: ${loop.context.currentTurn} turns, ${loop.context.totalToolCalls} tool calls`);
  console.log("Permission decisions:", permissions.history);

  unsubscribe();
}

main().catch(console.error);
