/**
 * Basic usage example
 *
 * Event consumption: events.subscribe() for typed events
 */

import {
  AgentLoop,
  ContextManager,
  createDefaultToolRegistry,
  EventBus,
  loadConfig,
  PermissionEngine,
  PiAiProvider,
  ToolExecutor,
} from "../src/index.js";

async function main() {
  const config = loadConfig();
  const provider = new PiAiProvider({ provider: config.get("provider"), model: config.get("model") });
  const events = new EventBus();

  // No answer source: anything the rules leave at ASK is denied
  const permissions = PermissionEngine.fromConfig(config);
  const executor = new ToolExecutor({
    tools: createDefaultToolRegistry({ workspaceDir: process.cwd() }),
    permissions,
    events,
  });
  const loop = new AgentLoop({
    provider,
    executor,
    events,
    contextManager: new ContextManager(provider, { contextLimit: config.get("context_limit") }, { events }),
    systemPrompt: config.get("system_prompt"),
  });

  console.log("Loopwright Basic Example\n");

  const unsubscribe = events.subscribe("tool_execution_started", (event) => {
    console.log(`[Tool call: ${event.toolName}]`);
  });

  // Example 1: Simple conversation
  console.log("--- Example 1: List files ---");
  const answer1 = await loop.run("List the TypeScript files in the src directory");
  console.log(`\n${answer1}`);
  console.log(`Done: ${loop.context.currentTurn} turns, ${loop.context.totalToolCalls} tool calls\n`);

  // Example 2: follow-up in the same session
  console.log("--- Example 2: Read package.json ---");
  const answer2 = await loop.run("Read package.json and tell me the project name");
  console.log(`\n${answer2}`);
  console.log(`Done: ${loop.context.currentTurn} turns\n`);

  unsubscribe();
  loop.reset();
}

main().catch(console.error);
