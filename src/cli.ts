#!/usr/bin/env node
/**
 * Loopwright CLI
 *
 * loopwright [--provider p] [--model m] [--max-turns n] [--verbose] [--yes] [message...]
 *
 * With a message: run once, print the answer, exit.
 * Without: interactive REPL with slash commands.
 *
 * Ctrl+C:
 * - while a run is active → aborts the run (USER_INTERRUPT), back to the prompt
 * - during an approval prompt → denies that request
 * - at the REPL prompt → exits
 */

import "dotenv/config";
import readline from "node:readline";
import { AgentLoop } from "./agent-loop.js";
import { EventBus } from "./agent-events.js";
import { color } from "./colors.js";
import type { ConfigInput } from "./config/config.js";
import { loadConfig } from "./config/config.js";
import { ContextManager } from "./context/compaction.js";
import { describeError } from "./errors.js";
import { EventLogger } from "./event-logger.js";
import { createLogger } from "./logger.js";
import { createReadlineAnswerSource } from "./permission-prompt.js";
import { PermissionEngine } from "./permissions.js";
import { PiAiProvider } from "./provider/pi-ai.js";
import { Spinner } from "./spinner.js";
import { ToolExecutor } from "./tool-executor.js";
import { createDefaultToolRegistry } from "./tools/registry.js";
import { formatTodos, TodoManager } from "./tools/todo.js";
import { parseCliArgs, USAGE } from "./cli-args.js";

const HELP = `
Commands:
  /help         Show help
  /reset        Start a new conversation
  /history      Show conversation history
  /context      Show context window usage
  /permissions  Show permission rules and decisions
  /todos        Show the todo list
  /quit         Exit
`;

// ============== Main function ==============

async function main(): Promise<number> {
  const args = parseCliArgs(process.argv.slice(2));
  if (args.help) {
    console.log(USAGE);
    return 0;
  }

  const overrides: Partial<ConfigInput> = {};
  if (args.provider) overrides.provider = args.provider;
  if (args.model) overrides.model = args.model;
  if (args.maxTurns !== undefined) overrides.max_turns = args.maxTurns;
  if (args.yes) overrides.approval_enabled = false;

  const config = loadConfig({ overrides });
  const debug = config.get("debug");
  const logger = createLogger("cli", { debug });

  const provider = new PiAiProvider({
    provider: config.get("provider"),
    model: config.get("model"),
    apiKey: config.get("api_key"),
  });
  if (!provider.hasApiKey) {
    logger.error(
      `API key not found for ${provider.name}. Set the provider's environment variable or LOOPWRIGHT_API_KEY.`,
    );
    return 1;
  }

  const workspaceDir = process.cwd();
  const rl = readline.createInterface({ input: process.stdin, output: process.stdout });
  const answers = createReadlineAnswerSource(rl);
  const spinner = new Spinner();
  const events = new EventBus({ logger: createLogger("events", { debug }) });
  const todos = new TodoManager();

  const permissions = PermissionEngine.fromConfig(config, { answers, interaction: spinner });
  const executor = new ToolExecutor({
    tools: createDefaultToolRegistry({ workspaceDir, todos }),
    permissions,
    events,
    logger: createLogger("executor", { debug }),
  });
  const contextManager = new ContextManager(
    provider,
    {
      contextLimit: config.get("context_limit"),
      compactThreshold: config.get("compact_threshold"),
      preserveRecentMessages: config.get("preserve_recent_messages"),
      charsPerToken: config.get("chars_per_token"),
    },
    { events, logger: createLogger("context", { debug }) },
  );
  const loop = new AgentLoop({
    provider,
    executor,
    contextManager,
    events,
    systemPrompt: config.get("system_prompt"),
    maxTurns: config.get("max_turns"),
    maxTokens: config.get("max_tokens"),
    maxOutputLength: config.get("max_output_length"),
    enableAutoCompaction: config.get("enable_auto_compaction"),
    logger: createLogger("loop", { debug }),
  });

  // Spinner follows the loop; the event logger suspends it while printing
  events.subscribe("state_changed", (event) => {
    if (event.to === "calling_llm") spinner.start("Thinking");
    else spinner.stop();
  });
  events.subscribe("tool_execution_started", (event) => spinner.start(`Running ${event.toolName}`));
  events.subscribe("tool_execution_completed", () => spinner.stop());
  const eventLogger = new EventLogger({
    verbose: args.verbose,
    write: (line) => {
      spinner.pause();
      console.error(color(line, "dim"));
      spinner.resume();
    },
  });
  eventLogger.attach(events);

  let running: AbortController | null = null;
  rl.on("SIGINT", () => {
    // An open question handles its own Ctrl+C
    if (answers.asking) return;
    if (running) {
      running.abort();
      return;
    }
    rl.close();
  });

  const runMessage = async (message: string): Promise<boolean> => {
    const controller = new AbortController();
    running = controller;
    try {
      const answer = await loop.run(message, { signal: controller.signal });
      const ctx = loop.context;
      console.log(`\n${color("Agent:", "blue")} ${answer}`);
      console.log(
        color(
          `\n  [turns=${ctx.currentTurn}, tools=${ctx.totalToolCalls}, llm=${ctx.totalLlmCalls}, ${ctx.durationMs}ms]`,
          "dim",
        ),
      );
      return true;
    } catch (err) {
      console.error(color(`\nError: ${describeError(err)}`, "red"));
      return false;
    } finally {
      running = null;
      spinner.stop();
    }
  };

  console.log(color("\n Loopwright", "cyan"));
  console.log(color(`Provider: ${provider.name} (${provider.model})`, "dim"));
  console.log(color(`Directory: ${workspaceDir}`, "dim"));
  for (const source of config.sources) {
    console.log(color(`Config: ${source.file}`, "dim"));
  }

  if (args.message) {
    const succeeded = await runMessage(args.message);
    eventLogger.detach();
    rl.close();
    return succeeded ? 0 : 1;
  }

  console.log(color("Type /help for commands, Ctrl+C to exit\n", "dim"));
  const commands: CommandDeps = { loop, contextManager, permissions, todos };

  for (;;) {
    const input = await answers.question(color("\nYou: ", "green"));
    if (input === null) break;
    const trimmed = input.trim();
    if (!trimmed) continue;

    if (trimmed.startsWith("/")) {
      if (handleCommand(trimmed, commands) === "quit") break;
      continue;
    }
    await runMessage(trimmed);
  }

  eventLogger.detach();
  rl.close();
  console.log(color("\nGoodbye!", "cyan"));
  return 0;
}

// ============== Slash commands ==============

interface CommandDeps {
  loop: AgentLoop;
  contextManager: ContextManager;
  permissions: PermissionEngine;
  todos: TodoManager;
}

function handleCommand(cmd: string, deps: CommandDeps): "quit" | "continue" {
  const [command] = cmd.slice(1).split(" ");

  switch (command) {
    case "help":
      console.log(HELP);
      break;

    case "reset":
      deps.loop.reset();
      deps.todos.clear();
      console.log(color(`Conversation reset (session ${deps.loop.session.id})`, "green"));
      break;

    case "history": {
      const messages = deps.loop.session.messages;
      if (messages.length === 0) {
        console.log(color("No history", "dim"));
        break;
      }
      for (const msg of messages) {
        const role = msg.role === "user" ? "You" : "Agent";
        const content = msg.parts
          .map((part) => {
            switch (part.partType) {
              case "text":
                return part.text;
              case "tool_use":
                return `[tool_use ${part.name}]`;
              case "tool_result":
                return `[tool_result${part.isError ? " error" : ""}]`;
            }
          })
          .join(" ");
        const preview = content.length > 100 ? `${content.slice(0, 100)}...` : content;
        console.log(`${color(`${role}:`, role === "You" ? "green" : "blue")} ${preview}`);
      }
      break;
    }

    case "context": {
      const usage = deps.contextManager.usageInfo(deps.loop.session);
      console.log(
        `Context: ~${usage.currentTokens.toLocaleString("en-US")} / ${usage.maxTokens.toLocaleString("en-US")} tokens (${usage.percentage}%), ${usage.messages} messages`,
      );
      break;
    }

    case "permissions": {
      console.log(`Approvals: ${deps.permissions.enabled ? "enabled" : "disabled"}`);
      console.log("Rules (highest priority first):");
      for (const rule of deps.permissions.rules) {
        const scope = [rule.pathPattern && `path=${rule.pathPattern}`, rule.commandPattern && `command=${rule.commandPattern}`]
          .filter(Boolean)
          .join(" ");
        console.log(`  ${String(rule.priority).padStart(5)}  ${rule.verdict.padEnd(5)}  ${rule.toolPattern}${scope ? ` ${scope}` : ""}`);
      }
      const history = deps.permissions.history;
      if (history.length > 0) {
        console.log("Decisions:");
        for (const decision of history) {
          console.log(`  ${decision.verdict.padEnd(5)}  ${decision.description}`);
        }
      }
      break;
    }

    case "todos":
      console.log(formatTodos(deps.todos.list(), deps.todos.summary()));
      break;

    case "quit":
    case "exit":
      return "quit";

    default:
      console.log(color(`Unknown command: ${command}`, "yellow"));
  }
  return "continue";
}

main().then(
  (code) => {
    process.exitCode = code;
  },
  (err: unknown) => {
    console.error(color(`Startup failed: ${describeError(err)}`, "red"));
    process.exitCode = 1;
  },
);
