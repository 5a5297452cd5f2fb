/**
 * Loopwright: a terminal coding-agent harness
 *
 * Public surface: the agent loop and the pieces it is assembled from.
 */

// Agent loop
export {
  AgentLoop,
  formatToolResult,
  INTERRUPTED_MESSAGE,
  MAX_TURNS_MESSAGE,
  type AgentLoopOptions,
  type RunOptions,
} from "./agent-loop.js";
export { LoopContext, LoopState, TerminationReason, type LoopContextSnapshot } from "./loop-state.js";

// Messages and sessions
export {
  Message,
  partFromDict,
  partFromWire,
  partToDict,
  partToWire,
  registerPartDecoder,
  textPart,
  toolResultPart,
  toolUsePart,
  type MessageDict,
  type MessagePart,
  type MessagePartDict,
  type PartDecoder,
  type Role,
  type TextPart,
  type ToolResultPart,
  type ToolUsePart,
  type WireBlock,
  type WireMessage,
} from "./message.js";
export { Session, type SessionDict } from "./session.js";
export { closePendingToolUses, getPendingToolUseIds } from "./session-tool-result-guard.js";

// Events
export {
  EventBus,
  type AgentEvent,
  type AgentEventType,
  type EventHandler,
  type PublishedEvent,
} from "./agent-events.js";
export { EventLogger, formatEvent } from "./event-logger.js";

// Permissions
export {
  DEFAULT_RULES,
  PermissionEngine,
  ruleFromDict,
  ruleMatches,
  ruleToDict,
  Verdict,
  type PermissionDecision,
  type PermissionEngineOptions,
  type PermissionRule,
  type PermissionRuleDict,
} from "./permissions.js";
export { matchesPattern } from "./permission-pattern.js";
export {
  createReadlineAnswerSource,
  formatDiff,
  type AnswerSource,
  type InteractionControl,
} from "./permission-prompt.js";

// Tools
export { DENIED_MESSAGE, ToolExecutor, type ToolExecutorOptions } from "./tool-executor.js";
export { createDefaultToolRegistry, ToolRegistry } from "./tools/registry.js";
export { createBuiltinTools } from "./tools/builtin.js";
export { createTodoTools, formatTodos, TodoManager, type TodoItem } from "./tools/todo.js";
export { fail, ok, toolDefinition, type Tool, type ToolDefinition, type ToolInput, type ToolResult } from "./tools/types.js";

// Context
export {
  ContextManager,
  DEFAULT_CONTEXT_SETTINGS,
  type CompactionResult,
  type ContextManagerSettings,
  type ContextUsage,
} from "./context/compaction.js";
export { estimateTokens } from "./context/tokens.js";

// Providers
export type { ChatRequest, ChatResponse, ChatUsage, LLMProvider } from "./provider/types.js";
export { PiAiProvider, resolveModel } from "./provider/pi-ai.js";
export { isProviderError, isRateLimitError, ProviderError, RateLimitError } from "./provider/errors.js";

// Configuration
export { Config, loadConfig, type ConfigValues, type LoadConfigOptions } from "./config/config.js";
export { DEFAULT_CONFIG } from "./config/defaults.js";

// Errors and logging
export { ConfigError, describeError, InterruptError, MessageFormatError, MissingArgumentError } from "./errors.js";
export { createLogger, silentLogger, type Logger } from "./logger.js";
