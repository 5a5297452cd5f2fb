/**
 * Built-in configuration defaults (lowest precedence layer)
 */

export const APP_DIR_NAME = ".loopwright";
export const PROJECT_CONFIG_FILE = ".loopwright.json";
export const GLOBAL_CONFIG_FILE = "config.json";
export const ENV_PREFIX = "LOOPWRIGHT_";

export const DEFAULT_SYSTEM_PROMPT = `You are a coding agent working in the user's project directory. You take action with tools rather than describing what could be done.

Tools:
- read: read file contents with line numbers
- write: create or overwrite a file
- edit: replace exact text in a file
- glob: find files by pattern (e.g. "src/**/*.ts")
- grep: search file contents with a regular expression
- bash: run a shell command in the project directory
- todo_write / todo_read: plan and track multi-step work

Rules:
1. Read a file before editing it.
2. To find or search something, use glob or grep right away.
3. To change a file, use write or edit; to run something, use bash.
4. Keep one todo in_progress at a time for tasks with three or more steps.
5. Be careful with destructive shell commands.
6. After using tools, summarize what you found or changed.`;

export const DEFAULT_CONFIG = {
  // LLM
  provider: "anthropic",
  model: "claude-sonnet-4-20250514",
  max_tokens: 16_384,
  system_prompt: DEFAULT_SYSTEM_PROMPT,

  // Agent loop and context
  max_turns: 20,
  max_output_length: 10_000,
  context_limit: 100_000,
  compact_threshold: 0.75,
  preserve_recent_messages: 3,
  chars_per_token: 4,
  enable_auto_compaction: true,

  // Permissions
  approval_enabled: true,
  show_diff: true,
  permission_rules: [],

  debug: false,
};
