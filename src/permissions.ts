/**
 * Permission engine
 *
 * Rules are evaluated in descending priority (ties keep insertion order); the
 * first match decides. No match means ASK.
 *
 * Evaluation of check():
 * 1. engine disabled → approve
 * 2. ALLOW / DENY → decided immediately, recorded to history
 * 3. ASK → interactive prompt, answer recorded to history
 */

import path from "node:path";
import { ConfigError } from "./errors.js";
import { compilePattern, matchesPattern } from "./permission-pattern.js";
import {
  promptForApproval,
  type AnswerSource,
  type InteractionControl,
  type LineWriter,
} from "./permission-prompt.js";
import type { Config } from "./config/config.js";

export const Verdict = {
  ALLOW: "allow",
  DENY: "deny",
  ASK: "ask",
} as const;

export type Verdict = (typeof Verdict)[keyof typeof Verdict];

export interface PermissionRule {
  readonly toolPattern: string;
  readonly pathPattern?: string;
  readonly commandPattern?: string;
  readonly verdict: Verdict;
  readonly priority: number;
  readonly description: string;
}

/** Config-file shape of a rule */
export interface PermissionRuleDict {
  tool_pattern: string;
  path_pattern?: string;
  command_pattern?: string;
  permission: Verdict;
  priority: number;
  description: string;
}

export interface PermissionDecision {
  description: string;
  verdict: Verdict;
}

export type PermissionContext = Record<string, unknown>;

// ============== Rule matching ==============

function contextString(context: PermissionContext, key: string): string | undefined {
  const value = context[key];
  return typeof value === "string" && value.length > 0 ? value : undefined;
}

export function ruleMatches(rule: PermissionRule, toolName: string, context: PermissionContext): boolean {
  if (!matchesPattern(toolName, rule.toolPattern)) return false;

  if (rule.pathPattern) {
    const target = contextString(context, "file_path") ?? contextString(context, "path");
    if (!target) return false;
    const pattern = compilePattern(rule.pathPattern);
    // Filename-only patterns ("*.test.*") match against the basename too
    if (!matchesPattern(target, pattern) && !matchesPattern(path.basename(target), pattern)) {
      return false;
    }
  }

  if (rule.commandPattern) {
    const command = contextString(context, "command");
    if (!command || !matchesPattern(command, rule.commandPattern)) return false;
  }

  return true;
}

export function ruleToDict(rule: PermissionRule): PermissionRuleDict {
  return {
    tool_pattern: rule.toolPattern,
    ...(rule.pathPattern ? { path_pattern: rule.pathPattern } : {}),
    ...(rule.commandPattern ? { command_pattern: rule.commandPattern } : {}),
    permission: rule.verdict,
    priority: rule.priority,
    description: rule.description,
  };
}

function optionalString(data: Record<string, unknown>, key: string): string | undefined {
  const value = data[key];
  if (value === undefined || value === null) return undefined;
  if (typeof value !== "string") {
    throw new ConfigError(`permission rule: "${key}" must be a string`, { keys: ["permission_rules"] });
  }
  return value;
}

function parseVerdict(value: unknown): Verdict {
  const normalized = (typeof value === "string" ? value : "ask").toLowerCase();
  if (normalized === Verdict.ALLOW || normalized === Verdict.DENY || normalized === Verdict.ASK) {
    return normalized;
  }
  throw new ConfigError(`permission rule: unknown permission "${String(value)}"`, { keys: ["permission_rules"] });
}

export function ruleFromDict(data: unknown): PermissionRule {
  if (typeof data !== "object" || data === null || Array.isArray(data)) {
    throw new ConfigError("permission rule must be an object", { keys: ["permission_rules"] });
  }
  const record: Record<string, unknown> = { ...data };
  const priority = record.priority ?? 0;
  if (typeof priority !== "number" || !Number.isInteger(priority)) {
    throw new ConfigError('permission rule: "priority" must be an integer', { keys: ["permission_rules"] });
  }
  return {
    toolPattern: optionalString(record, "tool_pattern") ?? "*",
    pathPattern: optionalString(record, "path_pattern"),
    commandPattern: optionalString(record, "command_pattern"),
    verdict: parseVerdict(record.permission),
    priority,
    description: optionalString(record, "description") ?? "",
  };
}

// ============== Default rules ==============

function allowTool(toolPattern: string, description: string): PermissionRule {
  return { toolPattern, verdict: Verdict.ALLOW, priority: -100, description };
}

function allowTestWrite(pathPattern: string, description: string): PermissionRule {
  return { toolPattern: "write", pathPattern, verdict: Verdict.ALLOW, priority: 10, description };
}

function allowCommand(commandPattern: string, description: string): PermissionRule {
  return { toolPattern: "bash", commandPattern, verdict: Verdict.ALLOW, priority: 10, description };
}

export const DEFAULT_RULES: readonly PermissionRule[] = [
  // Read-only tools
  allowTool("read", "Reading files is safe"),
  allowTool("glob", "Finding files is safe"),
  allowTool("grep", "Searching files is safe"),
  allowTool("todo_read", "Reading the todo list is safe"),
  allowTool("todo_write", "Updating the todo list is safe"),

  // Tests
  allowTestWrite("*test*.py", "Writing test files"),
  allowTestWrite("*.test.*", "Writing test files"),
  allowTestWrite("*.spec.*", "Writing spec files"),
  allowTestWrite("tests/*", "Writing to tests directory"),
  allowTestWrite("test/*", "Writing to test directory"),
  allowCommand("pytest*", "Running pytest"),
  allowCommand("python -m pytest*", "Running pytest via python -m"),
  allowCommand("python*pytest*", "Running pytest via python"),
  allowCommand("npm test*", "Running npm test"),
  allowCommand("npx vitest*", "Running vitest"),

  // Lint, type-check, format
  allowCommand("ruff *", "Running ruff linter"),
  allowCommand("mypy *", "Running mypy type checker"),
  allowCommand("black *", "Running black formatter"),
  allowCommand("npx tsc*", "Running the TypeScript compiler"),
  allowCommand("eslint *", "Running eslint"),
  allowCommand("prettier *", "Running prettier"),

  // Scratch directory
  { toolPattern: "write", pathPattern: "/tmp/*", verdict: Verdict.ALLOW, priority: -50, description: "Writing to /tmp is safe" },

  // Recursive delete
  { toolPattern: "bash", commandPattern: "rm -rf *", verdict: Verdict.DENY, priority: 100, description: "Dangerous recursive delete" },
  { toolPattern: "bash", commandPattern: "rm -r *", verdict: Verdict.DENY, priority: 100, description: "Dangerous recursive delete" },

  // Everything else
  { toolPattern: "*", verdict: Verdict.ASK, priority: -1000, description: "Default: ask user" },
];

// ============== Engine ==============

export interface PermissionEngineOptions {
  enabled?: boolean;
  showDiff?: boolean;
  rules?: readonly PermissionRule[];
  useDefaultRules?: boolean;
  /** Source of interactive answers; without one, ASK resolves to a denial. */
  answers?: AnswerSource;
  output?: LineWriter;
  interaction?: InteractionControl;
}

export class PermissionEngine {
  enabled: boolean;
  showDiff: boolean;
  interaction: InteractionControl | undefined;
  private _rules: PermissionRule[] = [];
  private readonly _history: PermissionDecision[] = [];
  private readonly answers: AnswerSource | undefined;
  private readonly output: LineWriter;

  constructor(opts: PermissionEngineOptions = {}) {
    this.enabled = opts.enabled ?? true;
    this.showDiff = opts.showDiff ?? true;
    this.answers = opts.answers;
    this.output = opts.output ?? ((line) => console.log(line));
    this.interaction = opts.interaction;
    const initial = [...(opts.useDefaultRules === false ? [] : DEFAULT_RULES), ...(opts.rules ?? [])];
    this.setRules(initial);
  }

  get rules(): readonly PermissionRule[] {
    return this._rules;
  }

  get history(): readonly PermissionDecision[] {
    return [...this._history];
  }

  addRule(rule: PermissionRule): void {
    this.setRules([...this._rules, rule]);
  }

  clearHistory(): void {
    this._history.length = 0;
  }

  evaluate(toolName: string, context: PermissionContext): Verdict {
    for (const rule of this._rules) {
      if (ruleMatches(rule, toolName, context)) return rule.verdict;
    }
    return Verdict.ASK;
  }

  async check(toolName: string, details: string, context: PermissionContext, diff?: string): Promise<boolean> {
    if (!this.enabled) return true;

    const verdict = this.evaluate(toolName, context);
    if (verdict !== Verdict.ASK) {
      this.record(toolName, details, verdict);
      return verdict === Verdict.ALLOW;
    }

    const approved = this.answers
      ? await promptForApproval({
          toolName,
          details,
          diff,
          showDiff: this.showDiff,
          answers: this.answers,
          output: this.output,
          interaction: this.interaction,
        })
      : false;
    this.record(toolName, details, approved ? Verdict.ALLOW : Verdict.DENY);
    return approved;
  }

  static fromConfig(config: Config, deps?: Omit<PermissionEngineOptions, "enabled" | "showDiff" | "rules">): PermissionEngine {
    return new PermissionEngine({
      ...deps,
      enabled: config.get("approval_enabled"),
      showDiff: config.get("show_diff"),
      rules: config.get("permission_rules").map(ruleFromDict),
    });
  }

  private record(toolName: string, details: string, verdict: Verdict): void {
    this._history.push({ description: `${toolName}: ${details}`, verdict });
  }

  private setRules(rules: PermissionRule[]): void {
    // Array.prototype.sort is stable: equal priorities keep insertion order
    this._rules = rules.sort((a, b) => b.priority - a.priority);
  }
}
