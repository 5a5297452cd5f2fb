/**
 * Tool executor
 *
 * Every outcome becomes a ToolResult; nothing a tool does can throw past here.
 *
 * Execution order:
 * 1. unknown tool → failed result
 * 2. missing required parameters → failed result with remediation text
 * 3. approval (only when an enabled engine is attached and the tool asks for it)
 *    - errors while preparing the request are logged; execution continues
 *    - denial → failed result with a conversational message, body never runs
 * 4. tool body; thrown errors → failed result
 */

import type { EventBus } from "./agent-events.js";
import { describeError, MissingArgumentError } from "./errors.js";
import { createLogger, type Logger } from "./logger.js";
import type { PermissionEngine } from "./permissions.js";
import { ToolRegistry } from "./tools/registry.js";
import {
  requiredParameters,
  type Tool,
  type ToolContext,
  type ToolDefinition,
  type ToolInput,
  type ToolResult,
} from "./tools/types.js";

export const DENIED_MESSAGE =
  "User denied permission for this action. Please ask what they would like to do instead.";

export interface ToolExecutorOptions {
  tools: ToolRegistry | readonly Tool[];
  permissions?: PermissionEngine;
  events?: EventBus;
  logger?: Logger;
}

export function missingArgumentMessage(tool: Tool, missing: readonly string[], input: ToolInput): string {
  const provided = Object.keys(input)
    .map((key) => `'${key}'`)
    .join(", ");
  const lines = [
    `Tool '${tool.name}' called with missing parameters: ${missing.join(", ")}`,
    `Provided parameters: [${provided}]`,
    "Please make sure to provide all required parameters.",
  ];
  if (tool.missingArgumentHint) lines.push("", tool.missingArgumentHint);
  return lines.join("\n");
}

export class ToolExecutor {
  readonly registry: ToolRegistry;
  readonly permissions: PermissionEngine | undefined;
  private readonly events: EventBus | undefined;
  private readonly logger: Logger;

  constructor(opts: ToolExecutorOptions) {
    this.registry = opts.tools instanceof ToolRegistry ? opts.tools : new ToolRegistry(opts.tools);
    this.permissions = opts.permissions;
    this.events = opts.events;
    this.logger = opts.logger ?? createLogger("executor");
  }

  getToolDefinitions(): ToolDefinition[] {
    return this.registry.definitions();
  }

  async execute(toolName: string, input: ToolInput, ctx: ToolContext = {}): Promise<ToolResult> {
    const tool = this.registry.get(toolName);
    if (!tool) {
      return { success: false, output: "", error: `Unknown tool: ${toolName}` };
    }

    const missing = requiredParameters(tool).filter((name) => input[name] === undefined || input[name] === null);
    if (missing.length > 0) {
      return { success: false, output: "", error: missingArgumentMessage(tool, missing, input) };
    }

    if (!(await this.isApproved(tool, input))) {
      return { success: false, output: DENIED_MESSAGE };
    }

    try {
      return await tool.execute(input, ctx);
    } catch (err) {
      if (err instanceof MissingArgumentError) {
        return { success: false, output: "", error: missingArgumentMessage(tool, err.missing, input) };
      }
      return { success: false, output: "", error: `Error executing ${toolName}: ${describeError(err)}` };
    }
  }

  private async isApproved(tool: Tool, input: ToolInput): Promise<boolean> {
    const permissions = this.permissions;
    if (!permissions?.enabled || !tool.approvalDescription) return true;

    let description: string | null = null;
    try {
      description = tool.approvalDescription(input);
    } catch (err) {
      this.logger.warn(`Failed to check permission: ${describeError(err)}`);
    }
    if (description === null) return true;

    // A failed preview still asks; it only loses the diff
    let diff: string | undefined;
    try {
      diff = await tool.approvalDiff?.(input);
    } catch (err) {
      this.logger.warn(`Failed to prepare diff for ${tool.name}: ${describeError(err)}`);
    }

    this.events?.publish({ type: "tool_approval_requested", toolName: tool.name, description });
    const approved = await permissions.check(tool.name, description, input, diff);
    this.events?.publish({ type: "tool_approval_result", toolName: tool.name, approved });
    return approved;
  }
}
