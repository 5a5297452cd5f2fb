/**
 * Tool contract
 *
 * - `parameters` is the flat schema exposed to the model: name → { type, description, required }
 * - `execute` may be sync or async; the executor awaits either way. The
 *   context carries the run's abort signal
 * - `approvalDescription` returns null when the call needs no approval, or the
 *   text shown to the user when it does
 * - `approvalDiff` supplies the change preview for file-writing tools
 */

export interface ToolResult {
  success: boolean;
  output: string;
  error?: string;
}

export type ToolParameterType = "string" | "integer" | "number" | "boolean" | "array" | "object";

export interface ToolParameter {
  type: ToolParameterType;
  description: string;
  required?: boolean;
  /** JSON schema of array items */
  items?: Record<string, unknown>;
  enum?: readonly string[];
}

export type ToolInput = Record<string, unknown>;

/** Per-call context handed to execute() */
export interface ToolContext {
  /** Fires when the run is interrupted; long-running tools stop their work */
  abortSignal?: AbortSignal;
}

export interface Tool<T extends ToolInput = ToolInput> {
  readonly name: string;
  readonly description: string;
  readonly parameters: Readonly<Record<string, ToolParameter>>;
  /** Appended to the missing-parameter message so the model can fix its next call */
  readonly missingArgumentHint?: string;
  execute(input: T, ctx?: ToolContext): ToolResult | Promise<ToolResult>;
  approvalDescription?(input: T): string | null;
  approvalDiff?(input: T): Promise<string | undefined>;
}

/** Provider-facing tool schema */
export interface ToolDefinition {
  name: string;
  description: string;
  input_schema: {
    type: "object";
    properties: Record<string, Record<string, unknown>>;
    required: string[];
  };
}

export function toolDefinition(tool: Tool): ToolDefinition {
  const properties: Record<string, Record<string, unknown>> = {};
  const required: string[] = [];
  for (const [name, param] of Object.entries(tool.parameters)) {
    properties[name] = {
      type: param.type,
      description: param.description,
      ...(param.items ? { items: param.items } : {}),
      ...(param.enum ? { enum: [...param.enum] } : {}),
    };
    if (param.required) required.push(name);
  }
  return {
    name: tool.name,
    description: tool.description,
    input_schema: { type: "object", properties, required },
  };
}

export function requiredParameters(tool: Tool): string[] {
  return Object.entries(tool.parameters)
    .filter(([, param]) => param.required)
    .map(([name]) => name);
}

export function ok(output: string): ToolResult {
  return { success: true, output };
}

export function fail(error: string, output = ""): ToolResult {
  return { success: false, output, error };
}
