/**
 * Tool registry
 *
 * An explicit object built at startup. Collaborators a tool needs (workspace
 * directory, todo manager) are passed in by the builder, never looked up.
 */

import { toolDefinition, type Tool, type ToolDefinition } from "./types.js";
import { createBuiltinTools } from "./builtin.js";
import { createTodoTools, TodoManager } from "./todo.js";

export class ToolRegistry {
  private readonly tools = new Map<string, Tool>();

  constructor(tools: readonly Tool[] = []) {
    for (const tool of tools) this.register(tool);
  }

  register(tool: Tool): this {
    if (this.tools.has(tool.name)) {
      throw new Error(`Tool already registered: ${tool.name}`);
    }
    this.tools.set(tool.name, tool);
    return this;
  }

  get(name: string): Tool | undefined {
    return this.tools.get(name);
  }

  has(name: string): boolean {
    return this.tools.has(name);
  }

  list(): Tool[] {
    return [...this.tools.values()];
  }

  names(): string[] {
    return [...this.tools.keys()];
  }

  definitions(): ToolDefinition[] {
    return this.list().map(toolDefinition);
  }
}

export interface DefaultToolsOptions {
  workspaceDir: string;
  todos?: TodoManager;
}

export function createDefaultToolRegistry(opts: DefaultToolsOptions): ToolRegistry {
  const todos = opts.todos ?? new TodoManager();
  return new ToolRegistry([
    ...createBuiltinTools({ workspaceDir: opts.workspaceDir }),
    ...createTodoTools(todos),
  ]);
}
