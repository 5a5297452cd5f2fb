/**
 * Todo tracking: todo_write replaces the whole list, todo_read prints it
 *
 * The TodoManager is injected so the CLI can show the same list the model edits.
 */

import { z } from "zod";
import { fail, ok, type Tool } from "./types.js";

export const TODO_STATUSES = ["pending", "in_progress", "completed"] as const;

export const TodoItemSchema = z.object({
  content: z.string().min(1),
  status: z.enum(TODO_STATUSES),
});

export type TodoItem = z.infer<typeof TodoItemSchema>;

export interface TodoSummary {
  total: number;
  completed: number;
  inProgress: number;
  pending: number;
}

export class TodoManager {
  private items: TodoItem[] = [];

  list(): TodoItem[] {
    return this.items.map((item) => ({ ...item }));
  }

  set(items: readonly TodoItem[]): void {
    this.items = items.map((item) => ({ ...item }));
  }

  clear(): void {
    this.items = [];
  }

  summary(): TodoSummary {
    const completed = this.items.filter((item) => item.status === "completed").length;
    const inProgress = this.items.filter((item) => item.status === "in_progress").length;
    return {
      total: this.items.length,
      completed,
      inProgress,
      pending: this.items.length - completed - inProgress,
    };
  }

  currentTask(): string | undefined {
    return this.items.find((item) => item.status === "in_progress")?.content;
  }
}

const STATUS_ICONS: Record<TodoItem["status"], string> = {
  completed: "✓",
  in_progress: "→",
  pending: "○",
};

export function formatTodos(items: readonly TodoItem[], summary: TodoSummary): string {
  if (items.length === 0) return "No todos in the list.";
  const lines = items.map((item, i) => `${i + 1}. [${STATUS_ICONS[item.status]}] ${item.content}`);
  lines.push(
    "",
    `Total: ${summary.total} | Completed: ${summary.completed} | In Progress: ${summary.inProgress} | Pending: ${summary.pending}`,
  );
  return lines.join("\n");
}

function validateTodos(value: unknown): { items: TodoItem[] } | { error: string } {
  if (!Array.isArray(value)) return { error: "'todos' must be a list" };
  const items: TodoItem[] = [];
  for (const [index, raw] of value.entries()) {
    const parsed = TodoItemSchema.safeParse(raw);
    if (!parsed.success) {
      const issue = parsed.error.issues[0];
      const where = issue && issue.path.length > 0 ? ` '${issue.path.join(".")}'` : "";
      return { error: `Todo item ${index}${where}: ${issue?.message ?? "invalid"}` };
    }
    items.push(parsed.data);
  }
  return { items };
}

export function createTodoTools(todos: TodoManager): Tool[] {
  const todoWrite: Tool<{ todos: unknown }> = {
    name: "todo_write",
    description: `Update the todo list. Replaces the entire list.

Use it to plan and track tasks with three or more steps, or when the user asks
for several things. Skip it for single, simple tasks.

Statuses: pending, in_progress (only ONE at a time), completed.`,
    parameters: {
      todos: {
        type: "array",
        description: "The updated todo list (replaces the entire list)",
        required: true,
        items: {
          type: "object",
          properties: {
            content: { type: "string", description: "Task content (e.g. 'Run the build')" },
            status: { type: "string", enum: [...TODO_STATUSES], description: "Task status" },
          },
          required: ["content", "status"],
        },
      },
    },
    execute(input) {
      const result = validateTodos(input.todos);
      if ("error" in result) return fail(result.error);
      todos.set(result.items);
      const summary = todos.summary();
      return ok(
        [
          `Updated ${result.items.length} todo(s).`,
          `Status: ${summary.completed}/${summary.total} completed, ${summary.inProgress} in progress, ${summary.pending} pending`,
        ].join("\n"),
      );
    },
  };

  const todoRead: Tool = {
    name: "todo_read",
    description: "Read the current todo list with statuses. Useful to check progress, especially after context compaction.",
    parameters: {},
    execute() {
      return ok(formatTodos(todos.list(), todos.summary()));
    },
  };

  return [todoWrite, todoRead];
}
