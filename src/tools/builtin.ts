/**
 * Built-in Tool Set
 *
 * Six tools covering the agent's essential capabilities:
 * - read:  read files with line numbers
 * - write: create or overwrite files (approval with diff preview)
 * - edit:  exact string replacement (approval with diff preview)
 * - bash:  run shell commands (approval only for risky commands)
 * - glob:  find files by pattern, newest first
 * - grep:  regex search across files
 *
 * Relative paths resolve against workspaceDir. Output sizes and command
 * timeouts are capped.
 */

import fs from "node:fs/promises";
import path from "node:path";
import { spawn } from "node:child_process";
import { createTwoFilesPatch } from "diff";
import { glob } from "glob";
import { describeError } from "../errors.js";
import { fail, ok, type Tool } from "./types.js";

export interface BuiltinToolsOptions {
  workspaceDir: string;
}

const DEFAULT_READ_LIMIT = 2000;
const BASH_DEFAULT_TIMEOUT_MS = 120_000;
const BASH_MAX_OUTPUT = 30_000;
const MAX_GLOB_RESULTS = 100;
const MAX_GREP_MATCHES = 100;
const SEARCH_IGNORE = ["**/node_modules/**", "**/.git/**"];

/** Substrings that make a shell command need approval */
export const DANGEROUS_COMMAND_PATTERNS = ["rm ", "mv ", "dd ", "format", ">", ">>", "|"];

function errnoCode(err: unknown): string | undefined {
  if (err instanceof Error && "code" in err && typeof err.code === "string") return err.code;
  return undefined;
}

async function readIfExists(filePath: string): Promise<string> {
  try {
    return await fs.readFile(filePath, "utf-8");
  } catch (err) {
    if (errnoCode(err) === "ENOENT") return "";
    throw err;
  }
}

function unifiedDiff(displayPath: string, before: string, after: string): string {
  return createTwoFilesPatch(`a/${displayPath}`, `b/${displayPath}`, before, after, undefined, undefined, {
    context: 3,
  });
}

function truncate(text: string, max: number): string {
  return text.length > max ? `${text.slice(0, max)}\n... (output truncated)` : text;
}

export function createBuiltinTools(opts: BuiltinToolsOptions): Tool[] {
  const resolve = (p: string) => path.resolve(opts.workspaceDir, p);

  // ============== File Read ==============

  const readTool: Tool<{ file_path: string; offset?: number; limit?: number }> = {
    name: "read",
    description:
      "Read file contents with line numbers. Use it before editing, or when the user asks to see a file.",
    parameters: {
      file_path: { type: "string", description: "Path of the file to read", required: true },
      offset: { type: "integer", description: "Line number to start reading from (1-based)" },
      limit: { type: "integer", description: `Maximum number of lines to read (default ${DEFAULT_READ_LIMIT})` },
    },
    async execute(input) {
      const filePath = resolve(input.file_path);
      try {
        const stat = await fs.stat(filePath);
        if (!stat.isFile()) return fail(`Not a file: ${input.file_path}`);
        const lines = (await fs.readFile(filePath, "utf-8")).split(/\r?\n/);
        if (lines.length > 0 && lines[lines.length - 1] === "") lines.pop();

        const start = input.offset && input.offset > 0 ? input.offset - 1 : 0;
        const limit = input.limit && input.limit > 0 ? input.limit : DEFAULT_READ_LIMIT;
        const selected = lines.slice(start, start + limit);
        const body = selected.map((line, i) => `${String(start + i + 1).padStart(6)}\t${line}`).join("\n");
        const remaining = lines.length - (start + selected.length);
        return ok(remaining > 0 ? `${body}\n... (${remaining} more lines, use offset to continue)` : body);
      } catch (err) {
        if (errnoCode(err) === "ENOENT") return fail(`File not found: ${input.file_path}`);
        if (errnoCode(err) === "EACCES") return fail(`Permission denied: ${input.file_path}`);
        return fail(`Error reading file: ${describeError(err)}`);
      }
    },
  };

  // ============== File Write ==============

  const writeTool: Tool<{ file_path: string; content: string }> = {
    name: "write",
    description: "Write a file, creating parent directories and overwriting any existing content.",
    parameters: {
      file_path: { type: "string", description: "Path of the file to write", required: true },
      content: { type: "string", description: "Full file content", required: true },
    },
    missingArgumentHint:
      "The write tool requires both 'file_path' and 'content'. Provide the complete file content, not a description of it.",
    approvalDescription(input) {
      return `Write to ${input.file_path} (${input.content.length} chars)`;
    },
    async approvalDiff(input) {
      const before = await readIfExists(resolve(input.file_path));
      return unifiedDiff(input.file_path, before, input.content);
    },
    async execute(input) {
      const filePath = resolve(input.file_path);
      try {
        await fs.mkdir(path.dirname(filePath), { recursive: true });
        await fs.writeFile(filePath, input.content, "utf-8");
        return ok(`Successfully wrote ${input.content.length} characters to ${input.file_path}`);
      } catch (err) {
        if (errnoCode(err) === "EACCES") return fail(`Permission denied: ${input.file_path}`);
        return fail(`Error writing file: ${describeError(err)}`);
      }
    },
  };

  // ============== File Edit ==============

  type EditInput = { file_path: string; old_string: string; new_string: string; replace_all?: boolean };

  const applyEdit = (content: string, input: EditInput): { content: string; count: number } | { error: string } => {
    const count = content.split(input.old_string).length - 1;
    if (count === 0) return { error: `String not found in file: ${input.old_string.slice(0, 50)}...` };
    if (count > 1 && !input.replace_all) {
      return {
        error: `Found ${count} occurrences of the string. Use replace_all=true to replace all, or provide more context.`,
      };
    }
    const next = input.replace_all
      ? content.split(input.old_string).join(input.new_string)
      : content.replace(input.old_string, () => input.new_string);
    return { content: next, count: input.replace_all ? count : 1 };
  };

  const editTool: Tool<EditInput> = {
    name: "edit",
    description:
      "Replace exact text in a file. old_string must match the file exactly (whitespace included) and be unique unless replace_all is set.",
    parameters: {
      file_path: { type: "string", description: "Path of the file to edit", required: true },
      old_string: { type: "string", description: "Exact text to replace", required: true },
      new_string: { type: "string", description: "Replacement text", required: true },
      replace_all: { type: "boolean", description: "Replace every occurrence (default false)" },
    },
    missingArgumentHint:
      "The edit tool requires 'file_path', 'old_string' and 'new_string'. Read the file first and copy old_string exactly.",
    approvalDescription(input) {
      return `Edit ${input.file_path}`;
    },
    async approvalDiff(input) {
      const before = await readIfExists(resolve(input.file_path));
      const edited = applyEdit(before, input);
      return "error" in edited ? undefined : unifiedDiff(input.file_path, before, edited.content);
    },
    async execute(input) {
      const filePath = resolve(input.file_path);
      try {
        const stat = await fs.stat(filePath);
        if (!stat.isFile()) return fail(`Not a file: ${input.file_path}`);
        const content = await fs.readFile(filePath, "utf-8");
        const edited = applyEdit(content, input);
        if ("error" in edited) return fail(edited.error);
        await fs.writeFile(filePath, edited.content, "utf-8");
        return ok(`Replaced ${edited.count} occurrence(s) in ${input.file_path}`);
      } catch (err) {
        if (errnoCode(err) === "ENOENT") return fail(`File not found: ${input.file_path}`);
        if (errnoCode(err) === "EACCES") return fail(`Permission denied: ${input.file_path}`);
        return fail(`Error editing file: ${describeError(err)}`);
      }
    },
  };

  // ============== Command Execution ==============

  const bashTool: Tool<{ command: string; timeout?: number }> = {
    name: "bash",
    description: "Run a shell command in the project directory. Use for tests, builds, git and other CLI tools.",
    parameters: {
      command: { type: "string", description: "Command to execute", required: true },
      timeout: { type: "integer", description: `Timeout in ms (default ${BASH_DEFAULT_TIMEOUT_MS})` },
    },
    approvalDescription(input) {
      return DANGEROUS_COMMAND_PATTERNS.some((pattern) => input.command.includes(pattern))
        ? `Run command: ${input.command}`
        : null;
    },
    async execute(input, ctx) {
      const timeout = input.timeout && input.timeout > 0 ? input.timeout : BASH_DEFAULT_TIMEOUT_MS;
      const abortSignal = ctx?.abortSignal;
      if (abortSignal?.aborted) return fail("Command interrupted");

      // Own process group, so a kill reaches every process the shell started
      const child = spawn("sh", ["-c", input.command], {
        cwd: opts.workspaceDir,
        stdio: ["ignore", "pipe", "pipe"],
        detached: true,
      });

      const killGroup = () => {
        try {
          if (child.pid !== undefined) process.kill(-child.pid, "SIGKILL");
          else child.kill("SIGKILL");
        } catch (err) {
          // ESRCH: the group already exited
          if (errnoCode(err) !== "ESRCH") child.kill("SIGKILL");
        }
      };

      let timedOut = false;
      let interrupted = false;
      const timer = setTimeout(() => {
        timedOut = true;
        killGroup();
      }, timeout);
      const onAbort = () => {
        interrupted = true;
        killGroup();
      };
      abortSignal?.addEventListener("abort", onAbort, { once: true });

      let stdout = "";
      let stderr = "";
      child.stdout.on("data", (chunk: Buffer) => {
        stdout += chunk.toString();
      });
      child.stderr.on("data", (chunk: Buffer) => {
        stderr += chunk.toString();
      });

      const exit = await new Promise<{ code: number | null; error?: Error }>((done) => {
        child.on("close", (code) => done({ code }));
        child.on("error", (error) => done({ code: null, error }));
      });
      clearTimeout(timer);
      abortSignal?.removeEventListener("abort", onAbort);

      if (interrupted) return fail("Command interrupted", truncate(stdout, BASH_MAX_OUTPUT));
      if (exit.error) return fail(`Error executing command: ${exit.error.message}`);
      if (timedOut) return fail(`Command timed out after ${timeout}ms`, truncate(stdout, BASH_MAX_OUTPUT));

      const parts: string[] = [];
      if (stdout) parts.push(stdout);
      if (stderr) parts.push(`[STDERR]\n${stderr}`);
      const output = truncate(parts.length > 0 ? parts.join("\n") : "(no output)", BASH_MAX_OUTPUT);
      if (exit.code !== 0) return fail(`[EXIT CODE] ${exit.code ?? "unknown"}`, output);
      return ok(output);
    },
  };

  // ============== File Search ==============

  const globTool: Tool<{ pattern: string; path?: string }> = {
    name: "glob",
    description: 'Find files by glob pattern (e.g. "src/**/*.ts"). Results are sorted newest first.',
    parameters: {
      pattern: { type: "string", description: "Glob pattern", required: true },
      path: { type: "string", description: "Directory to search in (default: project root)" },
    },
    async execute(input) {
      const base = resolve(input.path ?? ".");
      try {
        const stat = await fs.stat(base);
        if (!stat.isDirectory()) return fail(`Not a directory: ${input.path ?? base}`);
      } catch {
        return fail(`Directory not found: ${input.path ?? base}`);
      }
      const entries = await glob(input.pattern, {
        cwd: base,
        nodir: true,
        dot: false,
        ignore: SEARCH_IGNORE,
        stat: true,
        withFileTypes: true,
      });
      if (entries.length === 0) return ok("No files found matching pattern.");
      const sorted = entries
        .sort((a, b) => (b.mtimeMs ?? 0) - (a.mtimeMs ?? 0))
        .map((entry) => path.relative(opts.workspaceDir, entry.fullpath()));
      const shown = sorted.slice(0, MAX_GLOB_RESULTS);
      const more = sorted.length - shown.length;
      return ok(more > 0 ? `${shown.join("\n")}\n... and ${more} more files` : shown.join("\n"));
    },
  };

  const grepTool: Tool<{ pattern: string; path?: string; glob?: string; case_insensitive?: boolean }> = {
    name: "grep",
    description: "Search file contents with a regular expression. Returns path:line: text for each match.",
    parameters: {
      pattern: { type: "string", description: "Regular expression to search for", required: true },
      path: { type: "string", description: "File or directory to search (default: project root)" },
      glob: { type: "string", description: 'File filter inside the directory (default "**/*")' },
      case_insensitive: { type: "boolean", description: "Ignore case (default false)" },
    },
    async execute(input) {
      let regex: RegExp;
      try {
        regex = new RegExp(input.pattern, input.case_insensitive ? "i" : "");
      } catch (err) {
        return fail(`Invalid regex pattern: ${describeError(err)}`);
      }

      const base = resolve(input.path ?? ".");
      let files: string[];
      try {
        const stat = await fs.stat(base);
        files = stat.isFile()
          ? [base]
          : (await glob(input.glob ?? "**/*", { cwd: base, nodir: true, absolute: true, ignore: SEARCH_IGNORE })).sort();
      } catch {
        return fail(`Path not found: ${input.path ?? base}`);
      }

      const matches: string[] = [];
      for (const file of files) {
        let content: string;
        try {
          content = await fs.readFile(file, "utf-8");
        } catch {
          continue;
        }
        // Binary files are skipped
        if (content.includes("\u0000")) continue;
        const rel = path.relative(opts.workspaceDir, file);
        content.split(/\r?\n/).forEach((line, i) => {
          if (regex.test(line)) matches.push(`${rel}:${i + 1}: ${line}`);
        });
      }

      if (matches.length === 0) return ok("No matches found.");
      const shown = matches.slice(0, MAX_GREP_MATCHES);
      const more = matches.length - shown.length;
      return ok(more > 0 ? `${shown.join("\n")}\n... and ${more} more matches` : shown.join("\n"));
    },
  };

  return [readTool, writeTool, editTool, bashTool, globTool, grepTool];
}
