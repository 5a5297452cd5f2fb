/**
 * Command-line flags
 *
 * Flags may appear anywhere; every other argument joins into the one-shot message.
 */

export interface CliArgs {
  provider?: string;
  model?: string;
  maxTurns?: number;
  verbose: boolean;
  yes: boolean;
  help: boolean;
  message?: string;
}

const VALUE_FLAGS = new Set(["--provider", "--model", "--max-turns"]);

export function parseCliArgs(args: readonly string[]): CliArgs {
  const positional: string[] = [];
  for (let i = 0; i < args.length; i++) {
    const arg = args[i];
    if (VALUE_FLAGS.has(arg)) {
      i += 1;
      continue;
    }
    if (arg.startsWith("-")) continue;
    positional.push(arg);
  }

  const maxTurns = readFlag(args, "--max-turns");
  const message = positional.join(" ").trim();
  return {
    provider: readFlag(args, "--provider"),
    model: readFlag(args, "--model"),
    maxTurns: maxTurns === undefined ? undefined : Number(maxTurns),
    verbose: args.includes("--verbose") || args.includes("-v"),
    yes: args.includes("--yes") || args.includes("-y"),
    help: args.includes("--help") || args.includes("-h"),
    message: message || undefined,
  };
}

function readFlag(args: readonly string[], name: string): string | undefined {
  const idx = args.findIndex((arg) => arg === name);
  if (idx === -1) {
    return undefined;
  }
  const next = args[idx + 1];
  if (!next || next.startsWith("--")) {
    return undefined;
  }
  return next.trim() || undefined;
}

export const USAGE = `Usage: loopwright [options] [message...]

Options:
  --provider <name>   LLM provider (default from config: anthropic)
  --model <id>        Model id
  --max-turns <n>     Turn limit per message
  --yes, -y           Approve every tool call without asking
  --verbose, -v       Print every agent event
  --help, -h          Show this help
`;
