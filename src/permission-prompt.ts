/**
 * Interactive approval prompt
 *
 * The engine only sees two small capabilities:
 * - AnswerSource: yields the next line typed by the user, or null on EOF/interrupt
 * - InteractionControl: pause()/resume() for whatever else is drawing on the
 *   terminal (the CLI spinner), so the prompt is not overwritten
 *
 * EOF and Ctrl+C during the prompt are a denial, never an exception.
 */

import type { Interface as ReadlineInterface } from "node:readline";

export interface AnswerSource {
  question(prompt: string): Promise<string | null>;
}

export interface InteractionControl {
  pause(): void;
  resume(): void;
}

export type LineWriter = (line: string) => void;

export const APPROVE_PROMPT = "   Approve? [y/n]: ";
export const INVALID_INPUT_TEXT = "   Invalid input. Please enter 'y' or 'n'";
export const CANCELLED_TEXT = "\n   Cancelled. Denying permission.";

/**
 * Indent a unified diff for display under the approval request
 */
export function formatDiff(diff: string): string {
  return diff
    .replace(/\r?\n$/, "")
    .split(/\r?\n/)
    .map((line) => {
      if (line.startsWith("+++") || line.startsWith("---") || line.startsWith("@@")) return `  ${line}`;
      if (line.startsWith("+")) return `  + ${line.slice(1)}`;
      if (line.startsWith("-")) return `  - ${line.slice(1)}`;
      return `    ${line}`;
    })
    .join("\n");
}

export async function promptForApproval(params: {
  toolName: string;
  details: string;
  diff?: string;
  showDiff: boolean;
  answers: AnswerSource;
  output: LineWriter;
  interaction?: InteractionControl;
}): Promise<boolean> {
  const { output, answers } = params;
  params.interaction?.pause();
  try {
    output(`\n⚠️  Permission required: ${params.toolName}`);
    output(`   ${params.details}`);
    if (params.showDiff && params.diff) {
      output("\n   Changes:");
      output(formatDiff(params.diff));
      output("");
    }

    for (;;) {
      const answer = await answers.question(APPROVE_PROMPT);
      if (answer === null) {
        output(CANCELLED_TEXT);
        return false;
      }
      const normalized = answer.trim().toLowerCase();
      if (normalized === "y" || normalized === "yes") return true;
      if (normalized === "n" || normalized === "no") return false;
      output(INVALID_INPUT_TEXT);
    }
  } finally {
    params.interaction?.resume();
  }
}

/**
 * AnswerSource over a readline interface
 *
 * Resolves null when the interface closes (EOF) or Ctrl+C is pressed while the
 * question is open. `asking` lets the owner of the interface tell a prompt
 * interrupt from one aimed at the running agent.
 */
export function createReadlineAnswerSource(rl: ReadlineInterface): AnswerSource & { readonly asking: boolean } {
  let asking = false;
  return {
    get asking() {
      return asking;
    },
    question(prompt) {
      return new Promise<string | null>((resolve) => {
        const controller = new AbortController();
        const finish = (answer: string | null) => {
          asking = false;
          rl.off("close", onClose);
          rl.off("SIGINT", onInterrupt);
          resolve(answer);
        };
        const onClose = () => finish(null);
        const onInterrupt = () => {
          controller.abort();
          finish(null);
        };
        asking = true;
        rl.once("close", onClose);
        rl.once("SIGINT", onInterrupt);
        rl.question(prompt, { signal: controller.signal }, (answer) => finish(answer));
      });
    },
  };
}
