/**
 * LLM provider backed by @mariozechner/pi-ai
 *
 * Design decisions:
 * - SDK adaptation (Anthropic/OpenAI/Gemini/...) is delegated to pi-ai
 * - The loop only sees the LLMProvider contract and wire-format messages
 * - completeSimple reports failures as stopReason "error"; those are thrown
 *   here as RateLimitError / ProviderError
 */

import {
  completeSimple,
  getEnvApiKey,
  getModels,
  getProviders,
  type Api,
  type AssistantMessage,
  type KnownProvider,
  type Model,
  type Tool as PiTool,
} from "@mariozechner/pi-ai";
import { Type } from "@sinclair/typebox";
import { ConfigError, describeError, InterruptError } from "../errors.js";
import { convertMessagesToPi, convertPiAssistantToWire, mapStopReason } from "../message-convert.js";
import type { ToolDefinition } from "../tools/types.js";
import { toProviderError } from "./errors.js";
import type { ChatRequest, ChatResponse, LLMProvider } from "./types.js";

export function resolveKnownProvider(provider: string): KnownProvider {
  const known = getProviders().find((candidate) => candidate === provider);
  if (!known) {
    throw new ConfigError(`Unknown provider "${provider}". Available: ${getProviders().join(", ")}`, {
      keys: ["provider"],
    });
  }
  return known;
}

export function resolveModel(provider: string, modelId: string): Model<Api> {
  const models: Model<Api>[] = getModels(resolveKnownProvider(provider));
  const model = models.find((candidate) => candidate.id === modelId);
  if (!model) {
    throw new ConfigError(`Unknown model "${modelId}" for provider "${provider}"`, { keys: ["model"] });
  }
  return model;
}

export function toPiTool(definition: ToolDefinition): PiTool {
  return {
    name: definition.name,
    description: definition.description,
    parameters: Type.Unsafe<Record<string, unknown>>({ ...definition.input_schema }),
  };
}

export interface PiAiProviderOptions {
  provider: string;
  model: string;
  apiKey?: string;
  /** Pre-resolved model definition (custom endpoints, tests) */
  modelDef?: Model<Api>;
}

export class PiAiProvider implements LLMProvider {
  readonly name: string;
  readonly model: string;
  private readonly modelDef: Model<Api>;
  private readonly apiKey: string | undefined;

  constructor(opts: PiAiProviderOptions) {
    this.name = opts.provider;
    this.model = opts.model;
    this.modelDef = opts.modelDef ?? resolveModel(opts.provider, opts.model);
    this.apiKey = opts.apiKey ?? getEnvApiKey(opts.provider);
  }

  get hasApiKey(): boolean {
    return this.apiKey !== undefined;
  }

  async chat(request: ChatRequest): Promise<ChatResponse> {
    let reply: AssistantMessage;
    try {
      reply = await completeSimple(
        this.modelDef,
        {
          systemPrompt: request.system,
          messages: convertMessagesToPi(request.messages, this.modelDef),
          tools: request.tools.map(toPiTool),
        },
        { maxTokens: request.maxTokens, apiKey: this.apiKey, signal: request.signal },
      );
    } catch (err) {
      if (request.signal?.aborted) throw new InterruptError();
      throw toProviderError(describeError(err), { provider: this.name, model: this.model, cause: err });
    }

    if (reply.stopReason === "aborted") {
      throw new InterruptError();
    }
    if (reply.stopReason === "error") {
      throw toProviderError(reply.errorMessage ?? "Provider returned an error", {
        provider: this.name,
        model: this.model,
      });
    }

    return {
      content: convertPiAssistantToWire(reply),
      stopReason: mapStopReason(reply.stopReason),
      usage: { inputTokens: reply.usage.input, outputTokens: reply.usage.output },
    };
  }
}
