import { completeSimple, getModels, type AssistantMessage } from "@mariozechner/pi-ai";
import { beforeEach, describe, expect, it, vi } from "vitest";
import { ConfigError, InterruptError } from "../errors.js";
import { RateLimitError } from "./errors.js";
import { PiAiProvider, resolveKnownProvider, resolveModel, toPiTool } from "./pi-ai.js";

vi.mock("@mariozechner/pi-ai", async (importOriginal) => {
  const actual = await importOriginal<typeof import("@mariozechner/pi-ai")>();
  return { ...actual, completeSimple: vi.fn() };
});

const [model] = getModels("anthropic");

function reply(overrides: Partial<AssistantMessage>): AssistantMessage {
  return {
    role: "assistant",
    content: [{ type: "text", text: "hi" }],
    api: model.api,
    provider: model.provider,
    model: model.id,
    usage: {
      input: 12,
      output: 3,
      cacheRead: 0,
      cacheWrite: 0,
      totalTokens: 15,
      cost: { input: 0, output: 0, cacheRead: 0, cacheWrite: 0, total: 0 },
    },
    stopReason: "stop",
    timestamp: 0,
    ...overrides,
  };
}

function provider(): PiAiProvider {
  return new PiAiProvider({ provider: "anthropic", model: model.id, apiKey: "test-secret", modelDef: model });
}

const request = { messages: [{ role: "user" as const, content: "hi" }], system: "sys", tools: [], maxTokens: 100 };

describe("PiAiProvider", () => {
  beforeEach(() => {
    vi.mocked(completeSimple).mockReset();
  });

  it("converts the reply to the wire format", async () => {
    vi.mocked(completeSimple).mockResolvedValue(
      reply({
        content: [
          { type: "text", text: "Let me look." },
          { type: "toolCall", id: "c1", name: "read", arguments: { file_path: "a.ts" } },
        ],
        stopReason: "toolUse",
      }),
    );

    const response = await provider().chat(request);

    expect(response).toEqual({
      content: [
        { type: "text", text: "Let me look." },
        { type: "tool_use", id: "c1", name: "read", input: { file_path: "a.ts" } },
      ],
      stopReason: "tool_use",
      usage: { inputTokens: 12, outputTokens: 3 },
    });
    const [, context, options] = vi.mocked(completeSimple).mock.calls[0];
    expect(context.systemPrompt).toBe("sys");
    expect(options?.apiKey).toBe("test-secret");
    expect(options?.maxTokens).toBe(100);
  });

  it("throws a classified error for an error reply", async () => {
    vi.mocked(completeSimple).mockResolvedValue(reply({ stopReason: "error", errorMessage: "429 rate limit" }));
    await expect(provider().chat(request)).rejects.toBeInstanceOf(RateLimitError);
  });

  it("wraps thrown errors with provider details", async () => {
    vi.mocked(completeSimple).mockRejectedValue(new Error("401 unauthorized"));
    await expect(provider().chat(request)).rejects.toMatchObject({
      name: "ProviderError",
      reason: "auth",
      provider: "anthropic",
      model: model.id,
    });
  });

  it("turns an aborted call into an interrupt", async () => {
    vi.mocked(completeSimple).mockResolvedValue(reply({ stopReason: "aborted" }));
    await expect(provider().chat(request)).rejects.toBeInstanceOf(InterruptError);

    const controller = new AbortController();
    controller.abort();
    vi.mocked(completeSimple).mockRejectedValue(new Error("Request was aborted"));
    await expect(provider().chat({ ...request, signal: controller.signal })).rejects.toBeInstanceOf(InterruptError);
  });

  it("reports whether it has a key", () => {
    expect(provider().hasApiKey).toBe(true);
  });
});

describe("model resolution", () => {
  it("finds known models", () => {
    expect(resolveKnownProvider("anthropic")).toBe("anthropic");
    expect(resolveModel("anthropic", model.id).id).toBe(model.id);
  });

  it("names the bad key", () => {
    expect(() => resolveKnownProvider("nobody")).toThrow(ConfigError);
    try {
      resolveModel("anthropic", "no-such-model");
      expect.unreachable();
    } catch (err) {
      expect(err).toBeInstanceOf(ConfigError);
      if (err instanceof ConfigError) expect(err.keys).toEqual(["model"]);
    }
  });
});

describe("toPiTool", () => {
  it("passes the JSON schema through", () => {
    const tool = toPiTool({
      name: "read",
      description: "Read a file",
      input_schema: { type: "object", properties: { file_path: { type: "string" } }, required: ["file_path"] },
    });
    expect(tool.name).toBe("read");
    expect(tool.parameters).toMatchObject({ type: "object", required: ["file_path"] });
  });
});
