import { afterEach, describe, expect, it, vi } from "vitest";
import {
  OpenAiCompatibleTextGenerator,
  resolveTextGenerationConfigFromEnv,
} from "./openai-compatible-text-generator.js";

const REQUEST = {
  system: "Reply with JSON.",
  prompt: "Suggest a swap for butter.",
  schemaName: "substitution",
  jsonSchema: { type: "object" },
};

function jsonResponse(body: unknown): Response {
  return new Response(JSON.stringify(body), {
    status: 200,
    headers: { "content-type": "application/json" },
  });
}

afterEach(() => {
  vi.unstubAllGlobals();
});

describe("text generation config", () => {
  it("is absent for hosted providers without a key", () => {
    expect(resolveTextGenerationConfigFromEnv({})).toBeNull();
    expect(resolveTextGenerationConfigFromEnv({ KITCHEN_ASSISTANT_LLM_PROVIDER: "gemini" })).toBeNull();
  });

  it("resolves LM Studio without an API key", () => {
    const config = resolveTextGenerationConfigFromEnv({
      KITCHEN_ASSISTANT_LLM_PROVIDER: "lmstudio",
      KITCHEN_ASSISTANT_LLM_BASE_URL: "http://127.0.0.1:1234/v1",
      KITCHEN_ASSISTANT_LLM_MODEL: "qwen2.5-7b-instruct",
    });

    expect(config).toEqual({
      provider: "lmstudio",
      model: "qwen2.5-7b-instruct",
      baseUrl: "http://127.0.0.1:1234/v1",
      requestMode: "chat_completions",
      extraHeaders: {},
    });
  });

  it("falls back to openai for unknown providers and reads the provider key", () => {
    const config = resolveTextGenerationConfigFromEnv({
      KITCHEN_ASSISTANT_LLM_PROVIDER: "mystery",
      OPENAI_API_KEY: "test-key",
    });

    expect(config?.provider).toBe("openai");
    expect(config?.apiKey).toBe("test-key");
    expect(config?.requestMode).toBe("responses");
  });
});

describe("OpenAiCompatibleTextGenerator", () => {
  it("posts chat completions with attribution headers and parses the JSON reply", async () => {
    const fetchMock = vi.fn(async (_input: string | URL | Request, _init?: RequestInit) =>
      jsonResponse({
        choices: [{ message: { content: JSON.stringify({ alternatives: ["olive oil"] }) } }],
      }),
    );
    vi.stubGlobal("fetch", fetchMock);

    const config = resolveTextGenerationConfigFromEnv({
      KITCHEN_ASSISTANT_LLM_PROVIDER: "openrouter",
      OPENROUTER_API_KEY: "test-key",
      KITCHEN_ASSISTANT_OPENROUTER_SITE_URL: "https://kitchen.example.com",
      KITCHEN_ASSISTANT_OPENROUTER_APP_NAME: "KitchenAssistant",
    });
    if (!config) {
      throw new Error("expected config");
    }

    const result = await new OpenAiCompatibleTextGenerator(config).complete(REQUEST);

    expect(result).toEqual({ alternatives: ["olive oil"] });
    const firstCall = fetchMock.mock.calls[0];
    if (!firstCall) {
      throw new Error("expected one fetch invocation");
    }
    expect(String(firstCall[0])).toBe("https://openrouter.ai/api/v1/chat/completions");
    const headers = new Headers(firstCall[1]?.headers);
    expect(headers.get("authorization")).toBe("Bearer test-key");
    expect(headers.get("HTTP-Referer")).toBe("https://kitchen.example.com");
    expect(headers.get("X-Title")).toBe("KitchenAssistant");
  });

  it("reads output parts from the responses API and tolerates fenced JSON", async () => {
    vi.stubGlobal(
      "fetch",
      vi.fn(async () =>
        jsonResponse({
          output: [{ content: [{ text: '```json\n{"answer":"Store basil like flowers."}\n```' }] }],
        }),
      ),
    );

    const generator = new OpenAiCompatibleTextGenerator({
      provider: "openai",
      model: "gpt-4o-mini",
      apiKey: "test-key",
      requestMode: "responses",
      extraHeaders: {},
    });

    expect(await generator.complete(REQUEST)).toEqual({ answer: "Store basil like flowers." });
  });

  it("raises on non-2xx replies", async () => {
    vi.stubGlobal("fetch", vi.fn(async () => new Response("rate limited", { status: 429 })));

    const generator = new OpenAiCompatibleTextGenerator({
      provider: "lmstudio",
      model: "local-model",
      requestMode: "chat_completions",
      extraHeaders: {},
    });

    await expect(generator.complete(REQUEST)).rejects.toThrow(
      "text generation failed via chat_completions (lmstudio, 429): rate limited",
    );
  });

  it("raises on empty replies", async () => {
    vi.stubGlobal("fetch", vi.fn(async () => jsonResponse({ choices: [{ message: { content: "" } }] })));

    const generator = new OpenAiCompatibleTextGenerator({
      provider: "lmstudio",
      model: "local-model",
      requestMode: "chat_completions",
      extraHeaders: {},
    });

    await expect(generator.complete(REQUEST)).rejects.toThrow("text generation returned empty payload");
  });
});
