import { z } from "zod";
import type { TextGenerationRequest, TextGenerator } from "./types.js";

export type TextGenerationProvider =
  | "openai"
  | "openrouter"
  | "gemini"
  | "lmstudio"
  | "openai-compatible";
export type TextGenerationRequestMode = "responses" | "chat_completions";

export type TextGenerationConfig = {
  provider: TextGenerationProvider;
  model: string;
  apiKey?: string;
  baseUrl?: string;
  requestMode: TextGenerationRequestMode;
  extraHeaders: Record<string, string>;
};

const SUPPORTED_PROVIDERS: TextGenerationProvider[] = [
  "openai",
  "openrouter",
  "gemini",
  "lmstudio",
  "openai-compatible",
];

const ResponsesPayloadSchema = z.object({
  output_text: z.string().optional(),
  output: z
    .array(
      z.object({
        content: z.array(z.object({ text: z.string().optional() })).optional(),
      }),
    )
    .optional(),
});

const ChatCompletionsPayloadSchema = z.object({
  choices: z
    .array(
      z.object({
        message: z
          .object({
            content: z.union([z.string(), z.array(z.object({ text: z.string().optional() })), z.null()]).optional(),
          })
          .optional(),
      }),
    )
    .optional(),
});

type ResponsesPayload = z.infer<typeof ResponsesPayloadSchema>;
type ChatCompletionsPayload = z.infer<typeof ChatCompletionsPayloadSchema>;

/**
 * Returns null when a hosted provider is selected without an API key; the
 * engine then runs without text generation.
 */
export function resolveTextGenerationConfigFromEnv(
  env: NodeJS.ProcessEnv = process.env,
): TextGenerationConfig | null {
  const provider = parseProvider(env.KITCHEN_ASSISTANT_LLM_PROVIDER);
  const apiKey = resolveProviderApiKey(provider, env);
  const requiresApiKey = provider === "openai" || provider === "openrouter" || provider === "gemini";
  if (requiresApiKey && !apiKey) {
    return null;
  }

  const config: TextGenerationConfig = {
    provider,
    model: env.KITCHEN_ASSISTANT_LLM_MODEL?.trim() || defaultModel(provider),
    requestMode: resolveRequestMode(env.KITCHEN_ASSISTANT_LLM_REQUEST_MODE, provider),
    extraHeaders: resolveProviderHeaders(provider, env),
  };
  if (apiKey) {
    config.apiKey = apiKey;
  }
  const baseUrl = env.KITCHEN_ASSISTANT_LLM_BASE_URL?.trim();
  if (baseUrl) {
    config.baseUrl = baseUrl;
  }
  return config;
}

/**
 * Structured-output client for OpenAI-compatible endpoints. Resolves with the
 * parsed JSON the model produced; the caller validates its shape.
 */
export class OpenAiCompatibleTextGenerator implements TextGenerator {
  private readonly provider: TextGenerationProvider;
  private readonly apiKey: string | undefined;
  private readonly model: string;
  private readonly baseUrl: string;
  private readonly requestMode: TextGenerationRequestMode;
  private readonly extraHeaders: Record<string, string>;

  constructor(config: TextGenerationConfig) {
    this.provider = config.provider;
    this.apiKey = config.apiKey?.trim() || undefined;
    this.model = config.model;
    this.baseUrl = resolveBaseUrl(config.provider, config.baseUrl);
    this.requestMode = config.requestMode;
    this.extraHeaders = sanitizeHeaders(config.extraHeaders);
  }

  async complete(request: TextGenerationRequest, signal?: AbortSignal): Promise<unknown> {
    const text =
      this.requestMode === "chat_completions"
        ? await this.callChatCompletions(request, signal)
        : await this.callResponses(request, signal);

    if (!text) {
      throw new Error("text generation returned empty payload");
    }
    return parseJson(text);
  }

  private async callResponses(request: TextGenerationRequest, signal?: AbortSignal): Promise<string | null> {
    const response = await fetch(`${this.baseUrl}/responses`, {
      method: "POST",
      headers: this.buildHeaders(),
      body: JSON.stringify({
        model: this.model,
        input: [
          { role: "system", content: [{ type: "input_text", text: request.system }] },
          { role: "user", content: [{ type: "input_text", text: request.prompt }] },
        ],
        text: {
          format: {
            type: "json_schema",
            name: request.schemaName,
            strict: false,
            schema: request.jsonSchema,
          },
        },
      }),
      signal,
    });

    if (!response.ok) {
      throw new Error(
        `text generation failed via responses (${this.provider}, ${response.status}): ${await response.text()}`,
      );
    }

    return extractOutputText(ResponsesPayloadSchema.parse(await response.json()));
  }

  private async callChatCompletions(
    request: TextGenerationRequest,
    signal?: AbortSignal,
  ): Promise<string | null> {
    const response = await fetch(`${this.baseUrl}/chat/completions`, {
      method: "POST",
      headers: this.buildHeaders(),
      body: JSON.stringify({
        model: this.model,
        messages: [
          { role: "system", content: request.system },
          { role: "user", content: request.prompt },
        ],
        response_format: {
          type: "json_schema",
          json_schema: {
            name: request.schemaName,
            strict: false,
            schema: request.jsonSchema,
          },
        },
      }),
      signal,
    });

    if (!response.ok) {
      throw new Error(
        `text generation failed via chat_completions (${this.provider}, ${response.status}): ${await response.text()}`,
      );
    }

    return extractChatCompletionText(ChatCompletionsPayloadSchema.parse(await response.json()));
  }

  private buildHeaders(): Record<string, string> {
    const headers: Record<string, string> = {
      "content-type": "application/json",
      ...this.extraHeaders,
    };

    if (this.apiKey) {
      headers.authorization = `Bearer ${this.apiKey}`;
    }

    return headers;
  }
}

function parseProvider(value: string | undefined): TextGenerationProvider {
  const lowered = value?.trim().toLowerCase();
  if (!lowered) {
    return "openai";
  }

  const matched = SUPPORTED_PROVIDERS.find((provider) => provider === lowered);
  return matched ?? "openai";
}

function resolveRequestMode(
  value: string | undefined,
  provider: TextGenerationProvider,
): TextGenerationRequestMode {
  if (value === "responses" || value === "chat_completions") {
    return value;
  }

  switch (provider) {
    case "openrouter":
    case "gemini":
    case "lmstudio":
    case "openai-compatible":
      return "chat_completions";
    case "openai":
    default:
      return "responses";
  }
}

function resolveProviderApiKey(
  provider: TextGenerationProvider,
  env: NodeJS.ProcessEnv,
): string | undefined {
  const explicit = env.KITCHEN_ASSISTANT_LLM_API_KEY?.trim();
  if (explicit) {
    return explicit;
  }

  switch (provider) {
    case "openrouter":
      return env.OPENROUTER_API_KEY?.trim() || undefined;
    case "gemini":
      return env.GEMINI_API_KEY?.trim() || env.GOOGLE_API_KEY?.trim() || undefined;
    case "openai":
      return env.OPENAI_API_KEY?.trim() || undefined;
    case "lmstudio":
    case "openai-compatible":
    default:
      return undefined;
  }
}

function resolveProviderHeaders(
  provider: TextGenerationProvider,
  env: NodeJS.ProcessEnv,
): Record<string, string> {
  if (provider !== "openrouter") {
    return {};
  }

  const referer = env.KITCHEN_ASSISTANT_OPENROUTER_SITE_URL?.trim() || env.OPENROUTER_HTTP_REFERER?.trim();
  const appName = env.KITCHEN_ASSISTANT_OPENROUTER_APP_NAME?.trim() || env.OPENROUTER_APP_NAME?.trim();
  const headers: Record<string, string> = {};

  if (referer) {
    headers["HTTP-Referer"] = referer;
  }
  if (appName) {
    headers["X-Title"] = appName;
  }

  return headers;
}

function defaultModel(provider: TextGenerationProvider): string {
  switch (provider) {
    case "gemini":
      return "gemini-2.5-flash";
    case "openrouter":
      return "openai/gpt-4o-mini";
    case "lmstudio":
    case "openai-compatible":
      return "local-model";
    case "openai":
    default:
      return "gpt-4o-mini";
  }
}

function resolveBaseUrl(provider: TextGenerationProvider, override?: string): string {
  const normalizedOverride = override?.trim();
  if (normalizedOverride) {
    return normalizedOverride.replace(/\/$/, "");
  }

  switch (provider) {
    case "openrouter":
      return "https://openrouter.ai/api/v1";
    case "gemini":
      return "https://generativelanguage.googleapis.com/v1beta/openai";
    case "lmstudio":
    case "openai-compatible":
      return "http://127.0.0.1:1234/v1";
    case "openai":
    default:
      return "https://api.openai.com/v1";
  }
}

function sanitizeHeaders(headers: Record<string, string>): Record<string, string> {
  const sanitized: Record<string, string> = {};
  for (const [key, value] of Object.entries(headers)) {
    const headerKey = key.trim();
    const headerValue = value.trim();
    if (headerKey.length > 0 && headerValue.length > 0) {
      sanitized[headerKey] = headerValue;
    }
  }
  return sanitized;
}

function extractOutputText(payload: ResponsesPayload): string | null {
  if (payload.output_text) {
    return payload.output_text;
  }

  const parts = (payload.output ?? [])
    .flatMap((output) => output.content ?? [])
    .map((content) => content.text ?? "")
    .filter((text) => text.length > 0);
  return parts.length > 0 ? parts.join("\n") : null;
}

function extractChatCompletionText(payload: ChatCompletionsPayload): string | null {
  const content = payload.choices?.[0]?.message?.content;
  if (typeof content === "string") {
    return content.length > 0 ? content : null;
  }
  if (!Array.isArray(content)) {
    return null;
  }

  const parts = content.map((chunk) => chunk.text ?? "").filter((text) => text.length > 0);
  return parts.length > 0 ? parts.join("\n") : null;
}

function parseJson(text: string): unknown {
  try {
    return JSON.parse(text);
  } catch {
    const start = text.indexOf("{");
    const end = text.lastIndexOf("}");
    if (start >= 0 && end > start) {
      return JSON.parse(text.slice(start, end + 1));
    }
    throw new Error(`failed to parse text generation JSON payload: ${text.slice(0, 120)}`);
  }
}
