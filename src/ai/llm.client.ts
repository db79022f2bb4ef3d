import fetch from "node-fetch";
import { Logger } from "../config/logger";
import { LlmProvider } from "../config/env";

const PROVIDER_BASE_URLS: Record<LlmProvider, string> = {
  openai: "https://api.openai.com/v1",
  groq: "https://api.groq.com/openai/v1",
};

export interface ChatMessage {
  role: "system" | "user" | "assistant";
  content: string;
}

export interface ChatCompletionsRequestBody {
  model: string;
  temperature: number;
  messages: ChatMessage[];
  max_tokens?: number;
  max_completion_tokens?: number;
}

export interface FetchResponseLike {
  ok: boolean;
  status: number;
  text(): Promise<string>;
  json(): Promise<unknown>;
}

export type FetchLike = (
  url: string,
  init: { method: string; headers: Record<string, string>; body: string },
) => Promise<FetchResponseLike>;

export interface LlmClientOptions {
  provider: LlmProvider;
  apiKey: string;
  model: string;
  baseUrl?: string;
  fetchImpl?: FetchLike;
}

interface LlmCallOptions {
  promptName?: string;
  maxTokens?: number;
  temperature?: number;
}

export class LlmHttpError extends Error {
  constructor(
    readonly status: number,
    body: string,
  ) {
    super(`LLM API error: HTTP ${status} - ${body.slice(0, 300)}`);
    this.name = "LlmHttpError";
  }
}

export class LlmMalformedResponseError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "LlmMalformedResponseError";
  }
}

export class LlmClient {
  private readonly provider: LlmProvider;
  private readonly apiKey: string;
  private readonly model: string;
  private readonly baseUrl: string;
  private readonly fetchImpl: FetchLike;

  constructor(
    options: LlmClientOptions,
    private readonly logger: Logger,
  ) {
    if (!options.apiKey.trim()) {
      throw new Error(`Missing API key for LLM provider: ${options.provider}`);
    }
    if (!options.model.trim()) {
      throw new Error(`Missing model name for LLM provider: ${options.provider}`);
    }
    this.provider = options.provider;
    this.apiKey = options.apiKey.trim();
    this.model = options.model.trim();
    this.baseUrl = (options.baseUrl ?? PROVIDER_BASE_URLS[options.provider]).replace(/\/+$/, "");
    this.fetchImpl = options.fetchImpl ?? fetch;
  }

  getModelName(): string {
    return this.model;
  }

  getProvider(): LlmProvider {
    return this.provider;
  }

  async complete(messages: ChatMessage[], options?: LlmCallOptions): Promise<string> {
    const startedAt = Date.now();
    const maxTokens = options?.maxTokens ?? 200;
    const promptName = options?.promptName ?? "assistant_reply";
    const requestBody = this.buildRequestBody(messages, maxTokens, options?.temperature ?? 0.7);
    try {
      const response = await this.fetchImpl(`${this.baseUrl}/chat/completions`, {
        method: "POST",
        headers: {
          authorization: `Bearer ${this.apiKey}`,
          "content-type": "application/json",
        },
        body: JSON.stringify(requestBody),
      });

      if (!response.ok) {
        throw new LlmHttpError(response.status, await response.text());
      }

      let body: unknown;
      try {
        body = await response.json();
      } catch {
        throw new LlmMalformedResponseError("LLM response is not valid JSON");
      }
      const content = extractMessageContent(body);
      if (!content) {
        throw new LlmMalformedResponseError("LLM response does not contain message content");
      }

      this.logger.info("llm.call.completed", {
        promptName,
        provider: this.provider,
        modelName: this.model,
        latencyMs: Date.now() - startedAt,
        maxTokens,
        tokenEstimate: estimateTokenCount(messages, content),
      });
      return content;
    } catch (error) {
      this.logger.warn("llm.call.failed", {
        promptName,
        provider: this.provider,
        modelName: this.model,
        latencyMs: Date.now() - startedAt,
        error: error instanceof Error ? error.message : "Unknown error",
      });
      throw error;
    }
  }

  buildRequestBody(messages: ChatMessage[], maxTokens: number, temperature: number): ChatCompletionsRequestBody {
    const body: ChatCompletionsRequestBody = {
      model: this.model,
      temperature,
      messages,
    };
    if (usesMaxCompletionTokens(this.model)) {
      body.max_completion_tokens = maxTokens;
    } else {
      body.max_tokens = maxTokens;
    }
    return body;
  }
}

function extractMessageContent(body: unknown): string | undefined {
  if (!isRecord(body) || !Array.isArray(body.choices)) {
    return undefined;
  }
  const first: unknown = body.choices[0];
  if (!isRecord(first) || !isRecord(first.message)) {
    return undefined;
  }
  const content = first.message.content;
  return typeof content === "string" ? content.trim() : undefined;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null;
}

function estimateTokenCount(messages: ChatMessage[], output: string): number {
  const totalChars = messages.reduce((sum, message) => sum + message.content.length, 0) + output.length;
  return Math.max(1, Math.round(totalChars / 4));
}

function usesMaxCompletionTokens(model: string): boolean {
  const normalized = model.trim().toLowerCase();
  return normalized.startsWith("gpt-5") || /^o\d/.test(normalized);
}
