import { Logger } from "../config/logger";
import {
  GenerationErrorKind,
  GenerationRequest,
  GenerationResult,
  TextGenerator,
} from "../shared/types/generation.types";
import { ChatMessage, LlmHttpError, LlmMalformedResponseError } from "./llm.client";

export interface TextSafeCallArgs {
  llmClient: {
    complete(
      messages: ChatMessage[],
      options?: { promptName?: string; maxTokens?: number; temperature?: number },
    ): Promise<string>;
    getModelName?(): string;
  };
  messages: ChatMessage[];
  promptName: string;
  maxTokens?: number;
  temperature?: number;
  logger?: Logger;
  timeoutMs?: number;
  retryBackoffMs?: number;
}

const DEFAULT_TIMEOUT_MS = 20_000;
const DEFAULT_RETRY_BACKOFF_MS = 800;

export async function callTextPromptSafe(args: TextSafeCallArgs): Promise<GenerationResult> {
  const timeoutMs = normalizeTimeout(args.timeoutMs);
  const attempt = async (): Promise<string> =>
    withTimeout(
      args.llmClient.complete(args.messages, {
        promptName: args.promptName,
        maxTokens: args.maxTokens,
        temperature: args.temperature,
      }),
      timeoutMs,
    );

  try {
    return { ok: true, text: (await attempt()).trim() };
  } catch (error) {
    const kind = classifyGenerationError(error);
    if (!isRetryable(kind)) {
      return { ok: false, kind };
    }
  }

  args.logger?.warn("llm.safe.retry.once", {
    promptName: args.promptName,
    modelName: args.llmClient.getModelName?.(),
  });
  await sleep(args.retryBackoffMs ?? DEFAULT_RETRY_BACKOFF_MS);
  try {
    return { ok: true, text: (await attempt()).trim() };
  } catch (error) {
    return { ok: false, kind: classifyGenerationError(error) };
  }
}

// A generator that throws is reported as unavailable.
export async function generateSafely(
  generator: TextGenerator,
  request: GenerationRequest,
  logger?: Logger,
): Promise<GenerationResult> {
  try {
    return await generator.generate(request);
  } catch (error) {
    logger?.warn("llm.generator.threw", {
      promptName: request.promptName,
      error: error instanceof Error ? error.message : "Unknown error",
    });
    return { ok: false, kind: "unavailable" };
  }
}

export function classifyGenerationError(error: unknown): GenerationErrorKind {
  if (error instanceof LlmHttpError) {
    if (error.status === 401 || error.status === 403) {
      return "auth_failure";
    }
    if (error.status === 429) {
      return "rate_limited";
    }
    return "unavailable";
  }
  if (error instanceof LlmMalformedResponseError) {
    return "malformed_response";
  }
  if (isTimeoutError(error)) {
    return "timeout";
  }
  return "unavailable";
}

function isRetryable(kind: GenerationErrorKind): boolean {
  return kind === "rate_limited" || kind === "unavailable";
}

function normalizeTimeout(value?: number): number {
  if (typeof value === "number" && Number.isFinite(value) && value > 0) {
    return Math.round(value);
  }
  return DEFAULT_TIMEOUT_MS;
}

function withTimeout<T>(promise: Promise<T>, timeoutMs: number): Promise<T> {
  return new Promise<T>((resolve, reject) => {
    const timer = setTimeout(() => {
      reject(new Error("timeout"));
    }, timeoutMs);
    promise
      .then((value) => {
        clearTimeout(timer);
        resolve(value);
      })
      .catch((error: unknown) => {
        clearTimeout(timer);
        reject(error);
      });
  });
}

function sleep(ms: number): Promise<void> {
  if (ms <= 0) {
    return Promise.resolve();
  }
  return new Promise((resolve) => {
    setTimeout(resolve, ms);
  });
}

function isTimeoutError(error: unknown): boolean {
  const message = error instanceof Error ? error.message.toLowerCase() : "";
  return message.includes("timeout") || message.includes("timed out") || message.includes("etimedout");
}
