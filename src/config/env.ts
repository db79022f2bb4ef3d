import dotenv from "dotenv";
import { PhrasingMode } from "../shared/types/screening.types";
import { LogLevel } from "./logger";

dotenv.config();

export type LlmProvider = "openai" | "groq";

export interface EnvConfig {
  nodeEnv: string;
  port: number;
  logLevel: LogLevel;
  llmProvider: LlmProvider;
  llmApiKey: string;
  llmModel: string;
  llmTimeoutMs: number;
  llmRetryBackoffMs: number;
  minQuestions: number;
  maxQuestions: number;
  questionsPerTech: number;
  phrasingMode: PhrasingMode;
  companyName: string;
  transcriptTailSize: number;
  sessionIdleTtlMs: number;
}

const DEFAULT_MODELS: Record<LlmProvider, string> = {
  openai: "gpt-4o-mini",
  groq: "llama-3.1-8b-instant",
};

function getOptionalTrimmed(source: NodeJS.ProcessEnv, name: string): string | undefined {
  const value = source[name];
  if (typeof value !== "string") {
    return undefined;
  }
  const trimmed = value.trim();
  return trimmed.length > 0 ? trimmed : undefined;
}

export function loadEnv(source: NodeJS.ProcessEnv = process.env): EnvConfig {
  const portRaw = source.PORT ?? "3000";
  const port = Number(portRaw);
  const llmProvider = parseProvider(source.LLM_PROVIDER ?? "openai");
  const timeoutRaw = source.LLM_TIMEOUT_MS ?? "20000";
  const llmTimeoutMs = Number(timeoutRaw);
  const backoffRaw = source.LLM_RETRY_BACKOFF_MS ?? "800";
  const llmRetryBackoffMs = Number(backoffRaw);
  const tailRaw = source.TRANSCRIPT_TAIL_SIZE ?? "6";
  const transcriptTailSize = Number(tailRaw);

  if (!Number.isInteger(port) || port <= 0) {
    throw new Error(`Invalid PORT value: ${portRaw}`);
  }
  if (!Number.isFinite(llmTimeoutMs) || llmTimeoutMs < 1000) {
    throw new Error(`Invalid LLM_TIMEOUT_MS value: ${timeoutRaw}`);
  }
  if (!Number.isFinite(llmRetryBackoffMs) || llmRetryBackoffMs < 0) {
    throw new Error(`Invalid LLM_RETRY_BACKOFF_MS value: ${backoffRaw}`);
  }
  if (!Number.isInteger(transcriptTailSize) || transcriptTailSize < 1) {
    throw new Error(`Invalid TRANSCRIPT_TAIL_SIZE value: ${tailRaw}`);
  }

  const providerKeyName = llmProvider === "groq" ? "GROQ_API_KEY" : "OPENAI_API_KEY";
  const llmApiKey = getOptionalTrimmed(source, "LLM_API_KEY") ?? getOptionalTrimmed(source, providerKeyName);
  if (!llmApiKey) {
    throw new Error(`Missing required environment variable: LLM_API_KEY or ${providerKeyName}`);
  }

  return {
    nodeEnv: source.NODE_ENV ?? "development",
    port,
    logLevel: parseLogLevel((source.LOG_LEVEL ?? "info").trim().toLowerCase()),
    llmProvider,
    llmApiKey,
    llmModel: getOptionalTrimmed(source, "MODEL_NAME") ?? DEFAULT_MODELS[llmProvider],
    llmTimeoutMs,
    llmRetryBackoffMs,
    minQuestions: parsePositiveInteger(source, "MIN_QUESTIONS", "3"),
    maxQuestions: parsePositiveInteger(source, "MAX_QUESTIONS", "5"),
    questionsPerTech: parsePositiveInteger(source, "QUESTIONS_PER_TECH", "2"),
    phrasingMode: parsePhrasingMode(source.PHRASING_MODE ?? "templated"),
    companyName: getOptionalTrimmed(source, "COMPANY_NAME") ?? "TalentScout",
    transcriptTailSize,
    sessionIdleTtlMs: parsePositiveInteger(source, "SESSION_IDLE_TTL_MS", "1800000"),
  };
}

function parsePositiveInteger(source: NodeJS.ProcessEnv, name: string, fallback: string): number {
  const raw = source[name] ?? fallback;
  const value = Number(raw);
  if (!Number.isInteger(value) || value <= 0) {
    throw new Error(`Invalid ${name} value: ${raw}`);
  }
  return value;
}

function parseProvider(value: string): LlmProvider {
  const normalized = value.trim().toLowerCase();
  if (normalized === "openai" || normalized === "groq") {
    return normalized;
  }
  throw new Error(`Invalid LLM_PROVIDER value: ${value}`);
}

function parsePhrasingMode(value: string): PhrasingMode {
  const normalized = value.trim().toLowerCase();
  if (normalized === "templated" || normalized === "generated") {
    return normalized;
  }
  throw new Error(`Invalid PHRASING_MODE value: ${value}`);
}

function parseLogLevel(value: string): LogLevel {
  if (value === "debug" || value === "info" || value === "warn" || value === "error") {
    return value;
  }
  throw new Error(`Invalid LOG_LEVEL value: ${value}`);
}
