import assert from "node:assert/strict";
import test from "node:test";
import { loadEnv } from "../../config/env";

test("defaults apply when only an api key is set", () => {
  assert.deepEqual(loadEnv({ OPENAI_API_KEY: "test-secret" }), {
    nodeEnv: "development",
    port: 3000,
    logLevel: "info",
    llmProvider: "openai",
    llmApiKey: "test-secret",
    llmModel: "gpt-4o-mini",
    llmTimeoutMs: 20000,
    llmRetryBackoffMs: 800,
    minQuestions: 3,
    maxQuestions: 5,
    questionsPerTech: 2,
    phrasingMode: "templated",
    companyName: "TalentScout",
    transcriptTailSize: 6,
    sessionIdleTtlMs: 1800000,
  });
});

test("groq provider reads its own key and default model", () => {
  const env = loadEnv({ LLM_PROVIDER: "Groq", GROQ_API_KEY: "test-secret" });
  assert.equal(env.llmProvider, "groq");
  assert.equal(env.llmModel, "llama-3.1-8b-instant");
  assert.equal(env.llmApiKey, "test-secret");
});

test("LLM_API_KEY and MODEL_NAME take precedence", () => {
  const env = loadEnv({
    LLM_API_KEY: "test-secret",
    OPENAI_API_KEY: "other-secret",
    MODEL_NAME: "gpt-4o",
    PHRASING_MODE: "generated",
    COMPANY_NAME: "Acme",
  });
  assert.equal(env.llmApiKey, "test-secret");
  assert.equal(env.llmModel, "gpt-4o");
  assert.equal(env.phrasingMode, "generated");
  assert.equal(env.companyName, "Acme");
});

test("missing api key is reported with the provider variable", () => {
  assert.throws(() => loadEnv({}), /Missing required environment variable: LLM_API_KEY or OPENAI_API_KEY/);
  assert.throws(
    () => loadEnv({ LLM_PROVIDER: "groq", OPENAI_API_KEY: "test-secret" }),
    /Missing required environment variable: LLM_API_KEY or GROQ_API_KEY/,
  );
});

test("invalid values are rejected", () => {
  const base = { OPENAI_API_KEY: "test-secret" };
  assert.throws(() => loadEnv({ ...base, PORT: "abc" }), /Invalid PORT value: abc/);
  assert.throws(() => loadEnv({ ...base, LLM_PROVIDER: "local" }), /Invalid LLM_PROVIDER value: local/);
  assert.throws(() => loadEnv({ ...base, PHRASING_MODE: "fancy" }), /Invalid PHRASING_MODE value: fancy/);
  assert.throws(() => loadEnv({ ...base, MIN_QUESTIONS: "0" }), /Invalid MIN_QUESTIONS value: 0/);
  assert.throws(() => loadEnv({ ...base, LLM_TIMEOUT_MS: "50" }), /Invalid LLM_TIMEOUT_MS value: 50/);
  assert.throws(() => loadEnv({ ...base, LOG_LEVEL: "trace" }), /Invalid LOG_LEVEL value: trace/);
  assert.throws(() => loadEnv({ ...base, SESSION_IDLE_TTL_MS: "-1" }), /Invalid SESSION_IDLE_TTL_MS value: -1/);
});
