import assert from "node:assert/strict";
import test from "node:test";
import { FetchLike, LlmClient, LlmHttpError, LlmMalformedResponseError } from "../../ai/llm.client";
import { LlmTextGenerator } from "../../ai/text-generator";

const logger = {
  debug() {},
  info() {},
  warn() {},
  error() {},
};

interface CapturedRequest {
  url: string;
  method: string;
  headers: Record<string, string>;
  body: string;
}

function stubFetch(status: number, payload: unknown, captured: CapturedRequest[]): FetchLike {
  return async (url, init) => {
    captured.push({ url, ...init });
    return {
      ok: status >= 200 && status < 300,
      status,
      text: async () => JSON.stringify(payload),
      json: async () => payload,
    };
  };
}

test("complete posts to the provider endpoint and returns the message content", async () => {
  const captured: CapturedRequest[] = [];
  const client = new LlmClient(
    {
      provider: "groq",
      apiKey: "test-secret",
      model: "llama-3.1-8b-instant",
      fetchImpl: stubFetch(200, { choices: [{ message: { content: "  Hello!  " } }] }, captured),
    },
    logger,
  );

  const text = await client.complete([{ role: "user", content: "hi" }], { maxTokens: 50, temperature: 0.2 });

  assert.equal(text, "Hello!");
  assert.equal(captured.length, 1);
  assert.equal(captured[0]?.url, "https://api.groq.com/openai/v1/chat/completions");
  assert.equal(captured[0]?.method, "POST");
  assert.equal(captured[0]?.headers.authorization, "Bearer test-secret");
  assert.deepEqual(JSON.parse(captured[0]?.body ?? "{}"), {
    model: "llama-3.1-8b-instant",
    temperature: 0.2,
    messages: [{ role: "user", content: "hi" }],
    max_tokens: 50,
  });
});

test("newer reasoning models use max_completion_tokens", () => {
  const client = new LlmClient({ provider: "openai", apiKey: "test-secret", model: "gpt-5-mini" }, logger);
  assert.deepEqual(client.buildRequestBody([], 120, 0.7), {
    model: "gpt-5-mini",
    temperature: 0.7,
    messages: [],
    max_completion_tokens: 120,
  });
});

test("custom base url is used without a trailing slash", async () => {
  const captured: CapturedRequest[] = [];
  const client = new LlmClient(
    {
      provider: "openai",
      apiKey: "test-secret",
      model: "gpt-4o-mini",
      baseUrl: "http://127.0.0.1:9999/v1/",
      fetchImpl: stubFetch(200, { choices: [{ message: { content: "ok" } }] }, captured),
    },
    logger,
  );
  await client.complete([{ role: "user", content: "hi" }]);
  assert.equal(captured[0]?.url, "http://127.0.0.1:9999/v1/chat/completions");
});

test("non-2xx responses raise LlmHttpError with the status", async () => {
  const client = new LlmClient(
    {
      provider: "openai",
      apiKey: "test-secret",
      model: "gpt-4o-mini",
      fetchImpl: stubFetch(429, { error: "rate limit" }, []),
    },
    logger,
  );
  await assert.rejects(
    client.complete([{ role: "user", content: "hi" }]),
    (error: unknown) => error instanceof LlmHttpError && error.status === 429,
  );
});

test("responses without content raise LlmMalformedResponseError", async () => {
  const client = new LlmClient(
    {
      provider: "openai",
      apiKey: "test-secret",
      model: "gpt-4o-mini",
      fetchImpl: stubFetch(200, { choices: [] }, []),
    },
    logger,
  );
  await assert.rejects(client.complete([{ role: "user", content: "hi" }]), LlmMalformedResponseError);
});

test("constructor rejects an empty api key", () => {
  assert.throws(
    () => new LlmClient({ provider: "openai", apiKey: " ", model: "gpt-4o-mini" }, logger),
    /Missing API key for LLM provider: openai/,
  );
});

test("text generator sends system prompts, the task and the runtime context", async () => {
  const captured: CapturedRequest[] = [];
  const client = new LlmClient(
    {
      provider: "openai",
      apiKey: "test-secret",
      model: "gpt-4o-mini",
      fetchImpl: stubFetch(200, { choices: [{ message: { content: "Welcome!" } }] }, captured),
    },
    logger,
  );
  const generator = new LlmTextGenerator(client, logger, { companyName: "Acme", retryBackoffMs: 0 });

  const result = await generator.generate({
    promptName: "greeting",
    instruction: "Task: greet",
    context: { stage: "greeting", candidate: {}, transcriptTail: [] },
  });

  assert.deepEqual(result, { ok: true, text: "Welcome!" });
  const body: unknown = JSON.parse(captured[0]?.body ?? "{}");
  assert.ok(typeof body === "object" && body !== null && "messages" in body && Array.isArray(body.messages));
  assert.deepEqual(
    body.messages.map((message: { role: string }) => message.role),
    ["system", "system", "system", "user"],
  );
  assert.equal(body.messages[2].content, "Task: greet");
  assert.equal(
    body.messages[3].content,
    "Runtime context:\nStage: greeting\nCandidate record: {}\nRecent transcript:\n(empty)",
  );
});

test("text generator reports auth failures as a result", async () => {
  const client = new LlmClient(
    {
      provider: "openai",
      apiKey: "test-secret",
      model: "gpt-4o-mini",
      fetchImpl: stubFetch(401, { error: "invalid key" }, []),
    },
    logger,
  );
  const generator = new LlmTextGenerator(client, logger, { companyName: "Acme", retryBackoffMs: 0 });
  const result = await generator.generate({
    promptName: "redirect",
    instruction: "Task: redirect",
    context: { stage: "collect_email", candidate: { name: "Jane Doe" }, transcriptTail: [] },
  });
  assert.deepEqual(result, { ok: false, kind: "auth_failure" });
});
