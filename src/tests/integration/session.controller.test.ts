import assert from "node:assert/strict";
import { Server } from "node:http";
import { after, before, test } from "node:test";
import fetch from "node-fetch";
import { createApp } from "../../app";
import { loadEnv } from "../../config/env";
import { noopLogger } from "../../config/logger";
import { greetingMessage } from "../../screening/messages";
import { ConversationManager } from "../../screening/conversation.manager";
import { SessionService } from "../../screening/session.service";
import { ScreeningConfig } from "../../shared/types/screening.types";
import { GenerationResult, TextGenerator } from "../../shared/types/generation.types";

const generator: TextGenerator = {
  async generate(): Promise<GenerationResult> {
    return { ok: false, kind: "unavailable" };
  },
};

let server: Server | undefined;
let sessions: SessionService | undefined;
let baseUrl = "";

before(async () => {
  const { app, sessionService } = createApp(loadEnv({ OPENAI_API_KEY: "test-secret", COMPANY_NAME: "Acme" }), {
    generator,
    logger: noopLogger,
    random: () => 0,
  });
  const listening = app.listen(0, "127.0.0.1");
  await new Promise<void>((resolve) => listening.once("listening", () => resolve()));
  const address = listening.address();
  if (address === null || typeof address === "string") {
    throw new Error("Server did not bind to a port");
  }
  server = listening;
  sessions = sessionService;
  baseUrl = `http://127.0.0.1:${address.port}`;
});

after(async () => {
  await new Promise<void>((resolve, reject) => {
    if (!server) {
      resolve();
      return;
    }
    server.close((error) => (error ? reject(error) : resolve()));
  });
});

function asObject(value: unknown): Record<string, unknown> {
  if (typeof value !== "object" || value === null || Array.isArray(value)) {
    throw new Error("Expected a JSON object");
  }
  return Object.fromEntries(Object.entries(value));
}

async function requestJson(
  path: string,
  init?: { method: string; body?: unknown },
): Promise<{ status: number; body: Record<string, unknown> }> {
  const response = await fetch(`${baseUrl}${path}`, {
    method: init?.method ?? "GET",
    headers: { "content-type": "application/json" },
    body: init?.body === undefined ? undefined : JSON.stringify(init.body),
  });
  return { status: response.status, body: asObject(await response.json()) };
}

async function createSession(): Promise<string> {
  const created = await requestJson("/sessions", { method: "POST" });
  assert.equal(created.status, 201);
  return String(created.body.sessionId);
}

test("health and technologies respond", async () => {
  const health = await requestJson("/health");
  assert.equal(health.status, 200);
  assert.equal(health.body.ok, true);

  const technologies = await requestJson("/technologies");
  assert.equal(technologies.status, 200);
  const names = technologies.body.technologies;
  assert.ok(Array.isArray(names));
  assert.equal(names.length, 18);
  assert.equal(names[0], "python");
});

test("a session starts with the greeting and accepts turns", async () => {
  const created = await requestJson("/sessions", { method: "POST" });
  assert.equal(created.status, 201);
  assert.equal(created.body.stage, "collect_name");
  assert.equal(created.body.progressFraction, 0.1);
  assert.equal(created.body.assistantText, greetingMessage("Acme"));
  const sessionId = String(created.body.sessionId);

  const turn = await requestJson(`/sessions/${sessionId}/turns`, { method: "POST", body: { text: "John Doe" } });
  assert.equal(turn.status, 200);
  assert.equal(turn.body.stage, "collect_email");
  assert.equal(turn.body.assistantText, "Nice to meet you, John Doe! What is your email address?");

  const snapshot = await requestJson(`/sessions/${sessionId}`);
  assert.equal(snapshot.status, 200);
  assert.deepEqual(snapshot.body.candidate, { name: "John Doe" });
  assert.equal(snapshot.body.stage, "collect_email");
});

test("turn without text is a bad request", async () => {
  const sessionId = await createSession();
  const response = await requestJson(`/sessions/${sessionId}/turns`, { method: "POST", body: { message: "hi" } });
  assert.equal(response.status, 400);
  assert.equal(response.body.ok, false);
});

test("unknown sessions are not found", async () => {
  const snapshot = await requestJson("/sessions/missing");
  assert.equal(snapshot.status, 404);
  assert.equal(snapshot.body.error, "Session not found: missing");

  const turn = await requestJson("/sessions/missing/turns", { method: "POST", body: { text: "hi" } });
  assert.equal(turn.status, 404);
});

test("transcript is exported as text or json", async () => {
  const sessionId = await createSession();
  await requestJson(`/sessions/${sessionId}/turns`, { method: "POST", body: { text: "Jane Smith" } });

  const text = await fetch(`${baseUrl}/sessions/${sessionId}/transcript?format=text`);
  assert.equal(text.status, 200);
  assert.equal(text.headers.get("content-type"), "text/plain; charset=utf-8");
  const lines = (await text.text()).split("\n");
  assert.equal(lines[1], "Stage: collect_email");
  assert.equal(lines[2], "Full Name: Jane Smith");

  const json = await requestJson(`/sessions/${sessionId}/transcript`);
  assert.equal(json.status, 200);
  assert.equal(json.body.stage, "collect_email");
  assert.ok(Array.isArray(json.body.transcript));
  assert.equal(json.body.transcript.length, 3);

  const invalid = await requestJson(`/sessions/${sessionId}/transcript?format=xml`);
  assert.equal(invalid.status, 400);
});

test("reset restarts the screening and delete removes the session", async () => {
  const sessionId = await createSession();
  await requestJson(`/sessions/${sessionId}/turns`, { method: "POST", body: { text: "John Doe" } });

  const reset = await requestJson(`/sessions/${sessionId}/reset`, { method: "POST" });
  assert.equal(reset.status, 200);
  assert.equal(reset.body.stage, "collect_name");
  assert.equal(reset.body.assistantText, greetingMessage("Acme"));

  const snapshot = await requestJson(`/sessions/${sessionId}`);
  assert.deepEqual(snapshot.body.candidate, {});

  const deleted = await fetch(`${baseUrl}/sessions/${sessionId}`, { method: "DELETE" });
  assert.equal(deleted.status, 204);
  const gone = await requestJson(`/sessions/${sessionId}`);
  assert.equal(gone.status, 404);
});

test("turns queued on one session run in call order", async () => {
  assert.ok(sessions);
  const { sessionId } = await sessions.create();
  const first = sessions.runExclusive(sessionId, (manager) => manager.processTurn("John Doe"));
  const second = sessions.runExclusive(sessionId, (manager) => manager.processTurn("john@example.com"));

  const results = await Promise.all([first, second]);

  assert.deepEqual(
    results.map((result) => result?.stage),
    ["collect_email", "collect_phone"],
  );
  assert.equal(await sessions.runExclusive("missing", (manager) => manager.snapshot()), null);
  assert.equal(sessions.delete(sessionId), true);
  assert.equal(sessions.has(sessionId), false);
});

const screeningConfig: ScreeningConfig = {
  minQuestions: 3,
  maxQuestions: 5,
  questionsPerTech: 2,
  phrasingMode: "templated",
  companyName: "Acme",
  transcriptTailSize: 6,
};

function sequentialIds(): () => string {
  let next = 0;
  return () => {
    next += 1;
    return `session-${next}`;
  };
}

test("idle sessions are evicted after the ttl", async () => {
  let clock = 0;
  const service = new SessionService((sessionId) => new ConversationManager(screeningConfig, { generator, sessionId }), {
    createId: sequentialIds(),
    idleTtlMs: 1000,
    now: () => clock,
  });
  const { sessionId } = await service.create();
  assert.equal(sessionId, "session-1");

  clock = 500;
  assert.ok(await service.runExclusive(sessionId, (manager) => manager.processTurn("John Doe")));

  clock = 1400;
  assert.equal(service.evictIdle(), 0);
  assert.equal(service.has(sessionId), true);

  clock = 2600;
  assert.equal(await service.runExclusive(sessionId, (manager) => manager.snapshot()), null);
  assert.equal(service.has(sessionId), false);
  assert.equal(service.size(), 0);
});

test("a session whose greeting fails is not kept", async () => {
  const started = new ConversationManager(screeningConfig, { generator });
  await started.start();
  const service = new SessionService(() => started, { createId: sequentialIds() });

  await assert.rejects(service.create(), /Session already started/);

  assert.equal(service.has("session-1"), false);
  assert.equal(service.size(), 0);
});
