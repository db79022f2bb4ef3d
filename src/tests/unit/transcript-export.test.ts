import assert from "node:assert/strict";
import test from "node:test";
import { exportTranscript, isTranscriptExportFormat } from "../../screening/transcript-export";
import { Message, SessionSnapshot } from "../../shared/types/screening.types";

const snapshot: SessionSnapshot = {
  stage: "tech_questions",
  progressFraction: 0.8,
  candidate: { name: "Jane Doe", experience: 4, techStack: ["python", "react"] },
  questionSet: ["What is a generator?", "What is a hook?"],
  answers: [{ question: "What is a generator?", answer: "A lazy iterator." }],
};

const transcript: Message[] = [
  { role: "assistant", text: "Hello", timestamp: "2026-01-01T00:00:00.000Z" },
  { role: "user", text: "Jane Doe", timestamp: "2026-01-01T00:00:05.000Z" },
];

const exportedAt = new Date("2026-01-02T00:00:00.000Z");

test("json export pairs questions with answers", () => {
  const exported = exportTranscript(snapshot, transcript, "json", exportedAt);
  assert.equal(exported.contentType, "application/json");
  assert.deepEqual(JSON.parse(exported.body), {
    exportedAt: "2026-01-02T00:00:00.000Z",
    stage: "tech_questions",
    progressFraction: 0.8,
    candidate: { name: "Jane Doe", experience: 4, techStack: ["python", "react"] },
    questions: [
      { question: "What is a generator?", answer: "A lazy iterator." },
      { question: "What is a hook?", answer: null },
    ],
    transcript,
  });
});

test("text export lists fields and messages", () => {
  const exported = exportTranscript(snapshot, transcript, "text", exportedAt);
  assert.equal(exported.contentType, "text/plain; charset=utf-8");
  assert.equal(
    exported.body,
    [
      "Screening transcript exported 2026-01-02T00:00:00.000Z",
      "Stage: tech_questions",
      "Full Name: Jane Doe",
      "Years of Experience: 4",
      "Tech Stack: python, react",
      "",
      "[2026-01-01T00:00:00.000Z] ASSISTANT: Hello",
      "[2026-01-01T00:00:05.000Z] USER: Jane Doe",
    ].join("\n"),
  );
});

test("only json and text are export formats", () => {
  assert.equal(isTranscriptExportFormat("json"), true);
  assert.equal(isTranscriptExportFormat("text"), true);
  assert.equal(isTranscriptExportFormat("xml"), false);
  assert.equal(isTranscriptExportFormat(undefined), false);
});
