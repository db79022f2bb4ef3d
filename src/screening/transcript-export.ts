import { CANDIDATE_FIELDS, FIELD_LABELS, Message, SessionSnapshot } from "../shared/types/screening.types";
import { formatFieldValue } from "./messages";

export type TranscriptExportFormat = "json" | "text";

export interface TranscriptExport {
  contentType: string;
  body: string;
}

export function isTranscriptExportFormat(value: unknown): value is TranscriptExportFormat {
  return value === "json" || value === "text";
}

export function exportTranscript(
  snapshot: SessionSnapshot,
  transcript: ReadonlyArray<Message>,
  format: TranscriptExportFormat,
  exportedAt: Date = new Date(),
): TranscriptExport {
  if (format === "json") {
    return {
      contentType: "application/json",
      body: JSON.stringify(
        {
          exportedAt: exportedAt.toISOString(),
          stage: snapshot.stage,
          progressFraction: snapshot.progressFraction,
          candidate: snapshot.candidate,
          questions: snapshot.questionSet.map((question, index) => ({
            question,
            answer: snapshot.answers[index]?.answer ?? null,
          })),
          transcript,
        },
        null,
        2,
      ),
    };
  }

  const fieldLines = CANDIDATE_FIELDS.flatMap((field) => {
    const value = snapshot.candidate[field];
    return value === undefined ? [] : [`${FIELD_LABELS[field]}: ${formatFieldValue(value)}`];
  });
  const messageLines = transcript.map((message) => `[${message.timestamp}] ${message.role.toUpperCase()}: ${message.text}`);
  return {
    contentType: "text/plain; charset=utf-8",
    body: [
      `Screening transcript exported ${exportedAt.toISOString()}`,
      `Stage: ${snapshot.stage}`,
      ...fieldLines,
      "",
      ...messageLines,
    ].join("\n"),
  };
}
