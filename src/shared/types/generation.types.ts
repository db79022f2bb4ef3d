import { CandidateRecord, Message, Stage } from "./screening.types";

export type GenerationErrorKind =
  | "auth_failure"
  | "rate_limited"
  | "timeout"
  | "unavailable"
  | "malformed_response";

export type GenerationResult =
  | { ok: true; text: string }
  | { ok: false; kind: GenerationErrorKind };

export interface GenerationContext {
  stage: Stage;
  candidate: CandidateRecord;
  transcriptTail: ReadonlyArray<Message>;
}

export interface GenerationRequest {
  promptName: string;
  instruction: string;
  context: GenerationContext;
  maxTokens?: number;
  temperature?: number;
}

export interface TextGenerator {
  generate(request: GenerationRequest): Promise<GenerationResult>;
}
