import { GenerationContext } from "../../shared/types/generation.types";

export function renderRuntimeContext(context: GenerationContext): string {
  const transcript = context.transcriptTail.length
    ? context.transcriptTail.map((message) => `${message.role}: ${message.text}`).join("\n")
    : "(empty)";
  return [
    "Runtime context:",
    `Stage: ${context.stage}`,
    `Candidate record: ${JSON.stringify(context.candidate)}`,
    "Recent transcript:",
    transcript,
  ].join("\n");
}
