interface TechQuestionsPromptInput {
  technology: string;
  count: number;
  experienceYears?: number;
  position?: string;
}

export function buildTechQuestionsPrompt(input: TechQuestionsPromptInput): string {
  return [
    `Task: write ${input.count} technical screening questions about ${input.technology}.`,
    "Return one question per line, no numbering, no extra text.",
    "",
    "Rules:",
    "- Mix difficulty: at least one easy and one more challenging question when more than one is requested.",
    "- Test practical knowledge, not trivia.",
    "- Each question is one sentence and ends with a question mark.",
    "",
    `Candidate experience (years): ${input.experienceYears ?? "unknown"}`,
    `Desired position: ${input.position ?? "unknown"}`,
  ].join("\n");
}
