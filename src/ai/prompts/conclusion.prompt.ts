interface ConclusionPromptInput {
  companyName: string;
  summary: string;
  answeredQuestions: number;
}

export function buildConclusionPrompt(input: ConclusionPromptInput): string {
  return [
    "Task: close the screening conversation.",
    "",
    "Rules:",
    "- Thank the candidate for their time.",
    "- Include the summary below verbatim.",
    `- Explain that the ${input.companyName} team will review the answers and reply within 3-5 business days.`,
    "- End on a positive note. Maximum 6 sentences plus the summary.",
    "",
    `Technical questions answered: ${input.answeredQuestions}`,
    "Summary:",
    input.summary,
  ].join("\n");
}
