interface FieldQuestionPromptInput {
  acceptedLabel: string;
  acceptedValue: string;
  nextLabel: string;
  nextHint: string;
}

export function buildFieldQuestionPrompt(input: FieldQuestionPromptInput): string {
  return [
    "Task: acknowledge the answer the candidate just gave and ask for the next piece of information.",
    "",
    "Rules:",
    "- One short acknowledgement, then one question.",
    "- Ask only for the next field, nothing else.",
    "- Maximum 2 short sentences.",
    "",
    `Accepted field: ${input.acceptedLabel}`,
    `Accepted value: ${input.acceptedValue}`,
    `Next field: ${input.nextLabel}`,
    `Format hint for next field: ${input.nextHint}`,
  ].join("\n");
}
