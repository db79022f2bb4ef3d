interface RedirectPromptInput {
  neededLabel: string;
  userText: string;
}

export function buildRedirectPrompt(input: RedirectPromptInput): string {
  return [
    "Task: the candidate's last message was empty, unclear, or off-topic. Redirect them back to the screening.",
    "",
    "Rules:",
    "- Briefly acknowledge their message without answering unrelated questions in depth.",
    "- Remind them what information is needed right now.",
    "- Ask for that information.",
    "- Do not lecture. Maximum 3 short sentences.",
    "",
    `Needed information: ${input.neededLabel}`,
    `Candidate message: ${input.userText || "(empty)"}`,
  ].join("\n");
}
