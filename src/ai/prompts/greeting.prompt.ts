export function buildGreetingPrompt(companyName: string): string {
  return [
    `Task: greet a candidate who just opened the ${companyName} screening chat.`,
    "",
    "Rules:",
    "- Explain that this is a short initial screening that takes a few minutes.",
    "- Mention they can type exit at any time to leave.",
    "- End by asking for their full name.",
    "- Do not ask for anything else.",
  ].join("\n");
}
