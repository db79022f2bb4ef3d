export const EXIT_KEYWORDS: ReadonlySet<string> = new Set([
  "exit",
  "quit",
  "bye",
  "goodbye",
  "stop",
  "end",
  "cancel",
]);

export function tokenizeWords(text: string): string[] {
  return text
    .toLowerCase()
    .split(/\s+/)
    .map((token) => token.replace(/^[^\p{L}\p{N}]+|[^\p{L}\p{N}]+$/gu, ""))
    .filter((token) => token.length > 0);
}

export function isExitRequest(text: string): boolean {
  return tokenizeWords(text).some((token) => EXIT_KEYWORDS.has(token));
}
