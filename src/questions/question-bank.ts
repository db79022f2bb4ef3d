import questionBankData from "./data/question-bank.json";

export interface QuestionBankEntry {
  name: string;
  aliases: ReadonlyArray<string>;
  questions: ReadonlyArray<string>;
}

const GENERIC_TECH_TEMPLATES: ReadonlyArray<(tech: string) => string> = [
  (tech) => `Can you describe a project where you used ${tech} and the hardest problem you solved with it?`,
  (tech) => `Which features of ${tech} do you find most useful, and why?`,
  (tech) => `What best practices do you follow when working with ${tech}?`,
  (tech) => `How do you test and debug code that relies on ${tech}?`,
  (tech) => `How would you explain the main trade-offs of ${tech} to a teammate who has not used it?`,
];

export const GENERAL_QUESTIONS: ReadonlyArray<string> = [
  "How do you approach reviewing a teammate's pull request?",
  "Describe a production incident you helped resolve. What did you change afterwards?",
  "How do you decide when code needs automated tests and what kind?",
  "How do you break down a large feature into pieces you can ship?",
  "How do you keep your technical skills up to date?",
  "Tell me about a technical decision you would make differently today.",
];

export class QuestionBank {
  private readonly entries: ReadonlyArray<QuestionBankEntry>;
  private readonly index = new Map<string, QuestionBankEntry>();

  constructor(entries: ReadonlyArray<QuestionBankEntry> = questionBankData.technologies) {
    this.entries = entries;
    for (const entry of entries) {
      for (const key of [entry.name, ...entry.aliases]) {
        const normalized = normalizeTechKey(key);
        if (!this.index.has(normalized)) {
          this.index.set(normalized, entry);
        }
      }
    }
  }

  lookup(tech: string): string[] {
    const entry = this.index.get(normalizeTechKey(tech));
    return entry ? [...entry.questions] : [];
  }

  canonicalize(tech: string): string | null {
    return this.index.get(normalizeTechKey(tech))?.name ?? null;
  }

  listTechnologies(): string[] {
    return this.entries.map((entry) => entry.name);
  }
}

export function genericQuestionsFor(tech: string): string[] {
  return GENERIC_TECH_TEMPLATES.map((template) => template(tech));
}

function normalizeTechKey(value: string): string {
  return value.trim().toLowerCase().replace(/\s+/g, " ");
}
