import { generateSafely } from "../ai/llm.safe";
import { buildTechQuestionsPrompt } from "../ai/prompts/tech-questions.prompt";
import { logContext, Logger } from "../config/logger";
import { GENERAL_QUESTIONS, genericQuestionsFor, QuestionBank } from "../questions/question-bank";
import { GenerationContext, TextGenerator } from "../shared/types/generation.types";
import { CandidateRecord, ScreeningConfig } from "../shared/types/screening.types";

export interface QuestionSetInput {
  technologies: ReadonlyArray<string>;
  candidate: CandidateRecord;
  context: GenerationContext;
  config: Pick<ScreeningConfig, "minQuestions" | "maxQuestions" | "questionsPerTech">;
}

export interface QuestionSetDeps {
  questionBank: QuestionBank;
  generator: TextGenerator;
  logger: Logger;
  random: () => number;
}

export async function buildQuestionSet(input: QuestionSetInput, deps: QuestionSetDeps): Promise<string[]> {
  const collected: string[] = [];
  for (const tech of input.technologies) {
    const pool = deps.questionBank.lookup(tech);
    if (pool.length > 0) {
      collected.push(...sampleQuestions(pool, input.config.questionsPerTech, deps.random));
      continue;
    }
    collected.push(...(await generateQuestionsForTech(tech, input, deps)));
  }

  const questions = dedupeQuestions(collected).slice(0, input.config.maxQuestions);
  if (questions.length >= input.config.minQuestions) {
    return questions;
  }
  return padQuestions(questions, input.technologies, input.config.minQuestions, deps.questionBank);
}

// Partial Fisher-Yates; a source that always returns 0 keeps declaration order.
export function sampleQuestions(pool: ReadonlyArray<string>, count: number, random: () => number): string[] {
  const items = [...pool];
  const take = Math.min(count, items.length);
  for (let index = 0; index < take; index += 1) {
    const offset = Math.floor(random() * (items.length - index));
    const swapIndex = index + Math.min(Math.max(0, offset), items.length - index - 1);
    [items[index], items[swapIndex]] = [items[swapIndex], items[index]];
  }
  return items.slice(0, take);
}

export function parseGeneratedQuestions(text: string): string[] {
  return text
    .split(/\r?\n/)
    .map((line) =>
      line
        .replace(/^\s*(?:\d+[.)]|[-*•])\s*/, "")
        .trim()
        .replace(/^[*_]+|[*_]+$/g, "")
        .trim(),
    )
    .filter((line) => line.length > 0 && line.endsWith("?"));
}

async function generateQuestionsForTech(
  tech: string,
  input: QuestionSetInput,
  deps: QuestionSetDeps,
): Promise<string[]> {
  const count = input.config.questionsPerTech;
  const result = await generateSafely(
    deps.generator,
    {
      promptName: "tech_questions",
      instruction: buildTechQuestionsPrompt({
        technology: tech,
        count,
        experienceYears: input.candidate.experience,
        position: input.candidate.position,
      }),
      context: input.context,
      maxTokens: 80 * count,
      temperature: 0.8,
    },
    deps.logger,
  );

  const parsed = result.ok ? parseGeneratedQuestions(result.text).slice(0, count) : [];
  if (parsed.length > 0) {
    return parsed;
  }

  logContext(
    deps.logger,
    "warn",
    "screening.generation.degraded",
    {
      stage: input.context.stage,
      prompt_name: "tech_questions",
      error_code: result.ok ? "malformed_response" : result.kind,
    },
    { technology: tech },
  );
  return genericQuestionsFor(tech).slice(0, 1);
}

function dedupeQuestions(questions: ReadonlyArray<string>): string[] {
  const seen = new Set<string>();
  const output: string[] = [];
  for (const question of questions) {
    const key = question.trim().toLowerCase();
    if (!key || seen.has(key)) {
      continue;
    }
    seen.add(key);
    output.push(question.trim());
  }
  return output;
}

function padQuestions(
  questions: string[],
  technologies: ReadonlyArray<string>,
  minQuestions: number,
  questionBank: QuestionBank,
): string[] {
  const genericPools = technologies.map((tech) => genericQuestionsFor(questionBank.canonicalize(tech) ?? tech));
  const longestPool = Math.max(0, ...genericPools.map((pool) => pool.length));
  const candidates: string[] = [];
  for (let round = 0; round < longestPool; round += 1) {
    for (const pool of genericPools) {
      const question = pool[round];
      if (question !== undefined) {
        candidates.push(question);
      }
    }
  }
  candidates.push(...GENERAL_QUESTIONS);

  return dedupeQuestions([...questions, ...candidates]).slice(0, minQuestions);
}
