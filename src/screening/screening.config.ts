import { EnvConfig } from "../config/env";
import { ScreeningConfig } from "../shared/types/screening.types";

export const MAX_QUESTIONS_LIMIT = 10;

export function assertScreeningConfig(config: ScreeningConfig): void {
  const counts: Array<[string, number]> = [
    ["minQuestions", config.minQuestions],
    ["maxQuestions", config.maxQuestions],
    ["questionsPerTech", config.questionsPerTech],
    ["transcriptTailSize", config.transcriptTailSize],
  ];
  for (const [name, value] of counts) {
    if (!Number.isInteger(value) || value <= 0) {
      throw new Error(`Invalid screening config: ${name} must be a positive integer, got ${value}`);
    }
  }
  if (config.minQuestions > config.maxQuestions) {
    throw new Error(
      `Invalid screening config: minQuestions (${config.minQuestions}) exceeds maxQuestions (${config.maxQuestions})`,
    );
  }
  if (config.maxQuestions > MAX_QUESTIONS_LIMIT) {
    throw new Error(`Invalid screening config: maxQuestions must be at most ${MAX_QUESTIONS_LIMIT}`);
  }
  if (!config.companyName.trim()) {
    throw new Error("Invalid screening config: companyName is empty");
  }
}

export function screeningConfigFromEnv(env: EnvConfig): ScreeningConfig {
  const config: ScreeningConfig = {
    minQuestions: env.minQuestions,
    maxQuestions: env.maxQuestions,
    questionsPerTech: env.questionsPerTech,
    phrasingMode: env.phrasingMode,
    companyName: env.companyName,
    transcriptTailSize: env.transcriptTailSize,
  };
  assertScreeningConfig(config);
  return config;
}
