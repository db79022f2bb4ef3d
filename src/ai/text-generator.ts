import { Logger } from "../config/logger";
import { GenerationRequest, GenerationResult, TextGenerator } from "../shared/types/generation.types";
import { LlmClient } from "./llm.client";
import { callTextPromptSafe } from "./llm.safe";
import { renderRuntimeContext } from "./prompts/runtime-context";
import { buildScreeningSystemPrompt, SCREENING_EXECUTION_PROMPT } from "./system/screening.system";

interface LlmTextGeneratorOptions {
  companyName: string;
  timeoutMs?: number;
  retryBackoffMs?: number;
}

export class LlmTextGenerator implements TextGenerator {
  private readonly systemPrompt: string;

  constructor(
    private readonly llmClient: LlmClient,
    private readonly logger: Logger,
    private readonly options: LlmTextGeneratorOptions,
  ) {
    this.systemPrompt = buildScreeningSystemPrompt(options.companyName);
  }

  async generate(request: GenerationRequest): Promise<GenerationResult> {
    const result = await callTextPromptSafe({
      llmClient: this.llmClient,
      messages: [
        { role: "system", content: this.systemPrompt },
        { role: "system", content: SCREENING_EXECUTION_PROMPT },
        { role: "system", content: request.instruction },
        { role: "user", content: renderRuntimeContext(request.context) },
      ],
      promptName: request.promptName,
      maxTokens: request.maxTokens,
      temperature: request.temperature,
      logger: this.logger,
      timeoutMs: this.options.timeoutMs,
      retryBackoffMs: this.options.retryBackoffMs,
    });
    if (result.ok && !result.text) {
      return { ok: false, kind: "malformed_response" };
    }
    return result;
  }
}
