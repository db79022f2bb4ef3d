import readline from "node:readline/promises";
import { LlmClient } from "../src/ai/llm.client";
import { LlmTextGenerator } from "../src/ai/text-generator";
import { loadEnv } from "../src/config/env";
import { createLogger } from "../src/config/logger";
import { ConversationManager } from "../src/screening/conversation.manager";
import { screeningConfigFromEnv } from "../src/screening/screening.config";
import { TurnResult } from "../src/shared/types/screening.types";

function renderProgress(result: TurnResult): string {
  const width = 20;
  const filled = Math.round(result.progressFraction * width);
  return `[${"#".repeat(filled)}${"-".repeat(width - filled)}] ${Math.round(result.progressFraction * 100)}% (${result.stage})`;
}

async function main(): Promise<void> {
  const env = loadEnv();
  const logger = createLogger({
    minLevel: env.logLevel,
    write: (line) => process.stderr.write(line),
  });
  const generator = new LlmTextGenerator(
    new LlmClient({ provider: env.llmProvider, apiKey: env.llmApiKey, model: env.llmModel }, logger),
    logger,
    { companyName: env.companyName, timeoutMs: env.llmTimeoutMs, retryBackoffMs: env.llmRetryBackoffMs },
  );
  const manager = new ConversationManager(screeningConfigFromEnv(env), { generator, logger });
  const rl = readline.createInterface({ input: process.stdin, output: process.stdout });

  try {
    let result = await manager.start();
    for (;;) {
      process.stdout.write(`\n${result.assistantText}\n${renderProgress(result)}\n`);
      if (result.stage === "exited" || result.stage === "conclusion") {
        break;
      }
      const text = await rl.question("> ");
      result = await manager.processTurn(text);
    }
  } finally {
    rl.close();
  }
}

main().catch((error: unknown) => {
  process.stderr.write(`${error instanceof Error ? error.message : String(error)}\n`);
  process.exitCode = 1;
});
