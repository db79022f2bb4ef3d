import { createApp } from "./app";
import { loadEnv } from "./config/env";

function bootstrap(): void {
  const env = loadEnv();
  const { app, logger } = createApp(env);

  app.listen(env.port, () => {
    logger.info("Server started", { port: env.port, nodeEnv: env.nodeEnv });
    logger.info("LLM backend configured", { provider: env.llmProvider, modelName: env.llmModel });
    logger.info("Screening config", {
      minQuestions: env.minQuestions,
      maxQuestions: env.maxQuestions,
      questionsPerTech: env.questionsPerTech,
      phrasingMode: env.phrasingMode,
    });
  });
}

bootstrap();
