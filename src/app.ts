import express, { Express, Request, Response } from "express";
import { EnvConfig } from "./config/env";
import { createLogger, Logger } from "./config/logger";
import { LlmClient } from "./ai/llm.client";
import { LlmTextGenerator } from "./ai/text-generator";
import { buildSessionController } from "./http/session.controller";
import { QuestionBank } from "./questions/question-bank";
import { ConversationManager } from "./screening/conversation.manager";
import { screeningConfigFromEnv } from "./screening/screening.config";
import { SessionService } from "./screening/session.service";
import { TextGenerator } from "./shared/types/generation.types";

export interface AppContext {
  app: Express;
  logger: Logger;
  sessionService: SessionService;
}

export interface AppOverrides {
  logger?: Logger;
  generator?: TextGenerator;
  random?: () => number;
}

export function createApp(env: EnvConfig, overrides?: AppOverrides): AppContext {
  const logger = overrides?.logger ?? createLogger({ minLevel: env.logLevel });
  const screeningConfig = screeningConfigFromEnv(env);
  const generator =
    overrides?.generator ??
    new LlmTextGenerator(
      new LlmClient(
        {
          provider: env.llmProvider,
          apiKey: env.llmApiKey,
          model: env.llmModel,
        },
        logger,
      ),
      logger,
      {
        companyName: env.companyName,
        timeoutMs: env.llmTimeoutMs,
        retryBackoffMs: env.llmRetryBackoffMs,
      },
    );
  const questionBank = new QuestionBank();
  const sessionService = new SessionService(
    (sessionId) =>
      new ConversationManager(screeningConfig, {
        generator,
        questionBank,
        logger,
        random: overrides?.random,
        sessionId,
      }),
    { idleTtlMs: env.sessionIdleTtlMs },
  );

  const app = express();
  app.use(express.json({ limit: "64kb" }));

  app.get("/health", (_request: Request, response: Response) => {
    response.status(200).json({ ok: true, sessions: sessionService.size() });
  });
  app.get("/technologies", (_request: Request, response: Response) => {
    response.status(200).json({ ok: true, technologies: questionBank.listTechnologies() });
  });
  app.use("/sessions", buildSessionController({ sessionService, logger }));

  return { app, logger, sessionService };
}
