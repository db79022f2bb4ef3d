import { Request, Response, Router } from "express";
import { Logger } from "../config/logger";
import { SessionService } from "../screening/session.service";
import { exportTranscript, isTranscriptExportFormat } from "../screening/transcript-export";

interface SessionControllerDeps {
  sessionService: SessionService;
  logger: Logger;
}

function respondNotFound(response: Response, sessionId: string): void {
  response.status(404).json({ ok: false, error: `Session not found: ${sessionId}` });
}

function respondFailure(response: Response, logger: Logger, message: string, sessionId: string, error: unknown): void {
  logger.error(message, {
    session_id: sessionId,
    error: error instanceof Error ? error.message : "Unknown error",
  });
  response.status(500).json({ ok: false, error: "Internal error" });
}

export function buildSessionController(deps: SessionControllerDeps): Router {
  const router = Router();

  router.post("/", async (_request: Request, response: Response) => {
    try {
      const { sessionId, result } = await deps.sessionService.create();
      deps.logger.info("Session created", { session_id: sessionId });
      response.status(201).json({ ok: true, sessionId, ...result });
    } catch (error) {
      respondFailure(response, deps.logger, "Failed to create session", "new", error);
    }
  });

  router.post("/:id/turns", async (request: Request, response: Response) => {
    const sessionId = request.params.id ?? "";
    const body: unknown = request.body;
    const text = body && typeof body === "object" && "text" in body ? body.text : undefined;
    if (typeof text !== "string") {
      response.status(400).json({ ok: false, error: "Body must contain a text string" });
      return;
    }

    try {
      const result = await deps.sessionService.runExclusive(sessionId, (manager) => manager.processTurn(text));
      if (!result) {
        respondNotFound(response, sessionId);
        return;
      }
      response.status(200).json({ ok: true, ...result });
    } catch (error) {
      respondFailure(response, deps.logger, "Failed to process turn", sessionId, error);
    }
  });

  router.get("/:id", async (request: Request, response: Response) => {
    const sessionId = request.params.id ?? "";
    const snapshot = await deps.sessionService.runExclusive(sessionId, (manager) => manager.snapshot());
    if (!snapshot) {
      respondNotFound(response, sessionId);
      return;
    }
    response.status(200).json({ ok: true, sessionId, ...snapshot });
  });

  router.get("/:id/transcript", async (request: Request, response: Response) => {
    const sessionId = request.params.id ?? "";
    const format = request.query.format ?? "json";
    if (!isTranscriptExportFormat(format)) {
      response.status(400).json({ ok: false, error: "format must be json or text" });
      return;
    }
    const exported = await deps.sessionService.runExclusive(sessionId, (manager) =>
      exportTranscript(manager.snapshot(), manager.getTranscript(), format),
    );
    if (!exported) {
      respondNotFound(response, sessionId);
      return;
    }
    response.status(200).type(exported.contentType).send(exported.body);
  });

  router.post("/:id/reset", async (request: Request, response: Response) => {
    const sessionId = request.params.id ?? "";
    try {
      const result = await deps.sessionService.runExclusive(sessionId, (manager) => {
        manager.reset();
        return manager.start();
      });
      if (!result) {
        respondNotFound(response, sessionId);
        return;
      }
      response.status(200).json({ ok: true, ...result });
    } catch (error) {
      respondFailure(response, deps.logger, "Failed to reset session", sessionId, error);
    }
  });

  router.delete("/:id", (request: Request, response: Response) => {
    const sessionId = request.params.id ?? "";
    if (!deps.sessionService.delete(sessionId)) {
      respondNotFound(response, sessionId);
      return;
    }
    response.status(204).end();
  });

  return router;
}
