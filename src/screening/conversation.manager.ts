import { buildConclusionPrompt } from "../ai/prompts/conclusion.prompt";
import { buildFieldQuestionPrompt } from "../ai/prompts/field-question.prompt";
import { buildGreetingPrompt } from "../ai/prompts/greeting.prompt";
import { buildRedirectPrompt } from "../ai/prompts/redirect.prompt";
import { generateSafely } from "../ai/llm.safe";
import { logContext, Logger, noopLogger } from "../config/logger";
import { QuestionBank } from "../questions/question-bank";
import { GenerationContext, GenerationRequest, TextGenerator } from "../shared/types/generation.types";
import {
  CandidateField,
  CandidateFieldValues,
  CandidateRecord,
  CollectionStage,
  FIELD_LABELS,
  isCollectionStage,
  Message,
  MessageRole,
  ScreeningConfig,
  SessionSnapshot,
  Stage,
  STAGE_FIELDS,
  TechAnswer,
  TurnResult,
} from "../shared/types/screening.types";
import { ValidationResult } from "../shared/types/validation.types";
import { validateField } from "../validation/field.validators";
import { isExitRequest } from "./exit-detector";
import {
  cannedRedirectMessage,
  conversationEndedMessage,
  farewellMessage,
  FIELD_HINTS,
  FIELD_QUESTIONS,
  formatFieldValue,
  greetingMessage,
  nextFieldMessage,
  nextTechQuestionMessage,
  summaryMessage,
  techIntroMessage,
  techQuestionMessage,
  validationRetryMessage,
} from "./messages";
import { IndicatorOffTopicClassifier, OffTopicClassifier } from "./off-topic.classifier";
import { buildQuestionSet } from "./question-set";
import { assertScreeningConfig } from "./screening.config";
import { assertNever, assertTransition, nextStage, progressFraction } from "./stage-machine";

export interface ConversationManagerDeps {
  generator: TextGenerator;
  questionBank?: QuestionBank;
  offTopicClassifier?: OffTopicClassifier;
  logger?: Logger;
  random?: () => number;
  now?: () => Date;
  sessionId?: string;
}

/**
 * Owns one screening session: stage, candidate record, transcript and question set.
 * Turns must be processed one at a time; a re-entrant call is rejected.
 */
export class ConversationManager {
  private stage: Stage = "greeting";
  private candidate: CandidateRecord = {};
  private transcript: Message[] = [];
  private questionSet: ReadonlyArray<string> = [];
  private answers: TechAnswer[] = [];
  private conclusionText: string | null = null;
  private turnInFlight = false;

  private readonly generator: TextGenerator;
  private readonly questionBank: QuestionBank;
  private readonly offTopicClassifier: OffTopicClassifier;
  private readonly logger: Logger;
  private readonly random: () => number;
  private readonly now: () => Date;
  private readonly sessionId?: string;

  constructor(
    private readonly config: ScreeningConfig,
    deps: ConversationManagerDeps,
  ) {
    assertScreeningConfig(config);
    this.generator = deps.generator;
    this.questionBank = deps.questionBank ?? new QuestionBank();
    this.offTopicClassifier = deps.offTopicClassifier ?? new IndicatorOffTopicClassifier();
    this.logger = deps.logger ?? noopLogger;
    this.random = deps.random ?? Math.random;
    this.now = deps.now ?? (() => new Date());
    this.sessionId = deps.sessionId;
  }

  getStage(): Stage {
    return this.stage;
  }

  getProgressFraction(): number {
    return progressFraction(this.stage);
  }

  getCandidate(): CandidateRecord {
    return copyCandidate(this.candidate);
  }

  getTranscript(): ReadonlyArray<Message> {
    return this.transcript.map((message) => ({ ...message }));
  }

  getQuestionSet(): ReadonlyArray<string> {
    return [...this.questionSet];
  }

  snapshot(): SessionSnapshot {
    return {
      stage: this.stage,
      progressFraction: this.getProgressFraction(),
      candidate: this.getCandidate(),
      questionSet: [...this.questionSet],
      answers: this.answers.map((answer) => ({ ...answer })),
    };
  }

  async start(): Promise<TurnResult> {
    return this.runExclusive(async () => {
      if (this.stage !== "greeting") {
        throw new Error(`Session already started, current stage: ${this.stage}`);
      }
      return this.greet();
    });
  }

  async processTurn(rawText: string): Promise<TurnResult> {
    return this.runExclusive(() => this.handleTurn(typeof rawText === "string" ? rawText : ""));
  }

  reset(): void {
    if (this.turnInFlight) {
      throw new Error("Cannot reset while a turn is being processed for this session");
    }
    this.stage = "greeting";
    this.candidate = {};
    this.transcript = [];
    this.questionSet = [];
    this.answers = [];
    this.conclusionText = null;
  }

  private async runExclusive(task: () => Promise<TurnResult>): Promise<TurnResult> {
    if (this.turnInFlight) {
      throw new Error("A turn is already being processed for this session");
    }
    this.turnInFlight = true;
    try {
      return await task();
    } finally {
      this.turnInFlight = false;
    }
  }

  private async handleTurn(text: string): Promise<TurnResult> {
    this.append("user", text);

    const stage = this.stage;
    if (stage !== "exited" && isExitRequest(text)) {
      return this.exit();
    }

    switch (stage) {
      case "greeting":
        return this.greet();
      case "collect_name":
      case "collect_email":
      case "collect_phone":
      case "collect_experience":
      case "collect_position":
      case "collect_location":
      case "collect_tech_stack":
        return this.handleCollection(stage, text);
      case "tech_questions":
        return this.handleTechAnswer(text);
      case "conclusion":
        return this.reply(this.conclusionText ?? this.buildSummary());
      case "exited":
        return this.reply(conversationEndedMessage());
      default:
        return assertNever(stage);
    }
  }

  private async greet(): Promise<TurnResult> {
    const template = greetingMessage(this.config.companyName);
    const text =
      this.config.phrasingMode === "generated"
        ? await this.generateOr(template, {
            promptName: "greeting",
            instruction: buildGreetingPrompt(this.config.companyName),
            maxTokens: 150,
          })
        : template;
    this.advance("collect_name");
    return this.reply(text);
  }

  private async handleCollection(stage: CollectionStage, text: string): Promise<TurnResult> {
    if (!text.trim()) {
      return this.redirect(stage, text);
    }

    const field = STAGE_FIELDS[stage];
    const outcome = this.applyField(field, text);
    if (!outcome.ok) {
      if (this.offTopicClassifier.isOffTopic({ stage, text, validationCode: outcome.code })) {
        return this.redirect(stage, text);
      }
      logContext(this.logger, "info", "screening.validation.rejected", {
        session_id: this.sessionId,
        stage,
        error_code: outcome.code,
      });
      return this.reply(validationRetryMessage(outcome.reason, field));
    }

    const next = nextStage(stage);
    if (next === null) {
      throw new Error(`No successor for collection stage ${stage}`);
    }
    if (isCollectionStage(next)) {
      this.advance(next);
      return this.reply(await this.phraseNextField(field, formatFieldValue(outcome.value), STAGE_FIELDS[next]));
    }
    return this.enterTechQuestions();
  }

  private applyField<K extends CandidateField>(field: K, text: string): ValidationResult<CandidateFieldValues[K]> {
    const result = validateField(field, text);
    if (result.ok) {
      this.candidate[field] = result.value;
    }
    return result;
  }

  private async phraseNextField(
    acceptedField: CandidateField,
    acceptedValue: string,
    nextField: CandidateField,
  ): Promise<string> {
    const template = nextFieldMessage(acceptedField, acceptedValue, nextField);
    if (this.config.phrasingMode === "templated") {
      return template;
    }
    return this.generateOr(template, {
      promptName: "field_question",
      instruction: buildFieldQuestionPrompt({
        acceptedLabel: FIELD_LABELS[acceptedField],
        acceptedValue,
        nextLabel: FIELD_LABELS[nextField],
        nextHint: FIELD_HINTS[nextField],
      }),
      maxTokens: 120,
    });
  }

  private async redirect(stage: CollectionStage | "tech_questions", text: string): Promise<TurnResult> {
    const pendingQuestion = stage === "tech_questions" ? this.currentTechQuestion() : null;
    const neededLabel =
      stage === "tech_questions" ? "an answer to the current technical question" : FIELD_LABELS[STAGE_FIELDS[stage]];
    const question =
      stage === "tech_questions"
        ? techQuestionMessage(this.answers.length, this.questionSet.length, pendingQuestion ?? "")
        : FIELD_QUESTIONS[STAGE_FIELDS[stage]];

    this.logger.info("screening.fallback.redirect", { session_id: this.sessionId, stage });
    const reply = await this.generateOr(cannedRedirectMessage(question), {
      promptName: "redirect",
      instruction: buildRedirectPrompt({ neededLabel, userText: text.trim() }),
      maxTokens: 150,
    });
    return this.reply(reply);
  }

  private async enterTechQuestions(): Promise<TurnResult> {
    const technologies = this.candidate.techStack ?? [];
    const questions = await buildQuestionSet(
      {
        technologies,
        candidate: this.getCandidate(),
        context: this.buildContext(),
        config: this.config,
      },
      {
        questionBank: this.questionBank,
        generator: this.generator,
        logger: this.logger,
        random: this.random,
      },
    );
    const first = questions[0];
    if (first === undefined) {
      throw new Error("Question set is empty");
    }

    this.advance("tech_questions");
    this.questionSet = Object.freeze([...questions]);
    this.answers = [];
    this.append("system", `Prepared ${questions.length} technical questions covering ${technologies.join(", ")}.`);
    this.logger.info("screening.questions.prepared", {
      session_id: this.sessionId,
      technologies,
      count: questions.length,
    });
    return this.reply(techIntroMessage(technologies.join(", "), questions.length, first));
  }

  private async handleTechAnswer(text: string): Promise<TurnResult> {
    const question = this.currentTechQuestion();
    if (question === null) {
      this.advance("conclusion");
      return this.conclude();
    }
    if (!text.trim()) {
      return this.redirect("tech_questions", text);
    }

    this.answers.push({ question, answer: text.trim() });
    const next = this.currentTechQuestion();
    if (next !== null) {
      return this.reply(nextTechQuestionMessage(this.answers.length, this.questionSet.length, next));
    }
    this.advance("conclusion");
    return this.conclude();
  }

  private currentTechQuestion(): string | null {
    return this.questionSet[this.answers.length] ?? null;
  }

  private async conclude(): Promise<TurnResult> {
    const summary = this.buildSummary();
    this.conclusionText =
      this.config.phrasingMode === "generated"
        ? await this.generateOr(summary, {
            promptName: "conclusion",
            instruction: buildConclusionPrompt({
              companyName: this.config.companyName,
              summary,
              answeredQuestions: this.answers.length,
            }),
            maxTokens: 300,
          })
        : summary;
    return this.reply(this.conclusionText);
  }

  private buildSummary(): string {
    return summaryMessage(this.candidate, this.answers.length, this.questionSet.length, this.config.companyName);
  }

  private exit(): TurnResult {
    const from = this.stage;
    this.advance("exited");
    this.logger.info("screening.exited", { session_id: this.sessionId, stage: from });
    return this.reply(farewellMessage(this.candidate.name));
  }

  private async generateOr(fallback: string, request: Omit<GenerationRequest, "context">): Promise<string> {
    const result = await generateSafely(this.generator, { ...request, context: this.buildContext() }, this.logger);
    if (result.ok) {
      return result.text;
    }
    logContext(this.logger, "warn", "screening.generation.degraded", {
      session_id: this.sessionId,
      stage: this.stage,
      prompt_name: request.promptName,
      error_code: result.kind,
    });
    return fallback;
  }

  private buildContext(): GenerationContext {
    return {
      stage: this.stage,
      candidate: this.getCandidate(),
      transcriptTail: this.transcript.slice(-this.config.transcriptTailSize).map((message) => ({ ...message })),
    };
  }

  private advance(to: Stage): void {
    assertTransition(this.stage, to);
    this.logger.debug("screening.stage.advanced", { session_id: this.sessionId, from: this.stage, to });
    this.stage = to;
  }

  private append(role: MessageRole, text: string): void {
    this.transcript.push({ role, text, timestamp: this.now().toISOString() });
  }

  private reply(text: string): TurnResult {
    this.append("assistant", text);
    return {
      assistantText: text,
      stage: this.stage,
      progressFraction: this.getProgressFraction(),
    };
  }
}

function copyCandidate(candidate: CandidateRecord): CandidateRecord {
  const copy: CandidateRecord = { ...candidate };
  if (candidate.techStack) {
    copy.techStack = [...candidate.techStack];
  }
  return copy;
}
