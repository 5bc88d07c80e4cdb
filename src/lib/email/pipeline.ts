import { randomUUID } from "crypto";
import { FAILED_CLASSIFICATION, type ClassificationResult } from "../classifier";
import type { GeneratedText, GenerateOptions, GenerationResult, LLMRequest } from "../llm";
import { silentLogger, type ILogger } from "../logging";
import type { AuditSink, PipelineStage } from "./audit";
import { resolveControls } from "./control-resolver";
import { extractEmailDraft, type ExtractionResult } from "./output-parser";
import { validateEmailDraft } from "./output-validator";
import { buildEmailPrompt, buildRepairPrompt } from "./prompts";
import type {
  ControlRecord,
  GenerationUnavailableCode,
  InputRejectedCode,
  MalformedOutputCode,
  OutcomeMetadata,
  PipelineOutcome,
  ValidationResult,
} from "./types";

export const DESCRIPTION_MIN_LENGTH = 10;
export const DESCRIPTION_MAX_LENGTH = 500;
export const DEFAULT_REQUEST_BUDGET_MS = 25_000;

export interface IntentClassification {
  classify(text: string): Promise<ClassificationResult>;
}

export interface TextGeneration {
  generate(request: LLMRequest, options: GenerateOptions): Promise<GenerationResult>;
}

export interface EmailPipelineDeps {
  classifier: IntentClassification;
  generator: TextGeneration;
  audit?: AuditSink;
  logger?: ILogger;
  /** End-to-end budget; retries stop and the fallback is served once it runs out */
  requestBudgetMs?: number;
  confidenceThreshold?: number;
  now?: () => number;
}

interface RunContext {
  correlationId: string;
  start: number;
  deadlineAt: number;
  logger: ILogger;
}

export class EmailPipeline {
  private classifier: IntentClassification;
  private generator: TextGeneration;
  private audit: AuditSink | null;
  private logger: ILogger;
  private requestBudgetMs: number;
  private confidenceThreshold: number | undefined;
  private now: () => number;

  constructor(deps: EmailPipelineDeps) {
    this.classifier = deps.classifier;
    this.generator = deps.generator;
    this.audit = deps.audit ?? null;
    this.logger = (deps.logger ?? silentLogger).child({ component: "pipeline" });
    this.requestBudgetMs = deps.requestBudgetMs ?? DEFAULT_REQUEST_BUDGET_MS;
    this.confidenceThreshold = deps.confidenceThreshold;
    this.now = deps.now ?? Date.now;
  }

  /**
   * Runs one description through every stage. Always resolves with a typed
   * outcome; no fault escapes as a rejection.
   */
  async process(description: string, correlationId: string = randomUUID()): Promise<PipelineOutcome> {
    const start = this.now();
    const ctx: RunContext = {
      correlationId,
      start,
      deadlineAt: start + this.requestBudgetMs,
      logger: this.logger.child({ correlationId }),
    };

    let outcome: PipelineOutcome;
    try {
      outcome = await this.run(ctx, description);
    } catch (error) {
      ctx.logger.error("Unexpected pipeline fault", error);
      outcome = this.generationUnavailable(ctx, "PIPELINE_FAULT", "Unexpected internal fault");
    }

    this.emit(ctx, "complete", outcome.status, start, {
      code: outcome.status === "ok" ? undefined : "code" in outcome ? outcome.code : outcome.reason.code,
    });
    this.logOutcome(ctx, outcome);
    return outcome;
  }

  private async run(ctx: RunContext, description: string): Promise<PipelineOutcome> {
    // Stage 1: Input bounds
    let stageStart = this.now();
    const content = description.trim();
    if (content.length < DESCRIPTION_MIN_LENGTH || content.length > DESCRIPTION_MAX_LENGTH) {
      const tooShort = content.length < DESCRIPTION_MIN_LENGTH;
      this.emit(ctx, "input", "rejected", stageStart, { length: content.length });
      return this.inputRejected(
        ctx,
        tooShort ? "DESCRIPTION_TOO_SHORT" : "DESCRIPTION_TOO_LONG",
        `Description must be ${DESCRIPTION_MIN_LENGTH}-${DESCRIPTION_MAX_LENGTH} characters after trimming; got ${content.length}`
      );
    }
    this.emit(ctx, "input", "accepted", stageStart, { length: content.length });

    // Stage 2: Classification (never rejects, but nothing unexpected may escape)
    stageStart = this.now();
    let classification: ClassificationResult;
    try {
      classification = await this.classifier.classify(content);
    } catch (error) {
      ctx.logger.error("Classifier fault; using default label", error);
      classification = FAILED_CLASSIFICATION;
    }
    this.emit(ctx, "classification", classification.label, stageStart, {
      confidence: classification.confidence,
    });

    // Stage 3: Controls + prompt (pure)
    stageStart = this.now();
    let control: ControlRecord;
    let request: LLMRequest;
    try {
      control = resolveControls(classification, { threshold: this.confidenceThreshold });
      request = buildEmailPrompt(control, content);
    } catch (error) {
      ctx.logger.error("Failed to resolve controls or build prompt", error);
      this.emit(ctx, "controls", "fault", stageStart);
      return this.generationUnavailable(ctx, "PIPELINE_FAULT", "Could not prepare the generation request");
    }
    this.emit(ctx, "controls", control.confidenceTier, stageStart, {
      intent: control.intent,
      senderRole: control.senderRole,
      recipientRole: control.recipientRole,
      domain: control.domain,
      tone: control.tone,
    });

    // Stage 4: Generation
    const first = await this.generate(ctx, "generation", request, control);
    if (!first.success) {
      return this.generationUnavailable(ctx, first.code, first.error);
    }
    let text: GeneratedText = first.text;
    let generationAttempts = text.attempts.length;

    // Stage 5: Extraction, with one bounded re-prompt for generated text
    let extraction = this.extract(ctx, text);
    let reprompted = false;
    if (!extraction.success && text.source === "generated") {
      reprompted = true;
      const retry = await this.generate(ctx, "reprompt", buildRepairPrompt(request), control);
      if (!retry.success) {
        return this.generationUnavailable(ctx, retry.code, retry.error);
      }
      text = retry.text;
      generationAttempts += text.attempts.length;
      extraction = this.extract(ctx, text);
    }
    if (!extraction.success) {
      return this.malformedOutput(ctx, extraction.code, extraction.error);
    }

    // Stage 6: Validation
    stageStart = this.now();
    let validation: ValidationResult;
    try {
      validation = validateEmailDraft(extraction.draft, control);
    } catch (error) {
      ctx.logger.error("Validator fault", error);
      this.emit(ctx, "validation", "fault", stageStart);
      return this.malformedOutput(ctx, "VALIDATION_FAULT", "Draft could not be validated");
    }
    if (!validation.accepted) {
      this.emit(ctx, "validation", "rejected", stageStart, { ...validation.reason });
      return { status: "OutputRejected", reason: validation.reason, metadata: this.metadata(ctx) };
    }
    this.emit(ctx, "validation", "accepted", stageStart, { warnings: validation.warnings.length });

    return {
      status: "ok",
      draft: extraction.draft,
      metadata: {
        ...this.metadata(ctx),
        intent: control.intent,
        confidence: control.confidence,
        confidenceTier: control.confidenceTier,
        domain: control.domain,
        fallbackUsed: text.source === "fallback",
        warningsSuppressed: validation.warnings.length > 0,
        warnings: validation.warnings,
        generationAttempts,
        reprompted,
      },
    };
  }

  private async generate(
    ctx: RunContext,
    stage: PipelineStage,
    request: LLMRequest,
    control: ControlRecord
  ): Promise<GenerationResult> {
    const stageStart = this.now();
    let result: GenerationResult;
    try {
      result = await this.generator.generate(request, { domain: control.domain, deadlineAt: ctx.deadlineAt });
    } catch (error) {
      ctx.logger.error("Generation client fault", error);
      result = {
        success: false,
        code: "PERMANENT_PROVIDER_ERROR",
        error: error instanceof Error ? error.message : String(error),
        attempts: [],
        latencyMs: this.now() - stageStart,
      };
    }

    if (result.success) {
      this.emit(ctx, stage, result.text.source, stageStart, { attempts: result.text.attempts.length });
    } else {
      this.emit(ctx, stage, "failed", stageStart, { code: result.code, attempts: result.attempts.length });
    }
    return result;
  }

  private extract(ctx: RunContext, text: GeneratedText): ExtractionResult {
    const stageStart = this.now();
    let result: ExtractionResult;
    try {
      result = extractEmailDraft(text);
    } catch (error) {
      ctx.logger.error("Extractor fault", error);
      result = { success: false, code: "EXTRACTION_FAULT", error: "Extractor fault", candidatesTried: 0 };
    }
    this.emit(ctx, "extraction", result.success ? "parsed" : result.code, stageStart, {
      candidatesTried: result.candidatesTried,
    });
    return result;
  }

  private emit(
    ctx: RunContext,
    stage: PipelineStage,
    outcome: string,
    stageStart: number,
    detail?: Record<string, unknown>
  ): void {
    if (!this.audit) return;
    try {
      this.audit.record({
        correlationId: ctx.correlationId,
        stage,
        outcome,
        latencyMs: this.now() - stageStart,
        detail,
      });
    } catch (error) {
      ctx.logger.error("Audit sink failed", error, { stage });
    }
  }

  private metadata(ctx: RunContext): OutcomeMetadata {
    return { correlationId: ctx.correlationId, latencyMs: this.now() - ctx.start };
  }

  private inputRejected(ctx: RunContext, code: InputRejectedCode, message: string): PipelineOutcome {
    return { status: "InputRejected", code, message, metadata: this.metadata(ctx) };
  }

  private generationUnavailable(
    ctx: RunContext,
    code: GenerationUnavailableCode,
    message: string
  ): PipelineOutcome {
    return { status: "GenerationUnavailable", code, message, metadata: this.metadata(ctx) };
  }

  private malformedOutput(ctx: RunContext, code: MalformedOutputCode, message: string): PipelineOutcome {
    return { status: "MalformedOutput", code, message, metadata: this.metadata(ctx) };
  }

  private logOutcome(ctx: RunContext, outcome: PipelineOutcome): void {
    const data = { status: outcome.status, latencyMs: outcome.metadata.latencyMs };
    switch (outcome.status) {
      case "ok":
        if (outcome.metadata.fallbackUsed) {
          ctx.logger.error("Served fallback template; generation unavailable", undefined, data);
        } else {
          ctx.logger.info("Draft accepted", data);
        }
        break;
      case "GenerationUnavailable":
        ctx.logger.error("Generation unavailable", undefined, { ...data, code: outcome.code });
        break;
      case "OutputRejected":
        ctx.logger.warn("Draft rejected", { ...data, code: outcome.reason.code, field: outcome.reason.field });
        break;
      case "InputRejected":
      case "MalformedOutput":
        ctx.logger.warn(outcome.message, { ...data, code: outcome.code });
        break;
    }
  }
}
