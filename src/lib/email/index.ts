export { EmailPipeline, DESCRIPTION_MIN_LENGTH, DESCRIPTION_MAX_LENGTH, DEFAULT_REQUEST_BUDGET_MS } from "./pipeline";
export type { EmailPipelineDeps, IntentClassification, TextGeneration } from "./pipeline";
export { createEmailPipeline, type EmailPipelineRuntime } from "./factory";
export { resolveControls, confidenceTier, CONFIDENCE_THRESHOLD, CONTROL_TABLE } from "./control-resolver";
export { buildEmailPrompt, buildRepairPrompt, delimitDescription } from "./prompts";
export { extractEmailDraft, type ExtractionResult } from "./output-parser";
export { validateEmailDraft } from "./output-validator";
export { FallbackTemplates } from "./fallback-templates";
export { LoggerAuditSink, type AuditSink, type StageEvent, type PipelineStage } from "./audit";
export type {
  ControlRecord,
  EmailDraft,
  PipelineOutcome,
  PipelineStatus,
  RejectionReason,
  SuccessMetadata,
  ValidationResult,
} from "./types";
