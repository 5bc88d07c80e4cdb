import { z } from "zod/v4";
import type { IntentLabel } from "../classifier";

// ─── Control record ───────────────────────────────────────────────────────────

export type Tone = "formal" | "neutral";
export type LengthTarget = "short" | "medium" | "long";
export type ConfidenceTier = "high" | "low";
export type Domain = "general" | "education" | "hr" | "corporate";

/**
 * Generation parameters resolved once per request. Every field is required:
 * consumers never fill in defaults of their own.
 */
export interface ControlRecord {
  readonly intent: IntentLabel;
  /** Human-readable intent, quoted in directive guidance */
  readonly intentSummary: string;
  readonly senderRole: string;
  readonly recipientRole: string;
  readonly tone: Tone;
  readonly length: LengthTarget;
  readonly domain: Domain;
  readonly confidenceTier: ConfidenceTier;
  /** Raw classifier probability, kept for logging */
  readonly confidence: number;
}

// ─── Email draft ──────────────────────────────────────────────────────────────

export const EMAIL_FIELDS = ["subject", "greeting", "body", "closing"] as const;
export type EmailField = (typeof EMAIL_FIELDS)[number];

// Strings only, no coercion; unknown keys are stripped.
export const EmailDraftSchema = z.object({
  subject: z.string(),
  greeting: z.string(),
  body: z.string(),
  closing: z.string(),
});

export type EmailDraft = z.infer<typeof EmailDraftSchema>;

export const EMAIL_DRAFT_JSON_SCHEMA = {
  type: "object" as const,
  properties: {
    subject: { type: "string", description: "Subject line, at most 150 characters" },
    greeting: { type: "string", description: "Salutation line, e.g. 'Dear Professor Rao,'" },
    body: { type: "string", description: "Email body without greeting or sign-off" },
    closing: { type: "string", description: "Sign-off line, e.g. 'Kind regards,'" },
  },
  required: ["subject", "greeting", "body", "closing"],
  additionalProperties: false,
};

// ─── Validation ───────────────────────────────────────────────────────────────

export type RejectionCode =
  | "EMPTY_FIELD"
  | "LENGTH_OUT_OF_BOUNDS"
  | "PLACEHOLDER_DETECTED"
  | "UNBALANCED_STRUCTURE"
  | "HOSTILE_LANGUAGE"
  | "TONE_VIOLATION"
  | "SENSITIVE_DATA"
  | "INSUFFICIENT_SUBSTANCE";

export interface RejectionReason {
  code: RejectionCode;
  field?: EmailField;
  detail: string;
}

export type ValidationResult =
  | { accepted: true; warnings: string[] }
  | { accepted: false; reason: RejectionReason };

// ─── Pipeline outcome ─────────────────────────────────────────────────────────

export interface OutcomeMetadata {
  correlationId: string;
  latencyMs: number;
}

export interface SuccessMetadata extends OutcomeMetadata {
  intent: IntentLabel;
  confidence: number;
  confidenceTier: ConfidenceTier;
  domain: Domain;
  fallbackUsed: boolean;
  /** True when whitelisted placeholders were let through */
  warningsSuppressed: boolean;
  warnings: string[];
  /** Provider attempts across the initial call and any re-prompt */
  generationAttempts: number;
  reprompted: boolean;
}

export type InputRejectedCode = "DESCRIPTION_TOO_SHORT" | "DESCRIPTION_TOO_LONG";
export type GenerationUnavailableCode =
  | "PERMANENT_PROVIDER_ERROR"
  | "FALLBACK_UNAVAILABLE"
  | "PIPELINE_FAULT";
export type MalformedOutputCode =
  | "NO_RECORD_FOUND"
  | "NON_RECORD_SHAPE"
  | "EXTRACTION_FAULT"
  | "VALIDATION_FAULT";

export type PipelineOutcome =
  | { status: "ok"; draft: EmailDraft; metadata: SuccessMetadata }
  | { status: "InputRejected"; code: InputRejectedCode; message: string; metadata: OutcomeMetadata }
  | {
      status: "GenerationUnavailable";
      code: GenerationUnavailableCode;
      message: string;
      metadata: OutcomeMetadata;
    }
  | { status: "MalformedOutput"; code: MalformedOutputCode; message: string; metadata: OutcomeMetadata }
  | { status: "OutputRejected"; reason: RejectionReason; metadata: OutcomeMetadata };

export type PipelineStatus = PipelineOutcome["status"];
