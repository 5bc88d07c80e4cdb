import { DEFAULT_LABEL, isIntentLabel, type ClassificationResult, type IntentLabel } from "../classifier";
import type { ConfidenceTier, ControlRecord, Domain, LengthTarget, Tone } from "./types";

/**
 * A classification counts as confident only when its probability is strictly
 * greater than this value; exactly 0.6 resolves to "low".
 */
export const CONFIDENCE_THRESHOLD = 0.6;

export interface ControlEntry {
  intentSummary: string;
  senderRole: string;
  recipientRole: string;
  domain: Domain;
  tone: Tone;
  length: LengthTarget;
}

// New labels are added here and nowhere else.
export const CONTROL_TABLE: Record<IntentLabel, ControlEntry> = {
  general: {
    intentSummary: "a general request or message",
    senderRole: "individual",
    recipientRole: "recipient",
    domain: "general",
    tone: "neutral",
    length: "medium",
  },
  student_to_institution: {
    intentSummary: "a student making a request to their school, college, or university",
    senderRole: "student",
    recipientRole: "college administration",
    domain: "education",
    tone: "formal",
    length: "medium",
  },
  institution_to_student: {
    intentSummary: "an institution notifying or reminding its students",
    senderRole: "institute",
    recipientRole: "student",
    domain: "education",
    tone: "formal",
    length: "short",
  },
  hr_to_candidate: {
    intentSummary: "HR communicating the status of an application or hiring step",
    senderRole: "HR",
    recipientRole: "candidate",
    domain: "hr",
    tone: "formal",
    length: "short",
  },
  candidate_to_hr: {
    intentSummary: "an applicant or employee writing to HR or a recruiter",
    senderRole: "candidate",
    recipientRole: "HR",
    domain: "hr",
    tone: "formal",
    length: "medium",
  },
  employee_to_manager: {
    intentSummary: "an employee writing to their manager",
    senderRole: "employee",
    recipientRole: "manager",
    domain: "corporate",
    tone: "formal",
    length: "short",
  },
  business_to_client: {
    intentSummary: "a business communicating with a client or customer",
    senderRole: "company",
    recipientRole: "client",
    domain: "corporate",
    tone: "formal",
    length: "medium",
  },
  consultant_to_institution: {
    intentSummary: "an external consultant or advisor writing to an institution's leadership",
    senderRole: "consultant",
    recipientRole: "institution leadership",
    domain: "education",
    tone: "formal",
    length: "long",
  },
};

export interface ResolveOptions {
  threshold?: number;
}

export function confidenceTier(confidence: number, threshold = CONFIDENCE_THRESHOLD): ConfidenceTier {
  return confidence > threshold ? "high" : "low";
}

/**
 * Turns a classification into a fully populated control record. A low-tier
 * record keeps the predicted intent and score but takes its roles and style
 * from the `general` entry, so no unconfident guess reaches the prompt.
 */
export function resolveControls(result: ClassificationResult, options: ResolveOptions = {}): ControlRecord {
  const intent: IntentLabel = isIntentLabel(result.label) ? result.label : DEFAULT_LABEL;
  const confidence = Number.isFinite(result.confidence)
    ? Math.min(1, Math.max(0, result.confidence))
    : 0;
  const tier = confidenceTier(confidence, options.threshold);
  const entry = CONTROL_TABLE[tier === "high" ? intent : DEFAULT_LABEL];

  return Object.freeze({
    intent,
    intentSummary: CONTROL_TABLE[intent].intentSummary,
    senderRole: entry.senderRole,
    recipientRole: entry.recipientRole,
    tone: entry.tone,
    length: entry.length,
    domain: entry.domain,
    confidenceTier: tier,
    confidence,
  });
}
