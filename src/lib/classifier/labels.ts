/**
 * Versioned intent label set. `general` must stay first: it is the default
 * label and wins ties.
 */
export const LABEL_SET_VERSION = "v1";

export const INTENT_LABELS = [
  "general",
  "student_to_institution",
  "institution_to_student",
  "hr_to_candidate",
  "candidate_to_hr",
  "employee_to_manager",
  "business_to_client",
  "consultant_to_institution",
] as const;

export type IntentLabel = (typeof INTENT_LABELS)[number];

export const DEFAULT_LABEL: IntentLabel = "general";

export function isIntentLabel(value: string): value is IntentLabel {
  return INTENT_LABELS.some((label) => label === value);
}
