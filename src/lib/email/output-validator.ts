import {
  EMAIL_FIELDS,
  type ControlRecord,
  type EmailDraft,
  type EmailField,
  type RejectionCode,
  type RejectionReason,
  type ValidationResult,
} from "./types";

// ─── Limits ───────────────────────────────────────────────────────────────────

export const FIELD_LIMITS: Record<EmailField, { min: number; max: number }> = {
  subject: { min: 3, max: 150 },
  greeting: { min: 1, max: 50 },
  body: { min: 20, max: 1000 },
  closing: { min: 1, max: 50 },
};

/** A confident classification should give the model enough to say */
export const HIGH_CONFIDENCE_MIN_BODY = 80;

export const UPPERCASE_RATIO_LIMIT = 0.3;
/** Fields with fewer letters than this skip the uppercase check ("HR Update") */
export const UPPERCASE_MIN_LETTERS = 10;
export const MAX_EXCLAMATIONS_FORMAL = 1;

/** Slots a human is expected to fill; allowed only for low-confidence drafts */
export const LOW_TIER_PLACEHOLDER_WHITELIST = ["[your name]", "[recipient name]", "[date]"];

// ─── Patterns ─────────────────────────────────────────────────────────────────

const PLACEHOLDER_PATTERNS: RegExp[] = [
  /\[[^[\]\n]*\]/g,
  /\{[^{}\n]*\}/g,
  /<[^<>\n]*>/g,
  /_{3,}/g,
];

const INFORMAL_MARKERS =
  /\b(lol|lmao|omg|btw|gonna|wanna|gotta|kinda|yeah|yep|nope|hey|dude|thx|pls|plz|cuz)\b/i;

/** Text-speak "u"/"ur": lowercase and standalone only, so "U.S." and "U-turn" pass */
const INFORMAL_SHORT_FORMS = /(?<![\w.'-])(u|ur)(?![\w.'-])/;

const HOSTILE_TERMS =
  /\b(idiot|idiots|stupid|incompetent|useless|pathetic|shut up|or else|last warning|you people|ridiculous|disgusting|demand that you|you must comply|worthless)\b/i;

const SSN_PATTERN = /\b\d{3}-\d{2}-\d{4}\b/;
const NATIONAL_ID_PATTERN = /\b\d{4}[ -]\d{4}[ -]\d{4}\b/;
const PAN_PATTERN = /\b[A-Z]{5}\d{4}[A-Z]\b/;
const CARD_CANDIDATE_PATTERN = /\b(?:\d[ -]?){12,18}\d\b/g;
const EMAIL_ADDRESS_PATTERN = /[A-Za-z0-9._%+-]+@[A-Za-z0-9.-]+\.[A-Za-z]{2,}/g;

/** `<...>` that wraps a real address or link rather than a slot */
const BRACKETED_CONTACT = /^<(?:mailto:)?[A-Za-z0-9._%+-]+@[A-Za-z0-9.-]+\.[A-Za-z]{2,}>$|^<https?:\/\/[^\s<>]+>$/;

const BRACKET_PAIRS: Record<string, string> = { ")": "(", "]": "[", "}": "{" };

// ─── Helpers ──────────────────────────────────────────────────────────────────

function reject(code: RejectionCode, detail: string, field?: EmailField): ValidationResult {
  const reason: RejectionReason = field ? { code, field, detail } : { code, detail };
  return { accepted: false, reason };
}

function normalizePlaceholder(token: string): string {
  return token.toLowerCase().replace(/\s+/g, " ").trim();
}

export function luhnValid(digits: string): boolean {
  let sum = 0;
  let double = false;
  for (let i = digits.length - 1; i >= 0; i--) {
    let d = digits.charCodeAt(i) - 48;
    if (double) {
      d *= 2;
      if (d > 9) d -= 9;
    }
    sum += d;
    double = !double;
  }
  return sum % 10 === 0;
}

function isBalanced(value: string): boolean {
  const straightQuotes = (value.match(/"/g) ?? []).length;
  if (straightQuotes % 2 !== 0) return false;

  const openCurly = (value.match(/“/g) ?? []).length;
  const closeCurly = (value.match(/”/g) ?? []).length;
  if (openCurly !== closeCurly) return false;

  const stack: string[] = [];
  for (const char of value) {
    if (char === "(" || char === "[" || char === "{") {
      stack.push(char);
    } else if (char in BRACKET_PAIRS) {
      if (stack.pop() !== BRACKET_PAIRS[char]) return false;
    }
  }
  return stack.length === 0;
}

export function uppercaseRatio(value: string): { letters: number; ratio: number } {
  const letters = value.match(/[A-Za-z]/g) ?? [];
  if (letters.length === 0) return { letters: 0, ratio: 0 };
  const upper = letters.filter((c) => c >= "A" && c <= "Z").length;
  return { letters: letters.length, ratio: upper / letters.length };
}

// ─── Layers ───────────────────────────────────────────────────────────────────

function checkLengths(draft: EmailDraft): ValidationResult | null {
  for (const field of EMAIL_FIELDS) {
    const value = draft[field].trim();
    if (value.length === 0) {
      return reject("EMPTY_FIELD", `${field} is empty`, field);
    }
    const { min, max } = FIELD_LIMITS[field];
    if (value.length < min || value.length > max) {
      return reject(
        "LENGTH_OUT_OF_BOUNDS",
        `${field} has ${value.length} characters; allowed ${min}-${max}`,
        field
      );
    }
  }
  return null;
}

function checkPlaceholders(draft: EmailDraft, control: ControlRecord, warnings: string[]): ValidationResult | null {
  const whitelist = control.confidenceTier === "low" ? LOW_TIER_PLACEHOLDER_WHITELIST : [];

  for (const field of EMAIL_FIELDS) {
    for (const pattern of PLACEHOLDER_PATTERNS) {
      for (const match of draft[field].matchAll(pattern)) {
        const token = match[0];
        if (BRACKETED_CONTACT.test(token)) continue;
        if (whitelist.includes(normalizePlaceholder(token))) {
          warnings.push(`placeholder ${token} left in ${field}`);
          continue;
        }
        return reject("PLACEHOLDER_DETECTED", `unresolved placeholder ${token}`, field);
      }
    }
  }
  return null;
}

function checkStructure(draft: EmailDraft): ValidationResult | null {
  for (const field of EMAIL_FIELDS) {
    if (!isBalanced(draft[field])) {
      return reject("UNBALANCED_STRUCTURE", `unbalanced quotes or brackets in ${field}`, field);
    }
  }
  return null;
}

function checkTone(draft: EmailDraft, control: ControlRecord): ValidationResult | null {
  for (const field of EMAIL_FIELDS) {
    const hostile = draft[field].match(HOSTILE_TERMS);
    if (hostile) {
      return reject("HOSTILE_LANGUAGE", `hostile or demanding term "${hostile[0]}"`, field);
    }
  }

  if (control.tone !== "formal") return null;

  for (const field of EMAIL_FIELDS) {
    const informal = draft[field].match(INFORMAL_MARKERS) ?? draft[field].match(INFORMAL_SHORT_FORMS);
    if (informal) {
      return reject("TONE_VIOLATION", `informal marker "${informal[0]}" in a formal email`, field);
    }

    const { letters, ratio } = uppercaseRatio(draft[field]);
    if (letters >= UPPERCASE_MIN_LETTERS && ratio > UPPERCASE_RATIO_LIMIT) {
      return reject(
        "TONE_VIOLATION",
        `${Math.round(ratio * 100)}% of letters are uppercase (limit ${Math.round(UPPERCASE_RATIO_LIMIT * 100)}%)`,
        field
      );
    }
  }

  const exclamations = EMAIL_FIELDS.reduce((n, field) => n + (draft[field].match(/!/g) ?? []).length, 0);
  if (exclamations > MAX_EXCLAMATIONS_FORMAL) {
    return reject("TONE_VIOLATION", `${exclamations} exclamation marks in a formal email`);
  }
  return null;
}

function checkSensitive(draft: EmailDraft): ValidationResult | null {
  for (const field of EMAIL_FIELDS) {
    const value = draft[field];

    if (SSN_PATTERN.test(value)) {
      return reject("SENSITIVE_DATA", "number resembling a social security number", field);
    }
    for (const match of value.matchAll(CARD_CANDIDATE_PATTERN)) {
      const digits = match[0].replace(/\D/g, "");
      if (digits.length >= 13 && digits.length <= 19 && luhnValid(digits)) {
        return reject("SENSITIVE_DATA", "number resembling a payment card", field);
      }
    }
    if (NATIONAL_ID_PATTERN.test(value)) {
      return reject("SENSITIVE_DATA", "number resembling a national ID", field);
    }
    if (PAN_PATTERN.test(value)) {
      return reject("SENSITIVE_DATA", "value resembling a tax ID", field);
    }
  }

  const addresses = EMAIL_FIELDS.reduce(
    (n, field) => n + (draft[field].match(EMAIL_ADDRESS_PATTERN) ?? []).length,
    0
  );
  if (addresses > 1) {
    return reject("SENSITIVE_DATA", `${addresses} email addresses embedded; at most one allowed`);
  }
  return null;
}

function checkSubstance(draft: EmailDraft, control: ControlRecord): ValidationResult | null {
  if (control.confidenceTier !== "high") return null;
  const length = draft.body.trim().length;
  if (length < HIGH_CONFIDENCE_MIN_BODY) {
    return reject(
      "INSUFFICIENT_SUBSTANCE",
      `body has ${length} characters; a confident request needs at least ${HIGH_CONFIDENCE_MIN_BODY}`,
      "body"
    );
  }
  return null;
}

/**
 * Layered checks; the first failing layer decides the reason. A rejected
 * draft is never repaired.
 */
export function validateEmailDraft(draft: EmailDraft, control: ControlRecord): ValidationResult {
  const warnings: string[] = [];

  const failure =
    checkLengths(draft) ??
    checkPlaceholders(draft, control, warnings) ??
    checkStructure(draft) ??
    checkTone(draft, control) ??
    checkSensitive(draft) ??
    checkSubstance(draft, control);

  return failure ?? { accepted: true, warnings };
}
