import type { GeneratedText } from "../llm";
import { EmailDraftSchema, type EmailDraft, type MalformedOutputCode } from "./types";

export type ExtractionResult =
  | { success: true; draft: EmailDraft; candidatesTried: number }
  | { success: false; code: MalformedOutputCode; error: string; candidatesTried: number };

/** Upper bound on JSON.parse calls for a single reply */
export const MAX_PARSE_ATTEMPTS = 2000;

function positionsOf(text: string, char: string): number[] {
  const positions: number[] = [];
  for (let i = text.indexOf(char); i !== -1; i = text.indexOf(char, i + 1)) {
    positions.push(i);
  }
  return positions;
}

function isPlainObject(value: unknown): boolean {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function tryParse(json: string): { ok: true; value: unknown } | { ok: false } {
  try {
    return { ok: true, value: JSON.parse(sanitizeJsonNewlines(json)) };
  } catch {
    return { ok: false };
  }
}

/** Index of the `}` that closes the `{` at `start`, skipping braces inside strings; -1 if it never closes */
export function matchingBrace(text: string, start: number): number {
  let depth = 0;
  let inString = false;
  let escape = false;

  for (let i = start; i < text.length; i++) {
    const char = text[i];
    if (escape) {
      escape = false;
    } else if (inString) {
      if (char === "\\") escape = true;
      else if (char === '"') inString = false;
    } else if (char === '"') {
      inString = true;
    } else if (char === "{") {
      depth++;
    } else if (char === "}") {
      depth--;
      if (depth === 0) return i;
    }
  }
  return -1;
}

function parseDraft(candidate: string): EmailDraft | null {
  const parsed = tryParse(candidate);
  if (!parsed.ok) return null;
  const validation = EmailDraftSchema.safeParse(parsed.value);
  return validation.success ? validation.data : null;
}

/**
 * Recovers the email record from raw model output. Each `{` is first paired
 * with its depth-matched `}`, which finds a well-formed record behind any
 * amount of brace-heavy prose. If none of those hold the four string fields,
 * every `{`…`}` pair is tried by ascending start then ascending end, up to
 * {@link MAX_PARSE_ATTEMPTS}; a greedy first-to-last scan would fuse a broken
 * fragment with a good record that follows it.
 */
export function extractEmailDraft(generated: Pick<GeneratedText, "content">): ExtractionResult {
  const text = generated.content.trim();

  // The whole reply is JSON but not an object (e.g. a list of drafts)
  const whole = tryParse(text);
  if (whole.ok && !isPlainObject(whole.value)) {
    return {
      success: false,
      code: "NON_RECORD_SHAPE",
      error: `Expected a JSON object, got ${Array.isArray(whole.value) ? "an array" : typeof whole.value}`,
      candidatesTried: 1,
    };
  }

  const starts = positionsOf(text, "{");
  const ends = positionsOf(text, "}");
  const matched = new Set<string>();
  let tried = 0;

  for (const start of starts) {
    const end = matchingBrace(text, start);
    if (end === -1) continue;
    matched.add(`${start}:${end}`);
    tried++;

    const draft = parseDraft(text.substring(start, end + 1));
    if (draft) {
      return { success: true, draft, candidatesTried: tried };
    }
  }

  let exhaustive = 0;
  for (const start of starts) {
    for (const end of ends) {
      if (end <= start || matched.has(`${start}:${end}`)) continue;
      if (exhaustive >= MAX_PARSE_ATTEMPTS) {
        return {
          success: false,
          code: "NO_RECORD_FOUND",
          error: `No email record found within ${MAX_PARSE_ATTEMPTS} candidates`,
          candidatesTried: tried,
        };
      }
      exhaustive++;
      tried++;

      const draft = parseDraft(text.substring(start, end + 1));
      if (draft) {
        return { success: true, draft, candidatesTried: tried };
      }
    }
  }

  return {
    success: false,
    code: "NO_RECORD_FOUND",
    error:
      starts.length === 0
        ? "Could not find a JSON object in model output"
        : `None of ${tried} candidate objects held subject, greeting, body, and closing as strings`,
    candidatesTried: tried,
  };
}

/**
 * Escapes literal newlines inside JSON string values. Models sometimes emit
 * raw line breaks in the body instead of \n, which JSON.parse rejects.
 */
export function sanitizeJsonNewlines(json: string): string {
  let result = "";
  let inString = false;
  let escape = false;

  for (let i = 0; i < json.length; i++) {
    const char = json[i];

    if (escape) {
      result += char;
      escape = false;
      continue;
    }

    if (char === "\\") {
      result += char;
      escape = true;
      continue;
    }

    if (char === '"') {
      inString = !inString;
      result += char;
      continue;
    }

    if (inString && (char === "\n" || char === "\r")) {
      result += "\\n";
      // \r\n is one break
      if (char === "\r" && json[i + 1] === "\n") {
        i++;
      }
      continue;
    }

    result += char;
  }

  return result;
}
