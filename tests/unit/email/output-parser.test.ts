import { extractEmailDraft, matchingBrace, sanitizeJsonNewlines } from "@/lib/email/output-parser";

const DRAFT = {
  subject: "Leave request for Friday",
  greeting: "Dear Ms. Rao,",
  body: "I would like to request leave on Friday.",
  closing: "Kind regards,",
};

const extract = (content: string) => extractEmailDraft({ content });

describe("extractEmailDraft", () => {
  it("parses a bare JSON record", () => {
    const result = extract(JSON.stringify(DRAFT));

    expect(result).toEqual({ success: true, draft: DRAFT, candidatesTried: 1 });
  });

  it("finds the record inside surrounding prose", () => {
    const result = extract(`Sure! Here is your email:\n${JSON.stringify(DRAFT)}\nLet me know if you need changes.`);

    expect(result.success).toBe(true);
    if (!result.success) return;
    expect(result.draft).toEqual(DRAFT);
  });

  it("finds the record inside a markdown code fence", () => {
    const result = extract("```json\n" + JSON.stringify(DRAFT, null, 2) + "\n```");

    expect(result.success).toBe(true);
    if (!result.success) return;
    expect(result.draft).toEqual(DRAFT);
  });

  it("skips a broken fragment that precedes a complete record", () => {
    const content = `{"subject": "draft one", "body": \n\nActually, here is the final version:\n${JSON.stringify(DRAFT)}`;

    const result = extract(content);

    expect(result.success).toBe(true);
    if (!result.success) return;
    expect(result.draft).toEqual(DRAFT);
  });

  it("skips a record that is missing fields in favour of a later complete one", () => {
    const content = `{"subject": "partial"} and then ${JSON.stringify(DRAFT)}`;

    const result = extract(content);

    expect(result.success).toBe(true);
    if (!result.success) return;
    expect(result.draft.subject).toBe("Leave request for Friday");
  });

  it("finds a record behind brace-heavy prose without exhausting the candidate budget", () => {
    const prose = Array.from({ length: 70 }, (_, i) => `{x${i}}`).join(" ");

    const result = extract(`${prose} ${JSON.stringify(DRAFT)}`);

    expect(result).toEqual({ success: true, draft: DRAFT, candidatesTried: 71 });
  });

  it("keeps braces that appear inside string values", () => {
    const draft = { ...DRAFT, body: "Please quote reference {A-7} in your reply." };

    const result = extract(`Here it is: ${JSON.stringify(draft)}`);

    expect(result).toEqual({ success: true, draft, candidatesTried: 1 });
  });

  it("ignores extra fields", () => {
    const result = extract(JSON.stringify({ ...DRAFT, signature: "Asha", tone: "formal" }));

    expect(result.success).toBe(true);
    if (!result.success) return;
    expect(result.draft).toEqual(DRAFT);
    expect(Object.keys(result.draft)).toEqual(["subject", "greeting", "body", "closing"]);
  });

  it("treats a list of records as malformed", () => {
    const result = extract(JSON.stringify([DRAFT, DRAFT]));

    expect(result).toEqual({
      success: false,
      code: "NON_RECORD_SHAPE",
      error: "Expected a JSON object, got an array",
      candidatesTried: 1,
    });
  });

  it("treats a bare JSON string as malformed", () => {
    const result = extract('"just a string"');

    expect(result.success).toBe(false);
    if (result.success) return;
    expect(result.code).toBe("NON_RECORD_SHAPE");
    expect(result.error).toBe("Expected a JSON object, got string");
  });

  it("rejects a record whose fields are not strings", () => {
    const result = extract(JSON.stringify({ ...DRAFT, body: ["line one", "line two"] }));

    expect(result.success).toBe(false);
    if (result.success) return;
    expect(result.code).toBe("NO_RECORD_FOUND");
  });

  it("reports plain prose as having no record", () => {
    const result = extract("I am sorry, I cannot help with that.");

    expect(result).toEqual({
      success: false,
      code: "NO_RECORD_FOUND",
      error: "Could not find a JSON object in model output",
      candidatesTried: 0,
    });
  });

  it("accepts literal newlines inside string values", () => {
    const content = '{"subject": "Hi there", "greeting": "Hello,", "body": "Line one.\nLine two.", "closing": "Thanks,"}';

    const result = extract(content);

    expect(result.success).toBe(true);
    if (!result.success) return;
    expect(result.draft.body).toBe("Line one.\nLine two.");
  });
});

describe("matchingBrace", () => {
  it("returns the depth-matched closing brace", () => {
    expect(matchingBrace('a {"b": {"c": 1}} d', 2)).toBe(16);
  });

  it("skips braces inside strings and escaped quotes", () => {
    expect(matchingBrace('{"a": "}\\"}"}', 0)).toBe(12);
  });

  it("returns -1 for an object that never closes", () => {
    expect(matchingBrace('{"a": {"b": 1}', 0)).toBe(-1);
  });
});

describe("sanitizeJsonNewlines", () => {
  it("escapes newlines only inside strings", () => {
    expect(sanitizeJsonNewlines('{\n"a": "x\r\ny"\n}')).toBe('{\n"a": "x\\ny"\n}');
  });

  it("leaves escaped quotes alone", () => {
    expect(sanitizeJsonNewlines('{"a": "say \\"hi\\"\nnow"}')).toBe('{"a": "say \\"hi\\"\\nnow"}');
  });
});
