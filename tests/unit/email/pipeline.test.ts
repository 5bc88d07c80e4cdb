import * as path from "path";
import { DatasetModelSource, IntentClassifier, type ClassificationResult } from "@/lib/classifier";
import type { StageEvent } from "@/lib/email/audit";
import { FallbackTemplates } from "@/lib/email/fallback-templates";
import { EmailPipeline, type EmailPipelineDeps } from "@/lib/email/pipeline";
import { CONSERVATIVE_GUIDANCE } from "@/lib/email/prompts";
import type { EmailDraft } from "@/lib/email/types";
import { GenerationClient } from "@/lib/llm/generation-client";
import { ProviderError } from "@/lib/llm/errors";
import type {
  GeneratedTextSource,
  GenerateOptions,
  GenerationResult,
  LLMProvider,
  LLMRequest,
} from "@/lib/llm/types";
import { Logger } from "@/lib/logging";
import { MemoryTransport } from "../../helpers/memory-transport";

const DATA_DIR = path.resolve(__dirname, "../../../data");

const DRAFT: EmailDraft = {
  subject: "Recommendations on the college fee policy",
  greeting: "Dear Dean,",
  body:
    "I am writing to share my recommendations on the college fee policy following our recent review. " +
    "I would welcome the opportunity to discuss them with you at a convenient time.",
  closing: "Yours sincerely,",
};

function generated(content: string, source: GeneratedTextSource = "generated"): GenerationResult {
  return {
    success: true,
    text: {
      content,
      source,
      model: source === "generated" ? "mock-model" : "fallback-template",
      latencyMs: 1,
      attempts: [{ attempt: 0, provider: "mock", model: "mock-model", latencyMs: 1, success: true }],
    },
  };
}

function fixedClassifier(label: ClassificationResult["label"], confidence: number) {
  return { classify: jest.fn(async (): Promise<ClassificationResult> => ({ label, confidence, probabilities: {} })) };
}

function mockGenerator(...results: GenerationResult[]) {
  const generate = jest.fn(async (_request: LLMRequest, _options: GenerateOptions): Promise<GenerationResult> => {
    const next = results.shift();
    if (!next) throw new Error("unexpected generate call");
    return next;
  });
  return { generate };
}

function createPipeline(overrides: Partial<EmailPipelineDeps> = {}) {
  const events: StageEvent[] = [];
  const transport = new MemoryTransport();
  const deps: EmailPipelineDeps = {
    classifier: fixedClassifier("consultant_to_institution", 0.9),
    generator: mockGenerator(generated(JSON.stringify(DRAFT))),
    audit: { record: (event) => events.push(event) },
    logger: new Logger({ minLevel: "trace", component: "test", transports: [transport] }),
    ...overrides,
  };
  return { pipeline: new EmailPipeline(deps), events, transport, deps };
}

const DESCRIPTION = "I am a consultant advising a college on fee policy, write to the dean";

describe("EmailPipeline", () => {
  describe("input bounds", () => {
    it("rejects a description shorter than 10 characters after trimming", async () => {
      const classifier = fixedClassifier("general", 0.9);
      const { pipeline } = createPipeline({ classifier });

      const outcome = await pipeline.process("   hello   ", "req-1");

      expect(outcome).toMatchObject({
        status: "InputRejected",
        code: "DESCRIPTION_TOO_SHORT",
        metadata: { correlationId: "req-1" },
      });
      expect(classifier.classify).not.toHaveBeenCalled();
    });

    it("rejects a description longer than 500 characters", async () => {
      const { pipeline } = createPipeline();

      const outcome = await pipeline.process("x".repeat(501), "req-2");

      expect(outcome).toMatchObject({ status: "InputRejected", code: "DESCRIPTION_TOO_LONG" });
    });

    it("accepts exactly 10 and exactly 500 characters", async () => {
      const first = createPipeline();
      const second = createPipeline();

      expect((await first.pipeline.process("a".repeat(10))).status).toBe("ok");
      expect((await second.pipeline.process("a".repeat(500))).status).toBe("ok");
    });
  });

  describe("with the dataset-trained classifier", () => {
    let classifier: IntentClassifier;

    beforeAll(async () => {
      classifier = new IntentClassifier(
        new DatasetModelSource(path.join(DATA_DIR, "intent-dataset.json"), path.join(DATA_DIR, "stopwords.json"))
      );
      await classifier.warmUp();
    });

    it("does not write a consultant's request as a student", async () => {
      const generator = mockGenerator(generated(JSON.stringify(DRAFT)));
      const { pipeline, events } = createPipeline({ classifier, generator });

      const outcome = await pipeline.process(DESCRIPTION, "scenario-a");

      expect(outcome.status).toBe("ok");
      const controls = events.find((e) => e.stage === "controls");
      expect(controls?.detail?.senderRole).not.toBe("student");
      const request: LLMRequest = generator.generate.mock.calls[0][0];
      expect(request.systemPrompt).not.toContain("Sender role: student");
    });

    it("gives a vague request low confidence and conservative guidance", async () => {
      const generator = mockGenerator(generated(JSON.stringify(DRAFT)));
      const { pipeline } = createPipeline({ classifier, generator });

      const outcome = await pipeline.process("write an email", "scenario-b");

      expect(outcome.status).toBe("ok");
      if (outcome.status !== "ok") return;
      expect(outcome.metadata.confidenceTier).toBe("low");
      expect(outcome.metadata.intent).toBe("general");
      const request: LLMRequest = generator.generate.mock.calls[0][0];
      expect(request.systemPrompt).toContain(CONSERVATIVE_GUIDANCE);
      expect(request.systemPrompt).not.toContain("Sender role:");
    });
  });

  describe("when the generation service is down", () => {
    it("serves the domain fallback template after every retry fails", async () => {
      const provider: LLMProvider & { call: jest.Mock } = {
        name: "mock",
        call: jest.fn(async () => {
          throw new ProviderError("mock", "mock API error: Service Unavailable", { status: 503, transient: true });
        }),
      };
      const fallbacks = FallbackTemplates.fromFile(path.join(DATA_DIR, "fallback-templates.json"));
      const generator = new GenerationClient(
        { provider, maxRetries: 2, baseDelayMs: 500, attemptTimeoutMs: 8000 },
        { fallbacks, sleep: async () => undefined }
      );
      const { pipeline, transport } = createPipeline({
        classifier: fixedClassifier("hr_to_candidate", 0.9),
        generator,
      });

      const outcome = await pipeline.process("tell the candidate the interview moved to Monday", "scenario-c");

      expect(provider.call).toHaveBeenCalledTimes(3);
      expect(outcome.status).toBe("ok");
      if (outcome.status !== "ok") return;
      expect(outcome.draft).toEqual(fallbacks.template("hr"));
      expect(outcome.metadata).toMatchObject({
        correlationId: "scenario-c",
        domain: "hr",
        fallbackUsed: true,
        reprompted: false,
        generationAttempts: 3,
      });
      expect(transport.messages("error")).toContain("Served fallback template; generation unavailable");
    });

    it("reports a permanent provider error as GenerationUnavailable", async () => {
      const generator = mockGenerator({
        success: false,
        code: "PERMANENT_PROVIDER_ERROR",
        error: "mock API error: invalid key",
        attempts: [],
        latencyMs: 2,
      });
      const { pipeline } = createPipeline({ generator });

      const outcome = await pipeline.process(DESCRIPTION, "req-3");

      expect(outcome).toMatchObject({
        status: "GenerationUnavailable",
        code: "PERMANENT_PROVIDER_ERROR",
        message: "mock API error: invalid key",
        metadata: { correlationId: "req-3" },
      });
    });

    it("reports a missing fallback template as GenerationUnavailable", async () => {
      const generator = mockGenerator({
        success: false,
        code: "FALLBACK_UNAVAILABLE",
        error: 'No fallback template for domain "education"',
        attempts: [],
        latencyMs: 2,
      });
      const { pipeline } = createPipeline({ generator });

      expect(await pipeline.process(DESCRIPTION)).toMatchObject({
        status: "GenerationUnavailable",
        code: "FALLBACK_UNAVAILABLE",
      });
    });

    it("maps a generator that throws to GenerationUnavailable", async () => {
      const generator = {
        generate: jest.fn(async (): Promise<GenerationResult> => {
          throw new Error("socket hang up");
        }),
      };
      const { pipeline } = createPipeline({ generator });

      expect(await pipeline.process(DESCRIPTION)).toMatchObject({
        status: "GenerationUnavailable",
        message: "socket hang up",
      });
    });
  });

  it("passes the domain and request deadline to the generator", async () => {
    const generator = mockGenerator(generated(JSON.stringify(DRAFT)));
    const { pipeline } = createPipeline({ generator, now: () => 1_000, requestBudgetMs: 5_000 });

    await pipeline.process(DESCRIPTION);

    expect(generator.generate.mock.calls[0][1]).toEqual({ domain: "education", deadlineAt: 6_000 });
  });

  describe("malformed output", () => {
    it("re-prompts once and accepts a corrected reply", async () => {
      const generator = mockGenerator(
        generated("Sure, here is a draft: Dear Dean, ..."),
        generated(JSON.stringify(DRAFT))
      );
      const { pipeline, events } = createPipeline({ generator });

      const outcome = await pipeline.process(DESCRIPTION, "req-4");

      expect(generator.generate).toHaveBeenCalledTimes(2);
      const repair: LLMRequest = generator.generate.mock.calls[1][0];
      expect(repair.temperature).toBe(0);
      expect(repair.systemPrompt).toContain("## Previous Reply Rejected");
      expect(outcome).toMatchObject({
        status: "ok",
        draft: DRAFT,
        metadata: { reprompted: true, generationAttempts: 2 },
      });
      expect(events.map((e) => e.stage)).toEqual([
        "input",
        "classification",
        "controls",
        "generation",
        "extraction",
        "reprompt",
        "extraction",
        "validation",
        "complete",
      ]);
    });

    it("returns MalformedOutput when the re-prompt is also unusable", async () => {
      const generator = mockGenerator(generated("no json here"), generated(JSON.stringify([DRAFT])));
      const { pipeline } = createPipeline({ generator });

      const outcome = await pipeline.process(DESCRIPTION);

      expect(generator.generate).toHaveBeenCalledTimes(2);
      expect(outcome).toMatchObject({
        status: "MalformedOutput",
        code: "NON_RECORD_SHAPE",
        message: "Expected a JSON object, got an array",
      });
    });

    it("does not re-prompt for fallback text", async () => {
      const generator = mockGenerator(generated("not a record", "fallback"));
      const { pipeline } = createPipeline({ generator });

      const outcome = await pipeline.process(DESCRIPTION);

      expect(generator.generate).toHaveBeenCalledTimes(1);
      expect(outcome).toMatchObject({ status: "MalformedOutput", code: "NO_RECORD_FOUND" });
    });

    it("returns GenerationUnavailable when the re-prompt hits a permanent error", async () => {
      const generator = mockGenerator(generated("garbage"), {
        success: false,
        code: "PERMANENT_PROVIDER_ERROR",
        error: "mock API error: forbidden",
        attempts: [],
        latencyMs: 1,
      });
      const { pipeline } = createPipeline({ generator });

      expect(await pipeline.process(DESCRIPTION)).toMatchObject({
        status: "GenerationUnavailable",
        code: "PERMANENT_PROVIDER_ERROR",
      });
    });
  });

  it("returns the validator's reason unchanged", async () => {
    const generator = mockGenerator(
      generated(JSON.stringify({ ...DRAFT, body: `${DRAFT.body} Please contact [anything].` }))
    );
    const { pipeline } = createPipeline({ generator });

    const outcome = await pipeline.process(DESCRIPTION, "req-5");

    expect(outcome).toEqual({
      status: "OutputRejected",
      reason: { code: "PLACEHOLDER_DETECTED", field: "body", detail: "unresolved placeholder [anything]" },
      metadata: { correlationId: "req-5", latencyMs: expect.any(Number) },
    });
  });

  it("returns ok with full metadata and one audit event per stage", async () => {
    const { pipeline, events } = createPipeline();

    const outcome = await pipeline.process(DESCRIPTION, "req-6");

    expect(outcome).toEqual({
      status: "ok",
      draft: DRAFT,
      metadata: {
        correlationId: "req-6",
        latencyMs: expect.any(Number),
        intent: "consultant_to_institution",
        confidence: 0.9,
        confidenceTier: "high",
        domain: "education",
        fallbackUsed: false,
        warningsSuppressed: false,
        warnings: [],
        generationAttempts: 1,
        reprompted: false,
      },
    });
    expect(events.map((e) => e.stage)).toEqual([
      "input",
      "classification",
      "controls",
      "generation",
      "extraction",
      "validation",
      "complete",
    ]);
    expect(events.every((e) => e.correlationId === "req-6")).toBe(true);
    expect(events[events.length - 1].outcome).toBe("ok");
  });

  it("reports suppressed placeholder warnings for low-confidence drafts", async () => {
    const generator = mockGenerator(generated(JSON.stringify({ ...DRAFT, closing: "Regards, [Your Name]" })));
    const { pipeline } = createPipeline({ classifier: fixedClassifier("general", 0.3), generator });

    const outcome = await pipeline.process("send a note about the meeting");

    expect(outcome).toMatchObject({
      status: "ok",
      metadata: { warningsSuppressed: true, warnings: ["placeholder [Your Name] left in closing"] },
    });
  });

  it("continues with the general defaults when the classifier throws", async () => {
    const classifier = {
      classify: jest.fn(async (): Promise<ClassificationResult> => {
        throw new Error("model exploded");
      }),
    };
    const { pipeline } = createPipeline({ classifier });

    const outcome = await pipeline.process(DESCRIPTION);

    expect(outcome).toMatchObject({
      status: "ok",
      metadata: { intent: "general", confidence: 0, confidenceTier: "low", domain: "general" },
    });
  });

  it("keeps going when the audit sink fails", async () => {
    const { pipeline, transport } = createPipeline({
      audit: {
        record: () => {
          throw new Error("audit store offline");
        },
      },
    });

    const outcome = await pipeline.process(DESCRIPTION);

    expect(outcome.status).toBe("ok");
    expect(transport.messages("error")).toContain("Audit sink failed");
  });

  it("generates a correlation id when none is given", async () => {
    const { pipeline } = createPipeline();

    const outcome = await pipeline.process(DESCRIPTION);

    expect(outcome.metadata.correlationId).toMatch(/^[0-9a-f]{8}-[0-9a-f]{4}-4[0-9a-f]{3}-[89ab][0-9a-f]{3}-[0-9a-f]{12}$/);
  });
});
