import { ConsoleTransport, Logger, isLogLevel, type LogEntry } from "@/lib/logging";
import { MemoryTransport } from "../../helpers/memory-transport";

function createLogger(minLevel: "trace" | "info" | "warn" = "trace") {
  const transport = new MemoryTransport();
  const logger = new Logger({ minLevel, component: "test", transports: [transport] });
  return { logger, transport };
}

describe("Logger", () => {
  it("drops entries below the minimum level", () => {
    const { logger, transport } = createLogger("warn");

    logger.debug("hidden");
    logger.info("hidden too");
    logger.warn("shown");
    logger.error("also shown");

    expect(transport.messages()).toEqual(["shown", "also shown"]);
  });

  it("respects each transport's own minimum level", () => {
    const errorsOnly = new MemoryTransport("error");
    const logger = new Logger({ minLevel: "trace", component: "test", transports: [errorsOnly] });

    logger.info("info");
    logger.error("error");

    expect(errorsOnly.messages()).toEqual(["error"]);
  });

  it("carries component and correlation id into child loggers", () => {
    const { logger, transport } = createLogger();

    logger.child({ component: "pipeline" }).child({ correlationId: "req-1" }).info("hello");

    expect(transport.entries[0]).toMatchObject({
      level: "info",
      component: "pipeline",
      correlationId: "req-1",
      message: "hello",
    });
  });

  it("redacts sensitive keys, including nested ones", () => {
    const { logger, transport } = createLogger();

    logger.info("call", {
      apiKey: "test-secret",
      description: "ask my manager for leave",
      attempt: 1,
      request: { systemPrompt: "rules", maxTokens: 600 },
    });

    expect(transport.entries[0].data).toEqual({
      apiKey: "[REDACTED]",
      description: "[REDACTED]",
      attempt: 1,
      request: { systemPrompt: "[REDACTED]", maxTokens: 600 },
    });
  });

  it("serialises errors", () => {
    const { logger, transport } = createLogger();

    logger.error("failed", new RangeError("out of range"));
    logger.error("failed again", "plain string");

    expect(transport.entries[0].error).toMatchObject({ name: "RangeError", message: "out of range" });
    expect(transport.entries[1].error).toEqual({ name: "Unknown", message: "plain string" });
  });

  it("keeps logging when a transport throws", () => {
    const broken = { name: "broken", minLevel: "trace" as const, log: jest.fn(() => { throw new Error("disk full"); }) };
    const working = new MemoryTransport();
    const logger = new Logger({ minLevel: "trace", component: "test", transports: [broken, working] });
    const consoleError = jest.spyOn(console, "error").mockImplementation(() => undefined);

    logger.info("still delivered");

    expect(working.messages()).toEqual(["still delivered"]);
    expect(consoleError).toHaveBeenCalledTimes(1);
    consoleError.mockRestore();
  });
});

describe("isLogLevel", () => {
  it("accepts known levels only", () => {
    expect(isLogLevel("warn")).toBe(true);
    expect(isLogLevel("verbose")).toBe(false);
  });
});

describe("ConsoleTransport", () => {
  const entry: LogEntry = {
    timestamp: "2026-01-02T03:04:05.678Z",
    level: "info",
    component: "pipeline",
    correlationId: "abcdefgh-1234",
    message: "Draft accepted",
    data: { status: "ok" },
  };

  it("formats a readable line without colours", () => {
    const transport = new ConsoleTransport({ colors: false });

    expect(transport.format(entry)).toBe(
      '03:04:05.678 INF [pipeline] (abcdefgh) Draft accepted {"status":"ok"}'
    );
  });

  it("formats one JSON object per line in json mode", () => {
    const transport = new ConsoleTransport({ json: true });

    expect(JSON.parse(transport.format(entry))).toEqual(entry);
  });
});
