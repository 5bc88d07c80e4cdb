import type { ILogger } from "../logging";

export type PipelineStage =
  | "input"
  | "classification"
  | "controls"
  | "generation"
  | "reprompt"
  | "extraction"
  | "validation"
  | "complete";

export interface StageEvent {
  correlationId: string;
  stage: PipelineStage;
  outcome: string;
  latencyMs: number;
  detail?: Record<string, unknown>;
}

/** Receives one event per stage transition. Retention is the sink's concern. */
export interface AuditSink {
  record(event: StageEvent): void;
}

export class LoggerAuditSink implements AuditSink {
  private logger: ILogger;

  constructor(logger: ILogger) {
    this.logger = logger.child({ component: "audit" });
  }

  record(event: StageEvent): void {
    this.logger.child({ correlationId: event.correlationId }).info(`${event.stage}: ${event.outcome}`, {
      stage: event.stage,
      outcome: event.outcome,
      latencyMs: event.latencyMs,
      ...event.detail,
    });
  }
}
