/**
 * Shared display helpers for CLI tools.
 */

import type { PipelineOutcome } from "../lib/email";

// ─── Draft ───────────────────────────────────────────────────────────────────

export function printOutcome(outcome: PipelineOutcome, indent = "  "): void {
  console.log(`${indent}Status:      ${outcome.status}`);

  switch (outcome.status) {
    case "ok": {
      const m = outcome.metadata;
      console.log(`${indent}Intent:      ${m.intent} (${m.confidence.toFixed(3)}, ${m.confidenceTier})`);
      console.log(`${indent}Domain:      ${m.domain}`);
      if (m.fallbackUsed) console.log(`${indent}Fallback:    template served`);
      if (m.reprompted) console.log(`${indent}Re-prompted: yes`);
      for (const warning of m.warnings) {
        console.log(`${indent}Warning:     ${warning}`);
      }
      console.log();
      console.log(`${indent}Subject: ${outcome.draft.subject}`);
      console.log();
      console.log(`${indent}${outcome.draft.greeting}`);
      console.log();
      outcome.draft.body.split("\n").forEach((line) => {
        console.log(`${indent}${line}`);
      });
      console.log();
      console.log(`${indent}${outcome.draft.closing}`);
      break;
    }
    case "OutputRejected":
      console.log(`${indent}Reason:      ${outcome.reason.code}${outcome.reason.field ? ` (${outcome.reason.field})` : ""}`);
      console.log(`${indent}Detail:      ${outcome.reason.detail}`);
      break;
    default:
      console.log(`${indent}Code:        ${outcome.code}`);
      console.log(`${indent}Message:     ${outcome.message}`);
  }
}

// ─── Metadata ────────────────────────────────────────────────────────────────

export function printMetadata(outcome: PipelineOutcome, indent = "  "): void {
  console.log(`${indent}Correlation: ${outcome.metadata.correlationId}`);
  console.log(`${indent}Latency:     ${outcome.metadata.latencyMs}ms`);
  if (outcome.status === "ok") {
    console.log(`${indent}Attempts:    ${outcome.metadata.generationAttempts}`);
  }
}
