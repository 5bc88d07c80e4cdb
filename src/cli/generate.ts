#!/usr/bin/env node
import * as fs from "fs";
import * as path from "path";
import { config } from "dotenv";
import { z } from "zod/v4";
import { loadConfig } from "../lib/config";
import { createEmailPipeline, type PipelineOutcome } from "../lib/email";
import { ConsoleTransport, Logger } from "../lib/logging";
import { printMetadata, printOutcome } from "./display";

config({ path: path.resolve(process.cwd(), ".env.local") });

// ─── CLI argument parsing ─────────────────────────────────────────────────────
const args = process.argv.slice(2);
const verbose = args.includes("--verbose");
const json = args.includes("--json");
const fileIndex = args.indexOf("--file");
const filePath = fileIndex !== -1 ? args[fileIndex + 1] : undefined;
const positional = args.filter((arg, i) => !arg.startsWith("--") && (fileIndex === -1 || i !== fileIndex + 1));

const DescriptionListSchema = z.array(z.string());

function readDescriptions(): string[] {
  if (filePath) {
    const result = DescriptionListSchema.safeParse(
      JSON.parse(fs.readFileSync(path.resolve(process.cwd(), filePath), "utf8"))
    );
    if (!result.success) {
      console.error(`Error: ${filePath} must hold a JSON array of strings`);
      process.exit(1);
    }
    return result.data;
  }
  if (positional.length > 0) {
    return [positional.join(" ")];
  }
  console.error('Usage: npm run generate -- "<description>" | --file <descriptions.json> [--verbose] [--json]');
  process.exit(1);
}

async function main(): Promise<void> {
  const appConfig = loadConfig();
  const logger = new Logger({
    minLevel: verbose ? "debug" : appConfig.logLevel,
    component: "cli",
    transports: [new ConsoleTransport({ minLevel: "trace" })],
  });

  const { pipeline, modelSource } = createEmailPipeline(appConfig, logger);
  const descriptions = readDescriptions();

  if (!json) {
    console.log(`Provider: ${appConfig.generation.provider} (${appConfig.generation.model})`);
    console.log(`Intent model: ${modelSource.description}`);
    console.log(`Running ${descriptions.length} description(s)...`);
  }

  const outcomes: PipelineOutcome[] = [];
  for (const description of descriptions) {
    const outcome = await pipeline.process(description);
    outcomes.push(outcome);
    if (json) continue;

    console.log(`\n--- ${description.length > 70 ? `${description.substring(0, 70)}...` : description} ---`);
    printOutcome(outcome);
    if (verbose) printMetadata(outcome);
  }

  if (json) {
    console.log(JSON.stringify(outcomes, null, 2));
    return;
  }

  const accepted = outcomes.filter((o) => o.status === "ok").length;
  console.log(`\n\nResults: ${accepted}/${outcomes.length} drafts accepted.`);
}

main().catch((err) => {
  console.error("Fatal error:", err);
  process.exit(1);
});
