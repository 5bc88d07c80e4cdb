import * as fs from "fs";
import * as path from "path";
import { config } from "dotenv";
import { loadConfig } from "../lib/config";
import { DatasetModelSource, IntentModel } from "../lib/classifier";

config({ path: path.resolve(process.cwd(), ".env.local") });

const args = process.argv.slice(2);
const outIndex = args.indexOf("--out");

async function main(): Promise<void> {
  const appConfig = loadConfig(process.env, { requireApiKey: false });
  const outPath = path.resolve(
    process.cwd(),
    outIndex !== -1 && args[outIndex + 1] ? args[outIndex + 1] : appConfig.paths.intentModel
  );

  const source = new DatasetModelSource(
    path.resolve(process.cwd(), appConfig.paths.intentDataset),
    path.resolve(process.cwd(), appConfig.paths.stopWords)
  );

  const started = Date.now();
  const artifact = await source.load();
  const model = new IntentModel(artifact);

  fs.mkdirSync(path.dirname(outPath), { recursive: true });
  fs.writeFileSync(outPath, JSON.stringify(artifact) + "\n");

  console.log(`Trained on ${artifact.trainedExamples} examples in ${Date.now() - started}ms`);
  console.log(`  Labels:      ${model.labels.length} (set ${model.labelSetVersion})`);
  console.log(`  Vocabulary:  ${artifact.vocabulary.length} features`);
  console.log(`  Written to:  ${outPath}`);
}

main().catch((err) => {
  console.error("Fatal error:", err);
  process.exit(1);
});
