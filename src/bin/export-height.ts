#!/usr/bin/env tsx
import { hideBin } from "yargs/helpers";
import yargs from "yargs";
import { HeightExportReader } from "../adapters/height/HeightExportReader";
import { FileExportWriter } from "../adapters/files/FileExportWriter";
import { HeightExportService } from "../domain/services/ExportService";
import { loadConfig } from "../config";

const argv = yargs(hideBin(process.argv))
  .option("input-dir", {
    alias: "inputDir",
    type: "string",
    describe: "Height export directory (tasks.json, users.json, teams.json, statuses.json)",
  })
  .option("output", {
    type: "string",
    describe: "Output CSV path; parent_mapping.json is written beside it",
  })
  .option("use-height-ids", {
    alias: "useHeightIds",
    type: "boolean",
    describe: "Fill the ID column with Height IDs (T-123). Experimental",
  })
  .option("generate-both", {
    alias: "generateBoth",
    type: "boolean",
    describe: "Write one CSV with empty IDs and one <name>_with_ids CSV",
  })
  .help()
  .parseSync();

async function main() {
  const config = loadConfig({
    inputDir: argv.inputDir,
    output: argv.output,
    useHeightIds: argv.useHeightIds,
    generateBoth: argv.generateBoth,
  });

  console.log(`Loading data from ${config.export.inputDir}...`);
  const exporter = new HeightExportService(
    new HeightExportReader(config.export.inputDir),
    new FileExportWriter(),
    config.export
  );
  const summary = await exporter.run();

  console.log("\n" + "=".repeat(70));
  for (const csv of summary.csvFiles) {
    if (csv.useHeightIds) {
      console.log(`📄 CSV with Height IDs: ${csv.path}`);
      console.log("   → EXPERIMENTAL: test with a small subset first");
      console.log("   → If Linear ignores the IDs, use the standard CSV instead");
    } else {
      console.log(`📄 Standard CSV (empty IDs): ${csv.path}`);
      console.log("   → Linear assigns IDs on import");
      console.log("   → Run `npm run update-parents` afterwards to restore parents");
    }
  }
  console.log(`📋 Parent mapping: ${summary.mappingPath}`);
  console.log(`   → ${summary.relationshipCount} parent-child relationships`);
  console.log("=".repeat(70));
}

main().catch((err) => {
  console.error(err);
  process.exit(1);
});
