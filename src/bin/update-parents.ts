#!/usr/bin/env tsx
import { hideBin } from "yargs/helpers";
import yargs from "yargs";
import { LinearClient } from "../adapters/linear/LinearClient";
import { LinearAdapter } from "../adapters/linear/LinearAdapter";
import { DryRunLinearAdapter } from "../adapters/linear/DryRunLinearAdapter";
import { InquirerConfirm } from "../adapters/prompt/InquirerConfirm";
import { loadParentMapping } from "../adapters/files/parentMappingFile";
import { ParentRelationshipService } from "../domain/services/ParentRelationshipService";
import { loadConfig, requireLinearConfig } from "../config";

const argv = yargs(hideBin(process.argv))
  .option("mapping", {
    type: "string",
    describe: "Child → parent JSON written by the exporter",
  })
  .option("team", {
    type: "string",
    describe: "Only consider issues of this Linear team key (e.g. ENG)",
  })
  .option("page-size", {
    alias: "pageSize",
    type: "number",
    describe: "Issues fetched per GraphQL page",
  })
  .option("dry-run", {
    alias: "dryRun",
    type: "boolean",
    default: false,
    describe: "Compute and log updates without calling issueUpdate",
  })
  .option("yes", {
    alias: "y",
    type: "boolean",
    default: false,
    describe: "Skip the confirmation prompt",
  })
  .help()
  .parseSync();

async function main() {
  const config = loadConfig({
    mapping: argv.mapping,
    team: argv.team,
    pageSize: argv.pageSize,
    dryRun: argv.dryRun,
    yes: argv.yes,
  });
  const linearConfig = requireLinearConfig(config);

  const mapping = await loadParentMapping(config.relationships.mappingPath);
  console.log(
    `✓ Loaded ${Object.keys(mapping).length} parent-child relationships from ${config.relationships.mappingPath}`
  );

  const adapter = new LinearAdapter(new LinearClient(linearConfig));
  const linearPort = config.relationships.dryRun
    ? new DryRunLinearAdapter(adapter)
    : adapter;

  const updater = new ParentRelationshipService(linearPort, new InquirerConfirm(), {
    teamKey: linearConfig.teamKey,
    assumeYes: config.relationships.assumeYes,
  });
  const report = await updater.reconcile(mapping);

  if (report.summary && report.summary.failed > 0) {
    console.error(
      `${report.summary.failed} updates failed; rerun to retry them (completed ones are skipped).`
    );
    process.exitCode = 1;
  }
}

main().catch((err) => {
  console.error(err);
  process.exit(1);
});
