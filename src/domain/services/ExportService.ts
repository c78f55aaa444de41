import path from "node:path";
import type { HeightExportPort } from "../ports/HeightExportPort";
import type { ExportWriterPort } from "../ports/ExportWriterPort";
import type { CsvOutput, ExportSummary } from "../models/ExportSummary";
import type { StatusMap } from "../models/MappingModels";
import {
  buildLookups,
  generateParentMapping,
  transformTask,
} from "./TaskTransformer";

export const PARENT_MAPPING_FILENAME = "parent_mapping.json";

export interface HeightExportOptions {
  outputPath: string;
  useHeightIds: boolean;
  generateBoth: boolean;
  statusMap: StatusMap;
  priorityFieldTemplateIds: string[];
}

export function withIdsPath(outputPath: string): string {
  const { dir, name, ext } = path.parse(outputPath);
  return path.join(dir, `${name}_with_ids${ext}`);
}

export function parentMappingPath(outputPath: string): string {
  return path.join(path.dirname(outputPath), PARENT_MAPPING_FILENAME);
}

export class HeightExportService {
  constructor(
    private height: HeightExportPort,
    private writer: ExportWriterPort,
    private opts: HeightExportOptions
  ) {}

  /** Which CSV files to write, and whether each carries Height IDs. */
  plannedOutputs(): Array<{ path: string; useHeightIds: boolean }> {
    if (this.opts.generateBoth) {
      return [
        { path: this.opts.outputPath, useHeightIds: false },
        { path: withIdsPath(this.opts.outputPath), useHeightIds: true },
      ];
    }
    return [{ path: this.opts.outputPath, useHeightIds: this.opts.useHeightIds }];
  }

  /**
   * Load the Height export, write the parent mapping, then one CSV per
   * planned output.
   */
  async run(): Promise<ExportSummary> {
    const data = await this.height.loadExport();
    console.log(
      `Loaded ${data.tasks.length} tasks, ${data.teams.length} teams, ${data.users.length} users`
    );

    const lookups = buildLookups(data);

    const mapping = generateParentMapping(data.tasks, lookups);
    const mappingPath = parentMappingPath(this.opts.outputPath);
    await this.writer.writeParentMapping(mappingPath, mapping);
    const relationshipCount = Object.keys(mapping).length;
    console.log(
      `✓ Created parent mapping with ${relationshipCount} relationships at ${mappingPath}`
    );

    const csvFiles: CsvOutput[] = [];
    for (const output of this.plannedOutputs()) {
      const rows = data.tasks.map((task) =>
        transformTask(task, lookups, {
          statusMap: this.opts.statusMap,
          priorityFieldTemplateIds: this.opts.priorityFieldTemplateIds,
          useHeightIds: output.useHeightIds,
        })
      );
      await this.writer.writeCsv(output.path, rows);
      console.log(`✓ Created ${output.path} with ${rows.length} tasks`);
      csvFiles.push({ ...output, rowCount: rows.length });
    }

    return {
      taskCount: data.tasks.length,
      teamCount: data.teams.length,
      userCount: data.users.length,
      mappingPath,
      relationshipCount,
      csvFiles,
    };
  }
}
