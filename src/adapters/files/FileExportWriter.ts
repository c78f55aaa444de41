import { writeFile } from "node:fs/promises";
import type { ExportWriterPort } from "../../domain/ports/ExportWriterPort";
import {
  LINEAR_CSV_HEADERS,
  type LinearCsvRow,
} from "../../domain/models/LinearModels";
import type { ParentMapping } from "../../domain/models/MappingModels";
import { toCsv } from "../../utils/csv";

export class FileExportWriter implements ExportWriterPort {
  async writeCsv(path: string, rows: LinearCsvRow[]): Promise<void> {
    await writeFile(path, toCsv(LINEAR_CSV_HEADERS, rows), "utf-8");
  }

  async writeParentMapping(path: string, mapping: ParentMapping): Promise<void> {
    await writeFile(path, JSON.stringify(mapping, null, 2), "utf-8");
  }
}
