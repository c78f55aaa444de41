import type { LinearCsvRow } from "../models/LinearModels";
import type { ParentMapping } from "../models/MappingModels";

export interface ExportWriterPort {
  writeCsv(path: string, rows: LinearCsvRow[]): Promise<void>;
  writeParentMapping(path: string, mapping: ParentMapping): Promise<void>;
}
