import type { HeightExport } from "../models/HeightModels";

export interface HeightExportPort {
  loadExport(): Promise<HeightExport>;
}
