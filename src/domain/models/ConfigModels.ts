import type { StatusMap } from "./MappingModels";

export interface ExportConfig {
  inputDir: string;
  outputPath: string;
  useHeightIds: boolean;
  generateBoth: boolean;
  statusMap: StatusMap;
  priorityFieldTemplateIds: string[];
}

export interface LinearConfig {
  apiUrl: string;
  apiKey: string;
  teamKey?: string;
  pageSize: number;
}

export interface RelationshipConfig {
  mappingPath: string;
  dryRun: boolean;
  assumeYes: boolean;
}

export interface MigrationConfig {
  export: ExportConfig;
  linear: Omit<LinearConfig, "apiKey"> & { apiKey?: string };
  relationships: RelationshipConfig;
}
