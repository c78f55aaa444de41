export interface CsvOutput {
  path: string;
  useHeightIds: boolean;
  rowCount: number;
}

export interface ExportSummary {
  taskCount: number;
  teamCount: number;
  userCount: number;
  mappingPath: string;
  relationshipCount: number;
  csvFiles: CsvOutput[];
}
