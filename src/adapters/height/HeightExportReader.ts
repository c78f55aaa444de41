import { readFile } from "node:fs/promises";
import path from "node:path";
import type {
  HeightExport,
  HeightStatus,
  HeightTask,
  HeightTeam,
  HeightUser,
} from "../../domain/models/HeightModels";
import type { HeightExportPort } from "../../domain/ports/HeightExportPort";

export const HEIGHT_EXPORT_FILES = {
  tasks: "tasks.json",
  users: "users.json",
  teams: "teams.json",
  statuses: "statuses.json",
} as const;

type Guard<T> = (value: unknown) => value is T;

function isObject(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function isOptionalString(value: unknown): boolean {
  return value === undefined || value === null || typeof value === "string";
}

function isOptionalStringArray(value: unknown): boolean {
  return (
    value === undefined ||
    (Array.isArray(value) && value.every((v) => typeof v === "string"))
  );
}

const OPTIONAL_TASK_STRINGS = [
  "description",
  "createdUserId",
  "parentTaskId",
  "status",
  "createdAt",
  "lastActivityAt",
  "startedAt",
  "completedAt",
] as const;

function hasTaskShape(v: Record<string, unknown>): boolean {
  const fields = v.fields;
  return (
    typeof v.id === "string" &&
    typeof v.index === "number" &&
    typeof v.name === "string" &&
    OPTIONAL_TASK_STRINGS.every((key) => isOptionalString(v[key])) &&
    isOptionalStringArray(v.teamIds) &&
    isOptionalStringArray(v.assigneesIds) &&
    (fields === undefined || (Array.isArray(fields) && fields.every(isObject)))
  );
}

const isTask: Guard<HeightTask> = (v): v is HeightTask =>
  isObject(v) && hasTaskShape(v);

const isUser: Guard<HeightUser> = (v): v is HeightUser =>
  isObject(v) && typeof v.id === "string" && isOptionalString(v.email);

const isNamed = (v: unknown): v is HeightTeam & HeightStatus =>
  isObject(v) && typeof v.id === "string" && typeof v.name === "string";

/**
 * Reads the fixed-name JSON files of a Height workspace export. Any missing
 * file or malformed record aborts the load.
 */
export class HeightExportReader implements HeightExportPort {
  constructor(private inputDir: string) {}

  async loadExport(): Promise<HeightExport> {
    return {
      tasks: await this.loadRecords(HEIGHT_EXPORT_FILES.tasks, isTask),
      users: await this.loadRecords(HEIGHT_EXPORT_FILES.users, isUser),
      teams: await this.loadRecords(HEIGHT_EXPORT_FILES.teams, isNamed),
      statuses: await this.loadRecords(HEIGHT_EXPORT_FILES.statuses, isNamed),
    };
  }

  private async readJson(filename: string): Promise<unknown> {
    const file = path.join(this.inputDir, filename);
    let raw: string;
    try {
      raw = await readFile(file, "utf-8");
    } catch (err) {
      const reason = err instanceof Error ? err.message : String(err);
      throw new Error(`Cannot read Height export file ${file}: ${reason}`);
    }
    try {
      return JSON.parse(raw);
    } catch {
      throw new Error(`Invalid JSON in Height export file ${file}`);
    }
  }

  private async loadRecords<T>(filename: string, guard: Guard<T>): Promise<T[]> {
    const data = await this.readJson(filename);
    if (!Array.isArray(data)) {
      throw new Error(`Expected a JSON array in ${filename}`);
    }

    const records: T[] = [];
    data.forEach((entry: unknown, i) => {
      if (!guard(entry)) {
        throw new Error(`Malformed record at index ${i} in ${filename}`);
      }
      records.push(entry);
    });
    return records;
  }
}
