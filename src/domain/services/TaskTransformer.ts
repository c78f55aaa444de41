import type { HeightExport, HeightTask } from "../models/HeightModels";
import type { LinearCsvRow } from "../models/LinearModels";
import type {
  ExportLookups,
  ParentMapping,
  StatusMap,
} from "../models/MappingModels";
import { cleanDescription, extractPriority } from "../../utils/heightFields";
import { parseHeightDate, toLinearDate } from "../../utils/linearDate";
import {
  buildTraceabilityTag,
  toHeightId,
} from "../../utils/traceabilityTag";

export const DEFAULT_STATUS_MAP: StatusMap = {
  backLog: "Backlog",
  done: "Done",
  inProgress: "In Progress",
  Open: "Open",
  Closed: "Done",
  // Workspace statuses that export as UUIDs.
  "c79706e5-618d-4c3f-a31c-38e2b45c3afb": "Backlog",
  "1719cfde-fdf7-4d15-83bd-6bc1e6f46b3b": "Todo",
  "28e2b389-fb49-4595-a5f6-c338553dbbc2": "Todo",
  "1eb8b8d9-9f0a-4f31-9d19-b01f841a9ffb": "Todo",
  "7aa06750-ed00-4d8d-80a1-9946317cd01a": "Todo",
  "877844db-f8be-45b2-ba3b-606c93871542": "Todo",
  "62e6162e-c5af-4f73-863d-e7c1f9fb03cc": "Todo",
  "d6a747d1-a448-440f-973a-129731f79dd3": "Todo",
  "ce2bb19b-bdfb-41e2-8562-14a65e26e0db": "Todo",
  "4e1f732d-5694-4af4-befb-487d982c66da": "Todo",
};

/** Linear's built-in workflow states. */
export const LINEAR_STATUSES = [
  "Backlog",
  "Todo",
  "In Progress",
  "In Review",
  "Done",
  "Canceled",
  "Duplicate",
] as const;

/** Where an unmapped status that matches no Linear state lands. */
export const FALLBACK_STATUS = "Todo";

export interface TransformOptions {
  statusMap: StatusMap;
  priorityFieldTemplateIds: string[];
  useHeightIds: boolean;
}

export function buildLookups(data: HeightExport): ExportLookups {
  const teams = new Map(data.teams.map((t) => [t.id, t.name]));

  const userEmails = new Map<string, string>();
  for (const user of data.users) {
    if (user.email) userEmails.set(user.id, user.email);
  }

  const heightIds = new Map(data.tasks.map((t) => [t.id, toHeightId(t.index)]));
  const statusNames = new Map(data.statuses.map((s) => [s.id, s.name]));

  return { teams, userEmails, heightIds, statusNames };
}

function mapStatus(statusMap: StatusMap, status: string): string | undefined {
  return Object.hasOwn(statusMap, status) ? statusMap[status] : undefined;
}

const statusKey = (status: string) => status.replace(/[\s_-]/g, "").toLowerCase();

function toLinearStatus(status: string): string {
  const key = statusKey(status);
  return LINEAR_STATUSES.find((s) => statusKey(s) === key) ?? FALLBACK_STATUS;
}

export function resolveStatus(
  task: HeightTask,
  lookups: ExportLookups,
  statusMap: StatusMap
): string {
  // Linear rejects a completion date on anything that isn't done.
  if (task.completedAt) return "Done";

  const status = task.status ?? "";
  const mapped = mapStatus(statusMap, status);
  if (mapped) return mapped;

  // Map entries are taken as written; anything else is fitted to Linear's states.
  const name = lookups.statusNames.get(status);
  if (name) return mapStatus(statusMap, name) ?? toLinearStatus(name);

  return toLinearStatus(status);
}

function withTaskContext<T>(heightId: string, field: string, fn: () => T): T {
  try {
    return fn();
  } catch (err) {
    const message = err instanceof Error ? err.message : String(err);
    throw new Error(`${heightId} ${field}: ${message}`);
  }
}

/**
 * Completion timestamps earlier than creation are rejected by Linear, so
 * fall back to the last activity date for those.
 */
function completedDate(task: HeightTask, heightId: string): string | undefined {
  const { completedAt, createdAt } = task;
  if (!completedAt || !createdAt) return completedAt ?? undefined;

  const completed = withTaskContext(heightId, "completedAt", () =>
    parseHeightDate(completedAt)
  );
  const created = withTaskContext(heightId, "createdAt", () =>
    parseHeightDate(createdAt)
  );
  if (completed.getTime() < created.getTime()) {
    return task.lastActivityAt ?? completedAt;
  }
  return completedAt;
}

export function transformTask(
  task: HeightTask,
  lookups: ExportLookups,
  opts: TransformOptions
): LinearCsvRow {
  const heightId = toHeightId(task.index);

  const teamId = task.teamIds?.[0];
  const team = teamId ? lookups.teams.get(teamId) ?? "" : "";

  const creator = task.createdUserId
    ? lookups.userEmails.get(task.createdUserId) ?? ""
    : "";
  const assigneeId = task.assigneesIds?.[0];
  const assignee = assigneeId ? lookups.userEmails.get(assigneeId) ?? "" : "";

  const parentIssue = task.parentTaskId
    ? lookups.heightIds.get(task.parentTaskId) ?? ""
    : "";

  const tag = buildTraceabilityTag(heightId);
  const cleaned = cleanDescription(task.description);
  const description = cleaned ? `${tag}\n\n${cleaned}` : tag;

  const date = (field: string, value?: string | null) =>
    withTaskContext(heightId, field, () => toLinearDate(value));

  return {
    ID: opts.useHeightIds ? heightId : "",
    Team: team,
    Title: task.name,
    Description: description,
    Status: resolveStatus(task, lookups, opts.statusMap),
    Estimate: "",
    Priority: extractPriority(task.fields, opts.priorityFieldTemplateIds),
    "Project ID": "",
    Project: "",
    Creator: creator,
    Assignee: assignee,
    Labels: "",
    "Cycle Number": "",
    "Cycle Name": "",
    "Cycle Start": "",
    "Cycle End": "",
    Created: date("createdAt", task.createdAt),
    Updated: date("lastActivityAt", task.lastActivityAt),
    Started: date("startedAt", task.startedAt),
    Triaged: "",
    Completed: date("completedAt", completedDate(task, heightId)),
    Canceled: "",
    Archived: "",
    "Due Date": "",
    "Parent issue": parentIssue,
    Initiatives: "",
    "Project Milestone ID": "",
    "Project Milestone": "",
    "SLA Status": "",
    Roadmaps: "",
  };
}

export function generateParentMapping(
  tasks: HeightTask[],
  lookups: ExportLookups
): ParentMapping {
  const mapping: ParentMapping = {};
  for (const task of tasks) {
    if (!task.parentTaskId) continue;
    const parentHeightId = lookups.heightIds.get(task.parentTaskId);
    if (parentHeightId) {
      mapping[toHeightId(task.index)] = parentHeightId;
    }
  }
  return mapping;
}
