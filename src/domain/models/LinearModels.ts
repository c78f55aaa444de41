export const LINEAR_CSV_HEADERS = [
  "ID",
  "Team",
  "Title",
  "Description",
  "Status",
  "Estimate",
  "Priority",
  "Project ID",
  "Project",
  "Creator",
  "Assignee",
  "Labels",
  "Cycle Number",
  "Cycle Name",
  "Cycle Start",
  "Cycle End",
  "Created",
  "Updated",
  "Started",
  "Triaged",
  "Completed",
  "Canceled",
  "Archived",
  "Due Date",
  "Parent issue",
  "Initiatives",
  "Project Milestone ID",
  "Project Milestone",
  "SLA Status",
  "Roadmaps",
] as const;

export type LinearCsvColumn = (typeof LINEAR_CSV_HEADERS)[number];

export type LinearCsvRow = Record<LinearCsvColumn, string>;

export interface LinearIssueParent {
  id: string;
  identifier: string;
}

export interface LinearIssue {
  id: string;
  identifier: string;
  title: string;
  description?: string | null;
  parent?: LinearIssueParent | null;
}

export interface LinearPageInfo {
  hasNextPage: boolean;
  endCursor?: string | null;
}

export interface LinearIssuePage {
  nodes: LinearIssue[];
  pageInfo: LinearPageInfo;
}

export interface LinearIssueUpdatePayload {
  success: boolean;
  issue?: {
    id: string;
    identifier: string;
    parent?: { identifier: string } | null;
  } | null;
}
