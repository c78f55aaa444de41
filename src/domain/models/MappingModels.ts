import type { LinearIssueParent } from "./LinearModels";

/** Linear status name keyed by Height status id or name. */
export interface StatusMap {
  [heightStatus: string]: string;
}

/** Child Height ID → parent Height ID. */
export interface ParentMapping {
  [childHeightId: string]: string;
}

export interface ExportLookups {
  teams: Map<string, string>;
  userEmails: Map<string, string>;
  heightIds: Map<string, string>;
  statusNames: Map<string, string>;
}

export interface LinearIssueRef {
  linearId: string;
  identifier: string;
  title: string;
  currentParent?: LinearIssueParent | null;
}
