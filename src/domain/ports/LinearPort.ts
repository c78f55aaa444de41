import type { LinearIssue } from "../models/LinearModels";
import type { UpdateOutcome } from "../models/ParentUpdate";

export interface LinearPort {
  getAllIssues(teamKey?: string): Promise<LinearIssue[]>;
  setIssueParent(issueId: string, parentId: string): Promise<UpdateOutcome>;
}
