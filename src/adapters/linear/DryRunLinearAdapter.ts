import type { LinearPort } from "../../domain/ports/LinearPort";
import type { LinearIssue } from "../../domain/models/LinearModels";
import { UpdateOutcome } from "../../domain/models/ParentUpdate";

/** Reads go to Linear; parent updates are only logged. */
export class DryRunLinearAdapter implements LinearPort {
  constructor(private reader: LinearPort) {}

  async getAllIssues(teamKey?: string): Promise<LinearIssue[]> {
    return this.reader.getAllIssues(teamKey);
  }

  async setIssueParent(issueId: string, parentId: string): Promise<UpdateOutcome> {
    console.log(`[DryRun] would set parent of ${issueId} to ${parentId}`);
    return UpdateOutcome.success(issueId, parentId);
  }
}
