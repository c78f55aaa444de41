import type { LinearPort } from "../../domain/ports/LinearPort";
import type { LinearIssue } from "../../domain/models/LinearModels";
import { UpdateOutcome } from "../../domain/models/ParentUpdate";
import { LinearClient } from "./LinearClient";

export class LinearAdapter implements LinearPort {
  constructor(private linearClient: LinearClient) {}

  async getAllIssues(teamKey?: string): Promise<LinearIssue[]> {
    const issues: LinearIssue[] = [];
    let cursor: string | undefined;

    while (true) {
      const page = await this.linearClient.fetchIssuesPage(cursor, teamKey);
      issues.push(...page.nodes);
      if (!page.pageInfo.hasNextPage || !page.pageInfo.endCursor) break;
      cursor = page.pageInfo.endCursor;
    }
    return issues;
  }

  async setIssueParent(issueId: string, parentId: string): Promise<UpdateOutcome> {
    const payload = await this.linearClient.updateIssueParent(issueId, parentId);
    if (!payload.success || !payload.issue) {
      return UpdateOutcome.failure([`issueUpdate failed for ${issueId}`]);
    }
    return UpdateOutcome.success(
      payload.issue.identifier,
      payload.issue.parent?.identifier
    );
  }
}
