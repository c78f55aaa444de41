export type SkipReason = "child not found" | "parent not found";

export interface SkippedRelation {
  childHeightId: string;
  parentHeightId: string;
  reason: SkipReason;
}

export interface PendingParentUpdate {
  childHeightId: string;
  parentHeightId: string;
  childLinearId: string;
  parentLinearId: string;
  childIdentifier: string;
  parentIdentifier: string;
  childTitle: string;
}

export interface UpdateOutcome {
  success: boolean;
  identifier?: string;
  parentIdentifier?: string;
  errors?: string[];
}

export namespace UpdateOutcome {
  export function success(
    identifier: string,
    parentIdentifier?: string
  ): UpdateOutcome {
    return {
      success: true,
      identifier,
      parentIdentifier,
    };
  }

  export function failure(errors: string[]): UpdateOutcome {
    return {
      success: false,
      errors,
    };
  }
}

export interface ReconciliationPlan {
  updates: PendingParentUpdate[];
  skipped: SkippedRelation[];
  alreadyLinked: number;
}

export interface ApplySummary {
  succeeded: number;
  failed: number;
  total: number;
  failures: Array<{ update: PendingParentUpdate; errors: string[] }>;
}

/** Two Linear issues carrying the same Height tag. */
export interface DuplicateTag {
  heightId: string;
  keptIdentifier: string;
  duplicateIdentifier: string;
}

export type ReconciliationStatus = "up-to-date" | "aborted" | "applied";

export interface ReconciliationReport {
  status: ReconciliationStatus;
  issuesFetched: number;
  taggedIssues: number;
  duplicateTags: DuplicateTag[];
  plan: ReconciliationPlan;
  summary?: ApplySummary;
}
