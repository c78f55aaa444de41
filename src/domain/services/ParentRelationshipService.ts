import type { LinearPort } from "../ports/LinearPort";
import type { ConfirmPort } from "../ports/ConfirmPort";
import type { LinearIssue } from "../models/LinearModels";
import type { LinearIssueRef, ParentMapping } from "../models/MappingModels";
import type {
  ApplySummary,
  DuplicateTag,
  PendingParentUpdate,
  ReconciliationPlan,
  ReconciliationReport,
  SkippedRelation,
} from "../models/ParentUpdate";
import { extractHeightId } from "../../utils/traceabilityTag";

export interface ParentRelationshipOptions {
  teamKey?: string;
  assumeYes?: boolean;
  sampleSize?: number;
}

export interface HeightIssueIndex {
  byHeightId: Map<string, LinearIssueRef>;
  duplicateTags: DuplicateTag[];
}

/**
 * Height ID → Linear issue, keyed on the traceability tag in each
 * description. The first issue fetched for a tag wins.
 */
export function buildHeightIndex(issues: LinearIssue[]): HeightIssueIndex {
  const byHeightId = new Map<string, LinearIssueRef>();
  const duplicateTags: DuplicateTag[] = [];

  for (const issue of issues) {
    const heightId = extractHeightId(issue.description);
    if (!heightId) continue;
    const kept = byHeightId.get(heightId);
    if (kept) {
      duplicateTags.push({
        heightId,
        keptIdentifier: kept.identifier,
        duplicateIdentifier: issue.identifier,
      });
      continue;
    }
    byHeightId.set(heightId, {
      linearId: issue.id,
      identifier: issue.identifier,
      title: issue.title,
      currentParent: issue.parent,
    });
  }

  return { byHeightId, duplicateTags };
}

export function planParentUpdates(
  mapping: ParentMapping,
  index: Map<string, LinearIssueRef>
): ReconciliationPlan {
  const updates: PendingParentUpdate[] = [];
  const skipped: SkippedRelation[] = [];
  let alreadyLinked = 0;

  for (const [childHeightId, parentHeightId] of Object.entries(mapping)) {
    const child = index.get(childHeightId);
    if (!child) {
      skipped.push({ childHeightId, parentHeightId, reason: "child not found" });
      continue;
    }
    const parent = index.get(parentHeightId);
    if (!parent) {
      skipped.push({ childHeightId, parentHeightId, reason: "parent not found" });
      continue;
    }

    if (child.currentParent?.id === parent.linearId) {
      alreadyLinked++;
      continue;
    }

    updates.push({
      childHeightId,
      parentHeightId,
      childLinearId: child.linearId,
      parentLinearId: parent.linearId,
      childIdentifier: child.identifier,
      parentIdentifier: parent.identifier,
      childTitle: child.title,
    });
  }

  return { updates, skipped, alreadyLinked };
}

export class ParentRelationshipService {
  constructor(
    private linear: LinearPort,
    private prompt: ConfirmPort,
    private opts: ParentRelationshipOptions = {}
  ) {}

  /**
   * Fetch, reverse-map, diff, confirm, apply. Safe to rerun: relationships
   * already in place are counted, not re-sent.
   */
  async reconcile(mapping: ParentMapping): Promise<ReconciliationReport> {
    const scope = this.opts.teamKey ? ` (team: ${this.opts.teamKey})` : "";
    console.log(`Fetching issues from Linear${scope}...`);
    const issues = await this.linear.getAllIssues(this.opts.teamKey);
    console.log(`✓ Found ${issues.length} issues`);

    const { byHeightId, duplicateTags } = buildHeightIndex(issues);
    console.log(`✓ Found ${byHeightId.size} issues with Height IDs`);
    for (const dup of duplicateTags) {
      console.warn(
        `⚠ ${dup.heightId} is tagged on both ${dup.keptIdentifier} and ${dup.duplicateIdentifier}; keeping ${dup.keptIdentifier}`
      );
    }
    if (byHeightId.size === 0) {
      throw new Error(
        "No issues found with Height ID tags in their descriptions. " +
          "Import the CSV produced by the exporter first."
      );
    }

    const plan = planParentUpdates(mapping, byHeightId);
    for (const skip of plan.skipped) {
      const missing =
        skip.reason === "parent not found" ? skip.parentHeightId : skip.childHeightId;
      console.warn(
        `⚠ Skipping ${skip.childHeightId} → ${skip.parentHeightId}: ${skip.reason} (${missing})`
      );
    }

    const report: ReconciliationReport = {
      status: "up-to-date",
      issuesFetched: issues.length,
      taggedIssues: byHeightId.size,
      duplicateTags,
      plan,
    };

    console.log(
      `Updates needed: ${plan.updates.length} (already linked: ${plan.alreadyLinked}, skipped: ${plan.skipped.length})`
    );
    if (plan.updates.length === 0) {
      console.log("✓ All parent-child relationships are already set correctly!");
      return report;
    }

    this.printSample(plan.updates);

    const proceed =
      this.opts.assumeYes ||
      (await this.prompt.confirm(
        `This will update ${plan.updates.length} issues. Proceed?`
      ));
    if (!proceed) {
      console.log("Aborted.");
      return { ...report, status: "aborted" };
    }

    const summary = await this.applyUpdates(plan.updates);
    return { ...report, status: "applied", summary };
  }

  async applyUpdates(updates: PendingParentUpdate[]): Promise<ApplySummary> {
    const summary: ApplySummary = {
      succeeded: 0,
      failed: 0,
      total: updates.length,
      failures: [],
    };

    for (const [i, update] of updates.entries()) {
      const progress = `[${i + 1}/${updates.length}]`;
      let errors: string[];
      try {
        const outcome = await this.linear.setIssueParent(
          update.childLinearId,
          update.parentLinearId
        );
        if (outcome.success) {
          summary.succeeded++;
          console.log(
            `  ${progress} ✓ ${update.childIdentifier} → ${update.parentIdentifier}`
          );
          continue;
        }
        errors = outcome.errors ?? ["issueUpdate returned success: false"];
      } catch (err) {
        errors = [err instanceof Error ? err.message : String(err)];
      }

      summary.failed++;
      summary.failures.push({ update, errors });
      console.error(
        `  ${progress} ✗ ${update.childIdentifier}: ${errors.join("; ")}`
      );
    }

    console.log(
      `Summary: ${summary.succeeded} succeeded, ${summary.failed} failed, ${summary.total} total`
    );
    return summary;
  }

  private printSample(updates: PendingParentUpdate[]) {
    const size = this.opts.sampleSize ?? 5;
    console.log(`Sample updates (first ${Math.min(size, updates.length)}):`);
    for (const u of updates.slice(0, size)) {
      console.log(
        `  ${u.childIdentifier} (${u.childHeightId}) → parent: ${u.parentIdentifier} (${u.parentHeightId})`
      );
    }
  }
}
