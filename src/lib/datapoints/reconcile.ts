/**
 * Datapoint reconciler
 *
 * Compares the datapoints fetched before editing with the rows read back
 * from the edited table and works out which creates, updates and deletes
 * reproduce the edit on Beeminder.
 */

import type {
  Datapoint,
  DatapointOperation,
  EditableRow,
  ReconcilePlan,
} from "./types";

/**
 * True when the row carries exactly the fetched datapoint's fields.
 * A missing comment matches an empty one.
 */
export function isUnchanged(before: Datapoint, row: EditableRow): boolean {
  return (
    row.timestamp.getTime() === before.timestamp.getTime() &&
    row.value === before.value &&
    row.comment === (before.comment ?? "")
  );
}

/**
 * Rows with an unknown id are reported as orphans. Only the first row for an
 * id is reconciled; later ones are reported as duplicates. Deletes come last,
 * in the order the datapoints were fetched.
 */
export function reconcile(
  before: readonly Datapoint[],
  after: readonly EditableRow[]
): ReconcilePlan {
  const byId = new Map<string, Datapoint>(before.map((dp) => [dp.id, dp]));
  const toDelete = new Set<string>(byId.keys());
  const seen = new Set<string>();
  const plan: ReconcilePlan = { operations: [], issues: [] };

  for (const row of after) {
    if (row.id === undefined) {
      plan.operations.push({
        kind: "create",
        timestamp: row.timestamp,
        value: row.value,
        comment: row.comment,
      });
      continue;
    }

    const original = byId.get(row.id);
    if (!original) {
      plan.issues.push({ kind: "orphan", id: row.id, row });
      continue;
    }

    if (seen.has(row.id)) {
      plan.issues.push({ kind: "duplicate", id: row.id, row });
      continue;
    }

    seen.add(row.id);
    toDelete.delete(row.id);

    if (!isUnchanged(original, row)) {
      plan.operations.push({
        kind: "update",
        id: row.id,
        timestamp: row.timestamp,
        value: row.value,
        comment: row.comment,
      });
    }
  }

  for (const id of toDelete) {
    plan.operations.push({ kind: "delete", id });
  }

  return plan;
}

export interface PlanSummary {
  creates: number;
  updates: number;
  deletes: number;
  issues: number;
}

export function summarizePlan(plan: ReconcilePlan): PlanSummary {
  const count = (kind: DatapointOperation["kind"]) =>
    plan.operations.filter((op) => op.kind === kind).length;

  return {
    creates: count("create"),
    updates: count("update"),
    deletes: count("delete"),
    issues: plan.issues.length,
  };
}
