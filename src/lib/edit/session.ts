/**
 * Edit session - fetch, edit in $EDITOR, reconcile, apply
 */

import { mkdtemp, readFile, rm, writeFile } from "fs/promises";
import { tmpdir } from "os";
import { join } from "path";
import type { BeeminderApi } from "../beeminder/types";
import { decodeTable, encodeTable, localUtcOffset } from "../datapoints/table";
import { reconcile, summarizePlan } from "../datapoints/reconcile";
import type { DatapointOperation, ReconcilePlan, RowIssue, UtcOffsetProvider } from "../datapoints/types";
import { ApplyError } from "../errors";
import { consoleLogger, type Logger } from "../logger";
import { DEFAULT_EDITOR } from "../config";
import { applyOperations, type ApplyResult } from "./apply";
import { launchEditor } from "./editor";

export const DEFAULT_EDIT_LIMIT = 20;

export interface EditOptions {
  /** Editor command, used when openEditor is not given */
  editor?: string;
  /** Opens the table file and resolves once the user is done with it */
  openEditor?: (path: string) => void | Promise<void>;
  logger?: Logger;
  utcOffset?: UtcOffsetProvider;
  /** How many recent datapoints to edit */
  limit?: number;
  onOperation?: (operation: DatapointOperation) => void;
}

export interface EditResult extends ApplyResult {
  plan: ReconcilePlan;
}

export function describeIssue(issue: RowIssue): string {
  switch (issue.kind) {
    case "orphan":
      return `No datapoint with ID '${issue.id}'.`;
    case "duplicate":
      return `Datapoint '${issue.id}' appears more than once; only the first row was used.`;
  }
}

/**
 * Let the user edit a goal's recent datapoints as a table and push the
 * differences back to Beeminder.
 *
 * The table file is removed however the session ends. A table that fails to
 * parse aborts the session before anything is sent.
 */
export async function editDatapoints(
  client: BeeminderApi,
  goal: string,
  options: EditOptions = {}
): Promise<EditResult> {
  const {
    editor = DEFAULT_EDITOR,
    openEditor = (path: string) => launchEditor(editor, path),
    logger = consoleLogger,
    utcOffset = localUtcOffset,
    limit = DEFAULT_EDIT_LIMIT,
    onOperation,
  } = options;

  const before = await client.getDatapoints(goal, { sort: "timestamp", count: limit });

  const dir = await mkdtemp(join(tmpdir(), "beeline-"));
  let plan: ReconcilePlan;
  try {
    const tablePath = join(dir, `${goal.replace(/[^A-Za-z0-9_-]/g, "_")}.tsv`);
    await writeFile(tablePath, encodeTable(before, utcOffset), "utf-8");
    await openEditor(tablePath);
    const after = decodeTable(await readFile(tablePath, "utf-8"), utcOffset);
    plan = reconcile(before, after);
  } finally {
    await rm(dir, { recursive: true, force: true });
  }

  for (const issue of plan.issues) {
    logger.warn(describeIssue(issue));
  }

  if (plan.operations.length === 0) {
    logger.info("No changes.");
    return { plan, applied: [], failures: [] };
  }

  const result = await applyOperations(client, goal, plan.operations, { logger, onOperation });
  if (result.failures.length > 0) {
    throw new ApplyError(goal, result.failures);
  }

  const summary = summarizePlan(plan);
  logger.info(`Done: ${summary.creates} created, ${summary.updates} updated, ${summary.deletes} deleted.`);

  return { plan, ...result };
}
