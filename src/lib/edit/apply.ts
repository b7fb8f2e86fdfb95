import type { BeeminderApi } from "../beeminder/types";
import type { DatapointOperation } from "../datapoints/types";
import type { OperationFailure } from "../errors";
import { describeError } from "../errors";
import { consoleLogger, type Logger } from "../logger";

export interface ApplyOptions {
  logger?: Logger;
  /** Called before each operation is sent */
  onOperation?: (operation: DatapointOperation) => void;
}

export interface ApplyResult {
  applied: DatapointOperation[];
  failures: OperationFailure[];
}

type DatapointWriter = Pick<BeeminderApi, "createDatapoint" | "updateDatapoint" | "deleteDatapoint">;

export function describeOperation(operation: DatapointOperation): string {
  switch (operation.kind) {
    case "update":
      return `Updating datapoint '${operation.id}'.`;
    case "create":
      return `Creating new datapoint with value '${operation.value}'.`;
    case "delete":
      return `Deleting datapoint '${operation.id}'.`;
  }
}

/** Updates and creates keep their order; deletes go after all of them. */
export function orderOperations(operations: readonly DatapointOperation[]): DatapointOperation[] {
  return [
    ...operations.filter((op) => op.kind !== "delete"),
    ...operations.filter((op) => op.kind === "delete"),
  ];
}

async function execute(client: DatapointWriter, goal: string, operation: DatapointOperation): Promise<void> {
  switch (operation.kind) {
    case "update":
      await client.updateDatapoint(goal, {
        id: operation.id,
        timestamp: operation.timestamp,
        value: operation.value,
        comment: operation.comment,
      });
      return;
    case "create":
      await client.createDatapoint(goal, {
        timestamp: operation.timestamp,
        value: operation.value,
        comment: operation.comment,
      });
      return;
    case "delete":
      await client.deleteDatapoint(goal, operation.id);
      return;
  }
}

/**
 * Send operations to Beeminder one at a time.
 *
 * A failed operation is recorded and the rest are still attempted. Nothing
 * already applied is rolled back.
 */
export async function applyOperations(
  client: DatapointWriter,
  goal: string,
  operations: readonly DatapointOperation[],
  options: ApplyOptions = {}
): Promise<ApplyResult> {
  const { logger = consoleLogger, onOperation } = options;
  const result: ApplyResult = { applied: [], failures: [] };

  for (const operation of orderOperations(operations)) {
    onOperation?.(operation);
    logger.info(describeOperation(operation));

    try {
      await execute(client, goal, operation);
      result.applied.push(operation);
    } catch (error) {
      result.failures.push({ operation, error });
      const target = operation.kind === "create" ? `with value '${operation.value}'` : `'${operation.id}'`;
      logger.warn(`Failed to ${operation.kind} datapoint ${target} on goal '${goal}': ${describeError(error)}`);
    }
  }

  return result;
}
