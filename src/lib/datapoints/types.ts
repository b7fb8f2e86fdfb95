/**
 * Datapoint types shared by the table codec, the reconciler and the edit
 * session.
 */

/** A datapoint as stored by Beeminder. Never mutated locally. */
export interface Datapoint {
  id: string;
  timestamp: Date;
  value: number;
  comment?: string;
  daystamp?: string;
  updatedAt?: Date;
  requestid?: string;
}

/**
 * A row read back from the edited table. Rows without an id were added by
 * the user.
 */
export interface EditableRow {
  id?: string;
  timestamp: Date;
  value: number;
  comment: string;
}

export type DatapointOperation =
  | { kind: "update"; id: string; timestamp: Date; value: number; comment: string }
  | { kind: "create"; timestamp: Date; value: number; comment: string }
  | { kind: "delete"; id: string };

export interface RowIssue {
  kind: "orphan" | "duplicate";
  id: string;
  row: EditableRow;
}

export interface ReconcilePlan {
  operations: DatapointOperation[];
  issues: RowIssue[];
}

/** Minutes east of UTC */
export type UtcOffsetProvider = () => number;
