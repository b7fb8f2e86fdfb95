// Types
export type {
  Datapoint,
  EditableRow,
  DatapointOperation,
  RowIssue,
  ReconcilePlan,
  UtcOffsetProvider,
} from "./types";

// Table codec
export {
  TABLE_HEADER,
  localUtcOffset,
  formatTimestamp,
  parseTimestamp,
  parseValue,
  encodeTable,
  decodeTable,
} from "./table";

// Reconciliation
export { reconcile, isUnchanged, summarizePlan } from "./reconcile";
export type { PlanSummary } from "./reconcile";
