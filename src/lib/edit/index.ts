export { editDatapoints, describeIssue, DEFAULT_EDIT_LIMIT } from "./session";
export type { EditOptions, EditResult } from "./session";
export { applyOperations, orderOperations, describeOperation } from "./apply";
export type { ApplyOptions, ApplyResult } from "./apply";
export { launchEditor } from "./editor";
