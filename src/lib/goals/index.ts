export { hasEntryToday, safebufColour, sortGoals, formatGoal } from "./format";
export type { GoalFormatOptions } from "./format";
