/**
 * Goal list rendering for `beeline list`
 */

import { colorize, type Colour } from "../ansi";
import type { GoalSummary } from "../beeminder/types";
import { localUtcOffset } from "../datapoints/table";

export interface GoalFormatOptions {
  now?: Date;
  /** Minutes east of UTC used to decide what "today" is */
  utcOffset?: number;
  color?: boolean;
}

const SLUG_WIDTH = 20;

function calendarDay(date: Date): string {
  return date.toISOString().slice(0, 10);
}

/**
 * Whether the goal's last datapoint day is today in local time.
 */
export function hasEntryToday(
  goal: GoalSummary,
  now: Date = new Date(),
  utcOffset: number = localUtcOffset()
): boolean {
  const today = new Date(now.getTime() + utcOffset * 60_000);
  return calendarDay(goal.lastday) === calendarDay(today);
}

export function safebufColour(safebuf: number): Colour {
  if (safebuf <= 0) return "red";
  if (safebuf === 1) return "yellow";
  if (safebuf === 2) return "blue";
  if (safebuf <= 6) return "green";
  return "white";
}

/**
 * Goals still needing data today first, then the closest to derailing.
 */
export function sortGoals(goals: readonly GoalSummary[], options: GoalFormatOptions = {}): GoalSummary[] {
  const { now = new Date(), utcOffset = localUtcOffset() } = options;
  const done = new Map<GoalSummary, boolean>(goals.map((goal) => [goal, hasEntryToday(goal, now, utcOffset)]));

  return [...goals].sort((a, b) => {
    const today = Number(done.get(a)) - Number(done.get(b));
    return today !== 0 ? today : a.safebuf - b.safebuf;
  });
}

export function formatGoal(goal: GoalSummary, options: GoalFormatOptions = {}): string {
  const { now = new Date(), utcOffset = localUtcOffset(), color = false } = options;
  const mark = hasEntryToday(goal, now, utcOffset) ? "✓" : " ";
  const line = `${mark} ${goal.slug.padEnd(SLUG_WIDTH)} [${goal.limsum}]`;
  return color ? colorize(line, safebufColour(goal.safebuf)) : line;
}
