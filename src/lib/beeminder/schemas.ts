import { z } from "zod";
import type { Datapoint } from "../datapoints/types";
import type { DatapointRecord, GoalSummary } from "./types";

// Beeminder timestamps are unix seconds
function fromUnixSeconds(seconds: number): Date {
  return new Date(seconds * 1000);
}

export const goalSummarySchema = z
  .object({
    slug: z.string(),
    title: z.string().default(""),
    safebuf: z.number().int(),
    limsum: z.string().default(""),
    lastday: z.number(),
  })
  .passthrough();

export const goalListSchema = z.array(goalSummarySchema);

export const datapointSchema = z
  .object({
    id: z.string(),
    timestamp: z.number(),
    value: z.number(),
    comment: z.string().nullish(),
    daystamp: z.string().nullish(),
    updated_at: z.number().nullish(),
    requestid: z.string().nullish(),
  })
  .passthrough();

export const datapointListSchema = z.array(datapointSchema);

export function toGoalSummary(raw: z.infer<typeof goalSummarySchema>): GoalSummary {
  return {
    slug: raw.slug,
    title: raw.title,
    safebuf: raw.safebuf,
    limsum: raw.limsum,
    lastday: fromUnixSeconds(raw.lastday),
    fields: { ...raw },
  };
}

export function toDatapoint(raw: DatapointRecord): Datapoint {
  const dp: Datapoint = { id: raw.id, timestamp: fromUnixSeconds(raw.timestamp), value: raw.value };
  if (raw.comment != null) dp.comment = raw.comment;
  if (raw.daystamp != null) dp.daystamp = raw.daystamp;
  if (raw.updated_at != null) dp.updatedAt = fromUnixSeconds(raw.updated_at);
  if (raw.requestid != null) dp.requestid = raw.requestid;
  return dp;
}
