import type { Datapoint } from "../datapoints/types";

export interface GoalSummary {
  slug: string;
  title: string;
  /** Days of safety buffer left before derailing */
  safebuf: number;
  /** Rate summary, e.g. "+1 due in 2 days" */
  limsum: string;
  lastday: Date;
  /** Every field Beeminder returned, unconverted */
  fields: Record<string, unknown>;
}

/**
 * A datapoint exactly as Beeminder sent it: timestamps in unix seconds and
 * every field kept, including ones beeline does not read.
 */
export interface DatapointRecord {
  id: string;
  timestamp: number;
  value: number;
  comment?: string | null;
  daystamp?: string | null;
  updated_at?: number | null;
  requestid?: string | null;
  [field: string]: unknown;
}

export interface GetDatapointsOptions {
  sort?: "timestamp" | "daystamp" | "value" | "updated_at" | "id";
  count?: number;
}

export interface CreateDatapointInput {
  value: number;
  timestamp?: Date;
  comment?: string;
  requestid?: string;
}

export interface UpdateDatapointInput {
  id: string;
  value?: number;
  timestamp?: Date;
  comment?: string;
}

/**
 * The part of the Beeminder API that beeline uses.
 */
export interface BeeminderApi {
  getGoals(): Promise<GoalSummary[]>;
  getArchivedGoals(): Promise<GoalSummary[]>;
  getDatapoints(goal: string, options?: GetDatapointsOptions): Promise<Datapoint[]>;
  getDatapointRecords(goal: string, options?: GetDatapointsOptions): Promise<DatapointRecord[]>;
  createDatapoint(goal: string, input: CreateDatapointInput): Promise<Datapoint>;
  updateDatapoint(goal: string, input: UpdateDatapointInput): Promise<Datapoint>;
  deleteDatapoint(goal: string, id: string): Promise<Datapoint>;
}
