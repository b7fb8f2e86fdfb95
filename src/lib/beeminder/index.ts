import type { BeelineConfig } from "../config";
import { BeeminderClient } from "./client";

export type {
  BeeminderApi,
  GoalSummary,
  DatapointRecord,
  GetDatapointsOptions,
  CreateDatapointInput,
  UpdateDatapointInput,
} from "./types";

export { BeeminderClient } from "./client";
export type { BeeminderClientOptions, FetchLike } from "./client";

export function createClient(config: BeelineConfig): BeeminderClient {
  return new BeeminderClient({ apiKey: config.apiKey, baseUrl: config.baseUrl, user: config.user });
}
