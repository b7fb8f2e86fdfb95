/**
 * Beeminder REST client
 *
 * Requests go out one at a time. The auth token travels as the auth_token
 * query parameter and write requests send a form-encoded body.
 */

import type { z } from "zod";
import { ApiError } from "../errors";
import type { Datapoint } from "../datapoints/types";
import { DEFAULT_BASE_URL } from "../config";
import {
  datapointListSchema,
  datapointSchema,
  goalListSchema,
  toDatapoint,
  toGoalSummary,
} from "./schemas";
import type {
  BeeminderApi,
  CreateDatapointInput,
  DatapointRecord,
  GetDatapointsOptions,
  GoalSummary,
  UpdateDatapointInput,
} from "./types";

export type FetchLike = (url: string, init?: RequestInit) => Promise<Response>;

export interface BeeminderClientOptions {
  apiKey: string;
  baseUrl?: string;
  /** Username path segment, "me" for the token's owner */
  user?: string;
  fetch?: FetchLike;
}

interface RequestOptions {
  method?: "GET" | "POST" | "PUT" | "DELETE";
  query?: Record<string, string | undefined>;
  form?: Record<string, string | undefined>;
  goal?: string;
}

function toUnixSeconds(date: Date): string {
  return String(Math.floor(date.getTime() / 1000));
}

// Beeminder reports failures as {"errors": ...} or {"error": ...}
function errorDetail(body: string): string {
  try {
    const parsed: unknown = JSON.parse(body);
    if (parsed && typeof parsed === "object") {
      const detail = "errors" in parsed ? parsed.errors : "error" in parsed ? parsed.error : undefined;
      if (typeof detail === "string") return detail;
      if (detail !== undefined) return JSON.stringify(detail);
    }
  } catch {
    // Not JSON, fall through to the raw text
  }
  return body.trim().slice(0, 200);
}

export class BeeminderClient implements BeeminderApi {
  private readonly apiKey: string;
  private readonly baseUrl: string;
  private readonly user: string;
  private readonly fetchImpl: FetchLike;

  constructor(options: BeeminderClientOptions) {
    this.apiKey = options.apiKey;
    this.baseUrl = options.baseUrl ?? DEFAULT_BASE_URL;
    this.user = options.user ?? "me";
    this.fetchImpl = options.fetch ?? ((url, init) => fetch(url, init));
  }

  async getGoals(): Promise<GoalSummary[]> {
    const goals = await this.request(`users/${this.user}/goals.json`, goalListSchema);
    return goals.map(toGoalSummary);
  }

  async getArchivedGoals(): Promise<GoalSummary[]> {
    const goals = await this.request(`users/${this.user}/goals/archived.json`, goalListSchema);
    return goals.map(toGoalSummary);
  }

  async getDatapoints(goal: string, options: GetDatapointsOptions = {}): Promise<Datapoint[]> {
    const records = await this.getDatapointRecords(goal, options);
    return records.map(toDatapoint);
  }

  async getDatapointRecords(goal: string, options: GetDatapointsOptions = {}): Promise<DatapointRecord[]> {
    return this.request(this.goalPath(goal, "datapoints.json"), datapointListSchema, {
      goal,
      query: {
        sort: options.sort,
        count: options.count === undefined ? undefined : String(options.count),
      },
    });
  }

  async createDatapoint(goal: string, input: CreateDatapointInput): Promise<Datapoint> {
    const created = await this.request(this.goalPath(goal, "datapoints.json"), datapointSchema, {
      method: "POST",
      goal,
      form: {
        value: String(input.value),
        timestamp: input.timestamp ? toUnixSeconds(input.timestamp) : undefined,
        comment: input.comment,
        requestid: input.requestid,
      },
    });
    return toDatapoint(created);
  }

  async updateDatapoint(goal: string, input: UpdateDatapointInput): Promise<Datapoint> {
    const updated = await this.request(
      this.goalPath(goal, `datapoints/${encodeURIComponent(input.id)}.json`),
      datapointSchema,
      {
        method: "PUT",
        goal,
        form: {
          value: input.value === undefined ? undefined : String(input.value),
          timestamp: input.timestamp ? toUnixSeconds(input.timestamp) : undefined,
          comment: input.comment,
        },
      }
    );
    return toDatapoint(updated);
  }

  async deleteDatapoint(goal: string, id: string): Promise<Datapoint> {
    const deleted = await this.request(
      this.goalPath(goal, `datapoints/${encodeURIComponent(id)}.json`),
      datapointSchema,
      { method: "DELETE", goal }
    );
    return toDatapoint(deleted);
  }

  private goalPath(goal: string, rest: string): string {
    return `users/${this.user}/goals/${encodeURIComponent(goal)}/${rest}`;
  }

  private async request<S extends z.ZodTypeAny>(
    path: string,
    schema: S,
    options: RequestOptions = {}
  ): Promise<z.output<S>> {
    const method = options.method ?? "GET";
    const url = new URL(path, this.baseUrl);
    url.searchParams.set("auth_token", this.apiKey);
    for (const [key, value] of Object.entries(options.query ?? {})) {
      if (value !== undefined) url.searchParams.set(key, value);
    }

    const init: RequestInit = { method, headers: { Accept: "application/json" } };
    if (options.form) {
      const body = new URLSearchParams();
      for (const [key, value] of Object.entries(options.form)) {
        if (value !== undefined) body.set(key, value);
      }
      init.body = body;
    }

    const context = { method, path, goal: options.goal };
    const label = `${method} ${path}`;

    let response: Response;
    try {
      response = await this.fetchImpl(url.toString(), init);
    } catch (error) {
      throw new ApiError(`Request ${label} failed`, context, { cause: error });
    }

    const body = await response.text();
    if (!response.ok) {
      throw new ApiError(
        `Beeminder returned ${response.status} for ${label}: ${errorDetail(body)}`,
        { ...context, status: response.status }
      );
    }

    let payload: unknown;
    try {
      payload = JSON.parse(body);
    } catch (error) {
      throw new ApiError(`Beeminder sent invalid JSON for ${label}`, { ...context, status: response.status }, {
        cause: error,
      });
    }

    const parsed = schema.safeParse(payload);
    if (!parsed.success) {
      const issue = parsed.error.issues[0];
      const where = issue && issue.path.length > 0 ? ` at ${issue.path.join(".")}` : "";
      throw new ApiError(
        `Unexpected response for ${label}${where}: ${issue?.message ?? "invalid"}`,
        { ...context, status: response.status }
      );
    }
    return parsed.data;
  }
}
