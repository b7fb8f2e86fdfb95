import { describe, test, expect, vi } from "vitest";
import { BeeminderClient } from "./index";
import { ApiError } from "../errors";

const BASE_URL = "https://beeminder.test/api/v1/";
const T1 = new Date(Date.UTC(2024, 0, 15, 8, 30, 0));

function respondWith(body: unknown, status = 200) {
  return vi.fn(async (_url: string, _init?: RequestInit) => new Response(JSON.stringify(body), { status }));
}

function clientFor(fetch: ReturnType<typeof respondWith>) {
  return new BeeminderClient({ apiKey: "test-secret", baseUrl: BASE_URL, fetch });
}

const RAW_GOAL = {
  slug: "running",
  title: "Run more",
  safebuf: 3,
  limsum: "+1 due in 3 days",
  lastday: 1705307400,
  rate: 1,
};

const RAW_DATAPOINT = {
  id: "dp1",
  timestamp: 1705307400,
  daystamp: "20240115",
  value: 1.5,
  comment: "ran",
  updated_at: 1705307460,
  requestid: null,
};

describe("BeeminderClient", () => {
  test("getGoals converts the goal list", async () => {
    const fetch = respondWith([RAW_GOAL]);

    const goals = await clientFor(fetch).getGoals();

    expect(fetch.mock.calls[0]?.[0]).toBe(`${BASE_URL}users/me/goals.json?auth_token=test-secret`);
    expect(goals).toHaveLength(1);
    expect(goals[0]?.slug).toBe("running");
    expect(goals[0]?.safebuf).toBe(3);
    expect(goals[0]?.lastday.getTime()).toBe(T1.getTime());
    expect(goals[0]?.fields.rate).toBe(1);
  });

  test("getArchivedGoals reads the archived list", async () => {
    const fetch = respondWith([]);

    await clientFor(fetch).getArchivedGoals();

    expect(fetch.mock.calls[0]?.[0]).toBe(`${BASE_URL}users/me/goals/archived.json?auth_token=test-secret`);
  });

  test("getDatapoints passes sort and count", async () => {
    const fetch = respondWith([RAW_DATAPOINT, { ...RAW_DATAPOINT, id: "dp2", comment: null }]);

    const datapoints = await clientFor(fetch).getDatapoints("running", { sort: "timestamp", count: 20 });

    expect(fetch.mock.calls[0]?.[0]).toBe(
      `${BASE_URL}users/me/goals/running/datapoints.json?auth_token=test-secret&sort=timestamp&count=20`
    );
    expect(datapoints[0]).toEqual({
      id: "dp1",
      timestamp: T1,
      value: 1.5,
      comment: "ran",
      daystamp: "20240115",
      updatedAt: new Date(1705307460 * 1000),
    });
    expect(datapoints[1]?.comment).toBeUndefined();
  });

  test("getDatapointRecords keeps every field as sent", async () => {
    const raw = { ...RAW_DATAPOINT, origin: "web" };
    const fetch = respondWith([raw]);

    const records = await clientFor(fetch).getDatapointRecords("running", { sort: "timestamp" });

    expect(records).toEqual([raw]);
  });

  test("createDatapoint posts a form", async () => {
    const fetch = respondWith(RAW_DATAPOINT);

    await clientFor(fetch).createDatapoint("running", { value: 1.5, timestamp: T1, comment: "ran" });

    const [url, init] = fetch.mock.calls[0] ?? [];
    expect(url).toBe(`${BASE_URL}users/me/goals/running/datapoints.json?auth_token=test-secret`);
    expect(init?.method).toBe("POST");
    expect(String(init?.body)).toBe("value=1.5&timestamp=1705307400&comment=ran");
  });

  test("updateDatapoint puts to the datapoint", async () => {
    const fetch = respondWith(RAW_DATAPOINT);

    await clientFor(fetch).updateDatapoint("running", { id: "dp1", value: 2, comment: "" });

    const [url, init] = fetch.mock.calls[0] ?? [];
    expect(url).toBe(`${BASE_URL}users/me/goals/running/datapoints/dp1.json?auth_token=test-secret`);
    expect(init?.method).toBe("PUT");
    expect(String(init?.body)).toBe("value=2&comment=");
  });

  test("deleteDatapoint sends DELETE without a body", async () => {
    const fetch = respondWith(RAW_DATAPOINT);

    const deleted = await clientFor(fetch).deleteDatapoint("running", "dp1");

    const [url, init] = fetch.mock.calls[0] ?? [];
    expect(url).toBe(`${BASE_URL}users/me/goals/running/datapoints/dp1.json?auth_token=test-secret`);
    expect(init?.method).toBe("DELETE");
    expect(init?.body).toBeUndefined();
    expect(deleted.id).toBe("dp1");
  });

  test("escapes goal slugs", async () => {
    const fetch = respondWith([]);

    await clientFor(fetch).getDatapoints("a b");

    expect(fetch.mock.calls[0]?.[0]).toBe(`${BASE_URL}users/me/goals/a%20b/datapoints.json?auth_token=test-secret`);
  });

  test("uses the configured user", async () => {
    const fetch = respondWith([]);
    const client = new BeeminderClient({ apiKey: "test-secret", baseUrl: BASE_URL, user: "alice", fetch });

    await client.getGoals();

    expect(fetch.mock.calls[0]?.[0]).toBe(`${BASE_URL}users/alice/goals.json?auth_token=test-secret`);
  });

  test("reports API errors with status and goal", async () => {
    const fetch = respondWith({ errors: "Goal not found" }, 404);

    const error = await clientFor(fetch)
      .getDatapoints("nope")
      .catch((e: unknown) => e);

    expect(error).toBeInstanceOf(ApiError);
    if (error instanceof ApiError) {
      expect(error.status).toBe(404);
      expect(error.goal).toBe("nope");
      expect(error.method).toBe("GET");
      expect(error.message).toBe(
        "Beeminder returned 404 for GET users/me/goals/nope/datapoints.json: Goal not found"
      );
    }
  });

  test("rejects responses of the wrong shape", async () => {
    const fetch = respondWith([{ slug: "running", lastday: 0 }]);

    await expect(clientFor(fetch).getGoals()).rejects.toThrow(
      "Unexpected response for GET users/me/goals.json at 0.safebuf"
    );
  });

  test("rejects a successful response that is not JSON", async () => {
    const fetch = vi.fn(async (_url: string, _init?: RequestInit) => new Response("<html>"));
    const client = new BeeminderClient({ apiKey: "test-secret", baseUrl: BASE_URL, fetch });

    const error = await client.getDatapoints("running").catch((e: unknown) => e);

    expect(error).toBeInstanceOf(ApiError);
    if (error instanceof ApiError) {
      expect(error.message).toBe("Beeminder sent invalid JSON for GET users/me/goals/running/datapoints.json");
      expect(error.status).toBe(200);
      expect(error.goal).toBe("running");
    }
  });

  test("wraps network failures", async () => {
    const fetch = vi.fn(async (_url: string, _init?: RequestInit): Promise<Response> => {
      throw new Error("connection refused");
    });
    const client = new BeeminderClient({ apiKey: "test-secret", baseUrl: BASE_URL, fetch });

    const error = await client.getGoals().catch((e: unknown) => e);

    expect(error).toBeInstanceOf(ApiError);
    if (error instanceof ApiError) {
      expect(error.message).toBe("Request GET users/me/goals.json failed");
      expect(error.cause).toBeInstanceOf(Error);
    }
  });
});
