import { describe, test, expect } from "vitest";
import { ApiError, ApplyError, BeelineError, TableParseError, describeError } from "./errors";

describe("describeError", () => {
  test("joins the cause chain", () => {
    const api = new ApiError("Beeminder returned 500 for GET users/me/goals.json: oops", {
      method: "GET",
      path: "users/me/goals.json",
      status: 500,
    });
    const error = new BeelineError("Failed to fetch active goals", { cause: api });

    expect(describeError(error)).toBe(
      "Failed to fetch active goals: Beeminder returned 500 for GET users/me/goals.json: oops"
    );
  });

  test("handles thrown non-errors", () => {
    expect(describeError("plain")).toBe("plain");
  });
});

describe("error types", () => {
  test("TableParseError names the line", () => {
    const error = new TableParseError("missing value", 4, "2024-01-15 08:30:00");

    expect(error).toBeInstanceOf(BeelineError);
    expect(error.message).toBe('Line 4: missing value: "2024-01-15 08:30:00"');
  });

  test("ApplyError counts failures", () => {
    const error = new ApplyError("running", [
      { operation: { kind: "delete", id: "a" }, error: new Error("gone") },
      { operation: { kind: "delete", id: "b" }, error: new Error("gone") },
    ]);

    expect(error.message).toBe("2 datapoint operations failed for goal 'running'");
  });
});
