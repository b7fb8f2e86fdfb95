import { describe, test, expect } from "vitest";
import { colorize, shouldColor } from "./ansi";

describe("colorize", () => {
  test("wraps text in the colour and a reset", () => {
    expect(colorize("run", "green")).toBe("\x1b[32mrun\x1b[0m");
  });
});

describe("shouldColor", () => {
  test("colours terminals", () => {
    expect(shouldColor({ isTTY: true }, {})).toBe(true);
  });

  test("leaves pipes plain", () => {
    expect(shouldColor({ isTTY: false }, {})).toBe(false);
    expect(shouldColor({}, {})).toBe(false);
  });

  test("respects NO_COLOR", () => {
    expect(shouldColor({ isTTY: true }, { NO_COLOR: "" })).toBe(false);
  });
});
