import { describe, it, expect, beforeEach, afterEach } from "vitest";
import { bold, dim, orange } from "../../src/format/colors.js";

describe("colors", () => {
  const saved = { NO_COLOR: process.env.NO_COLOR, FORCE_COLOR: process.env.FORCE_COLOR };

  beforeEach(() => {
    delete process.env.NO_COLOR;
    delete process.env.FORCE_COLOR;
  });

  afterEach(() => {
    delete process.env.NO_COLOR;
    delete process.env.FORCE_COLOR;
    if (saved.NO_COLOR !== undefined) {
      process.env.NO_COLOR = saved.NO_COLOR;
    }
    if (saved.FORCE_COLOR !== undefined) {
      process.env.FORCE_COLOR = saved.FORCE_COLOR;
    }
  });

  it("returns plain text when NO_COLOR is set", () => {
    process.env.NO_COLOR = "1";
    process.env.FORCE_COLOR = "1";
    expect(bold("hi")).toBe("hi");
    expect(orange("tasks-api")).toBe("tasks-api");
  });

  it("wraps text in ANSI codes when FORCE_COLOR is set", () => {
    process.env.FORCE_COLOR = "1";
    expect(bold("hi")).toBe("\x1b[1mhi\x1b[22m");
    expect(dim("v1")).toBe("\x1b[2mv1\x1b[22m");
    expect(orange("tasks-api")).toBe("\x1b[38;5;208mtasks-api\x1b[39m");
  });
});
