import { describe, expect, it } from "vitest";
import { describeAdjustment, validateDuration } from "./duration-policy";

describe("validateDuration", () => {
  it("keeps durations within the ceiling", () => {
    expect(validateDuration("PT30M", "PT1H")).toEqual({ encoded: "PT30M", seconds: 1800 });
    expect(validateDuration("PT1H", "PT1H")).toEqual({ encoded: "PT1H", seconds: 3600 });
  });

  it("clamps durations above the ceiling", () => {
    expect(validateDuration("PT8H", "PT4H")).toEqual({ encoded: "PT4H", seconds: 14400, adjustment: "exceeds-ceiling" });
  });

  it("clamps for every requested value above the ceiling", () => {
    for (let minutes = 61; minutes <= 240; minutes += 17) {
      expect(validateDuration(`PT${minutes}M`, "PT1H").seconds).toBe(3600);
    }
    for (let minutes = 1; minutes <= 60; minutes += 7) {
      expect(validateDuration(`PT${minutes}M`, "PT1H").seconds).toBe(minutes * 60);
    }
  });

  it("falls back to the ceiling for malformed input", () => {
    expect(validateDuration("two hours", "PT2H")).toEqual({ encoded: "PT2H", seconds: 7200, adjustment: "malformed" });
  });

  it("falls back to the default ceiling when the ceiling is malformed", () => {
    expect(validateDuration("PT30M", "soon")).toEqual({ encoded: "PT30M", seconds: 1800 });
    expect(validateDuration("PT3H", "soon")).toEqual({ encoded: "PT1H", seconds: 3600, adjustment: "exceeds-ceiling" });
  });

  it("describes adjustments for progress output", () => {
    expect(describeAdjustment(validateDuration("PT8H", "PT4H"))).toBe(
      "Requested duration exceeds maximum allowed duration of PT4H. Using maximum duration.",
    );
    expect(describeAdjustment(validateDuration("bad", "PT4H"))).toBe("Invalid duration format. Using default duration of PT4H.");
    expect(describeAdjustment(validateDuration("PT1H", "PT4H"))).toBeUndefined();
  });
});
