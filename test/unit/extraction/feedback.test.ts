import { describe, it, expect } from "vitest";
import { buildRetryContext, buildRetryFeedback } from "../../../src/extraction/feedback";

describe("buildRetryFeedback", () => {
  it("lists the reasons in order", () => {
    expect(buildRetryFeedback(["angle must be in (0, 360], got 400", "unexpected field 'speed'"])).toBe(
      "Previous attempt failed because: angle must be in (0, 360], got 400; unexpected field 'speed'. Correct and respond again."
    );
  });

  it("caps the list at five reasons", () => {
    const reasons = ["r1", "r2", "r3", "r4", "r5", "r6", "r7"];
    expect(buildRetryFeedback(reasons)).toBe(
      "Previous attempt failed because: r1; r2; r3; r4; r5 (and 2 more). Correct and respond again."
    );
  });

  it("is a pure function of its reasons", () => {
    const reasons = ["x must be in [-100, 100], got 250"];
    expect(buildRetryFeedback([...reasons])).toBe(buildRetryFeedback([...reasons]));
  });
});

describe("buildRetryContext", () => {
  it("is undefined on a first attempt without caller context", () => {
    expect(buildRetryContext([])).toBeUndefined();
  });

  it("passes caller context through on a first attempt", () => {
    expect(buildRetryContext([], "robot is docked")).toBe("robot is docked");
  });

  it("adds one line per failed attempt, oldest first", () => {
    expect(buildRetryContext([["a"], ["b"]], "robot is docked")).toBe(
      [
        "robot is docked",
        "Previous attempt failed because: a. Correct and respond again.",
        "Previous attempt failed because: b. Correct and respond again.",
      ].join("\n")
    );
  });
});
