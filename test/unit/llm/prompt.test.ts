import { describe, it, expect } from "vitest";
import { createCommandSchema } from "../../../src/commands/schema";
import { buildSystemPrompt, buildUserMessage } from "../../../src/llm/prompt";

describe("buildSystemPrompt", () => {
  const lines = buildSystemPrompt(createCommandSchema()).split("\n");

  it("lists every command with its description", () => {
    expect(lines).toContain("- move_to: Navigate to a point on the floor plan");
    expect(lines).toContain("- rotate: Turn in place");
    expect(lines).toContain("- start_patrol: Patrol a route, a number of times or continuously");
  });

  it("describes field types, ranges and defaults", () => {
    expect(lines).toContain("    - x: X coordinate; number; in [-100, 100]");
    expect(lines).toContain("    - angle: Rotation angle in degrees; number; in (0, 360]");
    expect(lines).toContain("    - direction: Direction of rotation; one of clockwise, counter_clockwise");
    expect(lines).toContain(
      "    - route: Route or area to patrol; non-empty text; known values: first_floor, second_floor, bedrooms"
    );
    expect(lines).toContain("    - repeat_count: Number of patrol loops; integer; >= 1 or -1 (continuous); default 1");
    expect(lines).toContain("    - speed: Patrol speed; one of slow, medium, fast; default medium");
  });

  it("shows an example reply per command", () => {
    expect(lines).toContain(
      '    e.g. "Go to coordinates 5, 7" -> {"response":"...","command":"move_to","command_params":{"x":5,"y":7}}'
    );
  });

  it("follows the configured workspace and routes", () => {
    const custom = buildSystemPrompt(
      createCommandSchema({ workspace: { minX: 0, maxX: 10, minY: 0, maxY: 20 }, knownRoutes: ["garden"] })
    ).split("\n");

    expect(custom).toContain("    - y: Y coordinate; number; in [0, 20]");
    expect(custom).toContain("    - route: Route or area to patrol; non-empty text; known values: garden");
  });
});

describe("buildUserMessage", () => {
  it("sends the utterance alone on a first attempt", () => {
    expect(buildUserMessage("Turn left")).toBe("Turn left");
  });

  it("appends retry context as the previous error", () => {
    expect(buildUserMessage("Turn left", "angle must be in (0, 360], got 0")).toBe(
      "Turn left\n\nPrevious error: angle must be in (0, 360], got 0"
    );
  });
});
