import { describe, it, expect } from "vitest";
import {
  PARSE_FAILURE_REASON,
  extractJsonObject,
  normalizeWordNumbers,
  parseModelOutput,
} from "../../../src/commands/candidate";
import { createCommandSchema } from "../../../src/commands/schema";

const schema = createCommandSchema();

describe("parseModelOutput", () => {
  it("parses a well-formed reply", () => {
    const raw = '{"response": "Moving", "command": "move_to", "command_params": {"x": 5, "y": 7}}';
    expect(parseModelOutput(raw, schema)).toEqual({
      ok: true,
      candidate: { command: "move_to", params: { x: 5, y: 7 }, response: "Moving" },
    });
  });

  it("tolerates fences, prose and key aliases", () => {
    const raw = 'Sure!\n```json\n{"name": "rotate", "params": {"angle": "ninety", "direction": "clockwise"}}\n```';
    expect(parseModelOutput(raw, schema)).toEqual({
      ok: true,
      candidate: { command: "rotate", params: { angle: 90, direction: "clockwise" }, response: "" },
    });
  });

  it("normalizes word numbers only in numeric fields", () => {
    const raw = '{"command": "start_patrol", "command_params": {"route": "one", "repeat_count": "twice"}}';
    expect(parseModelOutput(raw, schema)).toEqual({
      ok: true,
      candidate: { command: "start_patrol", params: { route: "one", repeat_count: 2 }, response: "" },
    });
  });

  it("keeps conversational replies", () => {
    const raw = '{"response": " Hi there! ", "command": null, "command_params": null}';
    expect(parseModelOutput(raw, schema)).toEqual({
      ok: true,
      candidate: { command: null, params: null, response: "Hi there!" },
    });
  });

  it.each([
    ["plain text", "I can't do that"],
    ["a JSON array", "[1, 2]"],
    ["truncated JSON", '{"command": "move_to", '],
    ["a non-string command", '{"command": 5}'],
    ["an unrelated object", '{"foo": 1}'],
  ])("fails on %s", (_label, raw) => {
    expect(parseModelOutput(raw, schema)).toEqual({ ok: false, reason: PARSE_FAILURE_REASON });
  });
});

describe("extractJsonObject", () => {
  it("returns the outermost object", () => {
    expect(extractJsonObject('Here: {"a": {"b": 1}} done')).toBe('{"a": {"b": 1}}');
  });

  it("returns null when there is no object", () => {
    expect(extractJsonObject("nothing here")).toBeNull();
  });
});

describe("normalizeWordNumbers", () => {
  it("leaves params of unknown commands untouched", () => {
    expect(normalizeWordNumbers(schema, "dance", { x: "five" })).toEqual({ x: "five" });
  });

  it("leaves malformed number phrases for the validator to reject", () => {
    expect(normalizeWordNumbers(schema, "move_to", { x: "one one", y: "two" })).toEqual({ x: "one one", y: 2 });
  });

  it("leaves digits for the validator to coerce", () => {
    expect(normalizeWordNumbers(schema, "move_to", { x: "5", y: "seven" })).toEqual({ x: "5", y: 7 });
  });
});
