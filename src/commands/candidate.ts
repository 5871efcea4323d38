import { Candidate } from "../types";
import { parseWordNumber } from "./numbers";
import { CommandSchema, isPlainObject } from "./schema";

export type ParseResult = { ok: true; candidate: Candidate } | { ok: false; reason: string };

export const PARSE_FAILURE_REASON =
  'response was not a JSON object with "response", "command" and "command_params"';

const COMMAND_KEYS = ["command", "name", "action"];
const PARAMS_KEYS = ["command_params", "params", "parameters"];
const RESPONSE_KEYS = ["response", "message", "reply"];

function pick(source: Record<string, unknown>, keys: string[]): unknown {
  for (const key of keys) {
    if (key in source) return source[key];
  }
  return undefined;
}

/** Pulls the JSON object out of a reply that may be fenced or wrapped in prose. */
export function extractJsonObject(raw: string): string | null {
  const fenced = raw.match(/```(?:json)?\s*([\s\S]*?)```/i);
  const text = fenced ? fenced[1] : raw;
  const start = text.indexOf("{");
  const end = text.lastIndexOf("}");
  if (start === -1 || end <= start) return null;
  return text.slice(start, end + 1);
}

/**
 * Replaces word numbers ("five") with numbers in the fields the schema
 * declares numeric. Everything past this point only sees normalized values.
 */
export function normalizeWordNumbers(schema: CommandSchema, command: string, params: unknown): unknown {
  const spec = schema.get(command);
  if (!spec || !isPlainObject(params)) return params;

  const normalized: Record<string, unknown> = { ...params };
  for (const [field, fieldSpec] of Object.entries(spec.fields)) {
    const value = normalized[field];
    if (fieldSpec.type !== "number" || typeof value !== "string") continue;
    const parsed = parseWordNumber(value);
    if (parsed !== null) normalized[field] = parsed;
  }
  return normalized;
}

/** Best-effort structural parse of raw model text. Never throws. */
export function parseModelOutput(raw: string, schema: CommandSchema): ParseResult {
  const failure: ParseResult = { ok: false, reason: PARSE_FAILURE_REASON };

  const json = extractJsonObject(raw);
  if (!json) return failure;

  let parsed: unknown;
  try {
    parsed = JSON.parse(json);
  } catch {
    return failure;
  }
  if (!isPlainObject(parsed)) return failure;

  const command = pick(parsed, COMMAND_KEYS);
  const params = pick(parsed, PARAMS_KEYS);
  const response = pick(parsed, RESPONSE_KEYS);

  if (command === undefined && params === undefined && response === undefined) return failure;
  if (command !== undefined && command !== null && typeof command !== "string") return failure;

  const name = typeof command === "string" ? command : null;
  return {
    ok: true,
    candidate: {
      command: name,
      params: name === null ? (params ?? null) : normalizeWordNumbers(schema, name, params ?? null),
      response: typeof response === "string" ? response.trim() : "",
    },
  };
}
