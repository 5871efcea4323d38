import type { SchemaObject } from "ajv";
import { CommandParams } from "../types";

type Bound = { value: number; inclusive: boolean };

export type NumberField = {
  type: "number";
  description: string;
  integer?: boolean;
  min?: Bound;
  max?: Bound;
  /** Values accepted even though they sit outside min/max. */
  sentinels?: ReadonlyArray<{ value: number; meaning: string }>;
  default?: number;
};

export type EnumField = {
  type: "enum";
  description: string;
  values: readonly string[];
  aliases?: Readonly<Record<string, string>>;
  default?: string;
};

export type TextField = {
  type: "text";
  description: string;
  suggestions?: readonly string[];
  default?: string;
};

export type FieldSpec = NumberField | EnumField | TextField;

export type CommandSpec = {
  name: string;
  description: string;
  /** Declaration order is the order fields are checked and reported in. */
  fields: Readonly<Record<string, FieldSpec>>;
  example: { utterance: string; params: CommandParams };
  summarize: (params: CommandParams) => string;
};

/** Result of matching a name against the table and normalizing its params. */
export type Prepared =
  | { recognized: false; name: string }
  | { recognized: true; spec: CommandSpec; params: unknown };

export type WorkspaceBounds = { minX: number; maxX: number; minY: number; maxY: number };

export type SchemaOptions = {
  workspace: WorkspaceBounds;
  knownRoutes: readonly string[];
};

export const DEFAULT_SCHEMA_OPTIONS: SchemaOptions = {
  workspace: { minX: -100, maxX: 100, minY: -100, maxY: 100 },
  knownRoutes: ["first_floor", "second_floor", "bedrooms"],
};

const NUMERIC_STRING = /^[+-]?(\d+(\.\d*)?|\.\d+)(e[+-]?\d+)?$/i;

export function normalizeCommandName(name: string): string {
  return name.trim().toLowerCase().replace(/[\s-]+/g, "_");
}

export function isPlainObject(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

/** "in (0, 360]", ">= 1 or -1 (continuous)"; empty when the field is unbounded. */
export function describeRange(field: NumberField): string {
  const { min, max } = field;
  let text = "";
  if (min && max) {
    text = `in ${min.inclusive ? "[" : "("}${min.value}, ${max.value}${max.inclusive ? "]" : ")"}`;
  } else if (min) {
    text = `${min.inclusive ? ">=" : ">"} ${min.value}`;
  } else if (max) {
    text = `${max.inclusive ? "<=" : "<"} ${max.value}`;
  }
  for (const sentinel of field.sentinels ?? []) {
    text += ` or ${sentinel.value} (${sentinel.meaning})`;
  }
  return text;
}

function rangeKeywords(field: NumberField): SchemaObject {
  const range: SchemaObject = {};
  if (field.min) range[field.min.inclusive ? "minimum" : "exclusiveMinimum"] = field.min.value;
  if (field.max) range[field.max.inclusive ? "maximum" : "exclusiveMaximum"] = field.max.value;
  return range;
}

function fieldSchema(field: FieldSpec): SchemaObject {
  const base: SchemaObject = field.default !== undefined ? { default: field.default } : {};
  switch (field.type) {
    case "number": {
      const range = rangeKeywords(field);
      const type = field.integer ? "integer" : "number";
      if (!field.sentinels?.length || Object.keys(range).length === 0) return { ...base, type, ...range };
      return { ...base, type, anyOf: [range, ...field.sentinels.map((s) => ({ const: s.value }))] };
    }
    case "enum":
      return { ...base, type: "string", enum: [...field.values] };
    case "text":
      return { ...base, type: "string", minLength: 1 };
  }
}

/** JSON Schema of a command's params, as compiled by the validator. */
export function paramsSchema(spec: CommandSpec): SchemaObject {
  const entries = Object.entries(spec.fields);
  return {
    type: "object",
    properties: Object.fromEntries(entries.map(([name, field]) => [name, fieldSchema(field)])),
    required: entries.filter(([, field]) => field.default === undefined).map(([name]) => name),
    additionalProperties: false,
  };
}

/** Numeric strings to numbers, enum aliases to canonical values, text trimmed. Anything else is left for the validator to reject. */
function normalizeValue(field: FieldSpec, raw: unknown): unknown {
  if (typeof raw !== "string") return raw;
  switch (field.type) {
    case "number": {
      const trimmed = raw.trim();
      if (!NUMERIC_STRING.test(trimmed)) return raw;
      const value = Number(trimmed);
      return Number.isFinite(value) ? value : raw;
    }
    case "enum": {
      const lowered = raw.trim().toLowerCase();
      return field.aliases && Object.hasOwn(field.aliases, lowered) ? field.aliases[lowered] : lowered;
    }
    case "text":
      return raw.trim();
  }
}

export class CommandSchema {
  private specs: Map<string, CommandSpec>;

  constructor(specs: readonly CommandSpec[]) {
    this.specs = new Map(specs.map((spec) => [spec.name, spec]));
  }

  names(): string[] {
    return Array.from(this.specs.keys());
  }

  list(): CommandSpec[] {
    return Array.from(this.specs.values());
  }

  get(name: string): CommandSpec | undefined {
    return this.specs.get(normalizeCommandName(name));
  }

  /**
   * Looks the name up and normalizes the values of declared fields. Null
   * counts as absent. Undeclared keys and non-object params pass through
   * untouched so the validator can report them.
   */
  prepare(name: string, params: unknown): Prepared {
    const normalized = normalizeCommandName(name);
    const spec = this.specs.get(normalized);
    if (!spec) return { recognized: false, name: normalized };
    if (params === null || params === undefined) return { recognized: true, spec, params: {} };
    if (!isPlainObject(params)) return { recognized: true, spec, params };

    const entries = Object.entries(params)
      .filter(([key, value]) => !(value === null && Object.hasOwn(spec.fields, key)))
      .map(([key, value]): [string, unknown] =>
        Object.hasOwn(spec.fields, key) ? [key, normalizeValue(spec.fields[key], value)] : [key, value]
      );
    return { recognized: true, spec, params: Object.fromEntries(entries) };
  }
}

export function createCommandSchema(options: SchemaOptions = DEFAULT_SCHEMA_OPTIONS): CommandSchema {
  const { workspace, knownRoutes } = options;

  return new CommandSchema([
    {
      name: "move_to",
      description: "Navigate to a point on the floor plan",
      fields: {
        x: {
          type: "number",
          description: "X coordinate",
          min: { value: workspace.minX, inclusive: true },
          max: { value: workspace.maxX, inclusive: true },
        },
        y: {
          type: "number",
          description: "Y coordinate",
          min: { value: workspace.minY, inclusive: true },
          max: { value: workspace.maxY, inclusive: true },
        },
      },
      example: { utterance: "Go to coordinates 5, 7", params: { x: 5, y: 7 } },
      summarize: (p) => `Moving to coordinates (${p.x}, ${p.y}).`,
    },
    {
      name: "rotate",
      description: "Turn in place",
      fields: {
        angle: {
          type: "number",
          description: "Rotation angle in degrees",
          min: { value: 0, inclusive: false },
          max: { value: 360, inclusive: true },
        },
        direction: {
          type: "enum",
          description: "Direction of rotation",
          values: ["clockwise", "counter_clockwise"],
          aliases: {
            "counter-clockwise": "counter_clockwise",
            counterclockwise: "counter_clockwise",
            anticlockwise: "counter_clockwise",
            "anti-clockwise": "counter_clockwise",
          },
        },
      },
      example: { utterance: "Turn right 90 degrees", params: { angle: 90, direction: "clockwise" } },
      summarize: (p) => `Rotating ${p.angle} degrees ${String(p.direction).replace("_", "-")}.`,
    },
    {
      name: "start_patrol",
      description: "Patrol a route, a number of times or continuously",
      fields: {
        route: {
          type: "text",
          description: "Route or area to patrol",
          suggestions: knownRoutes,
        },
        repeat_count: {
          type: "number",
          description: "Number of patrol loops",
          integer: true,
          min: { value: 1, inclusive: true },
          sentinels: [{ value: -1, meaning: "continuous" }],
          default: 1,
        },
        speed: {
          type: "enum",
          description: "Patrol speed",
          values: ["slow", "medium", "fast"],
          default: "medium",
        },
      },
      example: {
        utterance: "Monitor the second floor continuously",
        params: { route: "second floor", repeat_count: -1, speed: "medium" },
      },
      summarize: (p) =>
        `Starting the ${p.route} patrol at ${p.speed} speed, ` +
        `${p.repeat_count === -1 ? "continuously" : `${p.repeat_count} time(s)`}.`,
    },
  ]);
}
