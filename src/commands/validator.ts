import Ajv, { ErrorObject, ValidateFunction } from "ajv";
import { Candidate, CommandParams, Verdict } from "../types";
import { CommandSchema, CommandSpec, describeRange, normalizeCommandName, paramsSchema } from "./schema";

const NON_COMMAND_NAMES = new Set(["", "none", "null"]);

const ajv = new Ajv({
  allErrors: true, // every violation goes back to the model in one round
  verbose: true, // errors carry the offending value
  useDefaults: true,
  strict: false,
  strictNumbers: true, // NaN and Infinity fail "number"
});

function formatValue(value: unknown): string {
  if (typeof value === "number") return String(value);
  try {
    return JSON.stringify(value) ?? String(value);
  } catch {
    return String(value);
  }
}

/** Lower wins when one field fails several keywords. */
function rank(error: ErrorObject): number {
  return error.keyword === "type" ? 0 : 1;
}

function describeFieldError(field: string, spec: CommandSpec, error: ErrorObject): string {
  const fieldSpec = spec.fields[field];
  const value: unknown = error.data;
  switch (error.keyword) {
    case "required":
      return `missing required field '${field}'`;
    case "type":
      if (fieldSpec?.type !== "number") return `${field} must be a string, got ${formatValue(value)}`;
      if (typeof value === "number" && Number.isFinite(value)) return `${field} must be an integer, got ${value}`;
      return `${field} must be a number, got ${formatValue(value)}`;
    case "enum":
      return fieldSpec?.type === "enum"
        ? `${field} must be one of ${fieldSpec.values.join(", ")}, got ${formatValue(value)}`
        : `${field} ${error.message ?? "is invalid"}`;
    case "minLength":
      return `${field} must be a non-empty string`;
    default:
      return fieldSpec?.type === "number"
        ? `${field} must be ${describeRange(fieldSpec)}, got ${formatValue(value)}`
        : `${field} ${error.message ?? "is invalid"}`;
  }
}

export class CommandValidator {
  private schema: CommandSchema;
  private compiled: Map<string, ValidateFunction<CommandParams>>;

  constructor(schema: CommandSchema) {
    this.schema = schema;
    this.compiled = new Map(
      schema.list().map((spec): [string, ValidateFunction<CommandParams>] => [
        spec.name,
        ajv.compile<CommandParams>(paramsSchema(spec)),
      ])
    );
  }

  /**
   * Classifies a candidate. All violations are collected, in schema field
   * order followed by unexpected fields, so one corrective round can address
   * every problem. Same candidate in, same reasons out.
   */
  validate(candidate: Candidate): Verdict {
    const name = candidate.command === null ? "" : normalizeCommandName(candidate.command);
    if (NON_COMMAND_NAMES.has(name)) return { kind: "not_a_command" };

    const prepared = this.schema.prepare(name, candidate.params);
    const check = prepared.recognized ? this.compiled.get(prepared.spec.name) : undefined;
    if (!prepared.recognized || !check) return { kind: "not_a_command" };

    const { spec, params } = prepared;
    if (check(params)) {
      return { kind: "valid", command: { command: spec.name, params } };
    }
    return { kind: "invalid", reasons: this.describeErrors(spec, check.errors ?? []) };
  }

  private describeErrors(spec: CommandSpec, errors: ErrorObject[]): string[] {
    const byField = new Map<string, ErrorObject>();
    const unexpected: string[] = [];

    for (const error of errors) {
      if (error.instancePath === "") {
        if (error.keyword === "type") return ["command_params must be an object"];
        if (error.keyword === "additionalProperties") unexpected.push(String(error.params.additionalProperty));
        if (error.keyword === "required") byField.set(String(error.params.missingProperty), error);
        continue;
      }
      const field = error.instancePath.slice(1).split("/")[0];
      const current = byField.get(field);
      if (!current || rank(error) < rank(current)) byField.set(field, error);
    }

    const reasons: string[] = [];
    for (const field of Object.keys(spec.fields)) {
      const error = byField.get(field);
      if (error) reasons.push(describeFieldError(field, spec, error));
    }
    for (const field of unexpected) {
      reasons.push(`unexpected field '${field}'`);
    }
    return reasons;
  }
}
