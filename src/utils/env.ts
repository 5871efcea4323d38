import { LogLevel, LOG_LEVELS } from "./logger";

export type Env = {
  OPENAI_API_KEY: string;
  OPENAI_BASE_URL?: string;
  OPENAI_MODEL: string;
  LLM_TIMEOUT_MS: number;
  EXTRACTION_MAX_ATTEMPTS: number;
  WORKSPACE_MIN_X: number;
  WORKSPACE_MAX_X: number;
  WORKSPACE_MIN_Y: number;
  WORKSPACE_MAX_Y: number;
  KNOWN_ROUTES: string[];
  PORT: number;
  LOG_LEVEL: LogLevel;
  MQTT_URL?: string;
  MQTT_USERNAME?: string;
  MQTT_PASSWORD?: string;
  ROBOT_CMD_TOPIC: string;
  ROBOT_ACK_TOPIC: string;
  MQTT_COMMAND_MAX_ATTEMPTS: number;
  MQTT_COMMAND_BASE_DELAY_MS: number;
  MQTT_ACK_TIMEOUT_MS: number;
};

type Source = Record<string, string | undefined>;

function readNumber(source: Source, key: string, fallback: number): number {
  const raw = source[key];
  if (raw === undefined || raw.trim() === "") return fallback;
  const value = Number(raw);
  if (!Number.isFinite(value)) {
    throw new Error(`Invalid numeric env: ${key}=${raw}`);
  }
  return value;
}

function readLogLevel(source: Source): LogLevel {
  const raw = source.LOG_LEVEL;
  if (!raw) return "info";
  const match = LOG_LEVELS.find((level) => level === raw);
  if (!match) {
    throw new Error(`Invalid LOG_LEVEL: ${raw} (expected one of ${LOG_LEVELS.join(", ")})`);
  }
  return match;
}

function readList(raw: string | undefined, fallback: string[]): string[] {
  const items = (raw || "")
    .split(",")
    .map((v) => v.trim())
    .filter(Boolean);
  return items.length ? items : fallback;
}

export function loadEnv(source: Source = process.env): Env {
  const baseUrl = source.OPENAI_BASE_URL || undefined;
  // OpenAI-compatible local runners accept any key.
  const apiKey = source.OPENAI_API_KEY || (baseUrl ? "not-needed" : undefined);
  if (!apiKey) {
    throw new Error("Missing required env: OPENAI_API_KEY");
  }

  const env: Env = {
    OPENAI_API_KEY: apiKey,
    OPENAI_BASE_URL: baseUrl,
    OPENAI_MODEL: source.OPENAI_MODEL || "gpt-4o-mini",
    LLM_TIMEOUT_MS: readNumber(source, "LLM_TIMEOUT_MS", 30000),
    EXTRACTION_MAX_ATTEMPTS: readNumber(source, "EXTRACTION_MAX_ATTEMPTS", 2),
    WORKSPACE_MIN_X: readNumber(source, "WORKSPACE_MIN_X", -100),
    WORKSPACE_MAX_X: readNumber(source, "WORKSPACE_MAX_X", 100),
    WORKSPACE_MIN_Y: readNumber(source, "WORKSPACE_MIN_Y", -100),
    WORKSPACE_MAX_Y: readNumber(source, "WORKSPACE_MAX_Y", 100),
    KNOWN_ROUTES: readList(source.KNOWN_ROUTES, ["first_floor", "second_floor", "bedrooms"]),
    PORT: readNumber(source, "PORT", 8001),
    LOG_LEVEL: readLogLevel(source),
    MQTT_URL: source.MQTT_URL || undefined,
    MQTT_USERNAME: source.MQTT_USERNAME,
    MQTT_PASSWORD: source.MQTT_PASSWORD,
    ROBOT_CMD_TOPIC: source.ROBOT_CMD_TOPIC || "robot/cmd",
    ROBOT_ACK_TOPIC: source.ROBOT_ACK_TOPIC || "robot/ack",
    MQTT_COMMAND_MAX_ATTEMPTS: readNumber(source, "MQTT_COMMAND_MAX_ATTEMPTS", 3),
    MQTT_COMMAND_BASE_DELAY_MS: readNumber(source, "MQTT_COMMAND_BASE_DELAY_MS", 1000),
    MQTT_ACK_TIMEOUT_MS: readNumber(source, "MQTT_ACK_TIMEOUT_MS", 8000),
  };

  if (!Number.isInteger(env.EXTRACTION_MAX_ATTEMPTS) || env.EXTRACTION_MAX_ATTEMPTS < 1) {
    throw new Error(`EXTRACTION_MAX_ATTEMPTS must be a positive integer, got ${env.EXTRACTION_MAX_ATTEMPTS}`);
  }
  if (env.WORKSPACE_MIN_X >= env.WORKSPACE_MAX_X || env.WORKSPACE_MIN_Y >= env.WORKSPACE_MAX_Y) {
    throw new Error("Workspace bounds must satisfy MIN < MAX on both axes");
  }

  return env;
}
