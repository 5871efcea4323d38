import dotenv from "dotenv";
dotenv.config();

import { createCommandSchema } from "./commands/schema";
import { CommandValidator } from "./commands/validator";
import { ExtractionLoop } from "./extraction/loop";
import { ApiServer } from "./http/server";
import { LlmClient } from "./llm/client";
import { RobotDispatcher } from "./mqtt/client";
import { Orchestrator } from "./orchestrator";
import { loadEnv } from "./utils/env";
import { createLogger } from "./utils/logger";

async function main() {
  const env = loadEnv();
  const logger = createLogger(env.LOG_LEVEL);

  const schema = createCommandSchema({
    workspace: {
      minX: env.WORKSPACE_MIN_X,
      maxX: env.WORKSPACE_MAX_X,
      minY: env.WORKSPACE_MIN_Y,
      maxY: env.WORKSPACE_MAX_Y,
    },
    knownRoutes: env.KNOWN_ROUTES,
  });
  const validator = new CommandValidator(schema);
  const llm = new LlmClient(env, schema, logger);
  const extraction = new ExtractionLoop({
    model: llm,
    schema,
    validator,
    maxAttempts: env.EXTRACTION_MAX_ATTEMPTS,
    attemptTimeoutMs: env.LLM_TIMEOUT_MS,
  });

  const dispatcher = env.MQTT_URL ? new RobotDispatcher({ ...env, MQTT_URL: env.MQTT_URL }, logger) : undefined;
  if (!dispatcher) logger.warn("MQTT_URL not set; validated commands will not be dispatched");

  const orchestrator = new Orchestrator({ extraction, schema, logger, executor: dispatcher });
  const server = new ApiServer({ port: env.PORT }, orchestrator, validator, logger);
  const url = await server.start();
  logger.info("API listening", { url, model: env.OPENAI_MODEL, maxAttempts: env.EXTRACTION_MAX_ATTEMPTS });

  // Graceful shutdown
  const shutdown = async (signal: string) => {
    logger.info(`Received ${signal}, shutting down...`);
    await server.stop();
    await dispatcher?.close();
    process.exit(0);
  };

  const onSignal = (signal: string) => {
    shutdown(signal).catch((err) => {
      logger.error("Shutdown failed", { message: String(err) });
      process.exit(1);
    });
  };
  process.on("SIGINT", () => onSignal("SIGINT"));
  process.on("SIGTERM", () => onSignal("SIGTERM"));
}

main().catch((err) => {
  // eslint-disable-next-line no-console
  console.error(err);
  process.exit(1);
});
