import dotenv from "dotenv";
dotenv.config();

import { startSimulator } from "./mqtt/simulator";
import { createLogger, LOG_LEVELS } from "./utils/logger";

const level = LOG_LEVELS.find((l) => l === process.env.LOG_LEVEL) ?? "info";
const logger = createLogger(level);

const client = startSimulator(
  {
    url: process.env.MQTT_URL || "mqtt://localhost:1883",
    cmdTopic: process.env.ROBOT_CMD_TOPIC || "robot/cmd",
    ackTopic: process.env.ROBOT_ACK_TOPIC || "robot/ack",
  },
  logger
);

process.on("SIGINT", () => {
  logger.info("Simulator exiting");
  client.end();
  process.exit(0);
});
