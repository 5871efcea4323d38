import { connect, MqttClient as RawClient } from "mqtt";
import { isPlainObject } from "../commands/schema";
import { AckMessage } from "../types";
import { Logger } from "../utils/logger";
import { CommandMessage } from "./client";

export function parseCommandMessage(payload: string): CommandMessage | null {
  let data: unknown;
  try {
    data = JSON.parse(payload);
  } catch {
    return null;
  }
  if (!isPlainObject(data) || !isPlainObject(data.params)) return null;
  if (typeof data.id !== "string" || typeof data.command !== "string") return null;

  const params: Record<string, number | string> = {};
  for (const [key, value] of Object.entries(data.params)) {
    if (typeof value === "number" || typeof value === "string") params[key] = value;
  }
  return {
    id: data.id,
    correlation_id: typeof data.correlation_id === "string" ? data.correlation_id : "unknown",
    command: data.command,
    params,
  };
}

/** What the robot would do; the text comes back in the ack. */
export function simulateRobotAction(message: CommandMessage): AckMessage {
  const p = message.params;
  switch (message.command) {
    case "move_to":
      return { id: message.id, status: "ok", message: `SIMULATION: Robot navigating to coordinates (${p.x}, ${p.y})` };
    case "rotate":
      return { id: message.id, status: "ok", message: `SIMULATION: Robot rotating ${p.angle} degrees ${p.direction}` };
    case "start_patrol": {
      const repeat = p.repeat_count === -1 ? "continuous patrol" : `${p.repeat_count ?? 1} time(s)`;
      return {
        id: message.id,
        status: "ok",
        message: `SIMULATION: Robot starting ${p.route} patrol at ${p.speed ?? "medium"} speed, repeating ${repeat}`,
      };
    }
    default:
      return { id: message.id, status: "error", message: `Unknown command in simulation: ${message.command}` };
  }
}

export type SimulatorOptions = {
  url: string;
  cmdTopic: string;
  ackTopic: string;
};

export function startSimulator(options: SimulatorOptions, logger: Logger): RawClient {
  const client = connect(options.url);

  client.on("connect", () => {
    logger.info("Simulator connected to MQTT", { url: options.url });
    client.subscribe(options.cmdTopic);
  });

  client.on("message", (topic, payload) => {
    if (topic !== options.cmdTopic) return;
    const message = parseCommandMessage(payload.toString());
    if (!message) {
      logger.error("Bad command payload", { payload: payload.toString() });
      return;
    }
    const ack = simulateRobotAction(message);
    logger.info("Simulated command", { correlationId: message.correlation_id, command: message.command, ack });
    client.publish(options.ackTopic, JSON.stringify(ack));
  });

  client.on("error", (err) => logger.error("Simulator MQTT error", { message: err.message }));
  return client;
}
