import { connect, MqttClient as RawClient } from "mqtt";
import { v4 as uuidv4 } from "uuid";
import { isPlainObject } from "../commands/schema";
import { AckMessage, CommandExecutor, RobotCommand } from "../types";
import { Env } from "../utils/env";
import { UpstreamServiceError, errorMessage } from "../utils/errors";
import { Logger } from "../utils/logger";

type Pending = {
  resolve: (ack: AckMessage) => void;
  reject: (err: Error) => void;
  timer: NodeJS.Timeout;
};

export type CommandMessage = {
  id: string;
  correlation_id: string;
  command: string;
  params: RobotCommand["params"];
};

export type MqttSettings = Pick<
  Env,
  | "MQTT_USERNAME"
  | "MQTT_PASSWORD"
  | "ROBOT_CMD_TOPIC"
  | "ROBOT_ACK_TOPIC"
  | "MQTT_COMMAND_MAX_ATTEMPTS"
  | "MQTT_COMMAND_BASE_DELAY_MS"
  | "MQTT_ACK_TIMEOUT_MS"
> & { MQTT_URL: string };

export function parseAck(payload: string): AckMessage | null {
  let data: unknown;
  try {
    data = JSON.parse(payload);
  } catch {
    return null;
  }
  if (!isPlainObject(data) || typeof data.id !== "string") return null;
  if (data.status !== "ok" && data.status !== "error") return null;
  return {
    id: data.id,
    status: data.status,
    ...(typeof data.message === "string" ? { message: data.message } : {}),
  };
}

/** Hands validated commands to the robot over MQTT and waits for its ack. */
export class RobotDispatcher implements CommandExecutor {
  private client: RawClient;
  private env: MqttSettings;
  private logger: Logger;
  private pending: Map<string, Pending> = new Map();

  constructor(env: MqttSettings, logger: Logger) {
    this.env = env;
    this.logger = logger;
    this.logger.info("MQTT connecting", {
      url: env.MQTT_URL,
      cmdTopic: env.ROBOT_CMD_TOPIC,
      ackTopic: env.ROBOT_ACK_TOPIC,
    });

    this.client = connect(env.MQTT_URL, {
      username: env.MQTT_USERNAME,
      password: env.MQTT_PASSWORD,
      reconnectPeriod: 2000,
    });

    this.client.on("connect", () => {
      this.logger.info("MQTT connected");
      this.client.subscribe(env.ROBOT_ACK_TOPIC);
    });

    this.client.on("reconnect", () => this.logger.debug("MQTT reconnecting"));
    this.client.on("offline", () => this.logger.warn("MQTT offline"));
    this.client.on("error", (err) => this.logger.error("MQTT error", { message: err.message }));

    this.client.on("message", (topic, payload) => {
      if (topic === env.ROBOT_ACK_TOPIC) this.handleAck(payload.toString());
    });
  }

  private handleAck(payload: string) {
    const ack = parseAck(payload);
    if (!ack) {
      this.logger.error("Failed to parse ack", { payload });
      return;
    }
    this.logger.info("MQTT ack received", { id: ack.id, status: ack.status, message: ack.message });
    const pending = this.pending.get(ack.id);
    if (pending) {
      clearTimeout(pending.timer);
      this.pending.delete(ack.id);
      pending.resolve(ack);
    } else {
      this.logger.debug("Ack with no pending request", { id: ack.id });
    }
  }

  private async sendOnce(command: RobotCommand, correlationId: string): Promise<AckMessage> {
    const id = uuidv4();
    const message: CommandMessage = {
      id,
      correlation_id: correlationId,
      command: command.command,
      params: command.params,
    };
    this.logger.info("MQTT publish", { topic: this.env.ROBOT_CMD_TOPIC, command: command.command, id, correlationId });

    // Register before publishing so a fast ack is not missed.
    const acked = new Promise<AckMessage>((resolve, reject) => {
      const timer = setTimeout(() => {
        this.pending.delete(id);
        reject(new Error("Command timed out waiting for ack"));
      }, this.env.MQTT_ACK_TIMEOUT_MS);
      this.pending.set(id, { resolve, reject, timer });
    });

    try {
      await new Promise<void>((resolve, reject) => {
        this.client.publish(this.env.ROBOT_CMD_TOPIC, JSON.stringify(message), (err) => {
          if (err) {
            this.logger.error("MQTT publish error", { message: err.message });
            reject(err);
          } else {
            resolve();
          }
        });
      });
    } catch (err) {
      const pending = this.pending.get(id);
      if (pending) {
        clearTimeout(pending.timer);
        this.pending.delete(id);
      }
      throw err;
    }

    return acked;
  }

  async execute(command: RobotCommand, correlationId: string): Promise<AckMessage> {
    const maxAttempts = Math.max(1, this.env.MQTT_COMMAND_MAX_ATTEMPTS || 1);
    const baseDelay = Math.max(0, this.env.MQTT_COMMAND_BASE_DELAY_MS);
    let lastError: unknown = null;

    for (let attempt = 1; attempt <= maxAttempts; attempt++) {
      try {
        return await this.sendOnce(command, correlationId);
      } catch (err) {
        lastError = err;
        if (attempt === maxAttempts) break;
        const delay = baseDelay * Math.pow(2, attempt - 1);
        this.logger.warn("MQTT command retry", {
          attempt,
          maxAttempts,
          delayMs: delay,
          message: errorMessage(err),
        });
        await new Promise((resolve) => setTimeout(resolve, delay));
      }
    }

    throw new UpstreamServiceError("robot", `Robot did not accept the command: ${errorMessage(lastError)}`, {
      cause: lastError,
    });
  }

  async close() {
    this.logger.info("Closing MQTT client");
    for (const [id, pending] of this.pending) {
      clearTimeout(pending.timer);
      pending.reject(new Error("MQTT client closed"));
      this.pending.delete(id);
    }
    await this.client.endAsync();
  }
}
