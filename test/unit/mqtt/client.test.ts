import { beforeEach, describe, it, expect, vi } from "vitest";
import { MqttSettings, RobotDispatcher, parseAck } from "../../../src/mqtt/client";
import { GatewayErrorCode, UpstreamServiceError } from "../../../src/utils/errors";
import { silentLogger } from "../../helpers/scripted-model";
import { clients, connect, lastClient } from "../../helpers/fake-mqtt";

vi.mock("mqtt", async () => {
  const fake = await import("../../helpers/fake-mqtt");
  return { connect: fake.connect };
});

const UUID = /^[0-9a-f]{8}-[0-9a-f]{4}-4[0-9a-f]{3}-[89ab][0-9a-f]{3}-[0-9a-f]{12}$/;

const settings: MqttSettings = {
  MQTT_URL: "mqtt://broker.test:1883",
  MQTT_USERNAME: "robot",
  MQTT_PASSWORD: "test-password",
  ROBOT_CMD_TOPIC: "robot/cmd",
  ROBOT_ACK_TOPIC: "robot/ack",
  MQTT_COMMAND_MAX_ATTEMPTS: 2,
  MQTT_COMMAND_BASE_DELAY_MS: 0,
  MQTT_ACK_TIMEOUT_MS: 20,
};

function dispatcher(overrides: Partial<MqttSettings> = {}) {
  return new RobotDispatcher({ ...settings, ...overrides }, silentLogger());
}

describe("RobotDispatcher", () => {
  beforeEach(() => {
    clients.length = 0;
    connect.mockClear();
  });

  it("connects with credentials and subscribes to acks once connected", () => {
    dispatcher();
    const client = lastClient();

    expect(connect).toHaveBeenCalledWith("mqtt://broker.test:1883", {
      username: "robot",
      password: "test-password",
      reconnectPeriod: 2000,
    });
    expect(client.subscribed).toEqual([]);
    client.emit("connect");
    expect(client.subscribed).toEqual(["robot/ack"]);
  });

  it("publishes the command and resolves with the robot's ack", async () => {
    const robot = dispatcher();
    const client = lastClient();
    client.onPublish = (_topic, payload) => {
      const sent: unknown = JSON.parse(payload);
      const id = typeof sent === "object" && sent !== null && "id" in sent ? sent.id : undefined;
      client.deliver("robot/ack", { id: "someone-else", status: "ok" });
      client.deliver("robot/ack", { id, status: "ok", message: "arrived" });
    };

    const ack = await robot.execute({ command: "move_to", params: { x: 5, y: 7 } }, "req-1");

    expect(client.published).toHaveLength(1);
    expect(client.published[0].topic).toBe("robot/cmd");
    const sent = JSON.parse(client.published[0].payload);
    expect(sent).toMatchObject({ correlation_id: "req-1", command: "move_to", params: { x: 5, y: 7 } });
    expect(sent.id).toMatch(UUID);
    expect(ack).toEqual({ id: sent.id, status: "ok", message: "arrived" });
  });

  it("retries a command that was never acknowledged", async () => {
    const robot = dispatcher();
    const client = lastClient();

    const call = robot.execute({ command: "rotate", params: { angle: 90, direction: "clockwise" } }, "req-1");

    await expect(call).rejects.toBeInstanceOf(UpstreamServiceError);
    await expect(call).rejects.toMatchObject({
      code: GatewayErrorCode.UPSTREAM_SERVICE,
      service: "robot",
      message: "Robot did not accept the command: Command timed out waiting for ack",
    });
    expect(client.published).toHaveLength(2);
    const [first, second] = client.published.map((p) => JSON.parse(p.payload).id);
    expect(first).not.toBe(second);
  });

  it("retries when publishing fails", async () => {
    const robot = dispatcher({ MQTT_ACK_TIMEOUT_MS: 5000 });
    const client = lastClient();
    client.publishError = new Error("client disconnecting");

    await expect(robot.execute({ command: "move_to", params: { x: 1, y: 1 } }, "req-1")).rejects.toMatchObject({
      message: "Robot did not accept the command: client disconnecting",
    });
    expect(client.published).toHaveLength(2);
  });

  it("fails pending commands on close", async () => {
    const robot = dispatcher({ MQTT_COMMAND_MAX_ATTEMPTS: 1, MQTT_ACK_TIMEOUT_MS: 5000 });
    const client = lastClient();

    const call = robot.execute({ command: "move_to", params: { x: 1, y: 1 } }, "req-1");
    await robot.close();

    await expect(call).rejects.toMatchObject({ message: "Robot did not accept the command: MQTT client closed" });
    expect(client.ended).toBe(true);
  });
});

describe("parseAck", () => {
  it("reads an ok ack with a message", () => {
    expect(parseAck('{"id": "m1", "status": "ok", "message": "done"}')).toEqual({
      id: "m1",
      status: "ok",
      message: "done",
    });
  });

  it("reads an error ack without a message", () => {
    expect(parseAck('{"id": "m1", "status": "error"}')).toEqual({ id: "m1", status: "error" });
  });

  it.each(["not json", "[]", '{"status": "ok"}', '{"id": "m1", "status": "busy"}'])("rejects %s", (payload) => {
    expect(parseAck(payload)).toBeNull();
  });
});
