import { vi } from "vitest";

type Handler = (...args: unknown[]) => void;

/** In-process stand-in for an mqtt.js client; tests drive it through emit(). */
export class FakeMqttClient {
  readonly published: { topic: string; payload: string }[] = [];
  readonly subscribed: string[] = [];
  publishError: Error | null = null;
  onPublish: ((topic: string, payload: string) => void) | null = null;
  ended = false;
  private handlers = new Map<string, Handler[]>();

  on(event: string, handler: Handler): void {
    this.handlers.set(event, [...(this.handlers.get(event) ?? []), handler]);
  }

  emit(event: string, ...args: unknown[]): void {
    for (const handler of this.handlers.get(event) ?? []) handler(...args);
  }

  deliver(topic: string, body: unknown): void {
    this.emit("message", topic, Buffer.from(typeof body === "string" ? body : JSON.stringify(body)));
  }

  subscribe(topic: string): void {
    this.subscribed.push(topic);
  }

  publish(topic: string, payload: string, callback?: (err?: Error) => void): void {
    this.published.push({ topic, payload });
    callback?.(this.publishError ?? undefined);
    this.onPublish?.(topic, payload);
  }

  async endAsync(): Promise<void> {
    this.ended = true;
  }

  end(): void {
    this.ended = true;
  }
}

export const clients: FakeMqttClient[] = [];

export const connect = vi.fn((_url: string, _options?: unknown) => {
  const client = new FakeMqttClient();
  clients.push(client);
  return client;
});

export function lastClient(): FakeMqttClient {
  const client = clients[clients.length - 1];
  if (!client) throw new Error("no MQTT client was created");
  return client;
}
