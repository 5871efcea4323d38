import { createServer, type IncomingMessage, type Server, type ServerResponse } from "node:http";
import { CommandValidator } from "../commands/validator";
import { isPlainObject } from "../commands/schema";
import { Orchestrator } from "../orchestrator";
import { ClientInputError, GatewayError, GatewayErrorCode, errorMessage } from "../utils/errors";
import { Logger } from "../utils/logger";

const MAX_BODY_BYTES = 64 * 1024;

const STATUS_BY_CODE: Record<GatewayErrorCode, number> = {
  [GatewayErrorCode.CLIENT_INPUT]: 400,
  [GatewayErrorCode.UPSTREAM_SERVICE]: 502,
  [GatewayErrorCode.UPSTREAM_TIMEOUT]: 504,
  [GatewayErrorCode.REQUEST_ABORTED]: 499,
};

class BodyError extends Error {}

export type ApiServerOptions = {
  port: number;
  host?: string;
};

/** JSON API in front of the orchestrator. Uses Node's built-in http module. */
export class ApiServer {
  private server: Server | null = null;
  private options: ApiServerOptions;
  private orchestrator: Orchestrator;
  private validator: CommandValidator;
  private logger: Logger;

  constructor(options: ApiServerOptions, orchestrator: Orchestrator, validator: CommandValidator, logger: Logger) {
    this.options = options;
    this.orchestrator = orchestrator;
    this.validator = validator;
    this.logger = logger;
  }

  /** Resolves with the base URL; port 0 picks a free port. */
  async start(): Promise<string> {
    return new Promise((resolve, reject) => {
      const server = createServer((req, res) => {
        this.handleRequest(req, res).catch((err) => {
          this.logger.error("Unhandled request error", { message: errorMessage(err) });
          if (!res.headersSent) this.sendJSON(res, 500, { error: "Internal server error", code: "INTERNAL_ERROR" });
        });
      });
      server.on("error", reject);
      const host = this.options.host ?? "0.0.0.0";
      server.listen(this.options.port, host, () => {
        const address = server.address();
        const port = address && typeof address === "object" ? address.port : this.options.port;
        this.server = server;
        resolve(`http://${host === "0.0.0.0" ? "localhost" : host}:${port}`);
      });
    });
  }

  async stop(): Promise<void> {
    const server = this.server;
    this.server = null;
    if (!server) return;
    await new Promise<void>((resolve, reject) => server.close((err) => (err ? reject(err) : resolve())));
  }

  private async handleRequest(req: IncomingMessage, res: ServerResponse): Promise<void> {
    const url = new URL(req.url || "/", "http://localhost");
    const method = req.method?.toUpperCase() || "GET";

    if ((url.pathname === "/health" || url.pathname === "/") && method === "GET") {
      return this.sendJSON(res, 200, { status: "healthy" });
    }
    if (url.pathname === "/process" && method === "POST") {
      return this.handleProcess(req, res);
    }
    if (url.pathname === "/validate" && method === "POST") {
      return this.handleValidate(req, res);
    }
    this.sendJSON(res, 404, { error: "Not found", code: "NOT_FOUND" });
  }

  private async handleProcess(req: IncomingMessage, res: ServerResponse): Promise<void> {
    const body = await this.readJSON(req, res);
    if (body === undefined) return;

    // Abandon in-flight model calls when the client goes away.
    const controller = new AbortController();
    res.on("close", () => {
      if (!res.writableEnded) controller.abort();
    });

    try {
      const result = await this.orchestrator.process(body, controller.signal);
      this.sendJSON(res, 200, result);
    } catch (err) {
      if (err instanceof ClientInputError) {
        return this.sendJSON(res, 400, { error: err.message, code: err.code, field: err.field });
      }
      if (err instanceof GatewayError) {
        return this.sendJSON(res, STATUS_BY_CODE[err.code], { error: err.message, code: err.code, ...err.context });
      }
      throw err;
    }
  }

  private async handleValidate(req: IncomingMessage, res: ServerResponse): Promise<void> {
    const body = await this.readJSON(req, res);
    if (body === undefined) return;

    if (typeof body.command !== "string" || body.command.trim() === "") {
      return this.sendJSON(res, 400, { error: "Missing required field: command", code: GatewayErrorCode.CLIENT_INPUT, field: "command" });
    }

    const verdict = this.validator.validate({ command: body.command, params: body.command_params ?? null, response: "" });
    switch (verdict.kind) {
      case "valid":
        this.logger.info("Validated command", { command: verdict.command.command });
        return this.sendJSON(res, 200, {
          success: true,
          message: `Received and validated command: '${verdict.command.command}'`,
          command: verdict.command.command,
          command_params: verdict.command.params,
        });
      case "invalid":
        return this.sendJSON(res, 422, {
          success: false,
          error: `Invalid params for '${body.command}': ${verdict.reasons.join("; ")}`,
          details: verdict.reasons,
        });
      case "not_a_command":
        return this.sendJSON(res, 422, {
          success: false,
          error: `Invalid command. Reason: Unknown command name '${body.command}'`,
          details: verdict.kind,
        });
    }
  }

  /** Parsed JSON object body, or undefined after a 400/413 has been sent. */
  private async readJSON(req: IncomingMessage, res: ServerResponse): Promise<Record<string, unknown> | undefined> {
    let raw: string;
    try {
      raw = await this.readBody(req);
    } catch (err) {
      if (err instanceof BodyError) {
        this.sendJSON(res, 413, { error: err.message, code: "BODY_TOO_LARGE" });
        return undefined;
      }
      throw err;
    }

    let parsed: unknown;
    try {
      parsed = raw ? JSON.parse(raw) : {};
    } catch {
      this.sendJSON(res, 400, { error: "Invalid JSON body", code: "INVALID_JSON" });
      return undefined;
    }
    if (!isPlainObject(parsed)) {
      this.sendJSON(res, 400, { error: "Request body must be a JSON object", code: "INVALID_JSON" });
      return undefined;
    }
    return parsed;
  }

  private readBody(req: IncomingMessage): Promise<string> {
    return new Promise((resolve, reject) => {
      const chunks: Buffer[] = [];
      let size = 0;
      req.on("data", (chunk: Buffer) => {
        size += chunk.length;
        if (size <= MAX_BODY_BYTES) chunks.push(chunk);
      });
      req.on("end", () => {
        if (size > MAX_BODY_BYTES) {
          reject(new BodyError(`Request body exceeds ${MAX_BODY_BYTES} bytes`));
        } else {
          resolve(Buffer.concat(chunks).toString("utf8"));
        }
      });
      req.on("error", reject);
    });
  }

  private sendJSON(res: ServerResponse, status: number, body: unknown): void {
    if (res.writableEnded) return;
    const json = JSON.stringify(body);
    res.writeHead(status, {
      "Content-Type": "application/json",
      "Content-Length": Buffer.byteLength(json),
    });
    res.end(json);
  }
}
