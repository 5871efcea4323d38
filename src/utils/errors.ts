export enum GatewayErrorCode {
  CLIENT_INPUT = "CLIENT_INPUT",
  UPSTREAM_SERVICE = "UPSTREAM_SERVICE",
  UPSTREAM_TIMEOUT = "UPSTREAM_TIMEOUT",
  REQUEST_ABORTED = "REQUEST_ABORTED",
}

export type UpstreamService = "language-model" | "robot";

export class GatewayError extends Error {
  readonly code: GatewayErrorCode;
  readonly context?: Record<string, unknown>;

  constructor(
    code: GatewayErrorCode,
    message: string,
    context?: Record<string, unknown>,
    options?: { cause?: unknown }
  ) {
    super(message, options);
    this.name = "GatewayError";
    this.code = code;
    this.context = context;
  }
}

/** The caller sent a request the gateway will not process. Never retried. */
export class ClientInputError extends GatewayError {
  readonly field: string;

  constructor(field: string, message: string) {
    super(GatewayErrorCode.CLIENT_INPUT, message, { field });
    this.name = "ClientInputError";
    this.field = field;
  }
}

/**
 * A collaborator (language model or robot) failed, timed out or answered with
 * something unusable. Distinct from a validation failure: the extraction loop
 * never retries these.
 */
export class UpstreamServiceError extends GatewayError {
  readonly service: UpstreamService;

  constructor(
    service: UpstreamService,
    message: string,
    options?: { timeout?: boolean; cause?: unknown }
  ) {
    super(
      options?.timeout ? GatewayErrorCode.UPSTREAM_TIMEOUT : GatewayErrorCode.UPSTREAM_SERVICE,
      message,
      { service },
      { cause: options?.cause }
    );
    this.name = "UpstreamServiceError";
    this.service = service;
  }
}

export class RequestAbortedError extends GatewayError {
  constructor(message = "Request was abandoned by the caller") {
    super(GatewayErrorCode.REQUEST_ABORTED, message);
    this.name = "RequestAbortedError";
  }
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
