import { v4 as uuidv4 } from "uuid";
import { CommandSchema } from "../commands/schema";
import { ExtractionLoop } from "../extraction/loop";
import {
  CommandExecutor,
  ExtractionOutcome,
  ProcessRequest,
  ProcessResponse,
  RequestContext,
} from "../types";
import { ClientInputError, GatewayError, errorMessage } from "../utils/errors";
import { Logger } from "../utils/logger";

export const DEFAULT_CHAT_REPLY = "I'm ready to help with robot commands!";
export const EXHAUSTED_REPLY =
  "Sorry, I couldn't turn that into a command I can safely run. Could you rephrase it?";

export type OrchestratorDeps = {
  extraction: ExtractionLoop;
  schema: CommandSchema;
  logger: Logger;
  generateId?: () => string;
  executor?: CommandExecutor;
};

function readInput(request: ProcessRequest): { userInput: string; retryContext?: string } {
  const { user_input: userInput, retry_context: retryContext } = request;
  if (typeof userInput !== "string" || userInput.trim() === "") {
    throw new ClientInputError("user_input", "Missing required field: user_input");
  }
  if (retryContext !== undefined && retryContext !== null && typeof retryContext !== "string") {
    throw new ClientInputError("retry_context", "retry_context must be a string");
  }
  const trimmedContext = typeof retryContext === "string" ? retryContext.trim() : "";
  return { userInput: userInput.trim(), ...(trimmedContext ? { retryContext: trimmedContext } : {}) };
}

/**
 * Entry point for one utterance: guards input, tags the request with a
 * correlation ID, runs extraction and maps its outcome to a response.
 */
export class Orchestrator {
  private extraction: ExtractionLoop;
  private schema: CommandSchema;
  private logger: Logger;
  private generateId: () => string;
  private executor?: CommandExecutor;

  constructor(deps: OrchestratorDeps) {
    this.extraction = deps.extraction;
    this.schema = deps.schema;
    this.logger = deps.logger;
    this.generateId = deps.generateId ?? uuidv4;
    this.executor = deps.executor;
  }

  async process(request: ProcessRequest, signal?: AbortSignal): Promise<ProcessResponse> {
    const input = readInput(request);
    const context: RequestContext = {
      correlationId: this.generateId(),
      userInput: input.userInput,
      retryContext: input.retryContext,
      startedAt: Date.now(),
      attempts: [],
    };
    const logger = this.logger.child({ correlationId: context.correlationId });
    logger.info("Request received", { userInput: context.userInput, retry: Boolean(context.retryContext) });

    try {
      context.outcome = await this.extraction.run(context, logger, signal);
      const response = await this.respond(context, context.outcome, logger);
      logger.info("Request completed", {
        status: context.outcome.status,
        command: response.command,
        attempts: context.attempts.length,
        duration_ms: Date.now() - context.startedAt,
      });
      return response;
    } catch (err) {
      logger.error("Request failed", {
        code: err instanceof GatewayError ? err.code : "INTERNAL",
        message: errorMessage(err),
        attempts: context.attempts.length,
        duration_ms: Date.now() - context.startedAt,
      });
      throw err;
    }
  }

  private async respond(context: RequestContext, outcome: ExtractionOutcome, logger: Logger): Promise<ProcessResponse> {
    const base = { correlation_id: context.correlationId };

    switch (outcome.status) {
      case "no_command":
        return { ...base, response: outcome.response || DEFAULT_CHAT_REPLY, command: null, command_params: null };
      case "exhausted":
        return {
          ...base,
          response: EXHAUSTED_REPLY,
          command: null,
          command_params: null,
          diagnostic: { code: "EXTRACTION_EXHAUSTED", attempts: context.attempts.length, reasons: outcome.reasons },
        };
      case "command": {
        const { command } = outcome;
        const confirmation = outcome.response || this.schema.get(command.command)?.summarize(command.params) || "";
        const response: ProcessResponse = {
          ...base,
          response: confirmation,
          command: command.command,
          command_params: command.params,
        };
        if (this.executor) {
          const ack = await this.executor.execute(command, context.correlationId);
          logger.info("Command executed", { command: command.command, status: ack.status });
          response.execution = { status: ack.status, ...(ack.message ? { message: ack.message } : {}) };
        }
        return response;
      }
    }
  }
}
