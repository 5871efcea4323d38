import { parseModelOutput } from "../commands/candidate";
import { CommandSchema } from "../commands/schema";
import { CommandValidator } from "../commands/validator";
import {
  ExtractionAttempt,
  ExtractionOutcome,
  LanguageModel,
  ModelRequest,
  RequestContext,
  Verdict,
} from "../types";
import { GatewayError, RequestAbortedError, UpstreamServiceError, errorMessage } from "../utils/errors";
import { Logger } from "../utils/logger";
import { buildRetryContext, buildRetryFeedback } from "./feedback";

export const DEFAULT_MAX_ATTEMPTS = 2;
export const DEFAULT_ATTEMPT_TIMEOUT_MS = 30000;

export type ExtractionLoopOptions = {
  model: LanguageModel;
  schema: CommandSchema;
  validator: CommandValidator;
  maxAttempts?: number;
  attemptTimeoutMs?: number;
};

function rejectOnAbort(signal: AbortSignal): Promise<never> {
  return new Promise((_, reject) => {
    signal.addEventListener("abort", () => reject(signal.reason), { once: true });
  });
}

/**
 * Drives the language model until it yields a valid command, a non-command,
 * or the attempt budget runs out. Only validation failures are retried;
 * anything the model service itself throws ends the request.
 */
export class ExtractionLoop {
  private model: LanguageModel;
  private schema: CommandSchema;
  private validator: CommandValidator;
  private maxAttempts: number;
  private attemptTimeoutMs: number;

  constructor(options: ExtractionLoopOptions) {
    this.model = options.model;
    this.schema = options.schema;
    this.validator = options.validator;
    this.maxAttempts = Math.max(1, Math.floor(options.maxAttempts ?? DEFAULT_MAX_ATTEMPTS));
    this.attemptTimeoutMs = options.attemptTimeoutMs ?? DEFAULT_ATTEMPT_TIMEOUT_MS;
  }

  async run(context: RequestContext, logger: Logger, signal?: AbortSignal): Promise<ExtractionOutcome> {
    const failures: string[][] = [];
    let lastReasons: string[] = [];

    for (let attempt = 1; attempt <= this.maxAttempts; attempt++) {
      const retryContext = buildRetryContext(failures, context.retryContext);
      const request: ModelRequest = {
        user_input: context.userInput,
        ...(retryContext ? { retry_context: retryContext } : {}),
      };
      logger.info("Extraction attempt", { attempt, maxAttempts: this.maxAttempts, retry: failures.length > 0 });

      const rawOutput = await this.callModel(request, context.correlationId, signal);
      const parsed = parseModelOutput(rawOutput, this.schema);
      const verdict: Verdict = parsed.ok
        ? this.validator.validate(parsed.candidate)
        : { kind: "invalid", reasons: [parsed.reason] };

      const record: ExtractionAttempt = {
        attempt,
        rawOutput,
        candidate: parsed.ok ? parsed.candidate : null,
        verdict,
      };
      context.attempts.push(record);
      const response = parsed.ok ? parsed.candidate.response : "";

      if (verdict.kind === "valid") {
        logger.info("Command validated", { attempt, command: verdict.command.command });
        return { status: "command", command: verdict.command, response };
      }
      if (verdict.kind === "not_a_command") {
        logger.info("No command in reply", { attempt });
        return { status: "no_command", response };
      }

      lastReasons = verdict.reasons;
      failures.push(verdict.reasons);
      logger.warn("Candidate rejected", { attempt, reasons: verdict.reasons });
      if (attempt < this.maxAttempts) {
        record.feedback = buildRetryFeedback(verdict.reasons);
      }
    }

    logger.warn("Extraction exhausted", { attempts: this.maxAttempts, reasons: lastReasons });
    return { status: "exhausted", reasons: lastReasons };
  }

  private async callModel(request: ModelRequest, correlationId: string, signal?: AbortSignal): Promise<string> {
    if (signal?.aborted) throw new RequestAbortedError();

    const controller = new AbortController();
    const timer = setTimeout(() => {
      controller.abort(
        new UpstreamServiceError("language-model", `Language model timed out after ${this.attemptTimeoutMs}ms`, {
          timeout: true,
        })
      );
    }, this.attemptTimeoutMs);
    const onCallerAbort = () => controller.abort(new RequestAbortedError());
    signal?.addEventListener("abort", onCallerAbort, { once: true });

    try {
      return await Promise.race([
        this.model.generate(request, { signal: controller.signal, correlationId }),
        rejectOnAbort(controller.signal),
      ]);
    } catch (err) {
      const reason: unknown = controller.signal.aborted ? controller.signal.reason : err;
      if (reason instanceof GatewayError) throw reason;
      throw new UpstreamServiceError("language-model", `Language model request failed: ${errorMessage(reason)}`, {
        cause: reason,
      });
    } finally {
      clearTimeout(timer);
      signal?.removeEventListener("abort", onCallerAbort);
    }
  }
}
