export type ParamValue = number | string;

export type CommandParams = Readonly<Record<string, ParamValue>>;

/** A command that has passed every structural and range check of its kind. */
export type RobotCommand = {
  command: string;
  params: CommandParams;
};

/** Unvalidated attempt at a command, as parsed out of raw model output. */
export type Candidate = {
  command: string | null;
  params: unknown;
  response: string;
};

export type Verdict =
  | { kind: "valid"; command: RobotCommand }
  | { kind: "invalid"; reasons: string[] }
  | { kind: "not_a_command" };

export type ModelRequest = {
  user_input: string;
  retry_context?: string;
};

export type ModelCallOptions = {
  signal: AbortSignal;
  correlationId: string;
};

/** Capability the extraction loop calls through; swapped for a scripted stub in tests. */
export interface LanguageModel {
  generate(request: ModelRequest, options: ModelCallOptions): Promise<string>;
}

export type ExtractionAttempt = {
  attempt: number;
  rawOutput: string;
  candidate: Candidate | null;
  verdict: Verdict;
  feedback?: string;
};

export type ExtractionOutcome =
  | { status: "command"; command: RobotCommand; response: string }
  | { status: "no_command"; response: string }
  | { status: "exhausted"; reasons: string[] };

export type RequestContext = {
  readonly correlationId: string;
  readonly userInput: string;
  readonly retryContext?: string;
  readonly startedAt: number;
  readonly attempts: ExtractionAttempt[];
  outcome?: ExtractionOutcome;
};

export type AckMessage = {
  id: string;
  status: "ok" | "error";
  message?: string;
};

export interface CommandExecutor {
  execute(command: RobotCommand, correlationId: string): Promise<AckMessage>;
}

export type ProcessRequest = {
  user_input?: unknown;
  retry_context?: unknown;
};

export type ExhaustedDiagnostic = {
  code: "EXTRACTION_EXHAUSTED";
  attempts: number;
  reasons: string[];
};

export type ProcessResponse = {
  correlation_id: string;
  response: string;
  command: string | null;
  command_params: CommandParams | null;
  diagnostic?: ExhaustedDiagnostic;
  execution?: { status: AckMessage["status"]; message?: string };
};
