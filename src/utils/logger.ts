export const LOG_LEVELS = ["debug", "info", "warn", "error"] as const;

export type LogLevel = (typeof LOG_LEVELS)[number];

type Meta = Record<string, unknown>;
type Sink = (line: string) => void;

export type Logger = {
  debug: (msg: string, meta?: Meta) => void;
  info: (msg: string, meta?: Meta) => void;
  warn: (msg: string, meta?: Meta) => void;
  error: (msg: string, meta?: Meta) => void;
  child: (bindings: Meta) => Logger;
};

const levels: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
};

export function createLogger(
  level: LogLevel,
  // eslint-disable-next-line no-console
  sink: Sink = (line) => console.log(line),
  bindings: Meta = {}
): Logger {
  const threshold = levels[level] ?? 20;

  const log = (lvl: LogLevel, msg: string, meta?: Meta) => {
    if (levels[lvl] < threshold) return;
    sink(
      JSON.stringify({
        level: lvl,
        msg,
        time: new Date().toISOString(),
        ...bindings,
        ...meta,
      })
    );
  };

  return {
    debug: (msg, meta) => log("debug", msg, meta),
    info: (msg, meta) => log("info", msg, meta),
    warn: (msg, meta) => log("warn", msg, meta),
    error: (msg, meta) => log("error", msg, meta),
    child: (extra) => createLogger(level, sink, { ...bindings, ...extra }),
  };
}
