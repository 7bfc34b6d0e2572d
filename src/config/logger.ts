export type LogLevel = "debug" | "info" | "warn" | "error";

export type LogMeta = Record<string, unknown>;

export type Logger = {
  debug: (msg: string, meta?: LogMeta) => void;
  info: (msg: string, meta?: LogMeta) => void;
  warn: (msg: string, meta?: LogMeta) => void;
  error: (msg: string, meta?: LogMeta) => void;
};

export type LogSink = (line: string) => void;

const REDACT_KEYS = ["password", "secret", "token", "authorization", "apikey", "api_key"];

const LEVEL_WEIGHT: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
};

function shouldRedactKey(key: string): boolean {
  const normalized = key.toLowerCase();
  return REDACT_KEYS.some((candidate) => normalized.includes(candidate));
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

export function sanitizeLogMeta(value: unknown): unknown {
  if (value === null || value === undefined) return value;
  if (Array.isArray(value)) return value.map((entry) => sanitizeLogMeta(entry));
  if (!isRecord(value)) return value;

  const output: Record<string, unknown> = {};
  for (const [key, innerValue] of Object.entries(value)) {
    output[key] = shouldRedactKey(key) ? "[redacted]" : sanitizeLogMeta(innerValue);
  }
  return output;
}

const stdoutSink: LogSink = (line) => {
  process.stdout.write(`${line}\n`);
};

export function createLogger(level: LogLevel = "info", sink: LogSink = stdoutSink): Logger {
  const threshold = LEVEL_WEIGHT[level];

  const write = (lvl: LogLevel, msg: string, meta?: LogMeta) => {
    if (LEVEL_WEIGHT[lvl] < threshold) return;
    const payload = {
      at: new Date().toISOString(),
      level: lvl,
      msg,
      ...(meta ? { meta: sanitizeLogMeta(meta) } : {}),
    };
    // JSONL, one event per line.
    sink(JSON.stringify(payload));
  };

  return {
    debug: (msg, meta) => write("debug", msg, meta),
    info: (msg, meta) => write("info", msg, meta),
    warn: (msg, meta) => write("warn", msg, meta),
    error: (msg, meta) => write("error", msg, meta),
  };
}

export const silentLogger: Logger = {
  debug: () => {},
  info: () => {},
  warn: () => {},
  error: () => {},
};
