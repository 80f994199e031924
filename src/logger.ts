export const LOG_LEVELS = ["debug", "info", "warn", "error"] as const;
export type LogLevel = (typeof LOG_LEVELS)[number];

export type LogMeta = Record<string, unknown>;

export type Logger = {
  debug(message: string, meta?: LogMeta): void;
  info(message: string, meta?: LogMeta): void;
  warn(message: string, meta?: LogMeta): void;
  error(message: string, meta?: LogMeta): void;
};

export type LogSink = (level: LogLevel, line: string) => void;

function serializeMeta(meta: LogMeta | undefined): string | undefined {
  if (!meta || Object.keys(meta).length === 0) {
    return undefined;
  }
  try {
    return JSON.stringify(meta, (_key, value: unknown) =>
      value instanceof Error ? { name: value.name, message: value.message } : value,
    );
  } catch {
    return "[unserializable-meta]";
  }
}

export function formatLogLine(level: LogLevel, message: string, meta?: LogMeta): string {
  const payload = serializeMeta(meta);
  const head = `${level.toUpperCase()} ${message}`;
  return payload ? `${head} ${payload}` : head;
}

const consoleSink: LogSink = (level, line) => {
  switch (level) {
    case "debug":
      console.debug(line);
      break;
    case "info":
      console.info(line);
      break;
    case "warn":
      console.warn(line);
      break;
    case "error":
      console.error(line);
      break;
  }
};

export function createLogger(params: { level?: LogLevel; sink?: LogSink } = {}): Logger {
  const threshold = LOG_LEVELS.indexOf(params.level ?? "info");
  const sink = params.sink ?? consoleSink;

  const emit = (level: LogLevel, message: string, meta?: LogMeta) => {
    if (LOG_LEVELS.indexOf(level) < threshold) {
      return;
    }
    sink(level, formatLogLine(level, message, meta));
  };

  return {
    debug: (message, meta) => emit("debug", message, meta),
    info: (message, meta) => emit("info", message, meta),
    warn: (message, meta) => emit("warn", message, meta),
    error: (message, meta) => emit("error", message, meta),
  };
}

export const silentLogger: Logger = {
  debug() {},
  info() {},
  warn() {},
  error() {},
};
