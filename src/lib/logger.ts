export type LogLevel = "debug" | "info" | "warn" | "error";

export type LogMeta = Record<string, unknown>;

export interface Logger {
  debug(message: string, meta?: LogMeta): void;
  info(message: string, meta?: LogMeta): void;
  warn(message: string, meta?: LogMeta): void;
  error(message: string, meta?: LogMeta): void;
}

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40
};

function isLogLevel(value: string): value is LogLevel {
  return value in LEVEL_ORDER;
}

function resolveThreshold(value: string | undefined): number {
  const normalized = value?.trim().toLowerCase();
  if (normalized === "silent") {
    return Number.POSITIVE_INFINITY;
  }

  if (normalized && isLogLevel(normalized)) {
    return LEVEL_ORDER[normalized];
  }

  return LEVEL_ORDER.info;
}

function serializeMeta(meta: LogMeta): LogMeta {
  const serialized: LogMeta = {};
  for (const [key, value] of Object.entries(meta)) {
    serialized[key] =
      value instanceof Error ? { name: value.name, message: value.message, stack: value.stack } : value;
  }

  return serialized;
}

export function createLogger(scope: string, level = process.env.LOG_LEVEL): Logger {
  const threshold = resolveThreshold(level);

  const emit = (logLevel: LogLevel, message: string, meta?: LogMeta) => {
    if (LEVEL_ORDER[logLevel] < threshold) {
      return;
    }

    const line = `[${scope}] ${message}`;
    if (meta) {
      console[logLevel](line, serializeMeta(meta));
    } else {
      console[logLevel](line);
    }
  };

  return {
    debug: (message, meta) => emit("debug", message, meta),
    info: (message, meta) => emit("info", message, meta),
    warn: (message, meta) => emit("warn", message, meta),
    error: (message, meta) => emit("error", message, meta)
  };
}
