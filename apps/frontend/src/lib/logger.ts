type LogLevel = "debug" | "info" | "warn" | "error";

const levelRank: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40
};

const isLogLevel = (value: unknown): value is LogLevel =>
  value === "debug" || value === "info" || value === "warn" || value === "error";

const configuredLevel = (): LogLevel => {
  const requested = import.meta.env.VITE_LOG_LEVEL;
  if (isLogLevel(requested)) return requested;
  return import.meta.env.MODE === "test" ? "error" : import.meta.env.DEV ? "debug" : "info";
};

const serialize = (value: unknown) => {
  if (!(value instanceof Error)) return value;
  return {
    name: value.name,
    message: value.message
  };
};

const threshold = levelRank[configuredLevel()];

const emit = (level: LogLevel, event: string, data?: Record<string, unknown>) => {
  if (levelRank[level] < threshold) return;

  const payload = data
    ? Object.fromEntries(Object.entries(data).map(([key, value]) => [key, serialize(value)]))
    : undefined;
  const record = {
    timestamp: new Date().toISOString(),
    level,
    event,
    ...(payload ? { data: payload } : {})
  };

  if (level === "error") {
    console.error(record);
  } else if (level === "warn") {
    console.warn(record);
  } else {
    console.log(record);
  }
};

export const logger = {
  debug: (event: string, data?: Record<string, unknown>) => emit("debug", event, data),
  info: (event: string, data?: Record<string, unknown>) => emit("info", event, data),
  warn: (event: string, data?: Record<string, unknown>) => emit("warn", event, data),
  error: (event: string, data?: Record<string, unknown>) => emit("error", event, data)
};
