import fs from "fs";
import path from "path";
import { env } from "../config/env.js";

export type LogLevel = "debug" | "info" | "warn" | "error" | "http";

type Threshold = Exclude<LogLevel, "http">;

const levelRank: Record<Threshold, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40
};

// Request lines rank with info so LOG_LEVEL=warn silences them.
const rankFor = (level: LogLevel) => (level === "http" ? levelRank.info : levelRank[level]);

const redactedKeys = new Set(["authorization", "password", "token", "accesstoken", "refreshtoken", "apikey", "secret"]);

/** Errors become plain objects, image buffers become their size, and credentials never reach a line. */
export const toLogValue = (key: string, value: unknown): unknown => {
  if (redactedKeys.has(key.toLowerCase())) return "[redacted]";
  if (value instanceof Error) {
    return { name: value.name, message: value.message, stack: value.stack };
  }
  if (Buffer.isBuffer(value)) return { bytes: value.length };
  if (typeof value === "string" && value.startsWith("data:image/")) {
    return `${value.slice(0, value.indexOf(",") + 1)}[${value.length} chars]`;
  }
  return value;
};

export type LogRecord = {
  timestamp: string;
  level: LogLevel;
  event: string;
  service: "assetcraft-api";
  pid: number;
  data?: Record<string, unknown>;
};

export type LogSink = {
  write: (record: LogRecord, line: string) => void;
  close: () => Promise<void>;
};

export const consoleSink: LogSink = {
  write: (record, line) => {
    if (record.level === "error") {
      console.error(line);
    } else if (record.level === "warn") {
      console.warn(line);
    } else {
      console.log(line);
    }
  },
  close: async () => undefined
};

/** Appends every line to `<directory>/assetcraft-api.log` and echoes it to the console. */
export const fileSink = (directory: string): LogSink & { filePath: string } => {
  const resolved = path.resolve(process.cwd(), directory);
  fs.mkdirSync(resolved, { recursive: true });
  const filePath = path.join(resolved, "assetcraft-api.log");
  const stream = fs.createWriteStream(filePath, { flags: "a", encoding: "utf8" });

  return {
    filePath,
    write: (record, line) => {
      stream.write(`${line}\n`);
      consoleSink.write(record, line);
    },
    close: () =>
      new Promise<void>((resolve) => {
        stream.end(() => resolve());
      })
  };
};

export const createLogger = ({ level, sink }: { level: Threshold; sink: LogSink }) => {
  const threshold = levelRank[level];

  const emit = (recordLevel: LogLevel, event: string, data?: Record<string, unknown>) => {
    if (rankFor(recordLevel) < threshold) return;

    const record: LogRecord = {
      timestamp: new Date().toISOString(),
      level: recordLevel,
      event,
      service: "assetcraft-api",
      pid: process.pid,
      ...(data ? { data: Object.fromEntries(Object.entries(data).map(([key, value]) => [key, toLogValue(key, value)])) } : {})
    };
    sink.write(record, JSON.stringify(record));
  };

  return {
    debug: (event: string, data?: Record<string, unknown>) => emit("debug", event, data),
    info: (event: string, data?: Record<string, unknown>) => emit("info", event, data),
    warn: (event: string, data?: Record<string, unknown>) => emit("warn", event, data),
    error: (event: string, data?: Record<string, unknown>) => emit("error", event, data),
    http: (event: string, data?: Record<string, unknown>) => emit("http", event, data),
    close: () => sink.close()
  };
};

export type Logger = ReturnType<typeof createLogger>;

const fileOutput = env.LOG_TO_FILE ? fileSink(env.LOG_DIRECTORY) : null;

export const logger = createLogger({ level: env.LOG_LEVEL, sink: fileOutput ?? consoleSink });

export const logFilePath = fileOutput?.filePath ?? null;
