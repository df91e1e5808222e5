export type LogLevel = "debug" | "info" | "warn" | "error";

export type LogEntry = {
  level: LogLevel;
  message: string;
  timestamp: string;
  data?: Record<string, unknown>;
};

export type LogCallback = (entry: LogEntry) => void;

const levelOrder: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

const callbacks = new Set<LogCallback>();

/**
 * Maps the value of `CHAINTABLE_DEBUG` to a level.
 * `1` or `true` enables debug output; `warn` and `error` raise the floor.
 */
export function levelFromEnv(value: string | undefined): LogLevel {
  switch (value) {
    case "1":
    case "true":
      return "debug";
    case "warn":
    case "error":
      return value;
    default:
      return "info";
  }
}

let currentLevel: LogLevel = levelFromEnv(process.env.CHAINTABLE_DEBUG);

function log(level: LogLevel, message: string, data?: Record<string, unknown>) {
  if (levelOrder[level] < levelOrder[currentLevel]) return;

  const entry: LogEntry = {
    level,
    message,
    timestamp: new Date().toISOString(),
    data,
  };

  const line = `[chaintable] ${message}${data ? ` ${JSON.stringify(data)}` : ""}`;
  console[level](line);

  for (const cb of callbacks) {
    cb(entry);
  }
}

export function debug(message: string, data?: Record<string, unknown>) {
  log("debug", message, data);
}

export function info(message: string, data?: Record<string, unknown>) {
  log("info", message, data);
}

export function warn(message: string, data?: Record<string, unknown>) {
  log("warn", message, data);
}

export function error(message: string, data?: Record<string, unknown>) {
  log("error", message, data);
}

/**
 * Subscribe to every entry that passes the current level.
 * @returns A function that removes the subscription.
 */
export function onLog(callback: LogCallback): () => void {
  callbacks.add(callback);
  return () => {
    callbacks.delete(callback);
  };
}

export function setLogLevel(level: LogLevel) {
  currentLevel = level;
}

export function getLogLevel(): LogLevel {
  return currentLevel;
}
