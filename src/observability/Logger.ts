export type LogLevel = "silent" | "error" | "warn" | "info" | "debug" | "trace";

export interface LoggerOptions {
  enabled?: boolean;
  level?: LogLevel;
  prefix?: string;
  /** Environment to read the level from. Defaults to process.env. */
  env?: NodeJS.ProcessEnv;
  /** Sink for formatted lines. Defaults to stderr, so logs never mix with chat output. */
  sink?: (line: string) => void;
}

export interface ResolvedLoggerOptions {
  enabled: boolean;
  level: LogLevel;
  prefix: string;
}

export interface Logger {
  options: ResolvedLoggerOptions;
  isEnabled(level: LogLevel): boolean;
  error(message: string, meta?: Record<string, unknown>): void;
  warn(message: string, meta?: Record<string, unknown>): void;
  info(message: string, meta?: Record<string, unknown>): void;
  debug(message: string, meta?: Record<string, unknown>): void;
  trace(message: string, meta?: Record<string, unknown>): void;
}

const LEVEL_ORDER: Record<LogLevel, number> = {
  silent: 0,
  error: 1,
  warn: 2,
  info: 3,
  debug: 4,
  trace: 5,
};

export function createLogger(options: LoggerOptions = {}): Logger {
  const resolved = resolveLoggerOptions(options);
  const sink = options.sink ?? ((line: string) => process.stderr.write(`${line}\n`));

  const isEnabled = (level: LogLevel) =>
    resolved.enabled && level !== "silent" && LEVEL_ORDER[level] <= LEVEL_ORDER[resolved.level];

  const log = (level: LogLevel, message: string, meta?: Record<string, unknown>) => {
    if (!isEnabled(level)) return;
    const prefix = `[${resolved.prefix}]`;
    const levelTag = `[${level.toUpperCase()}]`;
    const metaText = meta ? ` ${sanitizeForLog(meta, 1000)}` : "";
    sink(`${prefix} ${levelTag} ${message}${metaText}`);
  };

  return {
    options: resolved,
    isEnabled,
    error: (message, meta) => log("error", message, meta),
    warn: (message, meta) => log("warn", message, meta),
    info: (message, meta) => log("info", message, meta),
    debug: (message, meta) => log("debug", message, meta),
    trace: (message, meta) => log("trace", message, meta),
  };
}

export function resolveLoggerOptions(options: LoggerOptions = {}): ResolvedLoggerOptions {
  const envLevel = parseEnvLogLevel(options.env ?? process.env);
  const enabledFromEnv = envLevel !== undefined && envLevel !== "silent";
  const enabled = options.enabled ?? enabledFromEnv;
  const level = options.level ?? envLevel ?? (enabled ? "debug" : "silent");

  return {
    enabled,
    level,
    prefix: options.prefix ?? "mantle-chat",
  };
}

export function sanitizeForLog(value: unknown, maxLen = 500): string {
  const str = safeStringify(value, maxLen);
  return str.replace(
    /"(password|token|secret|apiKey|api_key|key|auth|authorization)":\s*"[^"]*"/gi,
    "\"$1\":\"[REDACTED]\"",
  );
}

export function summarizeForLog(value: unknown, maxLen = 200): string {
  if (value === null) return "null";
  if (value === undefined) return "undefined";
  if (typeof value === "string") {
    return value.length > maxLen ? `${value.slice(0, maxLen)}...` : value;
  }
  if (typeof value === "number" || typeof value === "boolean") {
    return String(value);
  }
  if (Array.isArray(value)) {
    return `Array(${value.length})`;
  }
  if (typeof value === "object") {
    const keys = Object.keys(value);
    const shown = keys.slice(0, 5).join(", ");
    return `Object(keys: ${shown}${keys.length > 5 ? ", ..." : ""})`;
  }
  return String(value);
}

function safeStringify(value: unknown, maxLen: number): string {
  try {
    const json = JSON.stringify(value);
    if (!json) return String(value);
    return json.length > maxLen ? `${json.slice(0, maxLen)}...` : json;
  } catch {
    const fallback = String(value);
    return fallback.length > maxLen ? `${fallback.slice(0, maxLen)}...` : fallback;
  }
}

function parseEnvLogLevel(env: NodeJS.ProcessEnv): LogLevel | undefined {
  const raw = env.MANTLE_CHAT_LOG_LEVEL ?? env.MANTLE_CHAT_DEBUG;

  if (!raw) return undefined;
  const value = raw.trim().toLowerCase();
  if (!value || value === "0" || value === "false" || value === "off") {
    return "silent";
  }
  if (value.includes("trace")) return "trace";
  if (value.includes("debug") || value === "1" || value === "true" || value === "yes") {
    return "debug";
  }
  if (value.includes("info")) return "info";
  if (value.includes("warn")) return "warn";
  if (value.includes("error")) return "error";
  if (value.includes("silent")) return "silent";
  return "debug";
}
