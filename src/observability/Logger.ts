export type LogLevel = "silent" | "error" | "warn" | "info" | "debug";

export interface DebugOptions {
  enabled?: boolean;
  level?: LogLevel;
  /** Log validated tool arguments (sanitized) */
  includeArgs?: boolean;
  /** Log tool observations */
  includeResults?: boolean;
  /** Log raw decision text */
  includeRaw?: boolean;
  /** Echo every trace event at debug level */
  logEvents?: boolean;
  prefix?: string;
}

export interface ResolvedDebugOptions {
  enabled: boolean;
  level: LogLevel;
  includeArgs: boolean;
  includeResults: boolean;
  includeRaw: boolean;
  logEvents: boolean;
  prefix: string;
}

export type LogFields = Record<string, unknown>;

export interface Logger {
  readonly options: ResolvedDebugOptions;
  isEnabled(level: LogLevel): boolean;
  error(message: string, meta?: LogFields): void;
  warn(message: string, meta?: LogFields): void;
  info(message: string, meta?: LogFields): void;
  debug(message: string, meta?: LogFields): void;
  /** Logger that stamps `bindings` ahead of every entry's metadata (e.g. a session id). */
  child(bindings: LogFields): Logger;
}

const LEVEL_ORDER: Record<LogLevel, number> = {
  silent: 0,
  error: 1,
  warn: 2,
  info: 3,
  debug: 4,
};

const WRITERS: Record<Exclude<LogLevel, "silent">, (line: string) => void> = {
  error: (line) => console.error(line),
  warn: (line) => console.warn(line),
  info: (line) => console.info(line),
  debug: (line) => console.log(line),
};

/**
 * Leveled console logger. Disabled unless enabled explicitly or through
 * AGENT_LOG_LEVEL / AGENT_DEBUG / DEBUG.
 */
export function createLogger(options: DebugOptions = {}): Logger {
  return new ConsoleLogger(resolveDebugOptions(options), {});
}

class ConsoleLogger implements Logger {
  constructor(
    readonly options: ResolvedDebugOptions,
    private readonly bindings: LogFields,
  ) {}

  isEnabled(level: LogLevel): boolean {
    return (
      this.options.enabled &&
      level !== "silent" &&
      LEVEL_ORDER[level] <= LEVEL_ORDER[this.options.level]
    );
  }

  error(message: string, meta?: LogFields): void {
    this.write("error", message, meta);
  }

  warn(message: string, meta?: LogFields): void {
    this.write("warn", message, meta);
  }

  info(message: string, meta?: LogFields): void {
    this.write("info", message, meta);
  }

  debug(message: string, meta?: LogFields): void {
    this.write("debug", message, meta);
  }

  child(bindings: LogFields): Logger {
    return new ConsoleLogger(this.options, { ...this.bindings, ...bindings });
  }

  private write(level: Exclude<LogLevel, "silent">, message: string, meta?: LogFields): void {
    if (!this.isEnabled(level)) return;
    const fields = { ...this.bindings, ...meta };
    const metaText = Object.keys(fields).length > 0 ? ` ${safeStringify(fields, 1000)}` : "";
    WRITERS[level](`[${this.options.prefix}] [${level.toUpperCase()}] ${message}${metaText}`);
  }
}

export function resolveDebugOptions(options: DebugOptions = {}): ResolvedDebugOptions {
  const envLevel = parseEnvLogLevel();
  const enabledFromEnv = envLevel !== undefined && envLevel !== "silent";
  const enabled = options.enabled ?? enabledFromEnv;
  const level =
    options.level ?? envLevel ?? (enabled ? "debug" : "silent");

  return {
    enabled,
    level,
    includeArgs: options.includeArgs ?? false,
    includeResults: options.includeResults ?? false,
    includeRaw: options.includeRaw ?? false,
    logEvents: options.logEvents ?? false,
    prefix: options.prefix ?? "agent-runtime",
  };
}

export function sanitizeForLog(value: unknown, maxLen = 500): string {
  const str = safeStringify(value, maxLen);
  return str.replace(
    /"([A-Za-z0-9_-]*(?:password|token|secret|key|auth)[A-Za-z0-9_-]*)":\s*"[^"]*"/gi,
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

function parseEnvLogLevel(): LogLevel | undefined {
  const raw =
    process.env.AGENT_LOG_LEVEL ??
    process.env.AGENT_DEBUG ??
    process.env.DEBUG;

  if (!raw) return undefined;
  const value = raw.trim().toLowerCase();
  if (!value || value === "0" || value === "false" || value === "off") {
    return "silent";
  }
  if (
    value.includes("debug") ||
    value.includes("trace") ||
    value === "1" ||
    value === "true" ||
    value === "yes"
  ) {
    return "debug";
  }
  if (value.includes("info")) return "info";
  if (value.includes("warn")) return "warn";
  if (value.includes("error")) return "error";
  if (value.includes("silent")) return "silent";
  return "debug";
}
