import { inspect } from "node:util";

const LEVELS = ["debug", "info", "warn", "error"] as const;
export type LogLevel = (typeof LEVELS)[number];
type LogFormat = "pretty" | "json";

const isLogLevel = (value: string): value is LogLevel =>
  (LEVELS as readonly string[]).includes(value);

const parseLevel = (value: string | undefined): LogLevel => {
  const normalized = String(value ?? "info").toLowerCase();
  return isLogLevel(normalized) ? normalized : "info";
};

const parseFormat = (value: string | undefined): LogFormat => {
  const normalized = String(value ?? "").toLowerCase();
  if (normalized === "json") return "json";
  if (normalized === "pretty") return "pretty";
  return process.env.APP_ENV === "prod" ? "json" : "pretty";
};

const defaultLevel = (): LogLevel => {
  if (process.env.LOG_LEVEL) return parseLevel(process.env.LOG_LEVEL);
  return process.env.APP_ENV === "test" || process.env.VITEST ? "error" : "info";
};

const shouldLog = (messageLevel: LogLevel, configured: LogLevel): boolean =>
  LEVELS.indexOf(messageLevel) >= LEVELS.indexOf(configured);

const configuredLevel = defaultLevel();
const configuredFormat = parseFormat(process.env.LOG_FORMAT);

const supportColor =
  Boolean(process.stdout.isTTY) &&
  process.env.NO_COLOR === undefined &&
  process.env.TERM !== "dumb";

const levelColor: Record<LogLevel, number> = {
  debug: 90,
  info: 36,
  warn: 33,
  error: 31
};

const colorize = (text: string, colorCode: number): string =>
  supportColor ? `\u001b[${colorCode}m${text}\u001b[0m` : text;

const stamp = (): string => new Date().toISOString();

const appName = (): string => process.env.APP_NAME ?? "quoteforge";

const toJsonSafe = (value: unknown, seen = new WeakSet<object>()): unknown => {
  if (value instanceof Error) {
    return {
      name: value.name,
      message: value.message,
      stack: value.stack,
      cause: toJsonSafe(value.cause, seen)
    };
  }
  if (typeof value === "bigint") return value.toString();
  if (typeof value === "function") return `[Function ${value.name || "anonymous"}]`;
  if (!value || typeof value !== "object") return value;
  if (seen.has(value)) return "[Circular]";
  seen.add(value);

  if (Array.isArray(value)) {
    return value.map((item) => toJsonSafe(item, seen));
  }

  const out: Record<string, unknown> = {};
  for (const [key, item] of Object.entries(value)) {
    out[key] = toJsonSafe(item, seen);
  }
  return out;
};

const inspectMeta = (value: unknown): string =>
  inspect(value, {
    colors: supportColor,
    depth: 6,
    compact: false,
    breakLength: 110,
    maxArrayLength: 30
  });

const splitMessageAndMeta = (args: unknown[]): { message: string; meta: unknown[] } => {
  if (args.length === 0) return { message: "", meta: [] };
  if (typeof args[0] === "string") {
    return { message: args[0], meta: args.slice(1) };
  }
  return { message: "log", meta: args };
};

const writePretty = (level: LogLevel, scope: string | null, args: unknown[]): void => {
  const { message, meta } = splitMessageAndMeta(args);
  const levelLabel = colorize(level.toUpperCase().padEnd(5), levelColor[level]);
  const scopeLabel = scope ? ` ${colorize(`(${scope})`, 35)}` : "";
  const header = `${stamp()} ${levelLabel} [${appName()}]${scopeLabel} ${message}`;
  const sink = level === "warn" || level === "error" ? process.stderr : process.stdout;
  if (meta.length === 0) {
    sink.write(`${header}\n`);
    return;
  }

  const lines = meta.map((entry, index) => {
    const branch = index === meta.length - 1 ? "└─" : "├─";
    return `  ${branch} ${inspectMeta(entry)}`;
  });
  sink.write(`${header}\n${lines.join("\n")}\n`);
};

const writeJson = (level: LogLevel, scope: string | null, args: unknown[]): void => {
  const { message, meta } = splitMessageAndMeta(args);
  const payload = {
    timestamp: stamp(),
    level,
    app: appName(),
    scope: scope ?? undefined,
    message,
    meta: meta.length > 0 ? toJsonSafe(meta) : undefined
  };
  const sink = level === "warn" || level === "error" ? process.stderr : process.stdout;
  sink.write(`${JSON.stringify(payload)}\n`);
};

const writeLog = (level: LogLevel, scope: string | null, args: unknown[]): void => {
  if (!shouldLog(level, configuredLevel)) return;
  if (configuredFormat === "json") writeJson(level, scope, args);
  else writePretty(level, scope, args);
};

export interface Logger {
  debug: (...args: unknown[]) => void;
  info: (...args: unknown[]) => void;
  warn: (...args: unknown[]) => void;
  error: (...args: unknown[]) => void;
  child: (scope: string) => Logger;
}

const buildLogger = (scope: string | null): Logger => ({
  debug: (...args: unknown[]) => writeLog("debug", scope, args),
  info: (...args: unknown[]) => writeLog("info", scope, args),
  warn: (...args: unknown[]) => writeLog("warn", scope, args),
  error: (...args: unknown[]) => writeLog("error", scope, args),
  child: (childScope: string) => buildLogger(scope ? `${scope}:${childScope}` : childScope)
});

export const logger: Logger = buildLogger(null);
