// Thin interface and default logger instance
export type Level = "TRACE" | "DEBUG" | "INFO" | "WARN" | "ERROR" | "FATAL";

export interface Logger {
  debug(msg: string, meta?: unknown): void;
  info(msg: string, meta?: unknown): void;
  warn(msg: string, meta?: unknown): void;
  error(msg: string, meta?: unknown): void;
  log?(level: Level, category: string, msg: string, meta?: unknown): void;
}

const LEVELS: Level[] = ["TRACE", "DEBUG", "INFO", "WARN", "ERROR", "FATAL"];

let context: Record<string, string | number | boolean> = {};
const redactKeys = new Set<string>([
  'apikey', 'key', 'secret', 'token', 'authorization', 'auth', 'password', 'cookie',
]);
const onceFlags = new Set<string>();

/**
 * Converts a log level string to its numeric weight.
 * TRACE=0, DEBUG=10, INFO=20, WARN=30, ERROR=40, FATAL=50.
 */
function levelValue(l: Level): number {
  switch (l) {
    case "TRACE": return 0;
    case "DEBUG": return 10;
    case "INFO": return 20;
    case "WARN": return 30;
    case "ERROR": return 40;
    case "FATAL": return 50;
  }
}

function isLevel(s: string): s is Level {
  return LEVELS.some(l => l === s);
}

/**
 * Reads the threshold from LOG_LEVEL on every call so tests can flip it.
 * Unknown values fall back to INFO.
 */
function currentThreshold(): number {
  const env = (process.env.LOG_LEVEL || "INFO").toUpperCase();
  return levelValue(isLevel(env) ? env : "INFO");
}

function ts(): string { return new Date().toISOString(); }

function redactMeta(meta: unknown): unknown {
  if (meta == null || typeof meta !== 'object') return meta;
  if (meta instanceof Error) return { name: meta.name, message: meta.message };
  if (Array.isArray(meta)) return meta.map(redactMeta);
  const out: Record<string, unknown> = {};
  let redacted = false;
  for (const [k, v] of Object.entries(meta)) {
    if (redactKeys.has(k.toLowerCase())) { out[k] = '***'; redacted = true; continue; }
    out[k] = redactMeta(v);
  }
  if (redacted) out.redacted = true;
  return out;
}

function emit(level: Level, category: string | undefined, message: string, meta?: unknown) {
  // TEST_MODE keeps test output quiet unless something actually broke
  const lvlEnv = (process.env.LOG_LEVEL || '').toUpperCase();
  const verbose = lvlEnv === 'DEBUG' || lvlEnv === 'TRACE' || !lvlEnv;
  if (process.env.TEST_MODE === '1' && verbose && levelValue(level) < 40) return;
  if (levelValue(level) < currentThreshold()) return;
  const redMeta = redactMeta(meta);
  if (process.env.LOG_JSON === "1") {
    const entry = {
      ts: ts(),
      level,
      category,
      message,
      data: redMeta != null ? [redMeta] : [],
      ...context
    };
    const line = JSON.stringify(entry);
    if (level === "ERROR" || level === "FATAL") console.error(line);
    else if (level === "WARN") console.warn(line);
    else console.log(line);
    return;
  }

  let ctxStr = "";
  if (Object.keys(context).length > 0) {
    ctxStr = " " + Object.entries(context).map(([k, v]) => `[${k}=${String(v)}]`).join(" ");
  }
  const prefix = `[${level}]${category ? `[${category}]` : ''}`;
  const line = `${prefix} ${message}${ctxStr}`;
  const rest = redMeta != null ? [redMeta] : [];

  if (level === "ERROR" || level === "FATAL") console.error(line, ...rest);
  else if (level === "WARN") console.warn(line, ...rest);
  else console.log(line, ...rest);
}

/** Merges keys into the context appended to every line. */
export function setLoggerContext(ctx: Record<string, string | number | boolean>) {
  context = { ...context, ...ctx };
}

/** Clears the whole context, or only the given keys. */
export function clearLoggerContext(keys?: string[]) {
  if (!keys) { context = {}; return; }
  for (const k of keys) delete context[k];
}

export function addLoggerRedactFields(keys: string[]) {
  for (const k of keys) redactKeys.add(String(k).toLowerCase());
}

export function warnOnce(id: string, message: string, meta?: unknown) {
  if (onceFlags.has(id)) return;
  onceFlags.add(id);
  emit('WARN', 'CONFIG', message, meta);
}

export function logTrace(message: string, meta?: unknown) { emit("TRACE", undefined, message, meta); }
export function logDebug(message: string, meta?: unknown) { emit("DEBUG", undefined, message, meta); }
export function logInfo(message: string, meta?: unknown) { emit("INFO", undefined, message, meta); }
export function logWarn(message: string, meta?: unknown) { emit("WARN", undefined, message, meta); }
export function logError(message: string, meta?: unknown) { emit("ERROR", undefined, message, meta); }
export function logFatal(message: string, meta?: unknown) { emit("FATAL", undefined, message, meta); }

/** Category-aware API: `[INFO][FEED] message`. */
export function log(level: Level, category: string, message: string, meta?: unknown) {
  emit(level, category, message, meta);
}

export const logger: Logger = {
  debug: (msg, meta) => emit("DEBUG", undefined, msg, meta),
  info: (msg, meta) => emit("INFO", undefined, msg, meta),
  warn: (msg, meta) => emit("WARN", undefined, msg, meta),
  error: (msg, meta) => emit("ERROR", undefined, msg, meta),
  log: (level, category, msg, meta) => emit(level, category, msg, meta),
};
