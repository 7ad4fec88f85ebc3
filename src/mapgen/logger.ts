export type LogLevel = "debug" | "info" | "warn" | "error";

const ORDER: LogLevel[] = ["debug", "info", "warn", "error"];

function parseLevel(raw: string | undefined | null): LogLevel | null {
  if (!raw) return null;
  const v = raw.toLowerCase();
  if (v === "debug" || v === "info" || v === "warn" || v === "error") {
    return v;
  }
  return null;
}

// MAPGEN_LOG_LEVEL=debug, or per scope: MAPGEN_LOG_SCOPE_RIVERS=debug
function scopeLevel(scope: string): LogLevel {
  return (
    parseLevel(process.env[`MAPGEN_LOG_SCOPE_${scope}`]) ??
    parseLevel(process.env.MAPGEN_LOG_LEVEL) ??
    "warn"
  );
}

export function logEnabled(scope: string, level: LogLevel): boolean {
  return ORDER.indexOf(level) >= ORDER.indexOf(scopeLevel(scope));
}

function timestamp(): string {
  const d = new Date();
  const h = String(d.getHours()).padStart(2, "0");
  const m = String(d.getMinutes()).padStart(2, "0");
  const s = String(d.getSeconds()).padStart(2, "0");
  const ms = String(d.getMilliseconds()).padStart(3, "0");
  return `${h}:${m}:${s}.${ms}`;
}

function formatMeta(value: unknown): unknown {
  if (value instanceof Error) {
    return { error: value.message, name: value.name, stack: value.stack };
  }
  return value;
}

export class Logger {
  private constructor(private readonly scope: string) {}

  static scope(scope: string): Logger {
    return new Logger(scope.toUpperCase());
  }

  private write(level: LogLevel, message: string, meta: unknown[]): void {
    if (!logEnabled(this.scope, level)) return;

    const line = `${timestamp()} [${this.scope}:${level.toUpperCase()}] ${message}`;
    const sink = level === "error" ? console.error : level === "warn" ? console.warn : console.log;
    sink(line, ...meta.map(formatMeta));
  }

  debug(message: string, ...meta: unknown[]): void {
    this.write("debug", message, meta);
  }

  info(message: string, ...meta: unknown[]): void {
    this.write("info", message, meta);
  }

  warn(message: string, ...meta: unknown[]): void {
    this.write("warn", message, meta);
  }

  error(message: string, ...meta: unknown[]): void {
    this.write("error", message, meta);
  }
}
