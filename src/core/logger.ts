export type LogLevel = "debug" | "info" | "warn" | "error";

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40
};

let minLevel: LogLevel = parseLogLevel(process.env.SWITCHBOARD_LOG_LEVEL) ?? "info";

export function parseLogLevel(value: string | undefined): LogLevel | null {
  const normalized = value?.trim().toLowerCase();
  if (normalized === "debug" || normalized === "info" || normalized === "warn" || normalized === "error") {
    return normalized;
  }
  return null;
}

export function setLogLevel(level: LogLevel): void {
  minLevel = level;
}

export class Logger {
  constructor(private readonly scope: string) {}

  debug(message: string, data?: Record<string, unknown>): void {
    this.log("debug", message, data);
  }

  info(message: string, data?: Record<string, unknown>): void {
    this.log("info", message, data);
  }

  warn(message: string, data?: Record<string, unknown>): void {
    this.log("warn", message, data);
  }

  error(message: string, data?: Record<string, unknown>): void {
    this.log("error", message, data);
  }

  private log(level: LogLevel, message: string, data?: Record<string, unknown>): void {
    if (LEVEL_ORDER[level] < LEVEL_ORDER[minLevel]) {
      return;
    }
    const payload = {
      ts: new Date().toISOString(),
      level: level.toUpperCase(),
      scope: this.scope,
      message,
      ...(data ?? {})
    };
    process.stdout.write(`${JSON.stringify(payload)}\n`);
  }
}
