type LogLevel = "debug" | "info" | "warn" | "error";
type LogContext = Record<string, unknown>;

function debugEnabled(): boolean {
  return process.env.LOG_LEVEL?.toLowerCase() === "debug";
}

function emit(level: LogLevel, msg: string, context?: LogContext) {
  if (level === "debug" && !debugEnabled()) return;
  const entry = { level, msg, ts: new Date().toISOString(), ...context };
  const line = JSON.stringify(entry);
  if (level === "error") {
    console.error(line);
  } else {
    console.log(line);
  }
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

export const log = {
  debug: (msg: string, context?: LogContext) => emit("debug", msg, context),
  info: (msg: string, context?: LogContext) => emit("info", msg, context),
  warn: (msg: string, context?: LogContext) => emit("warn", msg, context),
  error: (msg: string, context?: LogContext) => emit("error", msg, context),
};
