export type LogLevel = "info" | "warn" | "error";

function write(level: LogLevel, event: string, data: Record<string, unknown>): void {
  const payload = {
    ts: new Date().toISOString(),
    level,
    event,
    ...data
  };
  console.log(JSON.stringify(payload));
}

export function log(event: string, data: Record<string, unknown> = {}): void {
  write("info", event, data);
}

export function logWarn(event: string, data: Record<string, unknown> = {}): void {
  write("warn", event, data);
}

export function logError(event: string, error: unknown, data: Record<string, unknown> = {}): void {
  write("error", event, { ...data, error: errorMessage(error) });
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
