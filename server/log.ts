function timestamp(): string {
  return new Date().toLocaleTimeString("en-US", {
    hour: "numeric",
    minute: "2-digit",
    second: "2-digit",
    hour12: true,
  });
}

export function log(message: string, source = "express"): void {
  console.log(`${timestamp()} [${source}] ${message}`);
}

export function logWarn(message: string, source = "express"): void {
  console.warn(`${timestamp()} [${source}] ⚠️ ${message}`);
}

export function logError(message: string, source: string, error?: unknown): void {
  const detail = error === undefined ? "" : `: ${errorMessage(error)}`;
  console.error(`${timestamp()} [${source}] ❌ ${message}${detail}`);
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
