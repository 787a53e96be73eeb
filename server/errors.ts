export class ConfigError extends Error {
  readonly name = "ConfigError";

  constructor(readonly keys: string[], message?: string) {
    super(message ?? `Missing or invalid configuration: ${keys.join(", ")}`);
  }
}

export class ProxyDirectoryError extends Error {
  readonly name = "ProxyDirectoryError";

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
  }
}

export class SessionCreationError extends Error {
  readonly name = "SessionCreationError";

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
  }
}

export class StoreUnavailableError extends Error {
  readonly name = "StoreUnavailableError";

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
  }
}

export class PersistenceError extends Error {
  readonly name = "PersistenceError";

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
  }
}

export class CampaignPlatformError extends Error {
  readonly name = "CampaignPlatformError";

  constructor(
    readonly operation: string,
    readonly status: number | null,
    message: string,
    options?: { cause?: unknown },
  ) {
    super(`${operation} failed${status ? ` (${status})` : ""}: ${message}`, options);
  }
}

export class TaskDeadlineError extends Error {
  readonly name = "TaskDeadlineError";

  constructor(readonly deadlineMs: number) {
    super(`Task exceeded its ${deadlineMs}ms deadline`);
  }
}
