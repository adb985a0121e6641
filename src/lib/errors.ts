/** Bad input rejected before anything is written. */
export class ValidationError extends Error {
  readonly field: string;

  constructor(field: string, message: string) {
    super(message);
    this.name = "ValidationError";
    this.field = field;
  }
}

/** A storage or auth call failed. Never retried here; the caller decides what to show. */
export class BackendUnavailable extends Error {
  readonly operation: string;

  constructor(operation: string, cause: unknown) {
    super(`${operation} failed: ${errorMessage(cause)}`, { cause });
    this.name = "BackendUnavailable";
    this.operation = operation;
  }
}

export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "ConfigError";
  }
}

function errorMessage(e: unknown): string {
  if (e instanceof Error) return e.message;
  if (e && typeof e === "object" && "message" in e) return String(e.message);
  return String(e);
}

/** Text for the UI. Validation messages are already user-facing; backend failures get a generic prefix. */
export function describeError(e: unknown): string {
  if (e instanceof ValidationError) return e.message;
  if (e instanceof BackendUnavailable) return `No se pudo conectar con la base de datos (${e.message}).`;
  return errorMessage(e);
}
