export class DrainlogError extends Error {
  readonly code: string;

  constructor(message: string, code: string, options?: ErrorOptions) {
    super(message, options);
    this.name = "DrainlogError";
    this.code = code;
  }
}

// ── Domain errors ──

export class ConfigError extends DrainlogError {
  constructor(message: string, options?: ErrorOptions) {
    super(message, "CONFIG", options);
    this.name = "ConfigError";
  }
}

export class SinkWriteError extends DrainlogError {
  readonly destination: "console" | "file";

  constructor(message: string, destination: "console" | "file", options?: ErrorOptions) {
    super(message, "SINK_WRITE", options);
    this.name = "SinkWriteError";
    this.destination = destination;
  }
}

// ── Utilities ──

/** Coerce unknown thrown value to DrainlogError (preserves cause chain). */
export function toDrainlogError(value: unknown): DrainlogError {
  if (value instanceof DrainlogError) return value;
  if (value instanceof Error) return new DrainlogError(value.message, "UNKNOWN", { cause: value });
  return new DrainlogError(String(value ?? "Unknown error"), "UNKNOWN");
}

/** Extract error message string from unknown thrown value. */
export function errorMessage(value: unknown): string {
  if (value instanceof Error) return value.message;
  if (value == null) return "Unknown error";
  return String(value);
}
