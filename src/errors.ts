// ── Error types ──────────────────────────────────────────────────────────────

/** A query the caller can fix. Keeps what was submitted so it can be shown again. */
export class ValidationError extends Error {
  readonly coords: string;
  readonly radius: string;

  constructor(message: string, submitted: { coords: string; radius: string }) {
    super(message);
    this.name = "ValidationError";
    this.coords = submitted.coords;
    this.radius = submitted.radius;
  }
}

/** The datasets could not be loaded. Blocks every query until resolved. */
export class DataUnavailableError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "DataUnavailableError";
  }
}
