/**
 * Degenerate projection or warp geometry. Callers inside the frame pipeline
 * recover from it locally; it only escapes when a strict mode asks for it.
 */
export class InvalidGeometryError extends Error {
  override readonly name = "InvalidGeometryError";

  constructor(message: string) {
    super(message);
  }
}

/** Bad paths, missing catalog entries or malformed metadata. Fatal at start-up. */
export class ConfigurationError extends Error {
  override readonly name = "ConfigurationError";

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
  }
}
