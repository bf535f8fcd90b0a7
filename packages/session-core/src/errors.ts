export { ConfigurationError, InvalidGeometryError } from "@viewsynth/geometry-core";

/** An event the session has no transition for. Aborts only the current tick. */
export class UnsupportedEventError extends Error {
  override readonly name = "UnsupportedEventError";

  constructor(readonly event: string) {
    super(`Unsupported event: ${event}`);
  }
}

/** A collaborator call failed. Aborts only the current tick. */
export class CollaboratorFailureError extends Error {
  override readonly name = "CollaboratorFailureError";

  constructor(readonly collaborator: string, cause: unknown) {
    super(`${collaborator} failed: ${cause instanceof Error ? cause.message : String(cause)}`, {
      cause,
    });
  }
}
