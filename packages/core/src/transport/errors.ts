/**
 * Transport errors
 *
 * Only transport-boundary operations and updates of unknown entities fail.
 * Parsing and merging never do.
 */

export type SyncErrorCode =
  | "TRANSPORT_NOT_CONFIGURED"
  | "TRANSPORT_UNAVAILABLE"
  | "UNKNOWN_ENTITY";

export class SyncError extends Error {
  constructor(
    readonly code: SyncErrorCode,
    message: string,
    options?: { cause?: unknown }
  ) {
    super(message, options);
    this.name = "SyncError";
  }
}

/**
 * No transport or signer is bound. Fatal to the requested operation.
 */
export class TransportNotConfiguredError extends SyncError {
  constructor(message = "Transport not configured") {
    super("TRANSPORT_NOT_CONFIGURED", message);
    this.name = "TransportNotConfiguredError";
  }
}

/**
 * Subscribe, collect or publish failed. The caller may retry.
 */
export class TransportUnavailableError extends SyncError {
  constructor(message: string, cause?: unknown) {
    super("TRANSPORT_UNAVAILABLE", message, { cause });
    this.name = "TransportUnavailableError";
  }
}

/**
 * An update referenced an entity the session has not seen.
 */
export class UnknownEntityError extends SyncError {
  constructor(readonly identity: string) {
    super("UNKNOWN_ENTITY", `Unknown entity: ${identity}`);
    this.name = "UnknownEntityError";
  }
}

export function isSyncError(error: unknown): error is SyncError {
  return error instanceof SyncError;
}

/**
 * Wrap anything thrown at the transport boundary as TransportUnavailableError,
 * leaving SyncErrors as they are.
 */
export function toTransportError(error: unknown, operation: string): SyncError {
  if (isSyncError(error)) return error;
  const detail = error instanceof Error ? error.message : String(error);
  return new TransportUnavailableError(`${operation} failed: ${detail}`, error);
}
