/**
 * Error hierarchy for chain access.
 *
 * Only {@link TransportError} is meant to reach callers of the finder; a
 * {@link RpcCallError} is an answer from the node (a revert included) and the
 * search treats it as a failed probe.
 */

export class SlotFinderError extends Error {
  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = "SlotFinderError";
  }
}

export class TransportError extends SlotFinderError {
  constructor(
    message: string,
    public readonly method: string,
    options?: ErrorOptions
  ) {
    super(message, options);
    this.name = "TransportError";
  }
}

export class RequestTimeoutError extends TransportError {
  constructor(method: string, public readonly timeoutMs: number, options?: ErrorOptions) {
    super(`${method} timed out after ${timeoutMs}ms`, method, options);
    this.name = "RequestTimeoutError";
  }
}

export class RpcCallError extends SlotFinderError {
  constructor(
    message: string,
    public readonly method: string,
    options?: ErrorOptions
  ) {
    super(message, options);
    this.name = "RpcCallError";
  }
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
