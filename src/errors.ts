export type ErrorCode =
  | 'INVALID_ARGUMENT'
  | 'UNSUPPORTED_OPERATION'
  | 'TRANSPORT_FAILURE'
  | 'CANCELLED';

/** Malformed input to a constructor or factory. Always thrown synchronously. */
export class InvalidArgumentError extends Error {
  readonly code: ErrorCode = 'INVALID_ARGUMENT';

  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = 'InvalidArgumentError';
  }
}

export class UnsupportedOperationError extends Error {
  readonly code: ErrorCode = 'UNSUPPORTED_OPERATION';

  constructor(message: string) {
    super(message);
    this.name = 'UnsupportedOperationError';
  }
}

/**
 * Network or HTTP failure reported by a dispatcher. Only ever delivered
 * through a RequestFuture's failure channel.
 */
export class TransportError extends Error {
  readonly code: ErrorCode = 'TRANSPORT_FAILURE';
  readonly status: number | null;

  constructor(message: string, opts: { status?: number | null; cause?: unknown } = {}) {
    super(message, opts.cause === undefined ? undefined : { cause: opts.cause });
    this.name = 'TransportError';
    this.status = opts.status ?? null;
  }
}

export class CancellationError extends Error {
  readonly code: ErrorCode = 'CANCELLED';

  constructor(message = 'Request was cancelled') {
    super(message);
    this.name = 'CancellationError';
  }
}

/** Coerce a thrown value into an Error without losing the original. */
export function toError(err: unknown): Error {
  return err instanceof Error ? err : new Error(String(err));
}
