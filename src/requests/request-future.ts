import { CancellationError, UnsupportedOperationError, toError } from '../errors.js';
import type { CancelHandle, Dispatcher, DispatchResponse, RequestDescriptor } from './types.js';

export type FutureState = 'pending' | 'completed' | 'failed' | 'cancelled';

export type FutureOutcome<T> =
  | { state: 'completed'; value: T }
  | { state: 'failed'; error: Error }
  | { state: 'cancelled'; error: CancellationError };

// Dispatchers reach futures through a WeakRef only. A pending future with
// callbacks or `get()` waiters stays in here until it settles.
const awaited = new Set<object>();

/**
 * Completion handle for one submitted request.
 *
 * Only the dispatcher callbacks wired up in `submit` and the local `cancel`
 * can resolve it; the first terminal transition wins and later ones are
 * dropped. Callers can wait (`get`), register callbacks (`whenComplete`),
 * poll (`isDone`, `state`) or cancel. It is not a thenable and exposes no
 * resolve/reject.
 */
export class RequestFuture<T> {
  private outcome: FutureOutcome<T> | null = null;
  private callbacks: Array<(outcome: FutureOutcome<T>) => void> = [];
  private handle: CancelHandle | null = null;

  private constructor() {}

  /**
   * Submit a request and return a pending future for it. `parse` maps the
   * raw response to the future's value; a throw from it fails the future.
   *
   * The dispatcher only holds a weak reference to the future, so a caller
   * that drops it does not keep it alive.
   */
  static submit<T>(
    dispatcher: Dispatcher,
    request: RequestDescriptor,
    parse: (response: DispatchResponse) => T,
  ): RequestFuture<T> {
    const future = new RequestFuture<T>();
    const ref = new WeakRef(future);

    const onSuccess = (response: DispatchResponse): void => {
      const target = ref.deref();
      if (!target) return;
      let value: T;
      try {
        value = parse(response);
      } catch (err) {
        target.settle({ state: 'failed', error: toError(err) });
        return;
      }
      target.settle({ state: 'completed', value });
    };
    const onFailure = (err: Error): void => {
      ref.deref()?.settle({ state: 'failed', error: err });
    };

    try {
      const handle = dispatcher.submit(request, onSuccess, onFailure);
      // The dispatcher may have answered synchronously.
      if (future.outcome === null) future.handle = handle;
    } catch (err) {
      future.settle({ state: 'failed', error: toError(err) });
    }
    return future;
  }

  static completed<T>(value: T): RequestFuture<T> {
    const future = new RequestFuture<T>();
    future.settle({ state: 'completed', value });
    return future;
  }

  static failed<T = never>(error: unknown): RequestFuture<T> {
    const future = new RequestFuture<T>();
    future.settle({ state: 'failed', error: toError(error) });
    return future;
  }

  get state(): FutureState {
    return this.outcome?.state ?? 'pending';
  }

  isDone(): boolean {
    return this.outcome !== null;
  }

  isCancelled(): boolean {
    return this.outcome?.state === 'cancelled';
  }

  /** True when failed or cancelled. */
  isCompletedExceptionally(): boolean {
    return this.outcome !== null && this.outcome.state !== 'completed';
  }

  /**
   * Cancel the request. The dispatcher is told first (best effort); with
   * `mayInterrupt` it also aborts a request already in flight. Returns true
   * only if this call moved the future to `cancelled`.
   */
  cancel(mayInterrupt = true): boolean {
    if (this.outcome !== null) return false;
    this.handle?.cancel(mayInterrupt);
    return this.settle({ state: 'cancelled', error: new CancellationError() });
  }

  /** Resolves with the value, or rejects with the failure / CancellationError. */
  get(): Promise<T> {
    return new Promise<T>((resolve, reject) => {
      this.whenComplete((outcome) => {
        if (outcome.state === 'completed') resolve(outcome.value);
        else reject(outcome.error);
      });
    });
  }

  /** The value if completed; `fallback` while pending. Throws if failed or cancelled. */
  getNow(fallback: T): T {
    const outcome = this.outcome;
    if (outcome === null) return fallback;
    if (outcome.state === 'completed') return outcome.value;
    throw outcome.error;
  }

  /**
   * Register a callback for the terminal outcome. Callbacks always run
   * asynchronously, including when the future is already done.
   */
  whenComplete(callback: (outcome: FutureOutcome<T>) => void): this {
    const outcome = this.outcome;
    if (outcome !== null) {
      queueMicrotask(() => callback(outcome));
    } else {
      this.callbacks.push(callback);
      awaited.add(this);
    }
    return this;
  }

  /**
   * Always throws. A request future cannot be turned into a freely
   * resolvable handle; only its dispatcher and `cancel` may complete it.
   */
  toDeferred(): never {
    throw new UnsupportedOperationError(
      'Access to an unrestricted completion handle is not supported; only the dispatcher may resolve a RequestFuture',
    );
  }

  private settle(outcome: FutureOutcome<T>): boolean {
    if (this.outcome !== null) return false;
    this.outcome = outcome;
    this.handle = null;
    awaited.delete(this);
    const callbacks = this.callbacks;
    this.callbacks = [];
    for (const callback of callbacks) {
      queueMicrotask(() => callback(outcome));
    }
    return true;
  }
}
