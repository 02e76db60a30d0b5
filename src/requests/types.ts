import type { WireBody } from '../webhook/payload.js';

export type HttpMethod = 'GET' | 'POST' | 'PATCH' | 'DELETE';

/** One HTTP request for a dispatcher to execute. */
export type RequestDescriptor = {
  method: HttpMethod;
  url: string;
  body: WireBody | null;
  headers?: Record<string, string>;
  /** Short name used in logs (e.g. `webhook:execute`). */
  label?: string;
};

export type DispatchResponse = {
  status: number;
  headers: Record<string, string>;
  body: string;
};

export type CancelHandle = {
  /**
   * Drop the request if it has not started. With `interrupt`, a request
   * already on the wire is aborted too; it may still have been delivered.
   */
  cancel(interrupt: boolean): void;
};

/**
 * Executes requests on its own schedule (queueing, rate limits, transport)
 * and reports the outcome through exactly one of the two callbacks. A
 * cancelled request reports nothing.
 */
export interface Dispatcher {
  submit(
    request: RequestDescriptor,
    onSuccess: (response: DispatchResponse) => void,
    onFailure: (err: Error) => void,
  ): CancelHandle;
}
