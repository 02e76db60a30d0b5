import { TransportError } from '../errors.js';
import { type LoggerLike, silentLogger } from '../logging/logger-like.js';
import { type ConcurrencyLimiter, createConcurrencyLimiter } from './concurrency-limit.js';
import type { CancelHandle, Dispatcher, DispatchResponse, RequestDescriptor } from './types.js';

const DEFAULT_TIMEOUT_MS = 15_000;
const ERROR_BODY_EXCERPT = 200;

export type FetchDispatcherOpts = {
  /** Requests allowed on the wire at once. 0 = unbounded. Default: 1. */
  maxConcurrent?: number;
  /** Per-request timeout. Default: 15000. */
  timeoutMs?: number;
  /** Sent as User-Agent on every request. */
  userAgent?: string;
  log?: LoggerLike;
  /** Override fetch for testing. */
  fetchFn?: typeof globalThis.fetch;
};

type JobState = 'queued' | 'running' | 'done' | 'cancelled';

type Job = {
  id: number;
  request: RequestDescriptor;
  onSuccess: (response: DispatchResponse) => void;
  onFailure: (err: Error) => void;
  state: JobState;
  controller: AbortController;
};

/**
 * Dispatcher that executes requests with `fetch`, in submission order, with
 * at most `maxConcurrent` in flight. No retries: a non-2xx status or a
 * network error fails the request.
 */
export class FetchDispatcher implements Dispatcher {
  private readonly limiter: ConcurrencyLimiter | null;
  private readonly timeoutMs: number;
  private readonly userAgent: string | undefined;
  private readonly log: LoggerLike;
  private readonly fetchFn: typeof globalThis.fetch;
  private readonly jobs = new Set<Job>();
  private nextId = 1;
  private closed = false;

  constructor(opts: FetchDispatcherOpts = {}) {
    this.limiter = createConcurrencyLimiter(opts.maxConcurrent ?? 1);
    this.timeoutMs = opts.timeoutMs ?? DEFAULT_TIMEOUT_MS;
    this.userAgent = opts.userAgent;
    this.log = opts.log ?? silentLogger;
    this.fetchFn = opts.fetchFn ?? globalThis.fetch;
  }

  /** Requests submitted and not yet finished or cancelled. */
  get pendingCount(): number {
    return this.jobs.size;
  }

  submit(
    request: RequestDescriptor,
    onSuccess: (response: DispatchResponse) => void,
    onFailure: (err: Error) => void,
  ): CancelHandle {
    const job: Job = {
      id: this.nextId++,
      request,
      onSuccess,
      onFailure,
      state: 'queued',
      controller: new AbortController(),
    };

    if (this.closed) {
      job.state = 'done';
      queueMicrotask(() => onFailure(new TransportError('Dispatcher has been shut down')));
      return { cancel: () => {} };
    }

    this.jobs.add(job);
    this.run(job).catch((err) => {
      this.log.error({ err, requestId: job.id }, 'dispatch:unexpected failure');
    });
    return { cancel: (interrupt) => this.cancelJob(job, interrupt) };
  }

  /** Cancel every queued and in-flight request and refuse new ones. */
  shutdown(): void {
    this.closed = true;
    for (const job of [...this.jobs]) this.cancelJob(job, true);
  }

  private cancelJob(job: Job, interrupt: boolean): void {
    if (job.state === 'done' || job.state === 'cancelled') return;
    if (job.state === 'running' && !interrupt) {
      // Let it finish on the wire; its outcome is no longer reported.
      job.state = 'cancelled';
      this.log.debug?.({ requestId: job.id }, 'dispatch:cancelled without interrupt');
      return;
    }
    const wasRunning = job.state === 'running';
    job.state = 'cancelled';
    this.jobs.delete(job);
    if (wasRunning) job.controller.abort();
    this.log.debug?.({ requestId: job.id, wasRunning }, 'dispatch:cancelled');
  }

  private async run(job: Job): Promise<void> {
    const release = this.limiter ? await this.limiter.acquire() : () => {};
    try {
      if (job.state !== 'queued') return;
      job.state = 'running';
      const outcome = await this.execute(job);
      if (job.state !== 'running') return;
      job.state = 'done';
      if (outcome.ok) job.onSuccess(outcome.response);
      else job.onFailure(outcome.error);
    } finally {
      this.jobs.delete(job);
      release();
    }
  }

  private async execute(
    job: Job,
  ): Promise<{ ok: true; response: DispatchResponse } | { ok: false; error: TransportError }> {
    const { request } = job;
    const label = request.label ?? `${request.method} request`;
    const headers: Record<string, string> = { ...request.headers };
    if (this.userAgent) headers['User-Agent'] = this.userAgent;

    let body: string | FormData | undefined;
    if (request.body?.type === 'json') {
      headers['Content-Type'] = request.body.contentType;
      body = request.body.body;
    } else if (request.body?.type === 'multipart') {
      // fetch writes the multipart Content-Type with its boundary.
      body = request.body.body;
    }

    let timedOut = false;
    const timer = setTimeout(() => {
      timedOut = true;
      job.controller.abort();
    }, this.timeoutMs);

    this.log.debug?.(
      {
        requestId: job.id,
        label,
        method: request.method,
        inUse: this.limiter?.inUse ?? null,
        waiting: this.limiter?.waiting ?? 0,
      },
      'dispatch:start',
    );
    try {
      const res = await this.fetchFn(request.url, {
        method: request.method,
        headers,
        body,
        signal: job.controller.signal,
      });
      const text = await res.text();
      const responseHeaders: Record<string, string> = {};
      res.headers.forEach((value, key) => {
        responseHeaders[key] = value;
      });

      if (!res.ok) {
        this.log.warn(
          { requestId: job.id, label, status: res.status, body: text.slice(0, ERROR_BODY_EXCERPT) },
          'dispatch:http error',
        );
        return {
          ok: false,
          error: new TransportError(`${label} failed with HTTP ${res.status}: ${text.slice(0, ERROR_BODY_EXCERPT)}`, {
            status: res.status,
          }),
        };
      }

      this.log.debug?.({ requestId: job.id, label, status: res.status }, 'dispatch:done');
      return { ok: true, response: { status: res.status, headers: responseHeaders, body: text } };
    } catch (err) {
      if (timedOut) {
        this.log.warn({ requestId: job.id, label, timeoutMs: this.timeoutMs }, 'dispatch:timed out');
        return { ok: false, error: new TransportError(`${label} timed out after ${this.timeoutMs}ms`, { cause: err }) };
      }
      if (job.state === 'running') {
        this.log.warn({ err, requestId: job.id, label }, 'dispatch:request failed');
      }
      return { ok: false, error: new TransportError(`${label} failed`, { cause: err }) };
    } finally {
      clearTimeout(timer);
    }
  }
}
