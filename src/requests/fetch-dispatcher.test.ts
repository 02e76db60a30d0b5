import { describe, expect, it, vi } from 'vitest';

import { TransportError } from '../errors.js';
import type { LoggerLike } from '../logging/logger-like.js';
import { FetchDispatcher } from './fetch-dispatcher.js';
import type { DispatchResponse, RequestDescriptor } from './types.js';

// ---------------------------------------------------------------------------
// Helpers
// ---------------------------------------------------------------------------

function createLogger(): LoggerLike {
  return { info: vi.fn(), warn: vi.fn(), error: vi.fn(), debug: vi.fn() };
}

function makeDeferred<T>() {
  let resolve!: (v: T) => void;
  let reject!: (e: unknown) => void;
  const promise = new Promise<T>((res, rej) => {
    resolve = res;
    reject = rej;
  });
  return { promise, resolve, reject };
}

function jsonResponse(body: string, status = 200): Response {
  return new Response(body, { status, headers: { 'content-type': 'application/json' } });
}

function okFetch(body = '{"id":"1"}') {
  return vi.fn<typeof globalThis.fetch>().mockImplementation(async () => jsonResponse(body));
}

/** fetch that never settles on its own; rejects when its signal aborts. */
function hangingFetch() {
  const signals: AbortSignal[] = [];
  const fetchFn = vi.fn<typeof globalThis.fetch>().mockImplementation(
    (_input, init) =>
      new Promise<Response>((_resolve, reject) => {
        const signal = init?.signal;
        if (!signal) return;
        signals.push(signal);
        signal.addEventListener('abort', () => reject(new DOMException('This operation was aborted', 'AbortError')));
      }),
  );
  return { fetchFn, signals };
}

function callbacks() {
  return {
    onSuccess: vi.fn<(response: DispatchResponse) => void>(),
    onFailure: vi.fn<(err: Error) => void>(),
  };
}

const JSON_REQUEST: RequestDescriptor = {
  method: 'POST',
  url: 'https://example.test/api/webhooks/1/abc?wait=true',
  body: { type: 'json', contentType: 'application/json', body: '{"content":"hi","tts":false}' },
  label: 'webhook:execute',
};

const tick = (ms = 10) => new Promise((r) => setTimeout(r, ms));

// ---------------------------------------------------------------------------
// Tests
// ---------------------------------------------------------------------------

describe('FetchDispatcher', () => {
  it('sends JSON bodies with a JSON content type and reports the response', async () => {
    const fetchFn = okFetch();
    const dispatcher = new FetchDispatcher({ fetchFn, userAgent: 'test-agent/1.0', log: createLogger() });
    const { onSuccess, onFailure } = callbacks();

    dispatcher.submit(JSON_REQUEST, onSuccess, onFailure);

    await vi.waitFor(() => expect(onSuccess).toHaveBeenCalledTimes(1));
    expect(onFailure).not.toHaveBeenCalled();
    expect(onSuccess).toHaveBeenCalledWith({
      status: 200,
      headers: { 'content-type': 'application/json' },
      body: '{"id":"1"}',
    });

    const [url, init] = fetchFn.mock.calls[0];
    expect(url).toBe('https://example.test/api/webhooks/1/abc?wait=true');
    expect(init?.method).toBe('POST');
    expect(init?.body).toBe('{"content":"hi","tts":false}');
    expect(init?.headers).toEqual({ 'Content-Type': 'application/json', 'User-Agent': 'test-agent/1.0' });
    expect(dispatcher.pendingCount).toBe(0);
  });

  it('passes multipart bodies through as FormData without a content type', async () => {
    const fetchFn = okFetch();
    const dispatcher = new FetchDispatcher({ fetchFn });
    const form = new FormData();
    form.append('payload_json', '{"tts":false}');
    const { onSuccess, onFailure } = callbacks();

    dispatcher.submit({ method: 'POST', url: 'https://example.test/hook', body: { type: 'multipart', body: form } }, onSuccess, onFailure);

    await vi.waitFor(() => expect(onSuccess).toHaveBeenCalledTimes(1));
    const [, init] = fetchFn.mock.calls[0];
    expect(init?.body).toBe(form);
    expect(init?.headers).toEqual({});
  });

  it('fails with a TransportError carrying the status on non-2xx responses', async () => {
    const log = createLogger();
    const fetchFn = vi
      .fn<typeof globalThis.fetch>()
      .mockImplementation(async () => jsonResponse('{"message":"Cannot send an empty message"}', 400));
    const dispatcher = new FetchDispatcher({ fetchFn, log });
    const { onSuccess, onFailure } = callbacks();

    dispatcher.submit(JSON_REQUEST, onSuccess, onFailure);

    await vi.waitFor(() => expect(onFailure).toHaveBeenCalledTimes(1));
    expect(onSuccess).not.toHaveBeenCalled();
    const err = onFailure.mock.calls[0][0];
    expect(err).toBeInstanceOf(TransportError);
    expect(err).toMatchObject({ status: 400 });
    expect(err.message).toBe('webhook:execute failed with HTTP 400: {"message":"Cannot send an empty message"}');
    expect(log.warn).toHaveBeenCalledWith(
      expect.objectContaining({ status: 400, label: 'webhook:execute' }),
      'dispatch:http error',
    );
  });

  it('wraps network errors in a TransportError', async () => {
    const fetchFn = vi.fn<typeof globalThis.fetch>().mockRejectedValue(new TypeError('fetch failed'));
    const dispatcher = new FetchDispatcher({ fetchFn });
    const { onSuccess, onFailure } = callbacks();

    dispatcher.submit(JSON_REQUEST, onSuccess, onFailure);

    await vi.waitFor(() => expect(onFailure).toHaveBeenCalledTimes(1));
    const err = onFailure.mock.calls[0][0];
    expect(err).toBeInstanceOf(TransportError);
    expect(err.message).toBe('webhook:execute failed');
    expect(err.cause).toBeInstanceOf(TypeError);
  });

  it('times out slow requests', async () => {
    const { fetchFn } = hangingFetch();
    const dispatcher = new FetchDispatcher({ fetchFn, timeoutMs: 20 });
    const { onSuccess, onFailure } = callbacks();

    dispatcher.submit(JSON_REQUEST, onSuccess, onFailure);

    await vi.waitFor(() => expect(onFailure).toHaveBeenCalledTimes(1));
    expect(onFailure.mock.calls[0][0].message).toBe('webhook:execute timed out after 20ms');
  });

  it('runs one request at a time by default', async () => {
    const first = makeDeferred<Response>();
    const fetchFn = vi
      .fn<typeof globalThis.fetch>()
      .mockImplementationOnce(() => first.promise)
      .mockImplementation(async () => jsonResponse('{"id":"2"}'));
    const log = createLogger();
    const dispatcher = new FetchDispatcher({ fetchFn, log });
    const a = callbacks();
    const b = callbacks();

    dispatcher.submit(JSON_REQUEST, a.onSuccess, a.onFailure);
    dispatcher.submit(JSON_REQUEST, b.onSuccess, b.onFailure);

    await vi.waitFor(() => expect(fetchFn).toHaveBeenCalledTimes(1));
    await tick(25);
    expect(fetchFn).toHaveBeenCalledTimes(1);
    expect(dispatcher.pendingCount).toBe(2);

    first.resolve(jsonResponse('{"id":"1"}'));
    await vi.waitFor(() => expect(b.onSuccess).toHaveBeenCalledTimes(1));
    expect(a.onSuccess.mock.calls[0][0].body).toBe('{"id":"1"}');
    expect(b.onSuccess.mock.calls[0][0].body).toBe('{"id":"2"}');
    expect(log.debug).toHaveBeenCalledWith(
      expect.objectContaining({ requestId: 1, inUse: 1, waiting: 1 }),
      'dispatch:start',
    );
    expect(log.debug).toHaveBeenCalledWith(
      expect.objectContaining({ requestId: 2, inUse: 1, waiting: 0 }),
      'dispatch:start',
    );
  });

  it('runs requests in parallel when maxConcurrent=0', async () => {
    const { fetchFn } = hangingFetch();
    const dispatcher = new FetchDispatcher({ fetchFn, maxConcurrent: 0 });

    dispatcher.submit(JSON_REQUEST, vi.fn(), vi.fn());
    dispatcher.submit(JSON_REQUEST, vi.fn(), vi.fn());

    await vi.waitFor(() => expect(fetchFn).toHaveBeenCalledTimes(2));
    dispatcher.shutdown();
  });

  it('drops a queued request that is cancelled before it starts', async () => {
    const first = makeDeferred<Response>();
    const fetchFn = vi
      .fn<typeof globalThis.fetch>()
      .mockImplementationOnce(() => first.promise)
      .mockImplementation(async () => jsonResponse('{}'));
    const dispatcher = new FetchDispatcher({ fetchFn });
    const a = callbacks();
    const b = callbacks();

    dispatcher.submit(JSON_REQUEST, a.onSuccess, a.onFailure);
    const handle = dispatcher.submit(JSON_REQUEST, b.onSuccess, b.onFailure);
    await vi.waitFor(() => expect(fetchFn).toHaveBeenCalledTimes(1));

    handle.cancel(false);
    expect(dispatcher.pendingCount).toBe(1);
    first.resolve(jsonResponse('{}'));

    await vi.waitFor(() => expect(a.onSuccess).toHaveBeenCalledTimes(1));
    await tick();
    expect(fetchFn).toHaveBeenCalledTimes(1);
    expect(b.onSuccess).not.toHaveBeenCalled();
    expect(b.onFailure).not.toHaveBeenCalled();
    expect(dispatcher.pendingCount).toBe(0);
  });

  it('aborts an in-flight request when cancelled with interrupt', async () => {
    const { fetchFn, signals } = hangingFetch();
    const dispatcher = new FetchDispatcher({ fetchFn });
    const { onSuccess, onFailure } = callbacks();

    const handle = dispatcher.submit(JSON_REQUEST, onSuccess, onFailure);
    await vi.waitFor(() => expect(signals).toHaveLength(1));

    handle.cancel(true);
    expect(signals[0].aborted).toBe(true);
    await tick();
    expect(onSuccess).not.toHaveBeenCalled();
    expect(onFailure).not.toHaveBeenCalled();
    expect(dispatcher.pendingCount).toBe(0);
  });

  it('lets an in-flight request finish silently when cancelled without interrupt', async () => {
    const inFlight = makeDeferred<Response>();
    let signal: AbortSignal | undefined;
    const fetchFn = vi.fn<typeof globalThis.fetch>().mockImplementation((_input, init) => {
      signal = init?.signal ?? undefined;
      return inFlight.promise;
    });
    const dispatcher = new FetchDispatcher({ fetchFn });
    const { onSuccess, onFailure } = callbacks();

    const handle = dispatcher.submit(JSON_REQUEST, onSuccess, onFailure);
    await vi.waitFor(() => expect(fetchFn).toHaveBeenCalledTimes(1));

    handle.cancel(false);
    expect(signal?.aborted).toBe(false);
    inFlight.resolve(jsonResponse('{}'));
    await vi.waitFor(() => expect(dispatcher.pendingCount).toBe(0));
    expect(onSuccess).not.toHaveBeenCalled();
    expect(onFailure).not.toHaveBeenCalled();
  });

  it('shutdown cancels pending work and refuses new submissions', async () => {
    const { fetchFn, signals } = hangingFetch();
    const dispatcher = new FetchDispatcher({ fetchFn });
    const first = callbacks();
    dispatcher.submit(JSON_REQUEST, first.onSuccess, first.onFailure);
    await vi.waitFor(() => expect(signals).toHaveLength(1));

    dispatcher.shutdown();
    expect(signals[0].aborted).toBe(true);

    const late = callbacks();
    dispatcher.submit(JSON_REQUEST, late.onSuccess, late.onFailure);
    await vi.waitFor(() => expect(late.onFailure).toHaveBeenCalledTimes(1));
    expect(late.onFailure.mock.calls[0][0].message).toBe('Dispatcher has been shut down');
    expect(first.onFailure).not.toHaveBeenCalled();
  });
});
