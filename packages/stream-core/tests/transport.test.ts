import type { StreamFrame } from '@ariachat/shared-types';
import { beforeEach, describe, expect, it, vi } from 'vitest';
import { createStaticCredentialProvider, type CredentialProvider } from '../src/auth/credential-provider';
import type { StreamTransportError } from '../src/errors';
import { createStreamTransport, type FetchInit, type FetchLike } from '../src/sse/transport';
import { createControlledBody, deferred, hangingFetch, sseResponse, tick } from './helpers';

const TURN_URL = 'http://localhost:50052/api/v1/sessions/s1/turns';

function collect() {
  const frames: StreamFrame[] = [];
  const errors: StreamTransportError[] = [];
  return {
    frames,
    errors,
    callbacks: {
      onFrame: (frame: StreamFrame) => frames.push(frame),
      onError: (error: StreamTransportError) => errors.push(error),
    },
  };
}

describe('stream transport', () => {
  beforeEach(() => {
    vi.spyOn(console, 'info').mockImplementation(() => undefined);
    vi.spyOn(console, 'warn').mockImplementation(() => undefined);
  });

  it('delivers frames in order and completes when the body ends', async () => {
    const fetchMock = vi.fn<FetchLike>(async () =>
      sseResponse(['event: message\ndata: {"a":1}\n\nevent: final_', 'response\ndata: {"content":"ok"}\n\n']),
    );
    const transport = createStreamTransport({
      fetch: fetchMock,
      credentials: createStaticCredentialProvider('test-token'),
    });
    const sink = collect();

    const handle = transport.open({ method: 'POST', url: TURN_URL, body: '{"input":"hi"}' }, sink.callbacks);

    await expect(handle.done).resolves.toBe('completed');
    expect(sink.frames).toEqual([
      { eventType: 'message', data: '{"a":1}' },
      { eventType: 'final_response', data: '{"content":"ok"}' },
    ]);
    expect(sink.errors).toEqual([]);
    expect(handle.isActive()).toBe(false);
    expect(fetchMock).toHaveBeenCalledWith(TURN_URL, {
      method: 'POST',
      headers: {
        Accept: 'text/event-stream',
        'Cache-Control': 'no-cache',
        'Content-Type': 'application/json',
        Authorization: 'Bearer test-token',
      },
      body: '{"input":"hi"}',
      signal: expect.any(AbortSignal),
    });
  });

  it('flushes a trailing record without a terminator when the body ends', async () => {
    const transport = createStreamTransport({ fetch: async () => sseResponse(['data: one\n\ndata: two']) });
    const sink = collect();

    await transport.open({ method: 'GET', url: TURN_URL }, sink.callbacks).done;

    expect(sink.frames.map((frame) => frame.data)).toEqual(['one', 'two']);
  });

  it('sends the request unauthenticated when credentials are slow', async () => {
    const seen: FetchInit[] = [];
    const slow: CredentialProvider = { getAuthorizationHeader: () => new Promise(() => undefined) };
    const transport = createStreamTransport({
      fetch: async (_url, init) => {
        seen.push(init);
        return sseResponse([]);
      },
      credentials: slow,
      credentialWaitMs: 10,
    });

    await expect(transport.open({ method: 'GET', url: TURN_URL }, collect().callbacks).done).resolves.toBe('completed');
    expect(seen).toHaveLength(1);
    expect(seen[0]?.headers).toEqual({ Accept: 'text/event-stream', 'Cache-Control': 'no-cache' });
  });

  it('reports network failures as retryable connect errors', async () => {
    const transport = createStreamTransport({
      fetch: async () => {
        throw new TypeError('fetch failed');
      },
    });
    const sink = collect();

    await expect(transport.open({ method: 'GET', url: TURN_URL }, sink.callbacks).done).resolves.toBe('failed');
    expect(sink.errors).toHaveLength(1);
    expect(sink.errors[0]).toMatchObject({
      name: 'StreamTransportError',
      code: 'network',
      phase: 'connect',
      retryable: true,
      message: 'Network request failed: fetch failed',
    });
  });

  it('maps error statuses before reading any frames', async () => {
    const transport = createStreamTransport({
      fetch: async (url) =>
        url.endsWith('busy') ? new Response('overloaded', { status: 503 }) : new Response('', { status: 401 }),
    });
    const busy = collect();
    const denied = collect();

    await transport.open({ method: 'GET', url: `${TURN_URL}/busy` }, busy.callbacks).done;
    await transport.open({ method: 'GET', url: `${TURN_URL}/denied` }, denied.callbacks).done;

    expect(busy.errors[0]).toMatchObject({
      code: 'http',
      phase: 'connect',
      retryable: true,
      status: 503,
      message: 'Aria runtime unavailable (503): overloaded',
    });
    expect(denied.errors[0]).toMatchObject({ code: 'http', retryable: false, status: 401 });
    expect(busy.frames).toEqual([]);
  });

  it('fails when the response has no body', async () => {
    const transport = createStreamTransport({ fetch: async () => new Response(null, { status: 200 }) });
    const sink = collect();

    await expect(transport.open({ method: 'GET', url: TURN_URL }, sink.callbacks).done).resolves.toBe('failed');
    expect(sink.errors[0]).toMatchObject({ code: 'empty_body', phase: 'connect', retryable: false });
  });

  it('stops delivering on cancel without flushing or reporting an error', async () => {
    const body = createControlledBody();
    const firstFrame = deferred<void>();
    const transport = createStreamTransport({ fetch: async () => new Response(body.stream, { status: 200 }) });
    const frames: StreamFrame[] = [];
    const onError = vi.fn();

    const handle = transport.open(
      { method: 'GET', url: TURN_URL },
      {
        onFrame: (frame) => {
          frames.push(frame);
          firstFrame.resolve();
        },
        onError,
      },
    );
    body.push('data: first\n\ndata: unterminated');
    await firstFrame.promise;
    expect(handle.isActive()).toBe(true);

    handle.cancel();
    handle.cancel();

    await expect(handle.done).resolves.toBe('canceled');
    expect(frames).toEqual([{ eventType: 'message', data: 'first' }]);
    expect(onError).not.toHaveBeenCalled();
    expect(handle.isActive()).toBe(false);
  });

  it('never calls fetch when canceled before connecting', async () => {
    const fetchMock = vi.fn<FetchLike>(hangingFetch);
    const transport = createStreamTransport({ fetch: fetchMock });
    const sink = collect();

    const handle = transport.open({ method: 'GET', url: TURN_URL }, sink.callbacks);
    handle.cancel();

    await expect(handle.done).resolves.toBe('canceled');
    expect(fetchMock).not.toHaveBeenCalled();
    expect(sink.errors).toEqual([]);
  });

  it('treats an abort while connecting as a cancellation', async () => {
    const requested = deferred<void>();
    const transport = createStreamTransport({
      fetch: (url, init) => {
        requested.resolve();
        return hangingFetch(url, init);
      },
    });
    const sink = collect();

    const handle = transport.open({ method: 'GET', url: TURN_URL }, sink.callbacks);
    await requested.promise;
    handle.cancel();

    await expect(handle.done).resolves.toBe('canceled');
    expect(sink.errors).toEqual([]);
  });

  it('reports a connect timeout as a retryable connect error', async () => {
    const transport = createStreamTransport({ fetch: hangingFetch, connectTimeoutMs: 20 });
    const sink = collect();

    await expect(transport.open({ method: 'GET', url: TURN_URL }, sink.callbacks).done).resolves.toBe('failed');
    expect(sink.errors[0]).toMatchObject({
      code: 'timeout',
      phase: 'connect',
      retryable: true,
      message: `Timed out connecting to ${TURN_URL} after 20ms`,
    });
  });

  it('reports the resource timeout as a stream-phase error after delivering what arrived', async () => {
    const body = createControlledBody();
    const transport = createStreamTransport({
      fetch: async () => new Response(body.stream, { status: 200 }),
      resourceTimeoutMs: 40,
    });
    const sink = collect();

    const handle = transport.open({ method: 'GET', url: TURN_URL }, sink.callbacks);
    body.push('data: early\n\n');

    await expect(handle.done).resolves.toBe('failed');
    expect(sink.frames).toEqual([{ eventType: 'message', data: 'early' }]);
    expect(sink.errors[0]).toMatchObject({ code: 'timeout', phase: 'stream', retryable: true });
  });

  it('reports a mid-stream read failure once, after the frames already received', async () => {
    const body = createControlledBody();
    const firstFrame = deferred<void>();
    const transport = createStreamTransport({ fetch: async () => new Response(body.stream, { status: 200 }) });
    const frames: StreamFrame[] = [];
    const onError = vi.fn<(error: StreamTransportError) => void>();

    const handle = transport.open(
      { method: 'GET', url: TURN_URL },
      {
        onFrame: (frame) => {
          frames.push(frame);
          firstFrame.resolve();
        },
        onError,
      },
    );
    body.push('data: before\n\n');
    await firstFrame.promise;
    body.fail(new Error('connection reset'));

    await expect(handle.done).resolves.toBe('failed');
    expect(frames).toEqual([{ eventType: 'message', data: 'before' }]);
    expect(onError).toHaveBeenCalledTimes(1);
    expect(onError.mock.calls[0]?.[0]).toMatchObject({
      code: 'read',
      phase: 'stream',
      message: 'Stream interrupted: connection reset',
    });
  });

  it('closes the stream when a frame handler throws', async () => {
    const errorLog = vi.spyOn(console, 'error').mockImplementation(() => undefined);
    const transport = createStreamTransport({ fetch: async () => sseResponse(['data: a\n\n', 'data: b\n\n']) });
    const onFrame = vi.fn(() => {
      throw new Error('render failed');
    });

    const handle = transport.open({ method: 'GET', url: TURN_URL }, { onFrame, onError: vi.fn() });

    await expect(handle.done).resolves.toBe('failed');
    expect(onFrame).toHaveBeenCalledTimes(1);
    expect(errorLog).toHaveBeenCalledWith('[ariachat][sse] frame handler threw; closing stream', {
      id: handle.id,
      error: 'render failed',
    });
  });

  it('reports a cancel during a slow error body as a cancellation', async () => {
    const body = createControlledBody();
    const requested = deferred<void>();
    const transport = createStreamTransport({
      fetch: async () => {
        requested.resolve();
        return new Response(body.stream, { status: 503 });
      },
    });
    const sink = collect();

    const handle = transport.open({ method: 'GET', url: TURN_URL }, sink.callbacks);
    body.push('overl');
    await requested.promise;
    await tick(10);
    handle.cancel();

    await expect(handle.done).resolves.toBe('canceled');
    expect(sink.errors).toEqual([]);
  });
});
