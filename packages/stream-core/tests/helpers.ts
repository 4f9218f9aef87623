import type { FetchLike } from '../src/sse/transport';

export interface ControlledBody {
  stream: ReadableStream<Uint8Array>;
  push(text: string): void;
  close(): void;
  fail(reason: unknown): void;
}

export function createControlledBody(): ControlledBody {
  const encoder = new TextEncoder();
  let controller: ReadableStreamDefaultController<Uint8Array> | null = null;
  const stream = new ReadableStream<Uint8Array>({
    start(streamController) {
      controller = streamController;
    },
  });
  return {
    stream,
    push: (text) => controller?.enqueue(encoder.encode(text)),
    close: () => controller?.close(),
    fail: (reason) => controller?.error(reason),
  };
}

export function makeStream(chunks: string[]): ReadableStream<Uint8Array> {
  const encoder = new TextEncoder();
  return new ReadableStream<Uint8Array>({
    start(controller) {
      for (const chunk of chunks) {
        controller.enqueue(encoder.encode(chunk));
      }
      controller.close();
    },
  });
}

export function sseResponse(chunks: string[]): Response {
  return new Response(makeStream(chunks), { status: 200, headers: { 'content-type': 'text/event-stream' } });
}

/** Never answers; rejects once the request signal aborts. */
export const hangingFetch: FetchLike = (_url, init) =>
  new Promise<Response>((_resolve, reject) => {
    init.signal.addEventListener('abort', () => reject(new Error('This operation was aborted')), { once: true });
  });

export function deferred<T>() {
  let resolve: (value: T) => void = () => undefined;
  const promise = new Promise<T>((done) => {
    resolve = done;
  });
  return { promise, resolve };
}

export const tick = (ms = 0) => new Promise<void>((resolve) => setTimeout(resolve, ms));
