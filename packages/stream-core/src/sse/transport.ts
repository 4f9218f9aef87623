import type { StreamFrame, StreamOutcome } from '@ariachat/shared-types';
import { redactSecrets } from '@ariachat/storage-local';
import { resolveAuthorizationHeader, type CredentialProvider } from '../auth/credential-provider';
import {
  errorMessage,
  makeStreamTransportError,
  mapHttpStatusToError,
  type StreamErrorPhase,
  type StreamTransportError,
} from '../errors';
import { createId } from '../ids';
import { createSseFrameParser } from './frame-parser';

export interface FetchInit {
  method: string;
  headers: Record<string, string>;
  body?: string;
  signal: AbortSignal;
}

export type FetchLike = (url: string, init: FetchInit) => Promise<Response>;

export interface StreamRequest {
  method: 'GET' | 'POST';
  url: string;
  headers?: Record<string, string>;
  body?: string;
}

export interface StreamCallbacks {
  onFrame(frame: StreamFrame): void;
  /** Called at most once, never for a cancelled stream. */
  onError(error: StreamTransportError): void;
}

export interface StreamHandle {
  readonly id: string;
  /** Settles once the response body is finished with; never rejects. */
  readonly done: Promise<StreamOutcome>;
  cancel(): void;
  isActive(): boolean;
}

export interface StreamTransport {
  open(request: StreamRequest, callbacks: StreamCallbacks): StreamHandle;
}

export interface StreamTransportOptions {
  fetch?: FetchLike;
  credentials?: CredentialProvider;
  connectTimeoutMs?: number;
  resourceTimeoutMs?: number;
  credentialWaitMs?: number;
  lenientFraming?: boolean;
}

type AbortReason = 'canceled' | 'connect_timeout' | 'resource_timeout';

function buildHeaders(request: StreamRequest, authorization: string | null): Record<string, string> {
  const headers: Record<string, string> = {
    ...request.headers,
    Accept: 'text/event-stream',
    'Cache-Control': 'no-cache',
  };
  if (request.body !== undefined) {
    headers['Content-Type'] = 'application/json';
  }
  if (authorization) {
    headers.Authorization = authorization;
  }
  return headers;
}

export function createStreamTransport(options: StreamTransportOptions = {}): StreamTransport {
  const fetchImpl: FetchLike = options.fetch ?? ((url, init) => fetch(url, init));
  const connectTimeoutMs = options.connectTimeoutMs ?? 60_000;
  const resourceTimeoutMs = options.resourceTimeoutMs ?? 3_600_000;
  const credentialWaitMs = options.credentialWaitMs ?? 250;

  return {
    open(request, callbacks) {
      const id = createId('stream');
      const controller = new AbortController();
      let abortReason: AbortReason | null = null;
      let settled = false;
      let cancelBody: ((reason: string) => Promise<void>) | null = null;

      const reason = (): AbortReason | null => abortReason;
      const canceled = (): boolean => abortReason === 'canceled';

      const abort = (next: AbortReason): void => {
        if (settled || abortReason) {
          return;
        }
        abortReason = next;
        controller.abort(next);
        cancelBody?.(next).catch((error: unknown) => {
          console.debug('[ariachat][sse] body cancel failed', { id, error: errorMessage(error) });
        });
      };

      const timeoutError = (phase: StreamErrorPhase): StreamTransportError => {
        const limit = reason() === 'connect_timeout' ? connectTimeoutMs : resourceTimeoutMs;
        const what = phase === 'connect' ? 'connecting to' : 'streaming from';
        return makeStreamTransportError(`Timed out ${what} ${request.url} after ${limit}ms`, 'timeout', phase, true);
      };

      // Read through our own reader so cancel() can interrupt a slow error body.
      const readErrorBody = async (body: ReadableStream<Uint8Array>): Promise<string> => {
        const reader = body.getReader();
        cancelBody = (why) => reader.cancel(why);
        const decoder = new TextDecoder();
        let text = '';
        try {
          while (true) {
            const { value, done } = await reader.read();
            if (done) break;
            text += decoder.decode(value, { stream: true });
          }
          return text + decoder.decode();
        } catch (error) {
          console.debug('[ariachat][sse] error body unreadable', { id, error: errorMessage(error) });
          return text;
        }
      };

      const run = async (): Promise<StreamOutcome> => {
        const parser = createSseFrameParser({ lenientLineTermination: options.lenientFraming });
        const deliver = (frames: StreamFrame[]): void => {
          for (const frame of frames) {
            if (canceled()) return;
            callbacks.onFrame(frame);
          }
        };
        const fail = (error: StreamTransportError): StreamOutcome => {
          console.warn('[ariachat][sse] stream failed', { id, code: error.code, phase: error.phase, message: error.message });
          callbacks.onError(error);
          return 'failed';
        };

        const connectTimer = setTimeout(() => abort('connect_timeout'), connectTimeoutMs);
        const resourceTimer = setTimeout(() => abort('resource_timeout'), resourceTimeoutMs);

        try {
          const authorization = await resolveAuthorizationHeader(options.credentials, credentialWaitMs);
          if (canceled()) return 'canceled';

          const headers = buildHeaders(request, authorization);
          console.info('[ariachat][sse] open', redactSecrets({ id, method: request.method, url: request.url, headers }));

          let response: Response;
          try {
            response = await fetchImpl(request.url, {
              method: request.method,
              headers,
              body: request.body,
              signal: controller.signal,
            });
          } catch (error) {
            if (canceled()) return 'canceled';
            if (reason()) return fail(timeoutError('connect'));
            return fail(makeStreamTransportError(`Network request failed: ${errorMessage(error)}`, 'network', 'connect', true));
          } finally {
            clearTimeout(connectTimer);
          }

          const body = response.body;
          if (canceled()) {
            body?.cancel('canceled').catch((error: unknown) => {
              console.debug('[ariachat][sse] body cancel failed', { id, error: errorMessage(error) });
            });
            return 'canceled';
          }
          if (!response.ok) {
            const detail = body ? await readErrorBody(body) : '';
            if (canceled()) return 'canceled';
            return fail(mapHttpStatusToError(response.status, detail));
          }
          if (!body) {
            return fail(makeStreamTransportError('Aria runtime returned an empty stream body', 'empty_body', 'connect', false));
          }

          const reader = body.getReader();
          cancelBody = (why) => reader.cancel(why);

          let readError: unknown = null;
          try {
            while (true) {
              const { value, done } = await reader.read();
              if (done || canceled()) break;
              deliver(parser.push(value));
            }
          } catch (error) {
            readError = error;
          }

          if (canceled()) return 'canceled';
          deliver(parser.flush());
          if (reason()) return fail(timeoutError('stream'));
          if (readError) {
            return fail(makeStreamTransportError(`Stream interrupted: ${errorMessage(readError)}`, 'read', 'stream', true));
          }
          return 'completed';
        } finally {
          clearTimeout(connectTimer);
          clearTimeout(resourceTimer);
        }
      };

      const done = run()
        .catch((error: unknown): StreamOutcome => {
          console.error('[ariachat][sse] frame handler threw; closing stream', { id, error: errorMessage(error) });
          abort('canceled');
          return 'failed';
        })
        .then((outcome) => {
          settled = true;
          console.info('[ariachat][sse] closed', { id, outcome });
          return outcome;
        });

      return {
        id,
        done,
        cancel() {
          abort('canceled');
        },
        isActive() {
          return !settled && !canceled();
        },
      };
    },
  };
}
