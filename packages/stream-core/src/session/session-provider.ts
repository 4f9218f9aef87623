import { z } from 'zod';
import { resolveAuthorizationHeader, type CredentialProvider } from '../auth/credential-provider';
import { errorMessage, makeSessionError } from '../errors';
import { endpoints } from '../http/endpoints';
import type { FetchLike } from '../sse/transport';
import { jsonValueSchema } from '../turn/payloads';

export interface SessionProvider {
  /** Returns the current session id, creating a session on first use. */
  getCurrentSessionId(): Promise<string>;
}

export interface RestSessionProvider extends SessionProvider {
  createSession(): Promise<string>;
  clearSession(): void;
}

export interface RestSessionProviderOptions {
  baseUrl: string;
  credentials?: CredentialProvider;
  fetch?: FetchLike;
  timeoutMs?: number;
  credentialWaitMs?: number;
}

const sessionResponseSchema = z.object({
  data: z.object({
    id: z.string().min(1),
    user_id: z.string().optional(),
    created_at: z.string().optional(),
    context_data: z.record(z.string(), jsonValueSchema).optional(),
    status: z.string().optional(),
  }),
});

export function createRestSessionProvider(options: RestSessionProviderOptions): RestSessionProvider {
  const fetchImpl: FetchLike = options.fetch ?? ((url, init) => fetch(url, init));
  const timeoutMs = options.timeoutMs ?? 30_000;
  let currentSessionId: string | null = null;
  let pending: Promise<string> | null = null;
  let generation = 0;

  async function requestSession(): Promise<string> {
    const authorization = await resolveAuthorizationHeader(options.credentials, options.credentialWaitMs ?? 250);
    const headers: Record<string, string> = {
      Accept: 'application/json',
      'Content-Type': 'application/json',
    };
    if (authorization) {
      headers.Authorization = authorization;
    }

    console.info('[ariachat][session] creating session', { url: `${options.baseUrl}${endpoints.sessions}` });

    let response: Response;
    try {
      response = await fetchImpl(`${options.baseUrl}${endpoints.sessions}`, {
        method: 'POST',
        headers,
        body: JSON.stringify({}),
        signal: AbortSignal.timeout(timeoutMs),
      });
    } catch (error) {
      throw makeSessionError(`Session creation failed: ${errorMessage(error)}`, 'session_create', undefined, error);
    }

    if (!response.ok) {
      const detail = await response.text().catch(() => '');
      throw makeSessionError(
        `Session creation failed (${response.status})${detail ? `: ${detail}` : ''}`,
        'session_create',
        response.status,
      );
    }

    let payload: unknown;
    try {
      payload = await response.json();
    } catch (error) {
      throw makeSessionError('Session response was not valid JSON', 'session_response', response.status, error);
    }

    const parsed = sessionResponseSchema.safeParse(payload);
    if (!parsed.success) {
      throw makeSessionError('Session response did not include a session id', 'session_response', response.status);
    }

    console.info('[ariachat][session] session created', { sessionId: parsed.data.data.id });
    return parsed.data.data.id;
  }

  const provider: RestSessionProvider = {
    async createSession() {
      if (!pending) {
        const started = generation;
        const request: Promise<string> = requestSession()
          .then((sessionId) => {
            // A clearSession() since the request went out discards its result.
            if (generation === started) {
              currentSessionId = sessionId;
            }
            return sessionId;
          })
          .finally(() => {
            if (pending === request) {
              pending = null;
            }
          });
        pending = request;
      }
      return pending;
    },
    async getCurrentSessionId() {
      if (currentSessionId) {
        return currentSessionId;
      }
      return provider.createSession();
    },
    clearSession() {
      generation += 1;
      currentSessionId = null;
      pending = null;
    },
  };

  return provider;
}
