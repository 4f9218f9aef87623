export type StreamErrorCode = 'network' | 'timeout' | 'http' | 'read' | 'empty_body';

/** `connect`: nothing was received yet. `stream`: failed after the response started. */
export type StreamErrorPhase = 'connect' | 'stream';

export interface StreamTransportError extends Error {
  code: StreamErrorCode;
  phase: StreamErrorPhase;
  retryable: boolean;
  status?: number;
}

export type SessionErrorCode = 'session_create' | 'session_response';

export interface SessionError extends Error {
  code: SessionErrorCode;
  status?: number;
}

export type TurnErrorCode = 'session' | 'transport' | 'stream';

export interface TurnError extends Error {
  code: TurnErrorCode;
  turnId: string;
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

export function makeStreamTransportError(
  message: string,
  code: StreamErrorCode,
  phase: StreamErrorPhase,
  retryable: boolean,
  status?: number,
): StreamTransportError {
  return Object.assign(new Error(message), { name: 'StreamTransportError', code, phase, retryable, status });
}

export function mapHttpStatusToError(status: number, body: string): StreamTransportError {
  const detail = body.trim() ? `: ${body.trim()}` : '';
  if (status === 401 || status === 403) {
    return makeStreamTransportError(`Aria runtime rejected credentials (${status})${detail}`, 'http', 'connect', false, status);
  }
  if (status === 429 || status >= 500) {
    return makeStreamTransportError(`Aria runtime unavailable (${status})${detail}`, 'http', 'connect', true, status);
  }
  return makeStreamTransportError(`Aria runtime request failed (${status})${detail}`, 'http', 'connect', false, status);
}

export function makeSessionError(message: string, code: SessionErrorCode, status?: number, cause?: unknown): SessionError {
  return Object.assign(new Error(message, { cause }), { name: 'SessionError', code, status });
}

export function makeTurnError(message: string, code: TurnErrorCode, turnId: string, cause?: unknown): TurnError {
  return Object.assign(new Error(message, { cause }), { name: 'TurnError', code, turnId });
}

function hasCode(error: unknown, name: string): error is Error & { code: string } {
  return error instanceof Error && error.name === name && 'code' in error && typeof error.code === 'string';
}

export function isStreamTransportError(error: unknown): error is StreamTransportError {
  return hasCode(error, 'StreamTransportError');
}

export function isSessionError(error: unknown): error is SessionError {
  return hasCode(error, 'SessionError');
}

export function isTurnError(error: unknown): error is TurnError {
  return hasCode(error, 'TurnError');
}
