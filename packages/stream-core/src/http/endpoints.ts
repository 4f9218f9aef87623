import type { ClientSettings } from '@ariachat/shared-types';

/** `{scheme}://{host}:{port}/api/v1`, the prefix of every runtime endpoint. */
export function apiBaseUrl(settings: Pick<ClientSettings, 'api'>): string {
  const { scheme, host, port } = settings.api;
  return `${scheme}://${host}:${port}/api/v1`;
}

export const endpoints = {
  /** POST: create a session. */
  sessions: '/sessions',
  /** POST (SSE): execute a turn. */
  sessionTurns: (sessionId: string) => `/sessions/${encodeURIComponent(sessionId)}/turns`,
  /** GET (SSE): task output, optionally following until the task ends. */
  taskOutput: (taskId: string, follow: boolean) =>
    `/tasks/${encodeURIComponent(taskId)}/output?follow=${String(follow)}`,
  /** GET (SSE): notifications for the signed-in user. */
  notificationsStream: '/notifications/stream',
} as const;

export function endpointUrl(settings: Pick<ClientSettings, 'api'>, path: string): string {
  return `${apiBaseUrl(settings)}${path}`;
}
