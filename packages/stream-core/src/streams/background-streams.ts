import type { ClientSettings } from '@ariachat/shared-types';
import { endpointUrl, endpoints } from '../http/endpoints';
import type { StreamCallbacks, StreamHandle, StreamTransport } from '../sse/transport';

export interface TaskOutputStreamOptions {
  /** Keep the stream open until the task finishes. Defaults to `true`. */
  follow?: boolean;
}

export function openTaskOutputStream(
  transport: StreamTransport,
  settings: Pick<ClientSettings, 'api'>,
  taskId: string,
  callbacks: StreamCallbacks,
  options: TaskOutputStreamOptions = {},
): StreamHandle {
  const url = endpointUrl(settings, endpoints.taskOutput(taskId, options.follow ?? true));
  return transport.open({ method: 'GET', url }, callbacks);
}

export function openNotificationStream(
  transport: StreamTransport,
  settings: Pick<ClientSettings, 'api'>,
  callbacks: StreamCallbacks,
): StreamHandle {
  return transport.open({ method: 'GET', url: endpointUrl(settings, endpoints.notificationsStream) }, callbacks);
}
