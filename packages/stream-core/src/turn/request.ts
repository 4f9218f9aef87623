import type { ClientSettings } from '@ariachat/shared-types';
import { endpointUrl, endpoints } from '../http/endpoints';
import type { StreamRequest } from '../sse/transport';

export function buildTurnRequest(settings: Pick<ClientSettings, 'api'>, sessionId: string, input: string): StreamRequest {
  return {
    method: 'POST',
    url: endpointUrl(settings, endpoints.sessionTurns(sessionId)),
    body: JSON.stringify({ input }),
  };
}
