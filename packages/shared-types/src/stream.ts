export const DEFAULT_EVENT_TYPE = 'message';

/** One parsed SSE record: its `event:` tag and the newline-joined `data:` lines. */
export interface StreamFrame {
  eventType: string;
  data: string;
}

export type StreamOutcome = 'completed' | 'canceled' | 'failed';
