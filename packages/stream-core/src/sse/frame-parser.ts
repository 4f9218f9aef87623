import { DEFAULT_EVENT_TYPE, type StreamFrame } from '@ariachat/shared-types';

export interface SseFrameParserOptions {
  /**
   * Also treat a remainder that ends in a single `\n` as a complete record.
   * Accommodates servers that never send the blank-line terminator; output then
   * depends on where chunk boundaries fall.
   */
  lenientLineTermination?: boolean;
}

export interface SseFrameParser {
  push(chunk: Uint8Array | string): StreamFrame[];
  flush(): StreamFrame[];
}

const RECORD_SEPARATOR = '\n\n';

export function parseSseRecord(record: string): StreamFrame | null {
  let eventType: string | undefined;
  let data = '';

  for (const line of record.split('\n')) {
    if (line.startsWith('event:')) {
      eventType = line.slice('event:'.length).trim();
    } else if (line.startsWith('data:')) {
      const value = line.slice('data:'.length).trim();
      data = data ? `${data}\n${value}` : value;
    }
  }

  const trimmed = data.trim();
  if (!trimmed) {
    return null;
  }
  return { eventType: eventType || DEFAULT_EVENT_TYPE, data: trimmed };
}

export function createSseFrameParser(options: SseFrameParserOptions = {}): SseFrameParser {
  const decoder = new TextDecoder();
  let buffer = '';
  let searchFrom = 0;
  // A chunk-final CR may be the first half of a CRLF; it is carried into the next chunk.
  let pendingCr = false;

  const append = (text: string): void => {
    let next = pendingCr ? `\r${text}` : text;
    pendingCr = next.endsWith('\r');
    if (pendingCr) {
      next = next.slice(0, -1);
    }
    searchFrom = Math.max(0, buffer.length - 1);
    buffer += next.replace(/\r\n/g, '\n');
  };

  const drain = (): StreamFrame[] => {
    const frames: StreamFrame[] = [];

    let boundary = buffer.indexOf(RECORD_SEPARATOR, searchFrom);
    while (boundary !== -1) {
      const record = buffer.slice(0, boundary);
      buffer = buffer.slice(boundary + RECORD_SEPARATOR.length);
      const frame = parseSseRecord(record);
      if (frame) {
        frames.push(frame);
      }
      boundary = buffer.indexOf(RECORD_SEPARATOR);
    }

    if (options.lenientLineTermination && buffer.endsWith('\n')) {
      const frame = parseSseRecord(buffer.slice(0, -1));
      buffer = '';
      if (frame) {
        frames.push(frame);
      }
    }

    return frames;
  };

  return {
    push(chunk) {
      append(typeof chunk === 'string' ? chunk : decoder.decode(chunk, { stream: true }));
      return drain();
    },
    flush() {
      append(decoder.decode());
      if (pendingCr) {
        buffer += '\r';
        pendingCr = false;
      }
      const frames = drain();
      const frame = parseSseRecord(buffer);
      buffer = '';
      if (frame) {
        frames.push(frame);
      }
      return frames;
    },
  };
}
