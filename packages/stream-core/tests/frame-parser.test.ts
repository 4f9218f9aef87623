import type { StreamFrame } from '@ariachat/shared-types';
import { describe, expect, it } from 'vitest';
import { createSseFrameParser, parseSseRecord } from '../src/sse/frame-parser';

function parseChunks(chunks: Array<string | Uint8Array>): StreamFrame[] {
  const parser = createSseFrameParser();
  const frames: StreamFrame[] = [];
  for (const chunk of chunks) {
    frames.push(...parser.push(chunk));
  }
  frames.push(...parser.flush());
  return frames;
}

const TRANSCRIPT = [
  'event: message\ndata: {"id":"m1","role":"thought","content":"thinking"}\n\n',
  ': keep-alive\n\n',
  'event: tool_call\ndata: {"tool_name":"search",\ndata: "parameters_json":{"q":"x"}}\n\n',
  'data: no event line\n\n',
  'event: final_response\ndata: {"content":"done"}\n\n',
].join('');

describe('parseSseRecord', () => {
  it('reads the event type and data of a record', () => {
    expect(parseSseRecord('event: tool_result\ndata: {"ok":true}')).toEqual({
      eventType: 'tool_result',
      data: '{"ok":true}',
    });
  });

  it('joins multiple data lines with newlines', () => {
    expect(parseSseRecord('data: first\ndata:second\ndata:  third  ')).toEqual({
      eventType: 'message',
      data: 'first\nsecond\nthird',
    });
  });

  it('defaults an empty event value to message', () => {
    expect(parseSseRecord('event:\ndata: x')).toEqual({ eventType: 'message', data: 'x' });
  });

  it('drops records without data', () => {
    expect(parseSseRecord(': comment')).toBeNull();
    expect(parseSseRecord('event: message')).toBeNull();
    expect(parseSseRecord('data:   ')).toBeNull();
  });

  it('ignores unknown fields', () => {
    expect(parseSseRecord('id: 7\nretry: 100\ndata: payload')).toEqual({ eventType: 'message', data: 'payload' });
  });
});

describe('sse frame parser', () => {
  it('emits one frame per blank-line terminated record', () => {
    expect(parseChunks([TRANSCRIPT])).toEqual([
      { eventType: 'message', data: '{"id":"m1","role":"thought","content":"thinking"}' },
      { eventType: 'tool_call', data: '{"tool_name":"search",\n"parameters_json":{"q":"x"}}' },
      { eventType: 'message', data: 'no event line' },
      { eventType: 'final_response', data: '{"content":"done"}' },
    ]);
  });

  it('produces the same frames wherever the stream is split', () => {
    const expected = parseChunks([TRANSCRIPT]);
    for (let index = 0; index <= TRANSCRIPT.length; index += 1) {
      expect(parseChunks([TRANSCRIPT.slice(0, index), TRANSCRIPT.slice(index)])).toEqual(expected);
    }
  });

  it('produces the same frames when fed one character at a time', () => {
    expect(parseChunks(TRANSCRIPT.split(''))).toEqual(parseChunks([TRANSCRIPT]));
  });

  it('holds a record back until its terminator arrives', () => {
    const parser = createSseFrameParser();
    expect(parser.push('event: message\ndata: partial\n')).toEqual([]);
    expect(parser.push('\n')).toEqual([{ eventType: 'message', data: 'partial' }]);
  });

  it('emits an unterminated trailing record on flush', () => {
    const parser = createSseFrameParser();
    expect(parser.push('data: a\n\ndata: tail')).toEqual([{ eventType: 'message', data: 'a' }]);
    expect(parser.flush()).toEqual([{ eventType: 'message', data: 'tail' }]);
    expect(parser.flush()).toEqual([]);
  });

  it('accepts CRLF line endings, including a CR and LF split across chunks', () => {
    expect(parseChunks(['event: final_response\r\ndata: {"content":"x"}\r', '\n\r\n'])).toEqual([
      { eventType: 'final_response', data: '{"content":"x"}' },
    ]);
  });

  it('joins a CRLF split across three chunks', () => {
    expect(parseChunks(['data: x\r', '\n\r', '\n'])).toEqual([{ eventType: 'message', data: 'x' }]);
  });

  it('keeps a trailing CR until flush', () => {
    const parser = createSseFrameParser();
    expect(parser.push('data: y\r')).toEqual([]);
    expect(parser.flush()).toEqual([{ eventType: 'message', data: 'y' }]);
  });

  it('decodes multi-byte characters split across byte chunks', () => {
    const bytes = new TextEncoder().encode('data: héllo ✓\n\n');
    const frames = parseChunks([bytes.slice(0, 8), bytes.slice(8, 15), bytes.slice(15)]);
    expect(frames).toEqual([{ eventType: 'message', data: 'héllo ✓' }]);
  });

  it('only treats a single newline as a terminator in lenient mode', () => {
    const strict = createSseFrameParser();
    expect(strict.push('data: a\n')).toEqual([]);

    const lenient = createSseFrameParser({ lenientLineTermination: true });
    expect(lenient.push('data: a\n')).toEqual([{ eventType: 'message', data: 'a' }]);
    expect(lenient.push('data: b\n\n')).toEqual([{ eventType: 'message', data: 'b' }]);
    expect(lenient.flush()).toEqual([]);
  });
});
