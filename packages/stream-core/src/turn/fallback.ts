import type { TurnOutputEvent } from '@ariachat/shared-types';

export interface FallbackStep {
  /** Pause before the event is emitted. */
  delayMs: number;
  event: TurnOutputEvent;
}

export const SIMULATED_MESSAGE_TYPE = 'simulated';

export const FALLBACK_TOOL_NAME = 'KnowledgeRetriever';

export function wait(ms: number, signal?: AbortSignal): Promise<void> {
  if (signal?.aborted) {
    return Promise.reject(new Error('The operation was aborted.'));
  }
  if (!ms || ms <= 0) {
    return Promise.resolve();
  }
  return new Promise((resolve, reject) => {
    const handle = setTimeout(() => {
      signal?.removeEventListener('abort', onAbort);
      resolve();
    }, ms);
    const onAbort = () => {
      clearTimeout(handle);
      reject(new Error('The operation was aborted.'));
    };
    signal?.addEventListener('abort', onAbort, { once: true });
  });
}

/**
 * The canned sequence shown when the runtime cannot be reached: an
 * acknowledgment, a thought, one tool round trip and a final response.
 * Messages carry `messageType: 'simulated'` so they never pass for real output.
 */
export function buildFallbackScenario(input: string, createId: (prefix: string) => string): FallbackStep[] {
  const toolCallId = createId('call');
  return [
    {
      delayMs: 0,
      event: {
        type: 'message',
        payload: {
          id: createId('msg'),
          role: 'assistant',
          content: 'The Aria runtime is unreachable, so this is a simulated response.',
          metadata: { isStatus: true, isFinal: false, messageType: SIMULATED_MESSAGE_TYPE },
        },
      },
    },
    {
      delayMs: 250,
      event: {
        type: 'message',
        payload: {
          id: createId('msg'),
          role: 'thought',
          content: 'Analyzing your request...',
          metadata: { messageType: SIMULATED_MESSAGE_TYPE },
        },
      },
    },
    {
      delayMs: 500,
      event: {
        type: 'tool_call',
        payload: { id: toolCallId, toolName: FALLBACK_TOOL_NAME, parameters: { query: input } },
      },
    },
    {
      delayMs: 800,
      event: {
        type: 'tool_result',
        payload: {
          toolCallId,
          toolName: FALLBACK_TOOL_NAME,
          output: 'Found relevant information',
          success: true,
        },
      },
    },
    {
      delayMs: 500,
      event: {
        type: 'final_response',
        payload: { content: `Based on my analysis, here's a response to your query: ${input}` },
      },
    },
  ];
}

/** Emits `steps` in order; rejects as soon as `signal` aborts, emitting nothing further. */
export async function runFallbackScenario(
  steps: FallbackStep[],
  emit: (event: TurnOutputEvent) => void,
  signal: AbortSignal,
  delayOverrideMs?: number,
): Promise<void> {
  for (const step of steps) {
    await wait(delayOverrideMs ?? step.delayMs, signal);
    emit(step.event);
  }
}
