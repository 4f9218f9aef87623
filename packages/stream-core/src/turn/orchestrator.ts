import type { TurnOutputEvent, TurnOutputSink, TurnResult, TurnRunnerEvent } from '@ariachat/shared-types';
import { errorMessage, makeStreamTransportError, makeTurnError, type StreamTransportError } from '../errors';
import { createId } from '../ids';
import { createStreamTransport, type StreamHandle } from '../sse/transport';
import { decodeTurnFrame } from './decoder';
import { buildFallbackScenario, runFallbackScenario } from './fallback';
import { buildTurnRequest } from './request';
import { createTurnStateStore } from './state';
import type { TurnOrchestrator, TurnOrchestratorConfig } from './types';

interface RunningTurn {
  turnId: string;
  abortController: AbortController;
  handle: StreamHandle | null;
}

export function createTurnOrchestrator(config: TurnOrchestratorConfig): TurnOrchestrator {
  const now = config.now ?? Date.now;
  const nextId = (prefix: string): string => createId(prefix, now);
  const listeners = new Set<(event: TurnRunnerEvent) => void>();
  const store = createTurnStateStore();
  const transport =
    config.transport ??
    createStreamTransport({
      fetch: config.fetch,
      credentials: config.credentials,
      connectTimeoutMs: config.settings.stream.connectTimeoutMs,
      resourceTimeoutMs: config.settings.stream.resourceTimeoutMs,
      credentialWaitMs: config.settings.stream.credentialWaitMs,
      lenientFraming: config.settings.stream.lenientFraming,
    });
  const fallbackEnabled = config.fallback?.enabled ?? config.settings.fallback.enabled;
  const fallbackScenario = config.fallback?.scenario ?? buildFallbackScenario;
  let running: RunningTurn | null = null;

  const emit = (event: TurnRunnerEvent): void => {
    for (const listener of listeners) {
      listener(event);
    }
  };

  store.subscribe((state) => emit({ type: 'turn.state.changed', payload: state }));

  const stopRunning = (): void => {
    if (!running) {
      return;
    }
    running.abortController.abort();
    running.handle?.cancel();
    running = null;
  };

  async function executeTurn(input: string, sink: TurnOutputSink): Promise<TurnResult> {
    const turnId = nextId('turn');
    stopRunning();

    const abortController = new AbortController();
    const current: RunningTurn = { turnId, abortController, handle: null };
    running = current;
    store.dispatch({ type: 'started', turnId });

    const isCurrent = (): boolean => !abortController.signal.aborted;
    const deliver = (event: TurnOutputEvent): void => {
      if (isCurrent()) {
        sink(event);
      }
    };
    const finish = (result: TurnResult): TurnResult => {
      if (running === current) {
        running = null;
      }
      store.dispatch({ type: 'settled', turnId });
      emit({ type: 'turn.settled', payload: result });
      return result;
    };

    let sessionId: string;
    try {
      sessionId = await config.sessions.getCurrentSessionId();
    } catch (error) {
      if (!isCurrent()) {
        return finish({ turnId, outcome: 'canceled' });
      }
      console.error('[ariachat][turn] session resolution failed', { turnId, error: errorMessage(error) });
      const turnError = makeTurnError(`Could not resolve a session: ${errorMessage(error)}`, 'session', turnId, error);
      store.dispatch({ type: 'failed', turnId, error: turnError });
      finish({ turnId, outcome: 'failed' });
      throw turnError;
    }

    if (!isCurrent()) {
      return finish({ turnId, sessionId, outcome: 'canceled' });
    }

    console.info('[ariachat][turn] executing turn', { turnId, sessionId, inputLength: input.length });

    const failure: { error: StreamTransportError | null } = { error: null };
    const handle = transport.open(buildTurnRequest(config.settings, sessionId, input), {
      onFrame(frame) {
        if (!isCurrent()) return;
        const event = decodeTurnFrame(frame, { createId: nextId });
        if (event) {
          deliver(event);
        }
      },
      onError(error) {
        failure.error = error;
      },
    });
    current.handle = handle;

    const outcome = await handle.done;
    if (outcome === 'canceled' || !isCurrent()) {
      return finish({ turnId, sessionId, outcome: 'canceled' });
    }
    if (outcome === 'completed') {
      return finish({ turnId, sessionId, outcome: 'completed' });
    }

    const error = failure.error ?? makeStreamTransportError('Stream closed by a failing event handler', 'read', 'stream', false);

    if (error.phase === 'connect' && error.retryable && fallbackEnabled) {
      console.warn('[ariachat][turn] fallback_simulation: runtime unreachable, emitting simulated response', {
        turnId,
        sessionId,
        reason: error.message,
      });
      emit({ type: 'turn.fallback.started', payload: { turnId, reason: error.message } });
      try {
        await runFallbackScenario(
          fallbackScenario(input, nextId),
          deliver,
          abortController.signal,
          config.fallback?.stepDelayMs,
        );
      } catch (simulationError) {
        if (!isCurrent()) {
          return finish({ turnId, sessionId, outcome: 'canceled' });
        }
        store.dispatch({
          type: 'failed',
          turnId,
          error: makeTurnError(`Simulated response failed: ${errorMessage(simulationError)}`, 'transport', turnId, simulationError),
        });
        return finish({ turnId, sessionId, outcome: 'failed' });
      }
      return finish({ turnId, sessionId, outcome: 'fallback' });
    }

    store.dispatch({
      type: 'failed',
      turnId,
      error: makeTurnError(error.message, error.phase === 'stream' ? 'stream' : 'transport', turnId, error),
    });
    if (error.phase === 'stream') {
      emit({ type: 'turn.stream.warning', payload: { turnId, code: error.code, message: error.message } });
    }
    return finish({ turnId, sessionId, outcome: 'failed' });
  }

  return {
    executeTurn,
    async cancelCurrentTurn() {
      if (!running) {
        return;
      }
      const { turnId } = running;
      stopRunning();
      store.dispatch({ type: 'canceled' });
      console.info('[ariachat][turn] turn canceled', { turnId });
    },
    getState: () => store.getState(),
    subscribeToEvents(listener) {
      listeners.add(listener);
      return () => {
        listeners.delete(listener);
      };
    },
  };
}
