import type {
  ClientSettings,
  TurnLifecycleState,
  TurnOutputSink,
  TurnResult,
  TurnRunnerEvent,
} from '@ariachat/shared-types';
import type { CredentialProvider } from '../auth/credential-provider';
import type { SessionProvider } from '../session/session-provider';
import type { FetchLike, StreamTransport } from '../sse/transport';
import type { FallbackStep } from './fallback';

export interface TurnOrchestrator {
  /** Rejects only when the session cannot be resolved, with a `TurnError` of code `session`. */
  executeTurn(input: string, sink: TurnOutputSink): Promise<TurnResult>;
  cancelCurrentTurn(): Promise<void>;
  getState(): TurnLifecycleState;
  subscribeToEvents(listener: (event: TurnRunnerEvent) => void): () => void;
}

export interface TurnOrchestratorConfig {
  settings: ClientSettings;
  sessions: SessionProvider;
  credentials?: CredentialProvider;
  /** Defaults to a transport built from `settings.stream`, `credentials` and `fetch`. */
  transport?: StreamTransport;
  fetch?: FetchLike;
  fallback?: {
    /** Overrides `settings.fallback.enabled`. */
    enabled?: boolean;
    /** Replaces every step delay, e.g. `0` in tests. */
    stepDelayMs?: number;
    scenario?: (input: string, createId: (prefix: string) => string) => FallbackStep[];
  };
  now?: () => number;
}
