export interface TurnLifecycleState {
  isProcessing: boolean;
  isComplete: boolean;
  lastError: Error | null;
  activeTurnId: string | null;
}

export type TurnOutcome = 'completed' | 'canceled' | 'fallback' | 'failed';

export interface TurnResult {
  turnId: string;
  sessionId?: string;
  outcome: TurnOutcome;
}

export type TurnRunnerEvent =
  | {
      type: 'turn.state.changed';
      payload: TurnLifecycleState;
    }
  | {
      type: 'turn.stream.warning';
      payload: { turnId: string; code: string; message: string };
    }
  | {
      type: 'turn.fallback.started';
      payload: { turnId: string; reason: string };
    }
  | {
      type: 'turn.settled';
      payload: TurnResult;
    };
