/**
 * Turn lifecycle state.
 *
 * Every mutation is an action posted to the store's mailbox and reduced in
 * arrival order by a single consumer, so observers never see a half-applied
 * update. Actions carrying a `turnId` that is no longer active are ignored:
 * a superseded turn settling late cannot clobber its successor.
 *
 * Transitions:
 * - idle → processing: `started`
 * - processing → complete: `settled` or `canceled`
 * - `failed` records `lastError` without leaving processing
 */

import type { TurnLifecycleState } from '@ariachat/shared-types';

export type TurnStateAction =
  | { type: 'started'; turnId: string }
  | { type: 'failed'; turnId: string; error: Error }
  | { type: 'settled'; turnId: string }
  | { type: 'canceled' };

export type TurnStateIssue = 'processing_state_inconsistency' | 'orphaned_active_turn';

export const initialTurnState: TurnLifecycleState = {
  isProcessing: false,
  isComplete: false,
  lastError: null,
  activeTurnId: null,
};

export function reduceTurnState(state: TurnLifecycleState, action: TurnStateAction): TurnLifecycleState {
  switch (action.type) {
    case 'started':
      return { isProcessing: true, isComplete: false, lastError: null, activeTurnId: action.turnId };

    case 'failed':
      if (state.activeTurnId !== action.turnId) return state;
      return { ...state, lastError: action.error };

    case 'settled':
      if (state.activeTurnId !== action.turnId) return state;
      return { ...state, isProcessing: false, isComplete: true, activeTurnId: null };

    case 'canceled':
      if (!state.activeTurnId) return state;
      return { ...state, isProcessing: false, isComplete: true, activeTurnId: null };
  }
}

export function validateTurnState(state: TurnLifecycleState): TurnStateIssue[] {
  const issues: TurnStateIssue[] = [];
  if (state.isProcessing && state.isComplete) {
    issues.push('processing_state_inconsistency');
  }
  if (state.activeTurnId !== null && !state.isProcessing) {
    issues.push('orphaned_active_turn');
  }
  return issues;
}

export function recoverTurnState(state: TurnLifecycleState): TurnLifecycleState {
  const issues = validateTurnState(state);
  if (issues.length === 0) {
    return state;
  }
  console.error('[ariachat][turn] recovering from inconsistent lifecycle state', { issues });
  return { ...state, isProcessing: false, isComplete: false, activeTurnId: null };
}

export interface TurnStateStore {
  getState(): TurnLifecycleState;
  dispatch(action: TurnStateAction): void;
  subscribe(listener: (state: TurnLifecycleState) => void): () => void;
}

export function createTurnStateStore(initial: TurnLifecycleState = initialTurnState): TurnStateStore {
  let state = recoverTurnState(initial);
  const mailbox: TurnStateAction[] = [];
  const listeners = new Set<(state: TurnLifecycleState) => void>();
  let draining = false;

  const drain = (): void => {
    draining = true;
    try {
      let action = mailbox.shift();
      while (action) {
        const next = recoverTurnState(reduceTurnState(state, action));
        if (next !== state) {
          state = next;
          for (const listener of listeners) {
            listener(state);
          }
        }
        action = mailbox.shift();
      }
    } finally {
      draining = false;
    }
  };

  return {
    getState: () => state,
    dispatch(action) {
      mailbox.push(action);
      // A listener dispatching from inside a notification is queued behind the current action.
      if (!draining) {
        drain();
      }
    },
    subscribe(listener) {
      listeners.add(listener);
      return () => {
        listeners.delete(listener);
      };
    },
  };
}
