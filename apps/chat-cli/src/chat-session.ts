import type { TurnResult } from '@ariachat/shared-types';
import { isTurnError, type RestSessionProvider, type TurnOrchestrator } from '@ariachat/stream-core';
import { formatRunnerEvent, formatTurnEvent } from './format';

export type LineResult = 'continue' | 'quit';

export interface ChatSessionOptions {
  orchestrator: TurnOrchestrator;
  sessions: Pick<RestSessionProvider, 'clearSession'>;
  write(line: string): void;
}

export interface ChatSession {
  /** Handles one line of input: a slash command or a prompt to run as a turn. */
  handleLine(line: string): Promise<LineResult>;
  runPrompt(input: string): Promise<TurnResult | null>;
  dispose(): void;
}

export function createChatSession(options: ChatSessionOptions): ChatSession {
  const { orchestrator, sessions, write } = options;

  const unsubscribe = orchestrator.subscribeToEvents((event) => {
    const line = formatRunnerEvent(event);
    if (line) {
      write(line);
    }
  });

  async function runPrompt(input: string): Promise<TurnResult | null> {
    try {
      return await orchestrator.executeTurn(input, (event) => write(formatTurnEvent(event)));
    } catch (error) {
      if (isTurnError(error)) {
        write(`[error] ${error.message}`);
        return null;
      }
      throw error;
    }
  }

  return {
    runPrompt,
    async handleLine(line) {
      const text = line.trim();
      if (!text) {
        return 'continue';
      }

      switch (text) {
        case '/quit':
          await orchestrator.cancelCurrentTurn();
          return 'quit';
        case '/new':
          await orchestrator.cancelCurrentTurn();
          sessions.clearSession();
          write('[session] the next prompt starts a new session');
          return 'continue';
        case '/cancel':
          await orchestrator.cancelCurrentTurn();
          return 'continue';
      }

      if (text.startsWith('/')) {
        write(`[error] unknown command ${text}`);
        return 'continue';
      }

      await runPrompt(text);
      return 'continue';
    },
    dispose() {
      unsubscribe();
    },
  };
}
