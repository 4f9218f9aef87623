import type { TurnOutputEvent, TurnRunnerEvent } from '@ariachat/shared-types';

const SIMULATED = 'simulated';

function indent(text: string): string {
  return text
    .split('\n')
    .map((line) => `  ${line}`)
    .join('\n');
}

export function formatTurnEvent(event: TurnOutputEvent): string {
  switch (event.type) {
    case 'message': {
      const { role, content, metadata } = event.payload;
      const label = metadata?.isStatus ? 'status' : role;
      const suffix = metadata?.messageType === SIMULATED ? ' (simulated)' : '';
      return `[${label}]${suffix} ${content}`;
    }
    case 'tool_call': {
      const args = Object.entries(event.payload.parameters)
        .map(([key, value]) => `${key}=${value}`)
        .join(', ');
      return `[tool] ${event.payload.toolName}(${args})`;
    }
    case 'tool_result': {
      const { toolName, success, error, output } = event.payload;
      const status = success ? 'ok' : `failed${error ? `: ${error}` : ''}`;
      return `[tool] ${toolName} ${status}\n${indent(output)}`;
    }
    case 'final_response':
      return event.payload.content;
  }
}

/** Lines worth showing the user for orchestrator events; state changes print nothing. */
export function formatRunnerEvent(event: TurnRunnerEvent): string | null {
  switch (event.type) {
    case 'turn.stream.warning':
      return `[warning] ${event.payload.message}`;
    case 'turn.fallback.started':
      return `[offline] ${event.payload.reason}; showing a simulated response`;
    case 'turn.settled':
      return event.payload.outcome === 'canceled' ? '[canceled]' : null;
    case 'turn.state.changed':
      return null;
  }
}
