import type { JsonValue, MessageMetadata, MessageRole, StreamFrame, TurnOutputEvent } from '@ariachat/shared-types';
import type { z } from 'zod';
import { errorMessage } from '../errors';
import { createId } from '../ids';
import {
  errorPayloadSchema,
  finalResponsePayloadSchema,
  messagePayloadSchema,
  toolCallPayloadSchema,
  toolResultPayloadSchema,
  type MessagePayload,
} from './payloads';

export interface TurnDecoderOptions {
  createId?: (prefix: string) => string;
}

const ROLES: readonly MessageRole[] = ['system', 'user', 'assistant', 'thought', 'tool'];

export function mapMessageRole(role: string): MessageRole {
  const normalized = role.trim().toLowerCase();
  return ROLES.find((candidate) => candidate === normalized) ?? 'assistant';
}

export function stringifyParameter(value: JsonValue): string {
  return typeof value === 'string' ? value : JSON.stringify(value);
}

function mapMetadata(metadata: MessagePayload['metadata']): MessageMetadata | undefined {
  if (!metadata) {
    return undefined;
  }
  return {
    isStatus: metadata.is_status,
    isFinal: metadata.is_final,
    messageType: metadata.message_type,
  };
}

function parsePayload<T>(frame: StreamFrame, schema: z.ZodType<T, z.ZodTypeDef, unknown>): T | null {
  let json: unknown;
  try {
    json = JSON.parse(frame.data);
  } catch (error) {
    console.warn('[ariachat][decode] dropping frame with invalid JSON', {
      eventType: frame.eventType,
      error: errorMessage(error),
    });
    return null;
  }

  const parsed = schema.safeParse(json);
  if (!parsed.success) {
    console.warn('[ariachat][decode] dropping frame with unexpected payload', {
      eventType: frame.eventType,
      issues: parsed.error.issues.map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`),
    });
    return null;
  }
  return parsed.data;
}

/**
 * Maps one SSE frame to a turn event. Malformed or unrecognised frames are
 * logged and yield `null`; nothing here throws.
 */
export function decodeTurnFrame(frame: StreamFrame, options: TurnDecoderOptions = {}): TurnOutputEvent | null {
  const nextId = options.createId ?? ((prefix: string) => createId(prefix));

  switch (frame.eventType) {
    case 'message': {
      const payload = parsePayload(frame, messagePayloadSchema);
      if (!payload) return null;
      return {
        type: 'message',
        payload: {
          id: payload.id,
          role: mapMessageRole(payload.role),
          content: payload.content,
          createdAt: payload.created_at,
          metadata: mapMetadata(payload.metadata),
        },
      };
    }

    case 'tool_call': {
      const payload = parsePayload(frame, toolCallPayloadSchema);
      if (!payload) return null;
      const parameters: Record<string, string> = {};
      for (const [key, value] of Object.entries(payload.parameters_json)) {
        parameters[key] = stringifyParameter(value);
      }
      return {
        type: 'tool_call',
        payload: { id: nextId('call'), toolName: payload.tool_name, parameters },
      };
    }

    case 'tool_result': {
      const payload = parsePayload(frame, toolResultPayloadSchema);
      if (!payload) return null;
      return {
        type: 'tool_result',
        payload: {
          toolCallId: nextId('call'),
          toolName: payload.tool_name,
          output: JSON.stringify(payload.result_json, null, 2),
          success: payload.success,
          error: payload.error_message ?? undefined,
        },
      };
    }

    case 'final_response': {
      const payload = parsePayload(frame, finalResponsePayloadSchema);
      if (!payload) return null;
      return { type: 'final_response', payload: { content: payload.content } };
    }

    case 'error': {
      const payload = parsePayload(frame, errorPayloadSchema);
      if (!payload?.message) {
        console.warn('[ariachat][decode] dropping error frame without a message', { data: frame.data });
        return null;
      }
      return {
        type: 'message',
        payload: {
          id: nextId('error'),
          role: 'assistant',
          content: `Error: ${payload.message}`,
          metadata: { isFinal: true, messageType: 'error' },
        },
      };
    }

    default:
      console.warn('[ariachat][decode] ignoring unknown event type', { eventType: frame.eventType });
      return null;
  }
}
