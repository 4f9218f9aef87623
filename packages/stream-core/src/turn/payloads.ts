import type { JsonValue } from '@ariachat/shared-types';
import { z } from 'zod';

export const jsonValueSchema: z.ZodType<JsonValue> = z.lazy(() =>
  z.union([
    z.null(),
    z.boolean(),
    z.number(),
    z.string(),
    z.array(jsonValueSchema),
    z.record(z.string(), jsonValueSchema),
  ]),
);

const jsonObjectSchema = z.record(z.string(), jsonValueSchema);

export const messagePayloadSchema = z.object({
  id: z.string(),
  role: z.string(),
  content: z.string(),
  created_at: z.string().optional(),
  metadata: z
    .object({
      is_status: z.boolean().optional(),
      is_final: z.boolean().optional(),
      message_type: z.string().optional(),
    })
    .nullish(),
});

export const toolCallPayloadSchema = z.object({
  tool_name: z.string(),
  parameters_json: jsonObjectSchema,
});

export const toolResultPayloadSchema = z.object({
  tool_name: z.string(),
  result_json: jsonObjectSchema,
  success: z.boolean(),
  error_message: z.string().nullish(),
});

export const finalResponsePayloadSchema = z.object({
  content: z.string(),
});

export const errorPayloadSchema = z.object({
  message: z.string().optional(),
});

export type MessagePayload = z.infer<typeof messagePayloadSchema>;
export type ToolCallPayload = z.infer<typeof toolCallPayloadSchema>;
export type ToolResultPayload = z.infer<typeof toolResultPayloadSchema>;
