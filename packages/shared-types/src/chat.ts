export type MessageRole = 'system' | 'user' | 'assistant' | 'thought' | 'tool';

export interface MessageMetadata {
  isStatus?: boolean;
  isFinal?: boolean;
  messageType?: string;
}

export interface TurnMessage {
  id: string;
  role: MessageRole;
  content: string;
  createdAt?: string;
  metadata?: MessageMetadata;
}

export interface ToolCall {
  id: string;
  toolName: string;
  parameters: Record<string, string>;
}

export interface ToolResult {
  toolCallId: string;
  toolName: string;
  output: string;
  success: boolean;
  error?: string;
}

export type TurnOutputEvent =
  | { type: 'message'; payload: TurnMessage }
  | { type: 'tool_call'; payload: ToolCall }
  | { type: 'tool_result'; payload: ToolResult }
  | { type: 'final_response'; payload: { content: string } };

export type TurnOutputSink = (event: TurnOutputEvent) => void;
