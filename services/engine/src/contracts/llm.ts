import type { FailureKind } from './results';

export interface ToolCallRequest {
  id: string;
  name: string;
  arguments: Record<string, unknown>;
}

export interface ToolError {
  kind: FailureKind;
  message: string;
  retriable: boolean;
}

export interface ToolCallResult {
  id: string;
  output: unknown;
  error?: ToolError;
}

export interface UserMessage {
  role: 'user';
  text: string;
}

export interface AssistantMessage {
  role: 'assistant';
  text: string;
  toolCalls: ToolCallRequest[];
}

export interface ToolMessage {
  role: 'tool';
  toolCallId: string;
  name: string;
  result: ToolCallResult;
}

export type Message = UserMessage | AssistantMessage | ToolMessage;

/** JSON Schema subset the model providers accept for function parameters. */
export interface JsonSchema {
  type: 'object' | 'string' | 'number' | 'integer' | 'boolean' | 'array';
  description?: string;
  properties?: Record<string, JsonSchema>;
  required?: string[];
  items?: JsonSchema;
  enum?: readonly string[];
  minimum?: number;
  maximum?: number;
  additionalProperties?: boolean;
}

export interface ToolSpec {
  name: string;
  description: string;
  parameters: JsonSchema;
  returns: JsonSchema;
}

export interface ChatRequest {
  system: string;
  messages: Message[];
  /** Omitted or empty means the model must answer in text. */
  tools?: ToolSpec[];
  signal?: AbortSignal;
}

export interface ChatResponse {
  text: string;
  toolCalls: ToolCallRequest[];
}

export interface ChatModel {
  complete(request: ChatRequest): Promise<ChatResponse>;
}

export class ModelUnavailableError extends Error {
  constructor(message: string, readonly status?: number) {
    super(message);
    this.name = 'ModelUnavailableError';
  }
}
