// Provider Interface
// Common interface that all language model backends implement

export interface ToolCall {
  id: string;
  name: string;
  arguments: string; // JSON string
}

export interface ProviderTool {
  type: 'function';
  function: {
    name: string;
    description: string;
    parameters: {
      type: 'object';
      properties: Record<string, unknown>;
      required: string[];
    };
  };
}

export interface ProviderMessage {
  role: 'user' | 'assistant' | 'system' | 'tool';
  content: string;
  tool_calls?: ToolCall[]; // For assistant messages with tool calls
  tool_call_id?: string; // For tool result messages
  name?: string; // Tool name for tool messages
}

export interface ProviderOptions {
  model: string;
  maxTokens?: number;
  temperature?: number;
  signal?: AbortSignal;
  tools?: ProviderTool[];
  tool_choice?: 'auto' | 'none';
}

export interface ProviderUsage {
  promptTokens: number;
  completionTokens: number;
  totalTokens: number;
}

export interface ProviderResponse {
  content: string;
  toolCalls: ToolCall[];
  usage: ProviderUsage;
}

export interface StreamChunk {
  text: string;
  usage?: ProviderUsage;
  tool_calls?: ToolCall[];
  finish_reason?: 'stop' | 'tool_calls' | 'length';
}

export interface Provider {
  name: string;
  sendChat(messages: ProviderMessage[], options: ProviderOptions): Promise<ProviderResponse>;
  sendChatStream(messages: ProviderMessage[], options: ProviderOptions): AsyncIterable<StreamChunk>;
}

export const EMPTY_USAGE: ProviderUsage = { promptTokens: 0, completionTokens: 0, totalTokens: 0 };
