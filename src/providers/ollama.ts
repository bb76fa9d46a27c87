// Ollama Provider
// Chat against a local Ollama instance (/api/chat) with native tool calling

import { z } from 'zod';
import { AppError } from '../utils/errors.js';
import { postModelRequest, readLines, safeParseJson, toModelError } from './http.js';
import {
  EMPTY_USAGE,
  type Provider,
  type ProviderMessage,
  type ProviderOptions,
  type ProviderResponse,
  type ProviderUsage,
  type StreamChunk,
  type ToolCall,
} from './types.js';

const OllamaToolCallSchema = z.object({
  function: z.object({
    name: z.string(),
    arguments: z.union([z.record(z.unknown()), z.string()]).optional(),
  }),
});

const OllamaChatResponseSchema = z.object({
  message: z
    .object({
      role: z.string().optional(),
      content: z.string().optional().default(''),
      tool_calls: z.array(OllamaToolCallSchema).optional(),
    })
    .optional(),
  done: z.boolean().optional(),
  done_reason: z.string().optional(),
  prompt_eval_count: z.number().optional(),
  eval_count: z.number().optional(),
});

type OllamaChatResponse = z.infer<typeof OllamaChatResponseSchema>;

export interface OllamaProviderConfig {
  baseUrl: string;
  numCtx: number;
  timeoutMs: number;
}

export class OllamaProvider implements Provider {
  name = 'ollama';
  private baseUrl: string;

  constructor(private config: OllamaProviderConfig) {
    this.baseUrl = config.baseUrl.replace(/\/+$/, '');
    if (!this.baseUrl) {
      throw new Error('OLLAMA_GPU_URL not configured');
    }
  }

  async sendChat(messages: ProviderMessage[], options: ProviderOptions): Promise<ProviderResponse> {
    const requestOptions = { signal: options.signal, timeoutMs: this.config.timeoutMs, label: 'Ollama' };
    const { response, done, timedOut } = await postModelRequest(
      `${this.baseUrl}/api/chat`,
      this.buildBody(messages, options, false),
      {},
      requestOptions,
    );

    try {
      const parsed = OllamaChatResponseSchema.safeParse(await response.json());
      if (!parsed.success) {
        throw AppError.modelUnavailable('Ollama returned a malformed response');
      }
      return {
        content: parsed.data.message?.content ?? '',
        toolCalls: normalizeToolCalls(parsed.data, 0),
        usage: toUsage(parsed.data),
      };
    } catch (error) {
      throw toModelError(error, requestOptions, timedOut());
    } finally {
      done();
    }
  }

  async *sendChatStream(messages: ProviderMessage[], options: ProviderOptions): AsyncIterable<StreamChunk> {
    const requestOptions = { signal: options.signal, timeoutMs: this.config.timeoutMs, label: 'Ollama' };
    const { response, done, timedOut } = await postModelRequest(
      `${this.baseUrl}/api/chat`,
      this.buildBody(messages, options, true),
      {},
      requestOptions,
    );

    if (!response.body) {
      done();
      throw AppError.modelUnavailable('Ollama returned no response body');
    }

    let callIndex = 0;
    try {
      for await (const line of readLines(response.body)) {
        const parsed = OllamaChatResponseSchema.safeParse(safeParseJson(line));
        if (!parsed.success) {
          // Skip malformed lines
          continue;
        }

        const chunk = parsed.data;
        const text = chunk.message?.content ?? '';
        const toolCalls = normalizeToolCalls(chunk, callIndex);
        callIndex += toolCalls.length;

        if (text || toolCalls.length > 0) {
          yield {
            text,
            ...(toolCalls.length > 0 ? { tool_calls: toolCalls } : {}),
          };
        }

        if (chunk.done) {
          yield {
            text: '',
            usage: toUsage(chunk),
            finish_reason: callIndex > 0 ? 'tool_calls' : chunk.done_reason === 'length' ? 'length' : 'stop',
          };
          return;
        }
      }
    } catch (error) {
      throw toModelError(error, requestOptions, timedOut());
    } finally {
      done();
    }
  }

  private buildBody(messages: ProviderMessage[], options: ProviderOptions, stream: boolean) {
    const useTools = options.tools && options.tools.length > 0 && options.tool_choice !== 'none';
    return {
      model: options.model,
      messages: messages.map(toOllamaMessage),
      stream,
      ...(useTools ? { tools: options.tools } : {}),
      options: {
        num_ctx: this.config.numCtx,
        temperature: options.temperature ?? 0.7,
        repeat_penalty: 1.1,
        ...(options.maxTokens ? { num_predict: options.maxTokens } : {}),
      },
    };
  }
}

function toOllamaMessage(message: ProviderMessage): Record<string, unknown> {
  const base: Record<string, unknown> = { role: message.role, content: message.content };
  if (message.role === 'tool' && message.name) {
    base.tool_name = message.name;
  }
  if (message.role === 'assistant' && message.tool_calls && message.tool_calls.length > 0) {
    // Ollama expects arguments as an object, not a JSON string
    base.tool_calls = message.tool_calls.map(tc => ({
      function: { name: tc.name, arguments: safeParseJson(tc.arguments) ?? {} },
    }));
  }
  return base;
}

function normalizeToolCalls(chunk: OllamaChatResponse, offset: number): ToolCall[] {
  const calls = chunk.message?.tool_calls ?? [];
  return calls.map((tc, i) => ({
    id: `call_${offset + i}`,
    name: tc.function.name,
    arguments:
      typeof tc.function.arguments === 'string'
        ? tc.function.arguments
        : JSON.stringify(tc.function.arguments ?? {}),
  }));
}

function toUsage(chunk: OllamaChatResponse): ProviderUsage {
  if (chunk.prompt_eval_count === undefined && chunk.eval_count === undefined) {
    return { ...EMPTY_USAGE };
  }
  const promptTokens = chunk.prompt_eval_count ?? 0;
  const completionTokens = chunk.eval_count ?? 0;
  return { promptTokens, completionTokens, totalTokens: promptTokens + completionTokens };
}
