// OpenAI-compatible Provider
// vLLM, OpenRouter and similar /chat/completions endpoints

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

const UsageSchema = z
  .object({
    prompt_tokens: z.number().optional(),
    completion_tokens: z.number().optional(),
    total_tokens: z.number().optional(),
  })
  .nullish();

const CompletionSchema = z.object({
  choices: z
    .array(
      z.object({
        message: z.object({
          content: z.string().nullish(),
          tool_calls: z
            .array(
              z.object({
                id: z.string().optional(),
                function: z.object({ name: z.string(), arguments: z.string().optional() }),
              }),
            )
            .nullish(),
        }),
      }),
    )
    .min(1),
  usage: UsageSchema,
});

const StreamDeltaSchema = z.object({
  choices: z
    .array(
      z.object({
        delta: z
          .object({
            content: z.string().nullish(),
            tool_calls: z
              .array(
                z.object({
                  index: z.number().optional(),
                  id: z.string().optional(),
                  function: z
                    .object({ name: z.string().optional(), arguments: z.string().optional() })
                    .optional(),
                }),
              )
              .nullish(),
          })
          .optional(),
        finish_reason: z.string().nullish(),
      }),
    )
    .default([]),
  usage: UsageSchema,
});

export interface OpenAICompatProviderConfig {
  baseUrl: string;
  apiKey: string;
  timeoutMs: number;
}

export class OpenAICompatProvider implements Provider {
  name = 'openai_compat';
  private baseUrl: string;

  constructor(private config: OpenAICompatProviderConfig) {
    this.baseUrl = config.baseUrl.replace(/\/+$/, '');
    if (!this.baseUrl) {
      throw new Error('OPENAI_COMPAT_BASE_URL not configured');
    }
  }

  private headers(): Record<string, string> {
    return this.config.apiKey ? { Authorization: `Bearer ${this.config.apiKey}` } : {};
  }

  async sendChat(messages: ProviderMessage[], options: ProviderOptions): Promise<ProviderResponse> {
    const requestOptions = { signal: options.signal, timeoutMs: this.config.timeoutMs, label: 'Model endpoint' };
    const { response, done, timedOut } = await postModelRequest(
      `${this.baseUrl}/chat/completions`,
      this.buildBody(messages, options, false),
      this.headers(),
      requestOptions,
    );

    try {
      const parsed = CompletionSchema.safeParse(await response.json());
      if (!parsed.success) {
        throw AppError.modelUnavailable('Model endpoint returned a malformed response');
      }
      const message = parsed.data.choices[0].message;
      return {
        content: message.content ?? '',
        toolCalls: (message.tool_calls ?? []).map((tc, i) => ({
          id: tc.id || `call_${i}`,
          name: tc.function.name,
          arguments: tc.function.arguments || '{}',
        })),
        usage: toUsage(parsed.data.usage),
      };
    } catch (error) {
      throw toModelError(error, requestOptions, timedOut());
    } finally {
      done();
    }
  }

  async *sendChatStream(messages: ProviderMessage[], options: ProviderOptions): AsyncIterable<StreamChunk> {
    const requestOptions = { signal: options.signal, timeoutMs: this.config.timeoutMs, label: 'Model endpoint' };
    const { response, done, timedOut } = await postModelRequest(
      `${this.baseUrl}/chat/completions`,
      this.buildBody(messages, options, true),
      this.headers(),
      requestOptions,
    );

    if (!response.body) {
      done();
      throw AppError.modelUnavailable('Model endpoint returned no response body');
    }

    // Tool call fragments arrive split across deltas, keyed by index
    const pending = new Map<number, ToolCall>();

    try {
      for await (const line of readLines(response.body)) {
        if (!line.startsWith('data:')) continue;

        const data = line.slice(5).trim();
        if (data === '[DONE]') break;

        const parsed = StreamDeltaSchema.safeParse(safeParseJson(data));
        if (!parsed.success) continue;

        const choice = parsed.data.choices[0];
        const delta = choice?.delta;

        if (delta?.content) {
          yield { text: delta.content };
        }

        for (const tc of delta?.tool_calls ?? []) {
          const index = tc.index ?? pending.size;
          const existing = pending.get(index) ?? { id: tc.id || `call_${index}`, name: '', arguments: '' };
          existing.name += tc.function?.name ?? '';
          existing.arguments += tc.function?.arguments ?? '';
          pending.set(index, existing);
        }

        if (choice?.finish_reason) {
          const toolCalls = Array.from(pending.values());
          yield {
            text: '',
            ...(toolCalls.length > 0 ? { tool_calls: toolCalls } : {}),
            usage: toUsage(parsed.data.usage),
            finish_reason: toolCalls.length > 0 ? 'tool_calls' : choice.finish_reason === 'length' ? 'length' : 'stop',
          };
          pending.clear();
        }
      }
    } catch (error) {
      throw toModelError(error, requestOptions, timedOut());
    } finally {
      done();
    }
  }

  private buildBody(messages: ProviderMessage[], options: ProviderOptions, stream: boolean) {
    const useTools = options.tools && options.tools.length > 0;
    return {
      model: options.model,
      messages: messages.map(m => {
        const base: Record<string, unknown> = { role: m.role, content: m.content };
        if (m.role === 'tool') {
          base.tool_call_id = m.tool_call_id;
          if (m.name) base.name = m.name;
        }
        if (m.role === 'assistant' && m.tool_calls && m.tool_calls.length > 0) {
          base.tool_calls = m.tool_calls.map(tc => ({
            id: tc.id,
            type: 'function',
            function: { name: tc.name, arguments: tc.arguments },
          }));
        }
        return base;
      }),
      max_tokens: options.maxTokens,
      temperature: options.temperature ?? 0.7,
      stream,
      ...(useTools ? { tools: options.tools, tool_choice: options.tool_choice ?? 'auto' } : {}),
    };
  }
}

function toUsage(usage: z.infer<typeof UsageSchema>): ProviderUsage {
  if (!usage) return { ...EMPTY_USAGE };
  return {
    promptTokens: usage.prompt_tokens ?? 0,
    completionTokens: usage.completion_tokens ?? 0,
    totalTokens: usage.total_tokens ?? 0,
  };
}
