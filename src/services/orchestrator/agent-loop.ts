// Agent Loop
// Bounded model-directed tool calling for one user turn, streamed through a StreamPublisher

import { randomUUID } from 'node:crypto';
import type { Logger } from '../../logger.js';
import type { Provider, ProviderMessage, ProviderResponse, ToolCall } from '../../providers/types.js';
import { safeParseJson } from '../../providers/http.js';
import type { ResidencyLease } from '../tools/dispatcher.js';
import { describeOutcome, outcomeResult, type ToolDispatcher } from '../tools/dispatcher.js';
import type { ToolRegistry } from '../tools/registry.js';
import type { ToolInvocation } from '../tools/types.js';
import type { Residency } from '../gpu/types.js';
import type { Message, SessionStore } from '../sessions/types.js';
import type { StreamPublisher } from '../stream/publisher.js';
import { AppError, ErrorCode, errorMessage, isAppError } from '../../utils/errors.js';
import { buildSystemPrompt, TOOL_LIMIT_FALLBACK, TOOL_LIMIT_NOTE, unavailableToolsNotice } from './prompts.js';
import { TurnState, type AgentLoopOptions, type LoopState, type TurnResult } from './types.js';

/** Persisted tool message content is capped; the structured result is kept whole. */
export const MAX_TOOL_CONTENT_LENGTH = 2000;

const INTERNAL_FAILURE_DETAIL = 'The assistant hit an internal error while answering';

export interface AgentLoopDeps {
  provider: Provider;
  registry: ToolRegistry;
  dispatcher: ToolDispatcher;
  scheduler: ResidencyLease;
  store: SessionStore;
  logger: Logger;
}

export class AgentLoop {
  private provider: Provider;
  private registry: ToolRegistry;
  private dispatcher: ToolDispatcher;
  private scheduler: ResidencyLease;
  private store: SessionStore;
  private log: Logger;

  constructor(deps: AgentLoopDeps, private options: AgentLoopOptions) {
    if (!Number.isInteger(options.maxIterations) || options.maxIterations < 1) {
      throw new Error(`maxIterations must be an integer >= 1, got ${options.maxIterations}`);
    }
    this.provider = deps.provider;
    this.registry = deps.registry;
    this.dispatcher = deps.dispatcher;
    this.scheduler = deps.scheduler;
    this.store = deps.store;
    this.log = deps.logger;
  }

  /**
   * Runs one turn. Always settles: a done or error event is published unless
   * the caller aborted, in which case nothing further is published or persisted.
   */
  async runTurn(
    sessionId: string,
    content: string,
    publisher: StreamPublisher,
    signal?: AbortSignal,
  ): Promise<TurnResult> {
    const log = this.log.child({ session: sessionId, turn: randomUUID() });
    const state: LoopState = {
      sessionId,
      iterationCount: 0,
      maxIterations: this.options.maxIterations,
      assistantText: '',
      invocations: [],
      state: TurnState.AwaitingModel,
      boundExceeded: false,
    };

    try {
      const history = await this.store.listMessages(sessionId);
      await this.store.appendMessage(sessionId, { role: 'user', content });

      const conversation: ProviderMessage[] = [
        { role: 'system', content: buildSystemPrompt(this.registry.list()) },
        ...toProviderHistory(history),
        { role: 'user', content },
      ];

      while (state.state === TurnState.AwaitingModel) {
        ensureActive(signal);
        await publisher.status(state.iterationCount === 0 ? 'Analysing the request...' : 'Reviewing tool results...');

        const response = await this.callModel(conversation, signal);
        ensureActive(signal);

        const [call, ...ignored] = response.toolCalls;
        if (!call) {
          state.state = TurnState.Finalizing;
          state.assistantText = response.content;
          await this.emitText(publisher, response.content, signal);
          break;
        }

        if (ignored.length > 0) {
          log.warn({ tool: call.name, ignored: ignored.map(c => c.name) }, 'Model requested several tools; running the first');
        }

        if (state.iterationCount >= state.maxIterations) {
          log.info({ iterations: state.iterationCount, code: ErrorCode.LOOP_BOUND_EXCEEDED }, 'Tool call limit reached; forcing final answer');
          state.state = TurnState.Finalizing;
          state.boundExceeded = true;
          state.assistantText = await this.forceFinalAnswer(conversation, publisher, signal);
          break;
        }

        state.iterationCount++;
        state.state = TurnState.ExecutingTool;
        await this.executeTool(call, response, conversation, state, publisher, signal);
        state.state = TurnState.AwaitingModel;
      }

      const notice = this.failureNotice(state.invocations);
      if (notice) {
        state.assistantText += notice;
        await this.emitText(publisher, notice, signal);
      }

      ensureActive(signal);
      const message = await this.store.appendMessage(sessionId, { role: 'assistant', content: state.assistantText });
      state.state = TurnState.Done;
      await publisher.done(message.id);

      log.info(
        { iterations: state.iterationCount, tools: state.invocations.length, boundExceeded: state.boundExceeded },
        'Turn completed',
      );
      return { status: 'done', messageId: message.id, state };
    } catch (error) {
      if (signal?.aborted || isAppError(error, ErrorCode.CANCELLED)) {
        state.state = TurnState.Failed;
        publisher.cancel();
        log.info({ iterations: state.iterationCount }, 'Turn cancelled by client');
        return { status: 'cancelled', state };
      }

      state.state = TurnState.Failed;
      const detail = isAppError(error, ErrorCode.MODEL_UNAVAILABLE) ? error.message : INTERNAL_FAILURE_DETAIL;
      log.error({ err: error, iterations: state.iterationCount }, 'Turn failed');
      await publisher.error(detail);
      return { status: 'failed', detail, state };
    }
  }

  private async executeTool(
    call: ToolCall,
    response: ProviderResponse,
    conversation: ProviderMessage[],
    state: LoopState,
    publisher: StreamPublisher,
    signal: AbortSignal | undefined,
  ): Promise<void> {
    const args = parseToolArguments(call.arguments);
    const input = args ?? {};

    await publisher.toolStart(call.name, input);

    const invocation = await this.invokeTool(call.name, args, signal);
    state.invocations.push(invocation);

    await publisher.toolDone(call.name, describeOutcome(invocation.outcome));

    const toolResult = outcomeResult(invocation.outcome);
    const serialized = JSON.stringify(toolResult);

    await this.store.appendMessage(state.sessionId, {
      role: 'tool',
      content: serialized.slice(0, MAX_TOOL_CONTENT_LENGTH),
      toolName: call.name,
      toolInput: input,
      toolResult,
    });

    conversation.push(
      { role: 'assistant', content: response.content, tool_calls: [call] },
      { role: 'tool', tool_call_id: call.id, name: call.name, content: serialized },
    );
  }

  private async invokeTool(
    name: string,
    args: Record<string, unknown> | null,
    signal: AbortSignal | undefined,
  ): Promise<ToolInvocation> {
    const spec = this.registry.lookup(name);
    if (!spec) {
      this.log.warn({ tool: name }, 'Model requested an unknown tool');
      return rejectedInvocation(name, args ?? {}, `Unknown tool "${name}"`);
    }
    if (!args) {
      return rejectedInvocation(name, {}, `Arguments for ${name} are not a JSON object`);
    }
    return this.dispatcher.invoke(spec, args, { signal });
  }

  private async callModel(conversation: ProviderMessage[], signal: AbortSignal | undefined): Promise<ProviderResponse> {
    const tools = this.registry.toFunctionDefinitions();
    return this.withLlm(signal, () =>
      this.provider.sendChat(conversation, {
        model: this.options.model,
        temperature: this.options.temperature,
        signal,
        tools,
        tool_choice: 'auto',
      }),
    );
  }

  /**
   * Synthesis with tools disabled once the tool call limit is hit. Tokens stream
   * as produced unless the LLM slot is held: a slow reader must not pin the GPU,
   * so chunks are then buffered and published after release.
   */
  private async forceFinalAnswer(
    conversation: ProviderMessage[],
    publisher: StreamPublisher,
    signal: AbortSignal | undefined,
  ): Promise<string> {
    await publisher.status('Tool call limit reached, composing the answer...');

    const messages: ProviderMessage[] = [...conversation, { role: 'system', content: TOOL_LIMIT_NOTE }];
    const live = !this.options.holdLlmResidency;
    const chunks: string[] = [];

    await this.withLlm(signal, async () => {
      const stream = this.provider.sendChatStream(messages, {
        model: this.options.model,
        temperature: this.options.temperature,
        signal,
        tool_choice: 'none',
      });
      for await (const chunk of stream) {
        ensureActive(signal);
        if (!chunk.text) continue;
        chunks.push(chunk.text);
        if (live) await publisher.token(chunk.text);
      }
    });

    if (!live) {
      for (const chunk of chunks) {
        ensureActive(signal);
        await publisher.token(chunk);
      }
    }

    let text = chunks.join('');

    if (!text.trim()) {
      text += TOOL_LIMIT_FALLBACK;
      await publisher.token(TOOL_LIMIT_FALLBACK);
    }
    return text;
  }

  private async withLlm<T>(signal: AbortSignal | undefined, fn: () => Promise<T>): Promise<T> {
    if (!this.options.holdLlmResidency) {
      return fn();
    }

    let residency: Residency;
    try {
      residency = await this.scheduler.acquire('llm', { signal });
    } catch (error) {
      if (signal?.aborted || isAppError(error, ErrorCode.CANCELLED)) throw error;
      throw AppError.modelUnavailable('Language model could not be loaded', { cause: errorMessage(error) });
    }

    try {
      return await fn();
    } finally {
      this.scheduler.release(residency);
    }
  }

  private async emitText(publisher: StreamPublisher, text: string, signal: AbortSignal | undefined): Promise<void> {
    for (const fragment of splitIntoFragments(text, this.options.tokenChunkSize)) {
      ensureActive(signal);
      await publisher.token(fragment);
    }
  }

  private failureNotice(invocations: ToolInvocation[]): string {
    const failed = invocations
      .filter(i => i.outcome.status !== 'success')
      .map(i => i.toolName);
    const unique = Array.from(new Set(failed));
    return unique.length > 0 ? unavailableToolsNotice(unique) : '';
  }
}

function ensureActive(signal: AbortSignal | undefined): void {
  if (signal?.aborted) {
    throw AppError.cancelled('Turn cancelled');
  }
}

/** Splits on code points so surrogate pairs are never cut. */
export function splitIntoFragments(text: string, size: number): string[] {
  const chars = Array.from(text);
  const fragments: string[] = [];
  for (let i = 0; i < chars.length; i += size) {
    fragments.push(chars.slice(i, i + size).join(''));
  }
  return fragments;
}

/** Tool arguments arrive as a JSON string; anything but an object (or empty) is invalid. */
export function parseToolArguments(raw: string): Record<string, unknown> | null {
  if (!raw.trim()) return {};
  const parsed = safeParseJson(raw);
  if (parsed !== null && typeof parsed === 'object' && !Array.isArray(parsed)) {
    return { ...parsed };
  }
  return null;
}

// Prior tool messages are left out: they answer tool calls of earlier turns
// that are not replayed, and the assistant replies already carry their findings.
function toProviderHistory(history: Message[]): ProviderMessage[] {
  const messages: ProviderMessage[] = [];
  for (const message of history) {
    if (message.role === 'user' || message.role === 'assistant') {
      messages.push({ role: message.role, content: message.content });
    }
  }
  return messages;
}

function rejectedInvocation(toolName: string, input: Record<string, unknown>, reason: string): ToolInvocation {
  const now = new Date();
  return {
    id: randomUUID(),
    toolName,
    input,
    startedAt: now,
    finishedAt: now,
    durationMs: 0,
    outcome: { status: 'rejected', error: ErrorCode.TOOL_REJECTED, reason },
  };
}
