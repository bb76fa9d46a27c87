// Tool Dispatcher
// Runs one tool call end to end: validate, acquire residency, call, release

import { randomUUID } from 'node:crypto';
import type { Logger } from '../../logger.js';
import type { ResidencyScheduler } from '../gpu/residency-scheduler.js';
import type { Residency } from '../gpu/types.js';
import { linkSignals } from '../../utils/abort.js';
import { ErrorCode, errorMessage, isAppError } from '../../utils/errors.js';
import { toRecord } from './spec.js';
import type { ToolTransport } from './transport.js';
import type { ToolFailure, ToolInvocation, ToolOutcome, ToolPayload, ToolSpec } from './types.js';

export type ResidencyLease = Pick<ResidencyScheduler, 'acquire' | 'release'>;

export interface InvokeOptions {
  signal?: AbortSignal;
}

export class ToolDispatcher {
  constructor(
    private scheduler: ResidencyLease,
    private transport: ToolTransport,
    private log: Logger,
  ) {}

  /**
   * Never throws for tool-level problems: every failure is reported in the
   * returned invocation's outcome so the loop can continue. The budget
   * `spec.timeoutMs` covers waiting for the slot as well as the call itself.
   */
  async invoke(spec: ToolSpec, rawInput: unknown, options: InvokeOptions = {}): Promise<ToolInvocation> {
    const startedAt = new Date();
    const id = randomUUID();
    const input = toRecord(rawInput);

    const finish = (outcome: ToolOutcome): ToolInvocation => {
      const finishedAt = new Date();
      const invocation: ToolInvocation = {
        id,
        toolName: spec.name,
        input,
        startedAt,
        finishedAt,
        durationMs: finishedAt.getTime() - startedAt.getTime(),
        outcome,
      };
      this.log.info(
        { tool: spec.name, status: outcome.status, durationMs: invocation.durationMs },
        'Tool invocation finished',
      );
      return invocation;
    };

    const prepared = spec.prepare(rawInput);
    if (!prepared.ok) {
      return finish({ status: 'rejected', error: ErrorCode.TOOL_REJECTED, reason: prepared.error });
    }

    const budget = linkSignals([options.signal], spec.timeoutMs);
    let residency: Residency | null = null;

    try {
      if (spec.modelClass !== 'none') {
        try {
          residency = await this.scheduler.acquire(spec.modelClass, { signal: budget.signal });
        } catch (error) {
          return finish(this.acquireFailure(spec, error, options.signal, budget.timedOut()));
        }
      }

      let data: unknown;
      try {
        data = await this.transport.post(spec.endpoint, prepared.request, budget.signal);
      } catch (error) {
        return finish(this.callFailure(spec, error, options.signal, budget.timedOut()));
      }

      const result = toPayload(data);
      return finish({ status: 'success', result, summary: spec.summarize(result) });
    } finally {
      if (residency) this.scheduler.release(residency);
      budget.dispose();
    }
  }

  private acquireFailure(
    spec: ToolSpec,
    error: unknown,
    callerSignal: AbortSignal | undefined,
    timedOut: boolean,
  ): ToolFailure {
    if (callerSignal?.aborted) {
      return { status: 'timeout', error: ErrorCode.TOOL_TIMEOUT, reason: 'cancelled', cancelled: true };
    }
    if (isAppError(error, ErrorCode.SWAP_TIMEOUT)) {
      this.log.warn({ tool: spec.name, err: error }, 'Model swap timed out; tool not called');
      return { status: 'rejected', error: ErrorCode.SWAP_TIMEOUT, reason: error.message };
    }
    if (timedOut) {
      return {
        status: 'rejected',
        error: ErrorCode.TOOL_REJECTED,
        reason: `No ${spec.modelClass} slot became free within ${seconds(spec.timeoutMs)}s`,
      };
    }
    this.log.warn({ tool: spec.name, err: error }, 'Could not acquire model residency');
    return { status: 'rejected', error: ErrorCode.TOOL_REJECTED, reason: errorMessage(error) };
  }

  private callFailure(
    spec: ToolSpec,
    error: unknown,
    callerSignal: AbortSignal | undefined,
    timedOut: boolean,
  ): ToolFailure {
    if (callerSignal?.aborted) {
      return { status: 'timeout', error: ErrorCode.TOOL_TIMEOUT, reason: 'cancelled', cancelled: true };
    }
    if (timedOut) {
      return {
        status: 'timeout',
        error: ErrorCode.TOOL_TIMEOUT,
        reason: `${spec.name} did not respond within ${seconds(spec.timeoutMs)}s`,
        cancelled: false,
      };
    }
    this.log.warn({ tool: spec.name, err: error }, 'Tool call failed');
    return { status: 'transport_error', error: ErrorCode.TOOL_TRANSPORT_ERROR, reason: errorMessage(error) };
  }
}

function toPayload(data: unknown): ToolPayload {
  if (data !== null && typeof data === 'object' && !Array.isArray(data)) {
    return { ...data };
  }
  return { raw: data };
}

function seconds(ms: number): number {
  return Math.round(ms / 1000);
}

/** Text shown in `tool_done` for any outcome. */
export function describeOutcome(outcome: ToolOutcome): string {
  switch (outcome.status) {
    case 'success':
      return outcome.summary;
    case 'timeout':
      return outcome.cancelled ? 'Cancelled' : `Timed out: ${outcome.reason}`;
    case 'transport_error':
      return `Unavailable: ${outcome.reason}`;
    case 'rejected':
      return `Rejected: ${outcome.reason}`;
  }
}

/** Structured `toolResult` persisted on the tool message. */
export function outcomeResult(outcome: ToolOutcome): ToolPayload {
  if (outcome.status === 'success') return outcome.result;
  return { error: outcome.error, detail: outcome.reason };
}
