// Orchestrator Types

import type { ToolInvocation } from '../tools/types.js';

export enum TurnState {
  AwaitingModel = 'awaiting_model',
  ExecutingTool = 'executing_tool',
  Finalizing = 'finalizing',
  Done = 'done',
  Failed = 'failed',
}

export interface LoopState {
  sessionId: string;
  /** Tool calls executed this turn; never exceeds maxIterations */
  iterationCount: number;
  maxIterations: number;
  assistantText: string;
  invocations: ToolInvocation[];
  state: TurnState;
  /** Set when the model asked for a tool past the bound and finalization was forced */
  boundExceeded: boolean;
}

export type TurnResult =
  | { status: 'done'; messageId: string; state: LoopState }
  | { status: 'failed'; detail: string; state: LoopState }
  | { status: 'cancelled'; state: LoopState };

export interface AgentLoopOptions {
  model: string;
  maxIterations: number;
  /** Size of the token fragments a non-streamed final answer is split into */
  tokenChunkSize: number;
  temperature?: number;
  /** Hold `llm` residency around model calls; off when the model is served remotely */
  holdLlmResidency: boolean;
}
