// Tool system types and interfaces
// Tools are opaque HTTP skills; the registry maps a closed set of names to their specs

import type { z } from 'zod';
import type { ModelClass } from '../gpu/types.js';
import type { ErrorCode } from '../../utils/errors.js';

export const TOOL_NAMES = [
  'enterprise_graph_search',
  'enterprise_docs_search',
  'inventory_sql_search',
  'blueprint_vision',
  'norm_control',
  'web_search',
] as const;

export type ToolName = (typeof TOOL_NAMES)[number];

export function isToolName(name: string): name is ToolName {
  return TOOL_NAMES.some(known => known === name);
}

export type RequiredModelClass = 'none' | ModelClass;

export interface ToolParameter {
  name: string;
  type: 'string' | 'number' | 'boolean' | 'array' | 'object';
  description: string;
  required: boolean;
  enum?: string[];
  default?: unknown;
}

export interface ToolRequest {
  body: Record<string, unknown>;
  headers?: Record<string, string>;
}

/** Authoring shape of a tool; `createToolSpec` turns it into an immutable ToolSpec. */
export interface ToolDefinition<I> {
  name: ToolName;
  description: string;
  /** Path under the skills base URL, or an absolute URL */
  endpoint: string;
  modelClass: RequiredModelClass;
  parameters: ToolParameter[];
  input: z.ZodType<I, z.ZodTypeDef, unknown>;
  toRequest: (input: I) => ToolRequest;
  summarize: (data: ToolPayload) => string;
}

export type PreparedRequest =
  | { ok: true; input: Record<string, unknown>; request: ToolRequest }
  | { ok: false; error: string };

export interface ToolSpec {
  readonly name: ToolName;
  readonly description: string;
  readonly endpoint: string;
  readonly modelClass: RequiredModelClass;
  readonly timeoutMs: number;
  readonly parameters: readonly ToolParameter[];
  /** Validates model-supplied arguments and builds the HTTP request */
  prepare(input: unknown): PreparedRequest;
  summarize(data: ToolPayload): string;
}

/** Tool response JSON; non-object responses are wrapped as `{ raw }` */
export type ToolPayload = Record<string, unknown>;

export type ToolOutcome =
  | { status: 'success'; result: ToolPayload; summary: string }
  | { status: 'timeout'; error: ErrorCode.TOOL_TIMEOUT; reason: string; cancelled: boolean }
  | { status: 'transport_error'; error: ErrorCode.TOOL_TRANSPORT_ERROR; reason: string }
  | { status: 'rejected'; error: ErrorCode.TOOL_REJECTED | ErrorCode.SWAP_TIMEOUT; reason: string };

export type ToolFailure = Exclude<ToolOutcome, { status: 'success' }>;

export interface ToolInvocation {
  id: string;
  toolName: string;
  input: Record<string, unknown>;
  startedAt: Date;
  finishedAt: Date;
  durationMs: number;
  outcome: ToolOutcome;
}
