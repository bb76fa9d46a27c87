// Builds immutable ToolSpecs from tool definitions and runtime configuration

import type { ToolDefinition, ToolPayload, ToolSpec } from './types.js';

export interface ToolSpecOptions {
  skillsBaseUrl: string;
  defaultTimeoutMs: number;
  timeoutOverrides?: Record<string, number>;
}

export function resolveEndpoint(endpoint: string, baseUrl: string): string {
  if (/^https?:\/\//i.test(endpoint)) return endpoint;
  return `${baseUrl.replace(/\/+$/, '')}/${endpoint.replace(/^\/+/, '')}`;
}

export function createToolSpec<I>(definition: ToolDefinition<I>, options: ToolSpecOptions): ToolSpec {
  const timeoutMs = options.timeoutOverrides?.[definition.name] ?? options.defaultTimeoutMs;

  const spec: ToolSpec = {
    name: definition.name,
    description: definition.description,
    endpoint: resolveEndpoint(definition.endpoint, options.skillsBaseUrl),
    modelClass: definition.modelClass,
    timeoutMs,
    parameters: Object.freeze(definition.parameters.map(p => Object.freeze({ ...p }))),
    prepare(raw: unknown) {
      const parsed = definition.input.safeParse(raw ?? {});
      if (!parsed.success) {
        const issues = parsed.error.issues.map(i => `${i.path.join('.') || 'input'}: ${i.message}`);
        return { ok: false, error: `Invalid input for ${definition.name}: ${issues.join('; ')}` };
      }
      return { ok: true, input: toRecord(raw), request: definition.toRequest(parsed.data) };
    },
    summarize(data: ToolPayload) {
      return definition.summarize(data);
    },
  };

  return Object.freeze(spec);
}

export function toRecord(value: unknown): Record<string, unknown> {
  if (value !== null && typeof value === 'object' && !Array.isArray(value)) {
    return { ...value };
  }
  return {};
}

// Field readers for summarizing loosely typed tool responses

export function readNumber(data: ToolPayload, key: string): number | undefined {
  const value = data[key];
  return typeof value === 'number' && Number.isFinite(value) ? value : undefined;
}

export function readString(data: ToolPayload, key: string): string | undefined {
  const value = data[key];
  return typeof value === 'string' ? value : undefined;
}

export function readArray(data: ToolPayload, key: string): unknown[] | undefined {
  const value = data[key];
  return Array.isArray(value) ? value : undefined;
}

export function firstLine(text: string | undefined, max: number = 120): string {
  const line = (text ?? '').split('\n').map(l => l.trim()).find(Boolean) ?? '';
  return line.length > max ? `${line.slice(0, max - 3)}...` : line;
}

export function plural(count: number, one: string, many: string): string {
  return `${count} ${count === 1 ? one : many}`;
}
