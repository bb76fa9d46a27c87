// Shared fetch wrapper for model backends
// Maps network failures, HTTP errors and timeouts onto MODEL_UNAVAILABLE

import { AppError, errorMessage } from '../utils/errors.js';
import { linkSignals } from '../utils/abort.js';

export interface ModelRequestOptions {
  signal?: AbortSignal;
  timeoutMs: number;
  label: string;
}

export interface ModelHttpResponse {
  response: Response;
  /** Releases the timeout; call after the body has been fully consumed. */
  done: () => void;
  timedOut: () => boolean;
}

export async function postModelRequest(
  url: string,
  body: unknown,
  headers: Record<string, string>,
  options: ModelRequestOptions,
): Promise<ModelHttpResponse> {
  const linked = linkSignals([options.signal], options.timeoutMs);

  let response: Response;
  try {
    response = await fetch(url, {
      method: 'POST',
      headers: { 'Content-Type': 'application/json', ...headers },
      body: JSON.stringify(body),
      signal: linked.signal,
    });
  } catch (error) {
    linked.dispose();
    throw toModelError(error, options, linked.timedOut());
  }

  if (!response.ok) {
    const text = await response.text().catch(() => '');
    linked.dispose();
    throw AppError.modelUnavailable(`${options.label} returned HTTP ${response.status}`, {
      status: response.status,
      body: text.slice(0, 500),
    });
  }

  return { response, done: linked.dispose, timedOut: linked.timedOut };
}

/**
 * Caller cancellation maps to CANCELLED so the loop can tell a client
 * disconnect apart from a broken backend.
 */
export function toModelError(error: unknown, options: ModelRequestOptions, timedOut: boolean): unknown {
  if (options.signal?.aborted) {
    return AppError.cancelled();
  }
  if (timedOut) {
    return AppError.modelUnavailable(
      `${options.label} did not respond within ${Math.round(options.timeoutMs / 1000)}s`,
    );
  }
  if (error instanceof AppError) {
    return error;
  }
  return AppError.modelUnavailable(`${options.label} is unreachable`, { cause: errorMessage(error) });
}

export function safeParseJson(text: string): unknown {
  try {
    return JSON.parse(text);
  } catch {
    return undefined;
  }
}

/** Splits a streamed body into lines, keeping the unfinished tail buffered. */
export async function* readLines(body: ReadableStream<Uint8Array>): AsyncIterable<string> {
  const reader = body.getReader();
  const decoder = new TextDecoder();
  let buffer = '';

  try {
    while (true) {
      const { done, value } = await reader.read();
      if (done) break;

      buffer += decoder.decode(value, { stream: true });
      const lines = buffer.split('\n');
      buffer = lines.pop() || '';

      for (const line of lines) {
        const trimmed = line.trim();
        if (trimmed) yield trimmed;
      }
    }

    buffer += decoder.decode();
    if (buffer.trim()) yield buffer.trim();
  } finally {
    reader.releaseLock();
  }
}
