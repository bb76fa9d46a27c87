// Tool transport - POSTs JSON to a tool endpoint and parses the JSON reply

import { AppError, errorMessage } from '../../utils/errors.js';
import type { ToolRequest } from './types.js';

export interface ToolTransport {
  /** Rejects with a TOOL_TRANSPORT_ERROR AppError, or with the abort reason once `signal` aborts. */
  post(url: string, request: ToolRequest, signal: AbortSignal): Promise<unknown>;
}

export class HttpToolTransport implements ToolTransport {
  async post(url: string, request: ToolRequest, signal: AbortSignal): Promise<unknown> {
    let response: Response;
    try {
      response = await fetch(url, {
        method: 'POST',
        headers: { 'Content-Type': 'application/json', ...request.headers },
        body: JSON.stringify(request.body),
        signal,
      });
    } catch (error) {
      if (signal.aborted) throw error;
      throw AppError.toolTransport('Tool endpoint is unreachable', { cause: errorMessage(error) });
    }

    const text = await response.text();

    if (!response.ok) {
      throw AppError.toolTransport(`Tool endpoint returned HTTP ${response.status}`, {
        status: response.status,
        body: text.slice(0, 500),
      });
    }

    try {
      return JSON.parse(text);
    } catch {
      throw AppError.toolTransport('Tool endpoint returned malformed JSON', { body: text.slice(0, 500) });
    }
  }
}
