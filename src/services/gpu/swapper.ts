// Ollama model swapper
// Unloads the resident model (keep_alive 0s) and pins the target (keep_alive -1)

import type { Logger } from '../../logger.js';
import { errorMessage } from '../../utils/errors.js';
import type { ModelSwapper, SwapRequest } from './types.js';

export class OllamaModelSwapper implements ModelSwapper {
  constructor(private log: Logger) {}

  async swap(request: SwapRequest, signal: AbortSignal): Promise<void> {
    const baseUrl = request.baseUrl.replace(/\/+$/, '');

    if (request.from && request.from !== request.to) {
      this.log.info({ slot: request.slotId, model: request.from }, 'Unloading model');
      try {
        await this.generate(baseUrl, { model: request.from, prompt: '', keep_alive: '0s' }, signal);
      } catch (err) {
        if (signal.aborted) throw err;
        // The load below still evicts the old model once memory runs short
        this.log.warn({ err: errorMessage(err), slot: request.slotId, model: request.from }, 'Unload failed, loading anyway');
      }
    }

    this.log.info({ slot: request.slotId, model: request.to, numCtx: request.numCtx }, 'Loading model');
    await this.generate(
      baseUrl,
      {
        model: request.to,
        prompt: '',
        keep_alive: '-1',
        ...(request.numCtx ? { options: { num_ctx: request.numCtx } } : {}),
      },
      signal,
    );
  }

  private async generate(baseUrl: string, body: Record<string, unknown>, signal: AbortSignal): Promise<void> {
    const response = await fetch(`${baseUrl}/api/generate`, {
      method: 'POST',
      headers: { 'Content-Type': 'application/json' },
      body: JSON.stringify(body),
      signal,
    });

    if (!response.ok) {
      const text = await response.text().catch(() => '');
      throw new Error(`Ollama /api/generate returned HTTP ${response.status}: ${text.slice(0, 200)}`);
    }

    // Drain the body so the connection is reusable
    await response.arrayBuffer();
  }
}
