// GPU residency module - main exports and default wiring

import type { Logger } from '../../logger.js';
import type { Env } from '../../env.js';
import { ResidencyScheduler } from './residency-scheduler.js';
import { OllamaModelSwapper } from './swapper.js';
import type { ModelAssignments, ModelSwapper, SlotConfig } from './types.js';

export { ResidencyScheduler } from './residency-scheduler.js';
export { OllamaModelSwapper } from './swapper.js';
export type {
  ModelClass,
  ModelAssignment,
  ModelAssignments,
  ModelSwapper,
  Residency,
  SlotConfig,
  SlotSnapshot,
  SwapRequest,
} from './types.js';

export function slotsFromEnv(config: Env): SlotConfig[] {
  return [
    {
      id: 'gpu0',
      device: 'cuda:0',
      baseUrl: config.OLLAMA_GPU_URL,
      classes: ['llm', 'vlm'],
      swappable: true,
    },
    {
      id: 'cpu0',
      device: 'cpu',
      baseUrl: config.OLLAMA_CPU_URL,
      classes: ['embedding', 'reranker'],
      swappable: false,
    },
  ];
}

export function assignmentsFromEnv(config: Env): ModelAssignments {
  return {
    llm: { model: config.LLM_MODEL, numCtx: config.LLM_NUM_CTX },
    vlm: { model: config.VLM_MODEL, numCtx: config.VLM_NUM_CTX },
    embedding: { model: config.EMBEDDING_MODEL },
    reranker: { model: config.RERANKER_MODEL },
  };
}

export function createResidencyScheduler(config: Env, logger: Logger, swapper?: ModelSwapper): ResidencyScheduler {
  const log = logger.child({ module: 'gpu' });
  return new ResidencyScheduler({
    slots: slotsFromEnv(config),
    assignments: assignmentsFromEnv(config),
    swapper: swapper ?? new OllamaModelSwapper(log),
    swapTimeoutMs: config.VRAM_SWAP_TIMEOUT_MS,
    logger: log,
  });
}
