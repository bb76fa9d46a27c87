// GPU residency types

export type ModelClass = 'llm' | 'vlm' | 'embedding' | 'reranker';

export interface SlotConfig {
  id: string;
  device: string;
  /** Inference server that owns this device */
  baseUrl: string;
  classes: ModelClass[];
  /**
   * Swapping slots hold one model at a time (llm/vlm on the GPU). Shared slots
   * keep every class resident and never call the swapper.
   */
  swappable: boolean;
}

export interface ModelAssignment {
  model: string;
  numCtx?: number;
}

export type ModelAssignments = Record<ModelClass, ModelAssignment>;

export interface ResidentModel {
  modelClass: ModelClass;
  model: string;
  loadedAt: Date;
}

export interface Residency {
  id: string;
  slotId: string;
  modelClass: ModelClass;
  model: string;
  acquiredAt: Date;
  /** True when this acquisition had to load the model */
  swapped: boolean;
}

export interface SwapRequest {
  slotId: string;
  baseUrl: string;
  from: string | null;
  to: string;
  numCtx?: number;
}

export interface ModelSwapper {
  swap(request: SwapRequest, signal: AbortSignal): Promise<void>;
}

export interface AcquireOptions {
  signal?: AbortSignal;
}

export interface SlotSnapshot {
  id: string;
  device: string;
  swappable: boolean;
  resident: Array<{ modelClass: ModelClass; model: string; loadedAt: string }>;
  busy: boolean;
  heldBy: ModelClass | null;
  /** Concurrent residencies of `heldBy` */
  holders: number;
  queueDepth: number;
  swapCount: number;
  lastSwapMs: number | null;
}
