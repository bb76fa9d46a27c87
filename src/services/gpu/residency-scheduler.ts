// GPU Residency Scheduler
// Leases model slots per class: callers of the resident class share the slot,
// a different class waits FIFO until every holder has released

import { randomUUID } from 'node:crypto';
import type { Logger } from '../../logger.js';
import { AppError, ErrorCode, errorMessage, isAppError } from '../../utils/errors.js';
import { linkSignals } from '../../utils/abort.js';
import type {
  AcquireOptions,
  ModelAssignments,
  ModelClass,
  ModelSwapper,
  Residency,
  ResidentModel,
  SlotConfig,
  SlotSnapshot,
} from './types.js';

interface Waiter {
  token: string;
  modelClass: ModelClass;
  resolve: () => void;
}

interface SlotHolder {
  modelClass: ModelClass;
  tokens: Set<string>;
}

interface SlotState {
  config: SlotConfig;
  resident: ResidentModel[];
  holder: SlotHolder | null;
  waiters: Waiter[];
  /** Load in progress; same-class holders admitted meanwhile wait on it instead of swapping again */
  loading: Promise<void> | null;
  swapCount: number;
  lastSwapMs: number | null;
}

export interface ResidencySchedulerOptions {
  slots: SlotConfig[];
  assignments: ModelAssignments;
  swapper: ModelSwapper;
  swapTimeoutMs: number;
  logger: Logger;
}

export class ResidencyScheduler {
  private slots = new Map<string, SlotState>();
  private slotByClass = new Map<ModelClass, SlotState>();
  private assignments: ModelAssignments;
  private swapper: ModelSwapper;
  private swapTimeoutMs: number;
  private log: Logger;

  constructor(options: ResidencySchedulerOptions) {
    this.assignments = options.assignments;
    this.swapper = options.swapper;
    this.swapTimeoutMs = options.swapTimeoutMs;
    this.log = options.logger;

    for (const config of options.slots) {
      if (this.slots.has(config.id)) {
        throw new Error(`Model slot "${config.id}" configured twice`);
      }
      const state: SlotState = {
        config,
        resident: [],
        holder: null,
        waiters: [],
        loading: null,
        swapCount: 0,
        lastSwapMs: null,
      };
      this.slots.set(config.id, state);

      for (const modelClass of config.classes) {
        if (this.slotByClass.has(modelClass)) {
          throw new Error(`Model class "${modelClass}" is assigned to more than one slot`);
        }
        this.slotByClass.set(modelClass, state);
      }
    }
  }

  /**
   * Returns at once when the slot already serves `modelClass` and nobody of
   * another class is queued; otherwise waits FIFO until the slot is free. Then
   * makes sure the assigned model is loaded. Rejects with SWAP_TIMEOUT when the
   * load exceeds the swap budget and with CANCELLED when the signal aborts first.
   */
  async acquire(modelClass: ModelClass, options: AcquireOptions = {}): Promise<Residency> {
    const slot = this.slotByClass.get(modelClass);
    if (!slot) {
      throw AppError.toolRejected(`No model slot serves class "${modelClass}"`);
    }

    const token = randomUUID();
    await this.lock(slot, token, modelClass, options.signal);

    const { model, numCtx } = this.assignments[modelClass];
    try {
      const swapped = await this.ensureResident(slot, modelClass, model, numCtx, options.signal);
      return this.grant(slot, token, modelClass, model, swapped);
    } catch (error) {
      this.unlock(slot, token);
      throw error;
    }
  }

  /** Returns the slot to idle. The model stays loaded for the next caller. */
  release(residency: Residency): void {
    const slot = this.slots.get(residency.slotId);
    if (!slot || !slot.holder?.tokens.has(residency.id)) {
      this.log.debug({ slot: residency.slotId, residency: residency.id }, 'Ignoring release of a residency that is not held');
      return;
    }
    this.unlock(slot, residency.id);
  }

  /** Loads the LLM ahead of the first request. */
  async warmUp(modelClass: ModelClass = 'llm'): Promise<void> {
    const residency = await this.acquire(modelClass);
    this.release(residency);
    this.log.info({ slot: residency.slotId, model: residency.model }, 'Model warm');
  }

  snapshot(): SlotSnapshot[] {
    return Array.from(this.slots.values()).map(slot => ({
      id: slot.config.id,
      device: slot.config.device,
      swappable: slot.config.swappable,
      resident: slot.resident.map(r => ({
        modelClass: r.modelClass,
        model: r.model,
        loadedAt: r.loadedAt.toISOString(),
      })),
      busy: slot.holder !== null,
      heldBy: slot.holder?.modelClass ?? null,
      holders: slot.holder?.tokens.size ?? 0,
      queueDepth: slot.waiters.length,
      swapCount: slot.swapCount,
      lastSwapMs: slot.lastSwapMs,
    }));
  }

  private grant(slot: SlotState, token: string, modelClass: ModelClass, model: string, swapped: boolean): Residency {
    return {
      id: token,
      slotId: slot.config.id,
      modelClass,
      model,
      acquiredAt: new Date(),
      swapped,
    };
  }

  /** Resolves true when this call loaded the model. */
  private async ensureResident(
    slot: SlotState,
    modelClass: ModelClass,
    model: string,
    numCtx: number | undefined,
    signal: AbortSignal | undefined,
  ): Promise<boolean> {
    if (slot.resident.some(r => r.modelClass === modelClass && r.model === model)) {
      return false;
    }

    if (!slot.config.swappable) {
      // Shared slots keep their models warm; record residency without a swap
      slot.resident = slot.resident.filter(r => r.modelClass !== modelClass);
      slot.resident.push({ modelClass, model, loadedAt: new Date() });
      return false;
    }

    if (slot.loading) {
      const loaded = await this.joinLoad(slot, slot.loading, model, signal);
      return loaded ? false : this.ensureResident(slot, modelClass, model, numCtx, signal);
    }

    const loading = this.swap(slot, modelClass, model, numCtx, signal);
    slot.loading = loading;
    try {
      await loading;
    } finally {
      if (slot.loading === loading) slot.loading = null;
    }
    return true;
  }

  /** Resolves false when the caller that started the load went away before it finished. */
  private async joinLoad(
    slot: SlotState,
    loading: Promise<void>,
    model: string,
    signal: AbortSignal | undefined,
  ): Promise<boolean> {
    try {
      await (signal
        ? raceAbort(loading, signal, err =>
            this.log.debug({ err: errorMessage(err), slot: slot.config.id, model }, 'Shared load failed after its waiter left'),
          )
        : loading);
      return true;
    } catch (error) {
      if (signal?.aborted) throw AppError.cancelled('Residency request cancelled');
      if (isAppError(error, ErrorCode.CANCELLED)) return false;
      throw error;
    }
  }

  private async swap(
    slot: SlotState,
    modelClass: ModelClass,
    model: string,
    numCtx: number | undefined,
    signal: AbortSignal | undefined,
  ): Promise<void> {
    const from = slot.resident[0]?.model ?? null;
    const linked = linkSignals([signal], this.swapTimeoutMs);
    const startedAt = Date.now();

    this.log.info({ slot: slot.config.id, from, to: model }, 'Swapping model');

    // Until the load completes nothing is known to be resident
    slot.resident = [];
    slot.swapCount++;

    try {
      await raceAbort(
        this.swapper.swap({ slotId: slot.config.id, baseUrl: slot.config.baseUrl, from, to: model, numCtx }, linked.signal),
        linked.signal,
        err => this.log.warn({ err: errorMessage(err), slot: slot.config.id, model }, 'Abandoned swap settled with an error'),
      );
      slot.resident = [{ modelClass, model, loadedAt: new Date() }];
      slot.lastSwapMs = Date.now() - startedAt;
      this.log.info({ slot: slot.config.id, model, ms: slot.lastSwapMs }, 'Model resident');
    } catch (error) {
      slot.lastSwapMs = Date.now() - startedAt;
      if (linked.timedOut()) {
        this.log.warn({ slot: slot.config.id, model, timeoutMs: this.swapTimeoutMs }, 'Model swap timed out');
        throw AppError.swapTimeout(slot.config.id, model, this.swapTimeoutMs);
      }
      if (signal?.aborted) {
        throw AppError.cancelled('Model swap cancelled');
      }
      this.log.error({ err: errorMessage(error), slot: slot.config.id, model }, 'Model swap failed');
      throw AppError.toolRejected(`Could not load ${model}`, { cause: errorMessage(error) });
    } finally {
      linked.dispose();
    }
  }

  private lock(slot: SlotState, token: string, modelClass: ModelClass, signal?: AbortSignal): Promise<void> {
    if (signal?.aborted) {
      return Promise.reject(AppError.cancelled('Residency request cancelled'));
    }

    if (!slot.holder && slot.waiters.length === 0) {
      slot.holder = { modelClass, tokens: new Set([token]) };
      return Promise.resolve();
    }

    // Joining the current holders never overtakes a queued request of another class
    const holder = slot.holder;
    if (holder?.modelClass === modelClass && slot.waiters.length === 0) {
      holder.tokens.add(token);
      return Promise.resolve();
    }

    return new Promise<void>((resolve, reject) => {
      const onAbort = () => {
        slot.waiters = slot.waiters.filter(w => w !== waiter);
        reject(AppError.cancelled('Residency request cancelled'));
      };

      const waiter: Waiter = {
        token,
        modelClass,
        resolve: () => {
          signal?.removeEventListener('abort', onAbort);
          resolve();
        },
      };

      signal?.addEventListener('abort', onAbort, { once: true });
      slot.waiters.push(waiter);
    });
  }

  /** Drops one holder; the last one out admits the next class, with its queued run of peers. */
  private unlock(slot: SlotState, token: string): void {
    const holder = slot.holder;
    if (!holder || !holder.tokens.delete(token)) return;
    if (holder.tokens.size > 0) return;

    const next = slot.waiters[0];
    if (!next) {
      slot.holder = null;
      return;
    }

    const admitted: Waiter[] = [];
    while (slot.waiters[0]?.modelClass === next.modelClass) {
      const waiter = slot.waiters.shift();
      if (waiter) admitted.push(waiter);
    }
    slot.holder = { modelClass: next.modelClass, tokens: new Set(admitted.map(w => w.token)) };
    for (const waiter of admitted) waiter.resolve();
  }
}

/**
 * Settles with `promise` unless `signal` aborts first. A swapper that ignores
 * its signal keeps running in the background; its late result goes to `onLate`.
 */
function raceAbort<T>(promise: Promise<T>, signal: AbortSignal, onLate: (err: unknown) => void): Promise<T> {
  if (signal.aborted) {
    promise.catch(onLate);
    return Promise.reject(signal.reason);
  }

  return new Promise<T>((resolve, reject) => {
    const onAbort = () => {
      promise.catch(onLate);
      reject(signal.reason);
    };
    signal.addEventListener('abort', onAbort, { once: true });
    promise.then(
      value => {
        signal.removeEventListener('abort', onAbort);
        resolve(value);
      },
      err => {
        signal.removeEventListener('abort', onAbort);
        reject(err);
      },
    );
  });
}
