import { createStore, StoreApi } from 'zustand/vanilla';
import { LikeResult } from '../types/api';
import { LikeGateway } from '../types/gateways';
import { LikeState } from '../types/like';
import { Listener, Observable } from '../types/observable';
import { LIKE_DEFAULTS } from './config';
import { errorMessage } from './errors';
import { KeyedScheduler } from './keyed-scheduler';
import { createLogger, Logger } from './logger';

export interface LikeCoordinatorOptions {
  gateway: LikeGateway;
  debounceMs?: number;
  logger?: Logger;
}

interface LikeStoreState {
  likes: Record<string, LikeState>;
}

// Pending or in-flight work for one recipe
interface Slot {
  /** Published state before the burst started; restored on failure. */
  base: LikeResult;
  desiredLiked: boolean;
  generation: number;
  controller: AbortController | null;
  /** A request has gone out; aborting it does not undo it on the server. */
  sent: boolean;
  sessionId: number | null;
}

export const DEFAULT_LIKE_STATE: Readonly<LikeState> = Object.freeze({
  liked: false,
  likesCount: 0,
  isLoading: false,
  error: null,
});

export const LIKE_FAILED_MESSAGE = 'Failed to update like';

interface SessionHooks {
  toggle: (recipeId: string, currentlyLiked: boolean) => void;
  preload: (recipeIds: readonly string[]) => Promise<void>;
  close: () => void;
}

/**
 * Handle for one screen's like interactions. Closing it cancels the toggles
 * it started and re-reads those recipes from the server, since their
 * optimistic state was never confirmed.
 */
export class LikeSession {
  private closed = false;

  constructor(private readonly hooks: SessionHooks) {}

  get isClosed(): boolean {
    return this.closed;
  }

  toggle(recipeId: string, currentlyLiked: boolean): void {
    if (this.closed) return;
    this.hooks.toggle(recipeId, currentlyLiked);
  }

  preload(recipeIds: readonly string[]): Promise<void> {
    if (this.closed) return Promise.resolve();
    return this.hooks.preload(recipeIds);
  }

  close(): void {
    if (this.closed) return;
    this.closed = true;
    this.hooks.close();
  }
}

/**
 * Optimistic like state for any number of recipes.
 *
 * Each tap is published at once. Taps on the same recipe within the debounce
 * window collapse into one request carrying the last requested state, and a
 * newer burst aborts the request of an older one. Recipes never wait on each
 * other.
 */
export class LikeCoordinator {
  private readonly store: StoreApi<LikeStoreState>;
  private readonly gateway: LikeGateway;
  private readonly debounceMs: number;
  private readonly logger: Logger;
  private readonly scheduler = new KeyedScheduler<string>();
  private readonly slots = new Map<string, Slot>();
  // Generation of the latest toggle per recipe
  private readonly lastToggle = new Map<string, number>();
  private generation = 0;
  private sessionCount = 0;
  private disposed = false;

  constructor(options: LikeCoordinatorOptions) {
    this.gateway = options.gateway;
    this.debounceMs = options.debounceMs ?? LIKE_DEFAULTS.debounceMs;
    this.logger = options.logger ?? createLogger('LikeCoordinator');
    this.store = createStore<LikeStoreState>()(() => ({ likes: {} }));
  }

  getSnapshot(recipeId: string): LikeState {
    return this.store.getState().likes[recipeId] ?? DEFAULT_LIKE_STATE;
  }

  /** Live view of one recipe; listeners fire only when that recipe changes. */
  getLikeState(recipeId: string): Observable<LikeState> {
    return {
      getState: () => this.getSnapshot(recipeId),
      subscribe: (listener: Listener<LikeState>) =>
        this.store.subscribe((state, previous) => {
          const next = state.likes[recipeId] ?? DEFAULT_LIKE_STATE;
          const prev = previous.likes[recipeId] ?? DEFAULT_LIKE_STATE;
          if (next !== prev) {
            listener(next, prev);
          }
        }),
    };
  }

  isPending(recipeId: string): boolean {
    return this.slots.has(recipeId);
  }

  toggle(recipeId: string, currentlyLiked: boolean): void {
    this.enqueue(recipeId, currentlyLiked, null);
  }

  /** Seeds a recipe from data the caller already has, e.g. a feed page. */
  hydrate(recipeId: string, known: LikeResult): void {
    if (this.disposed || this.slots.has(recipeId)) return;
    this.publish(recipeId, { ...known, isLoading: false, error: null });
  }

  /** Fetches like status for recipes about to be shown. Failures are ignored. */
  async preload(recipeIds: readonly string[]): Promise<void> {
    if (this.disposed) return;
    const ids = [...new Set(recipeIds)].filter(id => !this.slots.has(id));
    if (ids.length === 0) return;
    const startedAt = this.generation;

    const results = await Promise.allSettled(ids.map(id => this.gateway.getLikeStatus(id)));
    results.forEach((result, index) => {
      const recipeId = ids[index];
      // A toggle that started meanwhile is newer than this read
      if (this.disposed || (this.lastToggle.get(recipeId) ?? 0) > startedAt) {
        this.logger.debug('Dropping stale like status for', recipeId);
        return;
      }
      if (result.status === 'fulfilled') {
        this.publish(recipeId, { ...result.value, isLoading: false, error: null });
      } else {
        this.logger.debug('Preload failed for', recipeId, errorMessage(result.reason));
      }
    });
  }

  clearError(recipeId: string): void {
    const current = this.store.getState().likes[recipeId];
    if (!current || current.error === null) return;
    this.publish(recipeId, { ...current, error: null });
  }

  openSession(): LikeSession {
    const sessionId = ++this.sessionCount;
    return new LikeSession({
      toggle: (recipeId, currentlyLiked) => this.enqueue(recipeId, currentlyLiked, sessionId),
      preload: recipeIds => this.preload(recipeIds),
      close: () => {
        const cancelled = this.cancelWhere(slot => slot.sessionId === sessionId);
        if (cancelled.length > 0) {
          void this.preload(cancelled);
        }
      },
    });
  }

  /** Cancels every pending and in-flight toggle. Published state is kept. */
  dispose(): void {
    if (this.disposed) return;
    this.disposed = true;
    this.cancelWhere(() => true);
  }

  private enqueue(recipeId: string, currentlyLiked: boolean, sessionId: number | null): void {
    if (this.disposed) return;

    const current = this.getSnapshot(recipeId);
    const desiredLiked = !currentlyLiked;
    let slot = this.slots.get(recipeId);
    if (!slot) {
      slot = {
        base: { liked: currentlyLiked, likesCount: current.likesCount },
        desiredLiked,
        generation: 0,
        controller: null,
        sent: false,
        sessionId,
      };
      this.slots.set(recipeId, slot);
    }

    // Supersede whatever the previous tap started
    slot.controller?.abort();
    slot.controller = null;
    slot.desiredLiked = desiredLiked;
    slot.sessionId = sessionId;
    slot.generation = ++this.generation;
    this.lastToggle.set(recipeId, slot.generation);

    const delta = current.liked === desiredLiked ? 0 : desiredLiked ? 1 : -1;
    this.publish(recipeId, {
      liked: desiredLiked,
      likesCount: current.likesCount + delta,
      isLoading: true,
      error: null,
    });

    const generation = slot.generation;
    this.scheduler.schedule(recipeId, this.debounceMs, () => {
      void this.flush(recipeId, generation);
    });
  }

  private isCurrent(recipeId: string, slot: Slot, generation: number): boolean {
    return this.slots.get(recipeId) === slot && slot.generation === generation;
  }

  private async flush(recipeId: string, generation: number): Promise<void> {
    const slot = this.slots.get(recipeId);
    if (!slot || slot.generation !== generation) return;

    if (!slot.sent && slot.desiredLiked === slot.base.liked) {
      this.logger.debug('Like burst for', recipeId, 'ended where it started, nothing sent');
      this.slots.delete(recipeId);
      this.publish(recipeId, { ...slot.base, isLoading: false, error: null });
      return;
    }

    const controller = new AbortController();
    slot.controller = controller;
    slot.sent = true;
    this.logger.debug('📡', slot.desiredLiked ? 'Liking' : 'Unliking', recipeId);

    try {
      const result = await this.gateway.toggleLike(recipeId, slot.desiredLiked, {
        signal: controller.signal,
      });
      if (!this.isCurrent(recipeId, slot, generation)) {
        this.logger.debug('Dropping superseded like response for', recipeId);
        return;
      }
      this.slots.delete(recipeId);
      this.publish(recipeId, { ...result, isLoading: false, error: null });
    } catch (error) {
      if (!this.isCurrent(recipeId, slot, generation)) {
        this.logger.debug('Dropping superseded like failure for', recipeId);
        return;
      }
      this.slots.delete(recipeId);
      this.logger.debug('↩️ Rolling back like for', recipeId + ':', errorMessage(error));
      this.publish(recipeId, {
        ...slot.base,
        isLoading: false,
        error: errorMessage(error, LIKE_FAILED_MESSAGE),
      });
    }
  }

  private cancelWhere(predicate: (slot: Slot) => boolean): string[] {
    const cancelled: string[] = [];
    for (const [recipeId, slot] of [...this.slots]) {
      if (!predicate(slot)) continue;
      this.scheduler.cancel(recipeId);
      slot.controller?.abort();
      this.slots.delete(recipeId);
      this.publish(recipeId, { ...this.getSnapshot(recipeId), isLoading: false });
      this.logger.debug('Cancelled pending like for', recipeId);
      cancelled.push(recipeId);
    }
    return cancelled;
  }

  private publish(recipeId: string, state: LikeState): void {
    const next: LikeState = { ...state, likesCount: Math.max(0, state.likesCount) };
    this.store.setState(current => ({ likes: { ...current.likes, [recipeId]: next } }));
  }
}
