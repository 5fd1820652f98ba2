import {
  NoActiveAssignmentError,
  TransientStoreError,
  UnknownRegionError
} from '../domain/errors';
import { RegionIdSchema, remainingTtlSeconds, systemClock, toQuestionView } from '../domain/models';
import type { Clock, QuestionView } from '../domain/models';
import { withTimeout } from '../domain/timeout';
import type { AssignmentStore } from '../ports/AssignmentStore';
import type { LookupCache } from '../ports/LookupCache';
import type { ServiceLogger, ServiceMetrics } from '../ports/Logger';

export interface LookupServiceOptions {
  clock?: Clock;
  storeTimeoutMs?: number;
  cacheTimeoutMs?: number;
  logger?: ServiceLogger;
  metrics?: ServiceMetrics;
}

const DEFAULT_STORE_TIMEOUT_MS = 2000;
const DEFAULT_CACHE_TIMEOUT_MS = 250;

export class LookupService {
  private readonly clock: Clock;
  private readonly storeTimeoutMs: number;
  private readonly cacheTimeoutMs: number;
  private readonly inFlight = new Map<string, Promise<QuestionView>>();

  constructor(
    private readonly store: Pick<AssignmentStore, 'getActiveAssignment' | 'regionExists'>,
    private readonly cache: LookupCache,
    private readonly options: LookupServiceOptions = {}
  ) {
    this.clock = options.clock ?? systemClock;
    this.storeTimeoutMs = options.storeTimeoutMs ?? DEFAULT_STORE_TIMEOUT_MS;
    this.cacheTimeoutMs = options.cacheTimeoutMs ?? DEFAULT_CACHE_TIMEOUT_MS;
  }

  async getCurrentQuestion(regionId: string): Promise<QuestionView> {
    const parsed = RegionIdSchema.safeParse(regionId);
    if (!parsed.success) {
      throw new UnknownRegionError(regionId);
    }
    const key = parsed.data;

    const cached = await this.readCache(key);
    if (cached) {
      this.options.metrics?.count('lookup_cache_hit');
      return cached;
    }
    this.options.metrics?.count('lookup_cache_miss');

    const pending = this.inFlight.get(key);
    if (pending) {
      this.options.logger?.debug('Joining in-flight lookup', { regionId: key });
      return pending;
    }

    const load = this.loadAndFill(key).finally(() => {
      this.inFlight.delete(key);
    });
    this.inFlight.set(key, load);
    return load;
  }

  private async readCache(regionId: string): Promise<QuestionView | null> {
    try {
      return await withTimeout(this.cache.get(regionId), this.cacheTimeoutMs, 'cache read');
    } catch (error) {
      this.options.logger?.warn('Cache read failed; falling back to store', {
        regionId,
        error: describe(error)
      });
      return null;
    }
  }

  private async loadAndFill(regionId: string): Promise<QuestionView> {
    const active = await this.callStore('getActiveAssignment', () =>
      this.store.getActiveAssignment(regionId)
    );

    if (!active) {
      const known = await this.callStore('regionExists', () => this.store.regionExists(regionId));
      if (!known) {
        throw new UnknownRegionError(regionId);
      }
      this.options.metrics?.count('lookup_no_active_assignment');
      throw new NoActiveAssignmentError(regionId);
    }

    const view = toQuestionView(active.assignment, active.cycle);
    const ttlSeconds = remainingTtlSeconds(active.cycle, this.clock());
    if (ttlSeconds > 0) {
      await this.writeCache(view, ttlSeconds);
    } else {
      this.options.logger?.warn('Active cycle has ended; serving without caching', {
        regionId,
        cycleId: active.cycle.cycleId
      });
    }
    return view;
  }

  private async callStore<T>(operation: string, call: () => Promise<T>): Promise<T> {
    try {
      return await withTimeout(call(), this.storeTimeoutMs, `store ${operation}`);
    } catch (error) {
      this.options.metrics?.count('lookup_transient_error');
      throw new TransientStoreError(operation, error);
    }
  }

  private async writeCache(view: QuestionView, ttlSeconds: number): Promise<void> {
    try {
      await withTimeout(this.cache.put(view, ttlSeconds), this.cacheTimeoutMs, 'cache write');
    } catch (error) {
      this.options.logger?.warn('Cache write failed; continuing without cache', {
        regionId: view.regionId,
        error: describe(error)
      });
    }
  }
}

function describe(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
