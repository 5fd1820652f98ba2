import { RotationConflictError } from '../domain/errors';
import { remainingTtlSeconds, systemClock, toQuestionView } from '../domain/models';
import type { Assignment, Clock, Cycle } from '../domain/models';
import { withTimeout } from '../domain/timeout';
import { CYCLE_DURATION_KEY } from '../ports/ConfigSource';
import type { ConfigSource } from '../ports/ConfigSource';
import type { AssignmentStore } from '../ports/AssignmentStore';
import type { LookupCache } from '../ports/LookupCache';
import type { ServiceLogger, ServiceMetrics } from '../ports/Logger';
import type { QuestionSelector } from './QuestionSelector';

export type RotationResult =
  | {
      status: 'rotated';
      cycle: Cycle;
      previousCycleId: number | null;
      assignments: Assignment[];
      cachePushed: boolean;
    }
  | {
      status: 'conflict';
      reason: 'superseded' | 'not_due';
      activeCycleId: number | null;
    };

export interface RotationEngineOptions {
  clock?: Clock;
  /** A trigger arriving this long before the active cycle ends still rotates. */
  earlyToleranceMs?: number;
  /** Bounds each read made before the commit; the commit itself is not bounded. */
  storeTimeoutMs?: number;
  cacheTimeoutMs?: number;
  logger?: ServiceLogger;
  metrics?: ServiceMetrics;
}

const DEFAULT_EARLY_TOLERANCE_MS = 5 * 60 * 1000;
const DEFAULT_STORE_TIMEOUT_MS = 2000;
const DEFAULT_CACHE_TIMEOUT_MS = 2000;

export class RotationEngine {
  private readonly clock: Clock;
  private readonly earlyToleranceMs: number;
  private readonly storeTimeoutMs: number;
  private readonly cacheTimeoutMs: number;

  constructor(
    private readonly store: AssignmentStore,
    private readonly selector: QuestionSelector,
    private readonly cache: LookupCache,
    private readonly config: ConfigSource,
    private readonly options: RotationEngineOptions = {}
  ) {
    this.clock = options.clock ?? systemClock;
    this.earlyToleranceMs = Math.max(0, options.earlyToleranceMs ?? DEFAULT_EARLY_TOLERANCE_MS);
    this.storeTimeoutMs = options.storeTimeoutMs ?? DEFAULT_STORE_TIMEOUT_MS;
    this.cacheTimeoutMs = options.cacheTimeoutMs ?? DEFAULT_CACHE_TIMEOUT_MS;
  }

  async rotate(): Promise<RotationResult> {
    const durationMs = await this.read(
      'config getDuration',
      this.config.getDuration(CYCLE_DURATION_KEY)
    );
    const previous = await this.read('store getActiveCycle', this.store.getActiveCycle());
    const now = this.clock();

    if (previous && now.getTime() < previous.endTime.getTime() - this.earlyToleranceMs) {
      this.options.logger?.info('Rotation skipped: active cycle is not due yet', {
        activeCycleId: previous.cycleId,
        endTime: previous.endTime.toISOString()
      });
      this.options.metrics?.count('rotation_conflict');
      return { status: 'conflict', reason: 'not_due', activeCycleId: previous.cycleId };
    }

    const startTime = previous ? previous.endTime : now;
    const cycle: Cycle = {
      cycleId: previous ? previous.cycleId + 1 : 1,
      startTime,
      endTime: new Date(startTime.getTime() + durationMs),
      active: true
    };

    const regions = await this.read('store listRegions', this.store.listRegions());
    const assignments: Assignment[] = [];
    for (const region of regions) {
      const question = await this.read(
        `select ${region.regionId}`,
        this.selector.selectNext(region.regionId)
      );
      assignments.push({
        cycleId: cycle.cycleId,
        regionId: region.regionId,
        questionId: question.questionId,
        content: question.content
      });
    }

    try {
      await this.store.commitRotation({
        expectedActiveCycleId: previous?.cycleId ?? null,
        cycle,
        assignments
      });
    } catch (error) {
      if (error instanceof RotationConflictError) {
        this.options.logger?.info('Rotation superseded by a concurrent commit', {
          expectedCycleId: error.expectedCycleId,
          attemptedCycleId: cycle.cycleId
        });
        this.options.metrics?.count('rotation_conflict');
        return {
          status: 'conflict',
          reason: 'superseded',
          activeCycleId: previous?.cycleId ?? null
        };
      }
      throw error;
    }

    this.options.metrics?.count('rotation_committed');
    this.options.logger?.info('Rotation committed', {
      cycleId: cycle.cycleId,
      previousCycleId: previous?.cycleId ?? null,
      startTime: cycle.startTime.toISOString(),
      endTime: cycle.endTime.toISOString(),
      regions: assignments.length
    });

    const cachePushed = await this.pushSnapshot(cycle, assignments);

    return {
      status: 'rotated',
      cycle,
      previousCycleId: previous?.cycleId ?? null,
      assignments,
      cachePushed
    };
  }

  private read<T>(label: string, operation: Promise<T>): Promise<T> {
    return withTimeout(operation, this.storeTimeoutMs, label);
  }

  private async pushSnapshot(cycle: Cycle, assignments: Assignment[]): Promise<boolean> {
    const ttlSeconds = remainingTtlSeconds(cycle, this.clock());
    if (ttlSeconds <= 0) {
      this.options.logger?.warn('Cache push skipped: new cycle has already ended', {
        cycleId: cycle.cycleId,
        endTime: cycle.endTime.toISOString()
      });
      return false;
    }
    if (assignments.length === 0) {
      return true;
    }

    const views = assignments.map(assignment => toQuestionView(assignment, cycle));
    try {
      await withTimeout(this.cache.putMany(views, ttlSeconds), this.cacheTimeoutMs, 'cache push');
      return true;
    } catch (error) {
      this.options.metrics?.count('cache_push_failed');
      this.options.logger?.warn('Cache push failed after rotation commit', {
        cycleId: cycle.cycleId,
        error: error instanceof Error ? error.message : String(error)
      });
      return false;
    }
  }
}
