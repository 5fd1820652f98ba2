import type { ScheduledEvent } from 'aws-lambda';
import {
  QuestionSelector,
  RotationEngine,
  type RotationResult
} from '@question-rotation/core';
import {
  DynamoAssignmentStore,
  DynamoLookupCache,
  DynamoParameterStore
} from '@question-rotation/persistence-ddb';
import { loadConfig } from './env';
import { instrument, logger, metrics, serializeError, serviceLogger, serviceMetrics } from './observability';

export interface RotationAppContext {
  engine: Pick<RotationEngine, 'rotate'>;
  stage: string;
}

/** Summary returned to the scheduler; dates are serialised so the payload is plain JSON. */
export type RotationSummary =
  | {
      status: 'rotated';
      cycleId: number;
      previousCycleId: number | null;
      startTime: string;
      endTime: string;
      regions: number;
      cachePushed: boolean;
    }
  | {
      status: 'conflict';
      reason: 'superseded' | 'not_due';
      activeCycleId: number | null;
    };

let appContextPromise: Promise<RotationAppContext> | undefined;
let appContextFactory: () => Promise<RotationAppContext> = bootstrap;

async function bootstrap(): Promise<RotationAppContext> {
  const config = loadConfig();
  logger.appendKeys({ stage: config.stage, app: config.appName });
  metrics.setDefaultDimensions({ app: config.appName, stage: config.stage });

  const store = new DynamoAssignmentStore({ tableName: config.tableName });
  const cache = new DynamoLookupCache({ tableName: config.controlTableName });
  const parameters = new DynamoParameterStore({ tableName: config.controlTableName });
  const engine = new RotationEngine(store, new QuestionSelector(store), cache, parameters, {
    earlyToleranceMs: config.rotationEarlyToleranceSeconds * 1000,
    storeTimeoutMs: config.storeTimeoutMs,
    // the snapshot push is batched writes, so it gets the store budget
    cacheTimeoutMs: config.storeTimeoutMs,
    logger: serviceLogger,
    metrics: serviceMetrics
  });

  return { engine, stage: config.stage };
}

async function getAppContext(): Promise<RotationAppContext> {
  if (!appContextPromise) {
    appContextPromise = appContextFactory().catch(error => {
      appContextPromise = undefined;
      throw error;
    });
  }
  return appContextPromise;
}

async function baseHandler(event: ScheduledEvent): Promise<RotationSummary> {
  logger.info('Rotation triggered', { eventId: event.id, scheduledAt: event.time });

  try {
    const app = await getAppContext();
    const result = await app.engine.rotate();
    return summarize(result);
  } catch (error) {
    serviceMetrics.count('rotation_failed');
    logger.error('Rotation failed; the active cycle is unchanged', { error: serializeError(error) });
    throw error;
  }
}

export function summarize(result: RotationResult): RotationSummary {
  if (result.status === 'conflict') {
    return result;
  }
  return {
    status: 'rotated',
    cycleId: result.cycle.cycleId,
    previousCycleId: result.previousCycleId,
    startTime: result.cycle.startTime.toISOString(),
    endTime: result.cycle.endTime.toISOString(),
    regions: result.assignments.length,
    cachePushed: result.cachePushed
  };
}

export const handler = instrument<ScheduledEvent, RotationSummary>('rotation', event => baseHandler(event));

export function __setRotationContextFactory(
  factory: () => Promise<RotationAppContext> | RotationAppContext
): void {
  appContextPromise = undefined;
  appContextFactory = async () => Promise.resolve(factory());
}
