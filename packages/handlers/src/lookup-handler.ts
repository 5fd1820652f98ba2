import type { APIGatewayProxyEventV2, APIGatewayProxyStructuredResultV2, Context } from 'aws-lambda';
import {
  LookupService,
  NoActiveAssignmentError,
  TransientStoreError,
  UnknownRegionError,
  type QuestionView
} from '@question-rotation/core';
import { DynamoAssignmentStore, DynamoLookupCache } from '@question-rotation/persistence-ddb';
import { loadConfig } from './env';
import { instrument, logger, metrics, serializeError, serviceLogger, serviceMetrics } from './observability';
import packageJson from '../../../package.json';

export interface LookupAppContext {
  lookup: Pick<LookupService, 'getCurrentQuestion'>;
  stage: string;
  appName: string;
  canConnect: () => Promise<boolean>;
}

let appContextPromise: Promise<LookupAppContext> | undefined;
let appContextFactory: () => Promise<LookupAppContext> = bootstrap;

async function bootstrap(): Promise<LookupAppContext> {
  const config = loadConfig();
  logger.appendKeys({ stage: config.stage, app: config.appName });
  metrics.setDefaultDimensions({ app: config.appName, stage: config.stage });

  const store = new DynamoAssignmentStore({ tableName: config.tableName });
  const cache = new DynamoLookupCache({ tableName: config.controlTableName });
  const lookup = new LookupService(store, cache, {
    storeTimeoutMs: config.storeTimeoutMs,
    cacheTimeoutMs: config.cacheTimeoutMs,
    logger: serviceLogger,
    metrics: serviceMetrics
  });

  return {
    lookup,
    stage: config.stage,
    appName: config.appName,
    canConnect: () => store.canConnect()
  };
}

async function getAppContext(): Promise<LookupAppContext> {
  if (!appContextPromise) {
    appContextPromise = appContextFactory().catch(error => {
      appContextPromise = undefined;
      throw error;
    });
  }
  return appContextPromise;
}

const version = packageJson.version ?? '0.0.0';

async function baseHandler(event: APIGatewayProxyEventV2): Promise<APIGatewayProxyStructuredResultV2> {
  try {
    if (event.requestContext.http.method !== 'GET') {
      return notFound();
    }

    if (matchesPath(event.rawPath, '/healthz')) {
      const app = await getAppContext();
      return json(200, { ok: true, version, stage: app.stage });
    }

    if (matchesPath(event.rawPath, '/readyz')) {
      return await handleReadyz();
    }

    if (matchesPath(event.rawPath, '/current-question')) {
      return await handleCurrentQuestion(event);
    }

    return notFound();
  } catch (error) {
    logger.error('Unhandled error in lookup handler', { error: serializeError(error) });
    return failure(500, 'internal_error', false);
  }
}

async function handleCurrentQuestion(event: APIGatewayProxyEventV2): Promise<APIGatewayProxyStructuredResultV2> {
  const regionId = event.queryStringParameters?.region?.trim();
  if (!regionId) {
    return failure(400, 'missing_region', false);
  }

  const app = await getAppContext();
  try {
    const view = await app.lookup.getCurrentQuestion(regionId);
    return json(200, toResponseBody(view));
  } catch (error) {
    if (error instanceof UnknownRegionError) {
      logger.info('Lookup for unknown region', { regionId });
      return failure(404, 'unknown_region', false);
    }
    if (error instanceof NoActiveAssignmentError) {
      logger.error('Region has no assignment in the active cycle', { regionId });
      return failure(500, 'no_active_assignment', false);
    }
    if (error instanceof TransientStoreError) {
      logger.warn('Transient store failure during lookup', {
        regionId,
        error: serializeError(error)
      });
      return failure(503, 'transient_failure', true);
    }
    throw error;
  }
}

async function handleReadyz(): Promise<APIGatewayProxyStructuredResultV2> {
  try {
    const app = await getAppContext();
    const canConnect = await app.canConnect();
    if (!canConnect) {
      throw new Error('DynamoDB not reachable');
    }
    return json(200, { ok: true, version, stage: app.stage });
  } catch (error) {
    logger.error('Readiness check failed', { error: serializeError(error) });
    return json(503, { ok: false, message: 'Not Ready' });
  }
}

function toResponseBody(view: QuestionView): Record<string, unknown> {
  return {
    region_id: view.regionId,
    question_id: view.questionId,
    content: view.content,
    cycle_id: view.cycleId
  };
}

function matchesPath(rawPath: string | undefined, target: string): boolean {
  return (rawPath ?? '').toLowerCase() === target.toLowerCase();
}

function json(statusCode: number, body: unknown): APIGatewayProxyStructuredResultV2 {
  return {
    statusCode,
    body: JSON.stringify(body),
    headers: { 'content-type': 'application/json' }
  };
}

function failure(statusCode: number, reason: string, retryable: boolean): APIGatewayProxyStructuredResultV2 {
  return json(statusCode, { ok: false, reason, retryable });
}

function notFound(): APIGatewayProxyStructuredResultV2 {
  return json(404, { message: 'Not Found' });
}

function getCorrelationId(event: APIGatewayProxyEventV2): string {
  return (
    event.headers?.['x-correlation-id'] ??
    event.headers?.['x-request-id'] ??
    event.requestContext.requestId ??
    `corr-${Date.now()}`
  );
}

export const handler = instrument<APIGatewayProxyEventV2, APIGatewayProxyStructuredResultV2>(
  'lookup',
  event => baseHandler(event),
  (event: APIGatewayProxyEventV2, context: Context) => ({
    requestId: context.awsRequestId,
    correlationId: getCorrelationId(event)
  })
);

export function __setLookupContextFactory(
  factory: () => Promise<LookupAppContext> | LookupAppContext
): void {
  appContextPromise = undefined;
  appContextFactory = async () => Promise.resolve(factory());
}
