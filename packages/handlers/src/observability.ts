import { Logger } from '@aws-lambda-powertools/logger';
import { Metrics, MetricUnit } from '@aws-lambda-powertools/metrics';
import { Tracer } from '@aws-lambda-powertools/tracer';
import type { Context } from 'aws-lambda';
import type { ServiceLogger, ServiceMetrics } from '@question-rotation/core';

const serviceName = process.env.APP_NAME ?? 'question-rotation';

export const logger = new Logger({ serviceName });
export const metrics = new Metrics({ namespace: serviceName, serviceName });
export const tracer = new Tracer({ serviceName });

export const serviceLogger: ServiceLogger = {
  debug: (message, context) => (context ? logger.debug(message, context) : logger.debug(message)),
  info: (message, context) => (context ? logger.info(message, context) : logger.info(message)),
  warn: (message, context) => (context ? logger.warn(message, context) : logger.warn(message)),
  error: (message, context) => (context ? logger.error(message, context) : logger.error(message))
};

export const serviceMetrics: ServiceMetrics = {
  count: (name, value = 1) => metrics.addMetric(name, MetricUnit.Count, value)
};

export function serializeError(error: unknown): Record<string, unknown> {
  const base: Record<string, unknown> = { message: 'Unknown error' };
  if (error instanceof Error) {
    base.message = error.message;
    base.name = error.name;
    base.stack = error.stack;
    if ('cause' in error && error.cause) {
      base.cause = error.cause instanceof Error ? error.cause.message : error.cause;
    }
  }
  return base;
}

let coldStart = true;

/**
 * Wraps a Lambda entry point with the shared logger context, cold start metric,
 * an X-Ray subsegment when tracing is on, and metric publication.
 */
export function instrument<TEvent, TResult>(
  name: string,
  handler: (event: TEvent, context: Context) => Promise<TResult>,
  requestKeys: (event: TEvent, context: Context) => Record<string, string> = (_, context) => ({
    requestId: context.awsRequestId
  })
): (event: TEvent, context: Context) => Promise<TResult> {
  return async (event, context) => {
    logger.addContext(context);
    logger.logEventIfEnabled(event);
    const keys = requestKeys(event, context);
    logger.appendKeys(keys);

    if (coldStart) {
      metrics.captureColdStartMetric();
    }

    try {
      if (!tracer.isTracingEnabled()) {
        return await handler(event, context);
      }
      return await traced(name, () => handler(event, context));
    } finally {
      metrics.publishStoredMetrics();
      logger.removeKeys(Object.keys(keys));
      coldStart = false;
    }
  };
}

async function traced<T>(name: string, fn: () => Promise<T>): Promise<T> {
  const segment = tracer.getSegment();
  const subsegment = segment?.addNewSubsegment(`## ${name}`);
  if (subsegment) {
    tracer.setSegment(subsegment);
  }
  tracer.annotateColdStart();
  tracer.addServiceNameAnnotation();

  try {
    return await fn();
  } catch (error) {
    if (error instanceof Error) {
      tracer.addErrorAsMetadata(error);
    }
    throw error;
  } finally {
    subsegment?.close();
    if (segment) {
      tracer.setSegment(segment);
    }
  }
}
