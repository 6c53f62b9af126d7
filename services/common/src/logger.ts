import { randomUUID } from 'crypto';

import type { FastifyPluginAsync, FastifyRequest } from 'fastify';
import fp from 'fastify-plugin';
import pino, { type Logger } from 'pino';

import { getConfig } from './config';
import type { RequestContext, TraceContext } from './types';

type ChildLoggerBindings = Record<string, unknown>;

let rootLogger: Logger | null = null;
const requestStartTimes = new WeakMap<FastifyRequest, bigint>();

function buildRootLogger(): Logger {
  const config = getConfig();
  if (!rootLogger) {
    rootLogger = pino({
      level: config.runtime.logLevel,
      base: {
        service: config.runtime.serviceName,
        env: config.runtime.env
      },
      timestamp: () => `,"timestamp":"${new Date().toISOString()}"`
    });
  }

  return rootLogger;
}

export function getLogger(bindings?: ChildLoggerBindings): Logger {
  const logger = buildRootLogger();
  return bindings ? logger.child(bindings) : logger;
}

export function resetLoggerForTesting(): void {
  rootLogger = null;
}

/**
 * Parses a W3C `traceparent` header (`version-traceId-spanId-flags`).
 * Malformed headers are ignored rather than rejected.
 */
export function parseTraceContext(headerValue?: string): TraceContext | undefined {
  if (!headerValue) {
    return undefined;
  }

  const parts = headerValue.trim().split('-');
  if (parts.length !== 4) {
    return undefined;
  }

  const [, traceId, spanId, flags] = parts;
  if (!/^[0-9a-f]{32}$/i.test(traceId) || !/^[0-9a-f]{16}$/i.test(spanId)) {
    return undefined;
  }

  const flagBits = Number.parseInt(flags, 16);

  return {
    traceId: traceId.toLowerCase(),
    spanId: spanId.toLowerCase(),
    sampled: Number.isFinite(flagBits) ? (flagBits & 1) === 1 : false,
    raw: headerValue
  };
}

function headerValueToString(value: unknown): string | undefined {
  if (typeof value === 'string') {
    return value;
  }

  if (Array.isArray(value)) {
    return typeof value[0] === 'string' ? value[0] : undefined;
  }

  return undefined;
}

export const requestLoggingPlugin: FastifyPluginAsync = fp(async (fastify) => {
  const config = getConfig();
  const enableLogging = config.runtime.enableRequestLogging;
  const traceHeaderName = config.monitoring.traceHeader.toLowerCase();
  const requestIdHeaderName = config.monitoring.requestIdHeader.toLowerCase();

  fastify.addHook('onRequest', async (request, reply) => {
    const incomingRequestId = headerValueToString(request.headers[requestIdHeaderName]);
    const requestId = incomingRequestId && incomingRequestId.length > 0 ? incomingRequestId : randomUUID();
    const traceContext = parseTraceContext(headerValueToString(request.headers[traceHeaderName]));

    const requestContext: RequestContext = {
      requestId,
      trace: traceContext
    };

    request.requestContext = requestContext;
    requestStartTimes.set(request, process.hrtime.bigint());

    const childBindings: ChildLoggerBindings = {
      request_id: requestId,
      trace_id: traceContext?.traceId,
      span_id: traceContext?.spanId
    };

    const childLogger = request.log.child(childBindings); Object.assign(request, { log: childLogger });

    if (enableLogging) {
      request.log.info(
        {
          path: request.url,
          method: request.method,
          trace_id: traceContext?.traceId
        },
        'request:start'
      );
    }

    reply.header(config.monitoring.requestIdHeader, requestId);

    if (config.monitoring.propagateTrace && traceContext?.raw) {
      reply.header(config.monitoring.traceHeader, traceContext.raw);
    }
  });

  fastify.addHook('onResponse', async (request, reply) => {
    if (!enableLogging) {
      return;
    }

    const start = requestStartTimes.get(request);
    const durationMs = start ? Number(process.hrtime.bigint() - start) / 1_000_000 : undefined;

    request.log.info(
      {
        status_code: reply.statusCode,
        duration_ms: durationMs
      },
      'request:complete'
    );
  });
});
