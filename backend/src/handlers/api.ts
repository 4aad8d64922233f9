import type {
  APIGatewayProxyEventV2,
  APIGatewayProxyStructuredResultV2,
} from 'aws-lambda';
import { ZodError } from 'zod';
import {
  ErrorCode,
  type ApiError,
  type DataProvidersResponse,
  type HealthResponse,
  type TemperatureScoreResponse,
} from '@tempscore/shared';
import { config } from '../lib/config.js';
import { createRequestLogger, logger as baseLogger, type Logger } from '../lib/logger.js';
import { AppError, NotFoundError, ValidationError } from '../lib/errors.js';
import { ProviderRegistry } from '../lib/providers/registry.js';
import { loadSettings } from '../lib/settings.js';
import { runPipeline } from '../lib/services/pipeline.js';
import { parseAggregationMethod } from '../lib/services/weights.js';
import { temperatureScoreRequestSchema, type Settings } from '../lib/validation.js';

// Route handler type
type RouteHandler = (
  event: APIGatewayProxyEventV2,
  context: HandlerContext
) => Promise<APIGatewayProxyStructuredResultV2>;

interface HandlerContext {
  requestId: string;
  logger: Logger;
  // Health checks never touch settings, so they are loaded on first use
  runtime: () => Promise<Runtime>;
}

// Settings and providers, loaded once per cold start
interface Runtime {
  settings: Settings;
  registry: ProviderRegistry;
}

let runtimePromise: Promise<Runtime> | undefined;

function getRuntime(): Promise<Runtime> {
  if (!runtimePromise) {
    runtimePromise = loadSettings()
      .then((settings) => ({
        settings,
        registry: new ProviderRegistry(settings.dataProviders, baseLogger),
      }))
      .catch((error: unknown) => {
        // Let the next invocation try again
        runtimePromise = undefined;
        throw error;
      });
  }
  return runtimePromise;
}

// Parse JSON body
function parseBody(event: APIGatewayProxyEventV2): unknown {
  if (!event.body) {
    throw new ValidationError('Request body is required');
  }
  try {
    return JSON.parse(
      event.isBase64Encoded ? Buffer.from(event.body, 'base64').toString('utf-8') : event.body
    );
  } catch {
    throw new ValidationError('Invalid JSON in request body');
  }
}

// Create JSON response
function jsonResponse(
  statusCode: number,
  body: unknown,
  headers?: Record<string, string>
): APIGatewayProxyStructuredResultV2 {
  return {
    statusCode,
    headers: {
      'Content-Type': 'application/json',
      ...headers,
    },
    body: JSON.stringify(body),
  };
}

function errorResponse(
  statusCode: number,
  code: ErrorCode,
  message: string,
  requestId: string,
  details?: Record<string, unknown>
): APIGatewayProxyStructuredResultV2 {
  const body: ApiError = {
    error: { code, message, requestId, ...(details ? { details } : {}) },
  };
  return jsonResponse(statusCode, body);
}

// Route definitions
const routes: Record<string, RouteHandler> = {
  'GET /health': async () => {
    const response: HealthResponse = {
      status: 'healthy',
      timestamp: new Date().toISOString(),
      version: config.version,
    };
    return jsonResponse(200, response);
  },

  'GET /data-providers': async (_event, ctx) => {
    const { registry } = await ctx.runtime();
    const response: DataProvidersResponse = { items: registry.describe() };
    return jsonResponse(200, response);
  },

  'POST /temperature-score': async (event, ctx) => {
    const body = temperatureScoreRequestSchema.parse(parseBody(event));
    const { settings, registry } = await ctx.runtime();

    const aggregationMethod = parseAggregationMethod(
      body.aggregationMethod,
      settings.defaultAggregationMethod
    );
    const providers = registry.resolve(body.dataProviders, {
      strict: body.strictProviders || config.features.strictProviderSelection,
    });

    const result = await runPipeline({
      providers,
      portfolio: body.companies,
      fallbackScore: body.defaultScore ?? settings.defaultScore,
      aggregationMethod,
      grouping: body.groupingColumns,
      scenario: body.scenario,
      scopeFilter: body.filterScopeCategory,
      timeFrameFilter: body.filterTimeFrame,
      includeColumns: body.includeColumns,
      anonymize: body.anonymizeDataDump,
      providerTimeoutMs: settings.providerTimeoutMs ?? config.providers.timeoutMs,
      logger: ctx.logger,
    });

    const response: TemperatureScoreResponse = {
      aggregatedScores: result.aggregatedScores,
      scores: result.scores,
      coverage: result.coverage,
      companies: result.companies,
      featureDistribution: result.groupingDistribution ?? null,
      unmatchedCompanyIds: result.unmatchedCompanyIds,
    };
    return jsonResponse(200, response);
  },
};

// Match route, ignoring a trailing slash
function matchRoute(method: string, path: string): RouteHandler | null {
  const normalizedPath = path.length > 1 ? path.replace(/\/+$/, '') : path;
  const key = `${method} ${normalizedPath}`;
  return Object.hasOwn(routes, key) ? routes[key] : null;
}

// Main handler
export async function handler(
  event: APIGatewayProxyEventV2
): Promise<APIGatewayProxyStructuredResultV2> {
  const requestId = event.requestContext.requestId;
  const logger = createRequestLogger(requestId);
  const method = event.requestContext.http.method;
  const path = event.rawPath;

  logger.info({ method, path }, 'Request received');

  try {
    const route = matchRoute(method, path);
    if (!route) {
      throw new NotFoundError('Route', `${method} ${path}`);
    }

    const response = await route(event, { requestId, logger, runtime: getRuntime });

    logger.info({ statusCode: response.statusCode }, 'Request completed');
    return response;
  } catch (error) {
    // Handle known errors
    if (error instanceof AppError) {
      logger.warn({ error: error.message, code: error.code }, 'Application error');
      return jsonResponse(error.statusCode, error.toApiError(requestId));
    }

    // Handle Zod validation errors
    if (error instanceof ZodError) {
      logger.warn({ issues: error.issues }, 'Validation error');
      return errorResponse(400, ErrorCode.VALIDATION_ERROR, 'Validation failed', requestId, {
        issues: error.issues,
      });
    }

    // Unknown errors
    logger.error({ error }, 'Unexpected error');
    return errorResponse(500, ErrorCode.INTERNAL_ERROR, 'An unexpected error occurred', requestId);
  }
}
