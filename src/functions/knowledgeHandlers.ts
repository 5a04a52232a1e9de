/**
 * HTTP handlers for the knowledge base
 *
 * Kept free of route registration so they can be exercised without the
 * Functions host; see knowledgeApi.ts for the bindings.
 */

import { createHash } from 'node:crypto';
import { HttpRequest, HttpResponseInit } from '@azure/functions';
import { KnowledgeBase } from '../lib/rag/knowledgeBase';
import {
  RESEARCH_PROMPT_NAME,
  RESEARCH_PROMPT_TEMPLATE,
  RESEARCH_PROMPT_VARIABLES,
} from '../lib/rag/prompts';
import {
  ConfigurationError,
  isCollectionAlreadyExistsError,
  isCollectionNotFoundError,
  isConfigurationError,
  isDimensionMismatchError,
  isEmbeddingProviderUnavailableError,
  isEmptyDocumentError,
  isEmptyQueryError,
  isRateLimitError,
  isRebuildTimeoutError,
  isServiceUnavailableError,
  isTimeoutError,
  toError,
} from '../lib/utils/errors';
import { trackEvent, trackMetric } from '../lib/utils/telemetry';
import { Metadata, MetadataValue } from '../types/chunk';
import { FilterCondition, MetadataFilter, RangePredicate } from '../types/vector';
import * as logger from '../lib/utils/logger';

export type KnowledgeRequest = Pick<HttpRequest, 'json' | 'params'>;

export type KnowledgeHandler = (request: KnowledgeRequest) => Promise<HttpResponseInit>;

export interface KnowledgeHandlers {
  searchKnowledge: KnowledgeHandler;
  addKnowledge: KnowledgeHandler;
  queryWithContext: KnowledgeHandler;
  updateKnowledgeIndex: KnowledgeHandler;
  listKnowledgeCollections: KnowledgeHandler;
  collectionStats: KnowledgeHandler;
  researchPrompt: KnowledgeHandler;
  health: KnowledgeHandler;
}

const SEARCH_K = { min: 1, max: 20, fallback: 5 };
const CONTEXT_K = { min: 1, max: 10, fallback: 3 };
const RANGE_KEYS = ['gt', 'gte', 'lt', 'lte'] as const;

// ============================================================================
// Request parsing
// ============================================================================

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function isMetadataValue(value: unknown): value is MetadataValue {
  return typeof value === 'string' || typeof value === 'number' || typeof value === 'boolean';
}

async function readBody(request: KnowledgeRequest): Promise<Record<string, unknown>> {
  let body: unknown;
  try {
    body = await request.json();
  } catch (err) {
    logger.debug('Unparsable request body', { error: toError(err).message });
    throw new ConfigurationError('Request body must be valid JSON');
  }

  if (!isRecord(body)) {
    throw new ConfigurationError('Request body must be a JSON object');
  }
  return body;
}

function requireString(body: Record<string, unknown>, key: string): string {
  const value = body[key];
  if (typeof value !== 'string' || value.trim().length === 0) {
    throw new ConfigurationError(`"${key}" is required and must be a non-empty string`);
  }
  return value;
}


/**
 * Path for content posted without one, stable across repeated posts
 */
export function defaultDocumentPath(content: string): string {
  return `document-${createHash('sha256').update(content).digest('hex').slice(0, 16)}`;
}

function optionalString(body: Record<string, unknown>, key: string): string | undefined {
  const value = body[key];
  if (value === undefined || value === null) {
    return undefined;
  }
  if (typeof value !== 'string' || value.trim().length === 0) {
    throw new ConfigurationError(`"${key}" must be a non-empty string`);
  }
  return value;
}

function optionalInteger(
  body: Record<string, unknown>,
  key: string,
  bounds: { min: number; max: number }
): number | undefined {
  const value = body[key];
  if (value === undefined || value === null) {
    return undefined;
  }
  if (typeof value !== 'number' || !Number.isInteger(value) || value < bounds.min || value > bounds.max) {
    throw new ConfigurationError(
      `"${key}" must be an integer between ${bounds.min} and ${bounds.max}`
    );
  }
  return value;
}

function parseMetadata(value: unknown): Metadata {
  if (value === undefined || value === null) {
    return {};
  }
  if (!isRecord(value)) {
    throw new ConfigurationError('"metadata" must be an object');
  }

  const metadata: Metadata = {};
  for (const [key, entry] of Object.entries(value)) {
    if (!isMetadataValue(entry)) {
      throw new ConfigurationError(`Metadata field "${key}" must be a string, number or boolean`);
    }
    metadata[key] = entry;
  }
  return metadata;
}

function parseCondition(key: string, value: unknown): FilterCondition {
  if (isMetadataValue(value)) {
    return value;
  }
  if (!isRecord(value)) {
    throw new ConfigurationError(`Filter on "${key}" must be a scalar or a range`);
  }

  const range: RangePredicate = {};
  for (const [operator, bound] of Object.entries(value)) {
    const rangeKey = RANGE_KEYS.find((candidate) => candidate === operator);
    if (!rangeKey || typeof bound !== 'number') {
      throw new ConfigurationError(
        `Filter on "${key}" has an invalid range operator "${operator}" (expected gt, gte, lt or lte with a number)`
      );
    }
    range[rangeKey] = bound;
  }
  return range;
}

function parseFilter(value: unknown): MetadataFilter | undefined {
  if (value === undefined || value === null) {
    return undefined;
  }
  if (!isRecord(value)) {
    throw new ConfigurationError('"filter" must be an object');
  }

  const filter: MetadataFilter = {};
  for (const [key, condition] of Object.entries(value)) {
    filter[key] = parseCondition(key, condition);
  }
  return filter;
}

// ============================================================================
// Responses
// ============================================================================

/**
 * Maps a failure to its HTTP status
 */
export function statusForError(error: unknown): number {
  if (isConfigurationError(error) || isEmptyDocumentError(error) || isEmptyQueryError(error)) {
    return 400;
  }
  if (isCollectionNotFoundError(error)) {
    return 404;
  }
  if (isCollectionAlreadyExistsError(error) || isDimensionMismatchError(error)) {
    return 409;
  }
  if (isRebuildTimeoutError(error)) {
    return 202;
  }
  if (
    isEmbeddingProviderUnavailableError(error) ||
    isRateLimitError(error) ||
    isServiceUnavailableError(error)
  ) {
    return 503;
  }
  if (isTimeoutError(error)) {
    return 504;
  }
  return 500;
}

function errorResponse(route: string, err: unknown, startTime: number): HttpResponseInit {
  const error = toError(err);
  const status = statusForError(error);
  const duration = Date.now() - startTime;

  if (status === 500) {
    logger.logError(`${route} failed`, error);
  } else {
    logger.warn(`${route} request failed`, { status, errorType: error.name, message: error.message });
  }

  trackEvent(`${route}.Error`, { errorType: error.name, status: String(status) });
  trackMetric(`${route}.RequestTime`, duration, { outcome: 'error' });

  if (status === 202) {
    return {
      status,
      jsonBody: { status: 'optimizing', message: error.message },
    };
  }

  return {
    status,
    jsonBody: {
      error: error.name,
      message: status === 500 ? 'Internal server error' : error.message,
    },
  };
}

/**
 * Runs a handler body, tracking its duration and mapping failures
 */
async function respond(
  route: string,
  work: () => Promise<HttpResponseInit>
): Promise<HttpResponseInit> {
  const startTime = Date.now();
  try {
    const response = await work();
    trackMetric(`${route}.RequestTime`, Date.now() - startTime, { outcome: 'success' });
    return response;
  } catch (err) {
    return errorResponse(route, err, startTime);
  }
}

// ============================================================================
// Handlers
// ============================================================================

export function createKnowledgeHandlers(getKnowledgeBase: () => KnowledgeBase): KnowledgeHandlers {
  return {
    searchKnowledge: (request) =>
      respond('SearchKnowledge', async () => {
        const body = await readBody(request);
        const query = requireString(body, 'query');
        const k = optionalInteger(body, 'k', SEARCH_K) ?? SEARCH_K.fallback;
        const collection = optionalString(body, 'collection');
        const filter = parseFilter(body.filter);

        const results = await getKnowledgeBase().search(query, collection, k, { filter });

        trackEvent('SearchKnowledge.Success', { k: String(k) }, { resultsCount: results.length });

        return {
          status: 200,
          jsonBody: { query, results, total: results.length },
        };
      }),

    addKnowledge: (request) =>
      respond('AddKnowledge', async () => {
        const body = await readBody(request);
        const content = requireString(body, 'content');
        const metadata = parseMetadata(body.metadata);
        const path = optionalString(body, 'path') ?? defaultDocumentPath(content);
        const collection = optionalString(body, 'collection');
        const chunkSize = optionalInteger(body, 'chunkSize', { min: 1, max: Number.MAX_SAFE_INTEGER });
        const overlap = optionalInteger(body, 'overlap', { min: 0, max: Number.MAX_SAFE_INTEGER });

        const report = await getKnowledgeBase().ingest(
          { path, text: content, metadata },
          collection,
          { chunkSize, overlap }
        );

        return {
          status: report.status === 'failed' ? 502 : 200,
          jsonBody: report,
        };
      }),

    queryWithContext: (request) =>
      respond('QueryWithContext', async () => {
        const body = await readBody(request);
        const query = requireString(body, 'query');
        const k = optionalInteger(body, 'context_k', CONTEXT_K) ?? CONTEXT_K.fallback;
        const collection = optionalString(body, 'collection');

        const result = await getKnowledgeBase().queryWithContext(query, collection, k);

        return { status: 200, jsonBody: result };
      }),

    updateKnowledgeIndex: (request) =>
      respond('UpdateKnowledgeIndex', async () => {
        const body = await readBody(request);
        const collection = optionalString(body, 'collection');
        const mode = body.force_rebuild === true ? 'full' : 'incremental';

        const description = await getKnowledgeBase().rebuildIndex(collection, mode);

        return {
          status: 200,
          jsonBody: { mode, collection: description },
        };
      }),

    listKnowledgeCollections: () =>
      respond('ListKnowledgeCollections', async () => {
        const collections = await getKnowledgeBase().listCollections();
        return {
          status: 200,
          jsonBody: { collections, total: collections.length },
        };
      }),

    collectionStats: (request) =>
      respond('CollectionStats', async () => {
        const name = request.params.collection;
        if (!name) {
          throw new ConfigurationError('Collection name is required');
        }
        const description = await getKnowledgeBase().describeCollection(name);
        return { status: 200, jsonBody: description };
      }),

    researchPrompt: () =>
      respond('ResearchPrompt', async () => ({
        status: 200,
        jsonBody: {
          name: RESEARCH_PROMPT_NAME,
          variables: RESEARCH_PROMPT_VARIABLES,
          template: RESEARCH_PROMPT_TEMPLATE,
        },
      })),

    health: () =>
      respond('Health', async () => {
        const report = await getKnowledgeBase().health();
        return {
          status: report.status === 'healthy' ? 200 : 503,
          jsonBody: report,
        };
      }),
  };
}
