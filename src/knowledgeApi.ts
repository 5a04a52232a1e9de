/**
 * HTTP endpoints for the knowledge base
 */

import { app, HttpRequest, HttpResponseInit, InvocationContext } from '@azure/functions';
import { createKnowledgeHandlers, KnowledgeHandler } from './functions/knowledgeHandlers';
import { getKnowledgeBase } from './lib/rag/factory';
import { setTag, wrapAzureFunction } from './lib/utils/sentry';
import * as logger from './lib/utils/logger';

const handlers = createKnowledgeHandlers(getKnowledgeBase);

/**
 * Adapts a knowledge handler to the Functions signature with Sentry instrumentation
 */
function bind(name: string, handler: KnowledgeHandler) {
  return wrapAzureFunction(
    name,
    async (request: HttpRequest, context: InvocationContext): Promise<HttpResponseInit> => {
      setTag('invocationId', context.invocationId);
      logger.debug('Knowledge request received', { function: name, url: request.url });
      return handler(request);
    }
  );
}

app.http('searchKnowledge', {
  methods: ['POST'],
  authLevel: 'function',
  route: 'search_knowledge',
  handler: bind('searchKnowledge', handlers.searchKnowledge),
});

app.http('addKnowledge', {
  methods: ['POST'],
  authLevel: 'function',
  route: 'add_knowledge',
  handler: bind('addKnowledge', handlers.addKnowledge),
});

app.http('queryWithContext', {
  methods: ['POST'],
  authLevel: 'function',
  route: 'query_with_context',
  handler: bind('queryWithContext', handlers.queryWithContext),
});

app.http('updateKnowledgeIndex', {
  methods: ['POST'],
  authLevel: 'function',
  route: 'update_knowledge_index',
  handler: bind('updateKnowledgeIndex', handlers.updateKnowledgeIndex),
});

app.http('listKnowledgeCollections', {
  methods: ['GET'],
  authLevel: 'function',
  route: 'list_knowledge_collections',
  handler: bind('listKnowledgeCollections', handlers.listKnowledgeCollections),
});

app.http('collectionStats', {
  methods: ['GET'],
  authLevel: 'function',
  route: 'knowledge/{collection}/stats',
  handler: bind('collectionStats', handlers.collectionStats),
});

app.http('researchPrompt', {
  methods: ['GET'],
  authLevel: 'function',
  route: 'prompts/rag_research_prompt',
  handler: bind('researchPrompt', handlers.researchPrompt),
});

app.http('health', {
  methods: ['GET'],
  authLevel: 'anonymous',
  route: 'health',
  handler: bind('health', handlers.health),
});
