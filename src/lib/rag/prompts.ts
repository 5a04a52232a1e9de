/**
 * Context assembly and prompt templates
 */

import { SearchResult } from '../../types/vector';

/**
 * Returned instead of an empty string when no results were retrieved
 */
export const EMPTY_CONTEXT_MARKER = '[No relevant context found]';

/**
 * Formats a similarity score as a percentage with one decimal
 */
export function formatRelevance(score: number): string {
  return `${(score * 100).toFixed(1)}%`;
}

/**
 * Formats search results into one source-annotated context block
 *
 * Entries keep the input order and are separated by a blank line:
 *
 *     [Source 1]
 *     Document: docs/setup.md
 *     Relevance: 87.5%
 *     <chunk content>
 */
export function assembleContext(results: SearchResult[]): string {
  if (results.length === 0) {
    return EMPTY_CONTEXT_MARKER;
  }

  return results
    .map((result, index) =>
      [
        `[Source ${index + 1}]`,
        `Document: ${result.chunk.documentPath}`,
        `Relevance: ${formatRelevance(result.score)}`,
        result.chunk.content,
      ].join('\n')
    )
    .join('\n\n');
}

/**
 * Answer prompt for a downstream generation step
 */
export function buildPrompt(query: string, context: string): string {
  return `Based on the following context, answer the query.

Context:
${context}

Query: ${query}

Answer:`;
}

export const RESEARCH_PROMPT_NAME = 'rag_research_prompt';

export const RESEARCH_PROMPT_VARIABLES = ['query', 'context'] as const;

export const RESEARCH_PROMPT_TEMPLATE = `You are a research assistant with access to a knowledge base.

When answering questions:
1. Use the retrieved context as your primary source
2. Combine information from several sources where they agree
3. Cite sources by their [Source n] marker
4. Say so when the context does not contain the answer

Knowledge Base Query: {query}

Retrieved Context:
{context}

Based on the above context, provide a comprehensive answer to: {query}

Answer:`;
