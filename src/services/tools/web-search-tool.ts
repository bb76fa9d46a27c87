// Web Search Tool
// Serper-compatible search API; registered only when an API key is configured

import { z } from 'zod';
import type { ToolDefinition } from './types.js';
import { readArray } from './spec.js';

export const WEB_SEARCH_RESULT_COUNT = 8;

const input = z.object({
  query: z.string().trim().min(1, 'query is required'),
});

export function createWebSearchTool(url: string, apiKey: string): ToolDefinition<z.infer<typeof input>> {
  return {
    name: 'web_search',
    description:
      'Search the web for current information: news, exchange rates, manufacturer documentation, ' +
      'published standards and similar. Use when the answer is not in plant data.',
    endpoint: url,
    modelClass: 'none',
    parameters: [
      {
        name: 'query',
        type: 'string',
        description: 'The search query',
        required: true,
      },
    ],
    input,
    toRequest: ({ query }) => ({
      body: { q: query, num: WEB_SEARCH_RESULT_COUNT },
      headers: { 'X-API-KEY': apiKey },
    }),
    summarize: data => {
      const count = Math.min(readArray(data, 'organic')?.length ?? 0, WEB_SEARCH_RESULT_COUNT);
      return `Found ${count} web results`;
    },
  };
}
