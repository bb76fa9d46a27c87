// Technical Documentation Search Tool
// Hybrid search over standards, equipment passports, manuals and regulations

import { z } from 'zod';
import type { ToolDefinition } from './types.js';
import { readArray, readNumber } from './spec.js';

const input = z.object({
  question: z.string().trim().min(1, 'question is required'),
});

export const docsSearchTool: ToolDefinition<z.infer<typeof input>> = {
  name: 'enterprise_docs_search',
  description:
    'Search the plant technical documentation (hybrid keyword and semantic search). ' +
    'Use for questions about standards, equipment passports, operating instructions, ' +
    'business correspondence and regulations.',
  endpoint: '/skills/docs-search',
  modelClass: 'llm',
  parameters: [
    {
      name: 'question',
      type: 'string',
      description: 'Question to search the documents for',
      required: true,
    },
  ],
  input,
  toRequest: ({ question }) => ({ body: { question } }),
  summarize: data => {
    const count = readNumber(data, 'chunks_found') ?? readArray(data, 'sources')?.length ?? 0;
    return `Found ${count} documentation fragments`;
  },
};
