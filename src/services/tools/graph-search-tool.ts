// Production Graph Search Tool
// Questions about parts, routings, operations, machines and tooling

import { z } from 'zod';
import type { ToolDefinition } from './types.js';
import { readNumber } from './spec.js';

const input = z.object({
  question: z.string().trim().min(1, 'question is required'),
});

export const graphSearchTool: ToolDefinition<z.infer<typeof input>> = {
  name: 'enterprise_graph_search',
  description:
    'Search the production knowledge graph. Use for questions about parts and their drawings, ' +
    'manufacturing routes, process plans and operations, machines, molds and tooling, ' +
    'and the links between parts and operations.',
  endpoint: '/skills/graph-search',
  modelClass: 'llm',
  parameters: [
    {
      name: 'question',
      type: 'string',
      description: 'Question about production data in natural language',
      required: true,
    },
  ],
  input,
  toRequest: ({ question }) => ({ body: { question } }),
  summarize: data => `Found ${readNumber(data, 'records_count') ?? 0} records in the production graph`,
};
