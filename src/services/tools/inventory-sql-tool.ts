// Warehouse Inventory Tool
// Stock levels of tools, metals and polymers, catalog and material properties

import { z } from 'zod';
import type { ToolDefinition } from './types.js';
import { firstLine, plural, readNumber, readString } from './spec.js';

const input = z.object({
  question: z.string().trim().min(1, 'question is required'),
});

export const inventorySqlTool: ToolDefinition<z.infer<typeof input>> = {
  name: 'inventory_sql_search',
  description:
    'Query the warehouse database. Use for questions about stock of cutting tools, metals and ' +
    'polymers, the item catalog, material properties and cutting tool characteristics.',
  endpoint: '/skills/inventory-sql',
  modelClass: 'llm',
  parameters: [
    {
      name: 'question',
      type: 'string',
      description: 'Question about the warehouse or the item catalog',
      required: true,
    },
  ],
  input,
  toRequest: ({ question }) => ({ body: { question } }),
  summarize: data => {
    const rows = plural(readNumber(data, 'rows_count') ?? 0, 'row', 'rows');
    const answer = firstLine(readString(data, 'answer'));
    return answer ? `${answer} (${rows})` : `Fetched ${rows} from the warehouse`;
  },
};
