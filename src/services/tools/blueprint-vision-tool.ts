// Blueprint Vision Tool
// Reads an uploaded drawing with the vision model

import { z } from 'zod';
import type { ToolDefinition } from './types.js';
import { firstLine, readString } from './spec.js';

export const DEFAULT_BLUEPRINT_QUESTION = 'Perform a full analysis of the drawing';

const input = z.object({
  image_path: z.string().trim().min(1, 'image_path is required'),
  question: z.string().trim().min(1).optional(),
});

export const blueprintVisionTool: ToolDefinition<z.infer<typeof input>> = {
  name: 'blueprint_vision',
  description:
    'Analyse a drawing with the multimodal model. Use when the user uploaded a drawing and wants ' +
    'its number, dimensions, tolerances, surface roughness, material or designations.',
  endpoint: '/skills/blueprint-vision',
  modelClass: 'vlm',
  parameters: [
    {
      name: 'image_path',
      type: 'string',
      description: 'Path to the drawing file, for example /app/documents/blueprints/detail.png',
      required: true,
    },
    {
      name: 'question',
      type: 'string',
      description: 'What to find out from the drawing',
      required: false,
      default: DEFAULT_BLUEPRINT_QUESTION,
    },
  ],
  input,
  toRequest: ({ image_path, question }) => ({
    body: { image_path, question: question ?? DEFAULT_BLUEPRINT_QUESTION },
  }),
  summarize: data => {
    const answer = firstLine(readString(data, 'answer'));
    return answer ? `Drawing analysed: ${answer}` : 'Drawing analysed';
  },
};
