// Norm Control Tool
// Checks a drawing or a process plan against standards

import { z } from 'zod';
import type { ToolDefinition } from './types.js';

const input = z.object({
  document_type: z.enum(['drawing', 'tech_process']),
  identifier: z.string().trim().min(1).optional(),
  image_path: z.string().trim().min(1).optional(),
});

export const normControlTool: ToolDefinition<z.infer<typeof input>> = {
  name: 'norm_control',
  description:
    'Check a drawing or a process plan for compliance with standards (norm control). ' +
    'Use when the user asks for norm control or a check of document formatting.',
  endpoint: '/skills/norm-control',
  modelClass: 'vlm',
  parameters: [
    {
      name: 'document_type',
      type: 'string',
      description: 'drawing for a drawing, tech_process for a process plan',
      required: true,
      enum: ['drawing', 'tech_process'],
    },
    {
      name: 'identifier',
      type: 'string',
      description: 'Drawing number or process plan number, for example TP-001',
      required: false,
    },
    {
      name: 'image_path',
      type: 'string',
      description: 'Path to the drawing file (drawings only)',
      required: false,
    },
  ],
  input,
  toRequest: ({ document_type, identifier, image_path }) => ({
    body: { document_type, identifier: identifier ?? null, image_path: image_path ?? null },
  }),
  summarize: data => (data.passed === true ? 'Norm control passed' : 'Norm control failed'),
};
