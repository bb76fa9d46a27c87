import type { FastifyInstance } from 'fastify';
import type { ResidencyScheduler } from '../services/gpu/residency-scheduler.js';
import type { ModelAssignments } from '../services/gpu/types.js';
import type { ToolRegistry } from '../services/tools/registry.js';

export const API_VERSION = '1.0.0';

export interface SystemRoutesOptions {
  registry: ToolRegistry;
  scheduler: Pick<ResidencyScheduler, 'snapshot'>;
  assignments: ModelAssignments;
}

export async function systemRoutes(server: FastifyInstance, options: SystemRoutesOptions) {
  const { registry, scheduler, assignments } = options;

  server.get('/health', async () => {
    return {
      status: 'ok',
      timestamp: new Date().toISOString(),
      version: API_VERSION,
    };
  });

  // Tools the model may call, in registration order
  server.get('/tools', async () => {
    return {
      tools: registry.list().map(spec => ({
        name: spec.name,
        description: spec.description,
        model_class: spec.modelClass,
        timeout_ms: spec.timeoutMs,
      })),
    };
  });

  server.get('/system/gpu', async () => {
    return {
      slots: scheduler.snapshot(),
      assignments,
    };
  });
}
