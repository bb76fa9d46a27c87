// Shopfloor Copilot API - agentic retrieval orchestrator
// Port: 8000 (localhost only by default)

// Load environment variables from .env file
import 'dotenv/config';

import Fastify from 'fastify';
import cors from '@fastify/cors';
import { env, logConfiguration } from './env.js';
import { loggerOptions } from './logger.js';
import { getProvider } from './providers/index.js';
import { assignmentsFromEnv, createResidencyScheduler } from './services/gpu/index.js';
import { HttpToolTransport, ToolDispatcher, initializeTools } from './services/tools/index.js';
import { AgentLoop } from './services/orchestrator/index.js';
import { InMemorySessionStore } from './services/sessions/index.js';
import { sessionRoutes } from './routes/sessions.js';
import { systemRoutes } from './routes/system.js';

const PORT = env.PORT;
const HOST = env.HOST;

const server = Fastify({
  logger: loggerOptions(env),
});

await server.register(cors, {
  origin: env.CORS_ORIGINS,
  credentials: true,
});

// Initialize tools
const registry = initializeTools(env);

const scheduler = createResidencyScheduler(env, server.log);
const dispatcher = new ToolDispatcher(scheduler, new HttpToolTransport(), server.log.child({ module: 'tools' }));
const store = new InMemorySessionStore();

const loop = new AgentLoop(
  {
    provider: getProvider(env.LLM_PROVIDER, env),
    registry,
    dispatcher,
    scheduler,
    store,
    logger: server.log.child({ module: 'agent' }),
  },
  {
    model: env.LLM_MODEL,
    maxIterations: env.CHAT_MAX_TOOL_ITERATIONS,
    tokenChunkSize: env.TOKEN_CHUNK_SIZE,
    // A remote OpenAI-compatible backend does not live on our GPU slot
    holdLlmResidency: env.LLM_PROVIDER === 'ollama',
  },
);

// Legacy redirect
server.get('/health', async (request, reply) => {
  return reply.code(301).redirect('/v1/health');
});

// API routes
await server.register(systemRoutes, { prefix: '/v1', registry, scheduler, assignments: assignmentsFromEnv(env) });
await server.register(sessionRoutes, { prefix: '/v1', store, loop, streamBufferSize: env.STREAM_BUFFER_SIZE });

// Start server
try {
  await server.listen({ port: PORT, host: HOST });
  console.log(`Shopfloor Copilot API listening on http://${HOST}:${PORT}`);
  console.log(`Health: http://${HOST}:${PORT}/v1/health`);
  console.log('');
  logConfiguration();
} catch (err) {
  server.log.error(err);
  process.exit(1);
}

if (env.GPU_WARMUP_ENABLED && env.LLM_PROVIDER === 'ollama') {
  scheduler.warmUp('llm').catch(err => {
    server.log.warn({ err }, 'LLM warm-up failed; the model will load on first request');
  });
}
