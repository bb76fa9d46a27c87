// Session routes
// Session history plus the streamed agent turn
import { once } from 'node:events';
import type { FastifyInstance } from 'fastify';
import { z } from 'zod';
import type { AgentLoop } from '../services/orchestrator/agent-loop.js';
import { toWireMessage, toWireSession, type SessionStore } from '../services/sessions/index.js';
import { StreamPublisher, formatSseFrame } from '../services/stream/index.js';
import { AppError, formatErrorResponse } from '../utils/errors.js';

const CreateSessionSchema = z.object({
  title: z.string().min(1).max(255).optional(),
});

const TurnRequestSchema = z.object({
  content: z.string().trim().min(1).max(32_000),
});

export const SSE_HEADERS = {
  'Content-Type': 'text/event-stream',
  'Cache-Control': 'no-cache',
  Connection: 'keep-alive',
  'X-Accel-Buffering': 'no',
} as const;

export interface SessionRoutesOptions {
  store: SessionStore;
  loop: Pick<AgentLoop, 'runTurn'>;
  streamBufferSize: number;
}

export async function sessionRoutes(server: FastifyInstance, options: SessionRoutesOptions) {
  const { store, loop, streamBufferSize } = options;
  // One in-flight turn per session
  const activeTurns = new Set<string>();

  // POST /v1/sessions - Create a session
  server.post('/sessions', async (request, reply) => {
    const parsed = CreateSessionSchema.safeParse(request.body ?? {});
    if (!parsed.success) {
      const error = AppError.validationError('Invalid request body', parsed.error.issues);
      return reply.code(error.statusCode).send(formatErrorResponse(error, true));
    }

    const session = await store.createSession(parsed.data.title);
    return reply.code(201).send({ session: toWireSession(session) });
  });

  // GET /v1/sessions/:id/messages - Session history in creation order
  server.get<{ Params: { id: string } }>('/sessions/:id/messages', async (request, reply) => {
    const session = await store.getSession(request.params.id);
    if (!session) {
      const error = AppError.notFound('Session not found');
      return reply.code(error.statusCode).send(formatErrorResponse(error));
    }

    const messages = await store.listMessages(session.id);
    return { messages: messages.map(toWireMessage) };
  });

  // POST /v1/sessions/:id/message - Run one agent turn, streamed as SSE
  server.post<{ Params: { id: string } }>('/sessions/:id/message', async (request, reply) => {
    const parsed = TurnRequestSchema.safeParse(request.body);
    if (!parsed.success) {
      const error = AppError.validationError('Invalid request body', parsed.error.issues);
      return reply.code(error.statusCode).send(formatErrorResponse(error, true));
    }

    const sessionId = request.params.id;
    const session = await store.getSession(sessionId);
    if (!session) {
      const error = AppError.notFound('Session not found');
      return reply.code(error.statusCode).send(formatErrorResponse(error));
    }

    if (activeTurns.has(sessionId)) {
      const error = AppError.conflict('A turn is already running for this session');
      return reply.code(error.statusCode).send(formatErrorResponse(error));
    }
    activeTurns.add(sessionId);

    const log = request.log.child({ session: sessionId });
    const controller = new AbortController();
    const publisher = new StreamPublisher(log, streamBufferSize);
    const raw = reply.raw;

    const onClose = () => {
      if (!raw.writableFinished) {
        log.info('Client disconnected; cancelling turn');
        controller.abort();
        publisher.cancel();
      }
    };

    reply.hijack();
    raw.writeHead(200, SSE_HEADERS);
    raw.on('close', onClose);

    const turn = loop.runTurn(sessionId, parsed.data.content, publisher, controller.signal);

    try {
      for await (const event of publisher.events()) {
        if (!raw.write(formatSseFrame(event))) {
          await once(raw, 'drain', { signal: controller.signal });
        }
      }
    } catch (err) {
      if (!controller.signal.aborted) {
        log.error({ err }, 'Failed to write SSE event');
        controller.abort();
        publisher.cancel();
      }
    } finally {
      await turn;
      raw.off('close', onClose);
      activeTurns.delete(sessionId);
      if (!raw.writableEnded) {
        raw.end();
      }
    }
  });
}
