// In-process session store
// Stand-in for the external session service; keeps history in memory

import { randomUUID } from 'node:crypto';
import { AppError } from '../../utils/errors.js';
import type { Message, NewMessage, Session, SessionStore } from './types.js';

export const DEFAULT_SESSION_TITLE = 'New chat';

export class InMemorySessionStore implements SessionStore {
  private sessions = new Map<string, Session>();
  private messages = new Map<string, Message[]>();
  private lastTimestamp = 0;

  async createSession(title?: string): Promise<Session> {
    const now = this.now();
    const session: Session = {
      id: randomUUID(),
      title: title?.trim() || DEFAULT_SESSION_TITLE,
      createdAt: now,
      updatedAt: now,
    };
    this.sessions.set(session.id, session);
    this.messages.set(session.id, []);
    return { ...session };
  }

  async getSession(id: string): Promise<Session | null> {
    const session = this.sessions.get(id);
    return session ? { ...session } : null;
  }

  async listMessages(sessionId: string): Promise<Message[]> {
    return [...(this.messages.get(sessionId) ?? [])];
  }

  async appendMessage(sessionId: string, message: NewMessage): Promise<Message> {
    const session = this.sessions.get(sessionId);
    const history = this.messages.get(sessionId);
    if (!session || !history) {
      throw AppError.notFound('Session not found', { sessionId });
    }

    const createdAt = this.now();
    const stored: Message = { ...message, id: randomUUID(), sessionId, createdAt };
    history.push(stored);
    session.updatedAt = createdAt;
    return stored;
  }

  // Strictly increasing so creation order survives a sort by timestamp
  private now(): Date {
    const ms = Math.max(Date.now(), this.lastTimestamp + 1);
    this.lastTimestamp = ms;
    return new Date(ms);
  }
}
