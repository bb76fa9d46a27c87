// Session and message model
// Sessions are owned by an external service; the orchestrator reads history and appends turns

export interface Session {
  id: string;
  title: string;
  createdAt: Date;
  updatedAt: Date;
}

interface MessageBase {
  id: string;
  sessionId: string;
  createdAt: Date;
}

export interface UserMessage extends MessageBase {
  role: 'user';
  content: string;
}

export interface AssistantMessage extends MessageBase {
  role: 'assistant';
  content: string;
}

/** A tool message always names its tool; content holds the serialized result. */
export interface ToolMessage extends MessageBase {
  role: 'tool';
  content: string;
  toolName: string;
  toolInput: Record<string, unknown>;
  toolResult: Record<string, unknown>;
}

export type Message = UserMessage | AssistantMessage | ToolMessage;

export type MessageRole = Message['role'];

type WithoutStored<T> = T extends Message ? Omit<T, 'id' | 'sessionId' | 'createdAt'> : never;

export type NewMessage = WithoutStored<Message>;

export interface SessionStore {
  createSession(title?: string): Promise<Session>;
  getSession(id: string): Promise<Session | null>;
  /** Messages in creation order */
  listMessages(sessionId: string): Promise<Message[]>;
  appendMessage(sessionId: string, message: NewMessage): Promise<Message>;
}

export interface WireMessage {
  id: string;
  session_id: string;
  role: MessageRole;
  content: string;
  tool_name: string | null;
  tool_input: Record<string, unknown> | null;
  tool_result: Record<string, unknown> | null;
  created_at: string;
}

export function toWireMessage(message: Message): WireMessage {
  const tool = message.role === 'tool' ? message : null;
  return {
    id: message.id,
    session_id: message.sessionId,
    role: message.role,
    content: message.content,
    tool_name: tool?.toolName ?? null,
    tool_input: tool?.toolInput ?? null,
    tool_result: tool?.toolResult ?? null,
    created_at: message.createdAt.toISOString(),
  };
}

export interface WireSession {
  id: string;
  title: string;
  created_at: string;
  updated_at: string;
}

export function toWireSession(session: Session): WireSession {
  return {
    id: session.id,
    title: session.title,
    created_at: session.createdAt.toISOString(),
    updated_at: session.updatedAt.toISOString(),
  };
}
