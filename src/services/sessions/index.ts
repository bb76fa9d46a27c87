export { InMemorySessionStore, DEFAULT_SESSION_TITLE } from './store.js';
export { toWireMessage, toWireSession } from './types.js';
export type {
  AssistantMessage,
  Message,
  MessageRole,
  NewMessage,
  Session,
  SessionStore,
  ToolMessage,
  UserMessage,
  WireMessage,
  WireSession,
} from './types.js';
