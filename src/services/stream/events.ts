// Stream events sent to the chat client during one turn
// Key order is part of the wire contract: constructors build objects in wire order

export type StreamEvent =
  | { type: 'status'; text: string }
  | { type: 'tool_start'; tool: string; input: Record<string, unknown> }
  | { type: 'tool_done'; tool: string; summary: string }
  | { type: 'token'; content: string }
  | { type: 'done'; message_id: string }
  | { type: 'error'; detail: string };

export type StreamEventType = StreamEvent['type'];

export type TerminalEvent = Extract<StreamEvent, { type: 'done' | 'error' }>;

export function isTerminalEvent(event: StreamEvent): event is TerminalEvent {
  return event.type === 'done' || event.type === 'error';
}

export const streamEvents = {
  status: (text: string): StreamEvent => ({ type: 'status', text }),
  toolStart: (tool: string, input: Record<string, unknown>): StreamEvent => ({ type: 'tool_start', tool, input }),
  toolDone: (tool: string, summary: string): StreamEvent => ({ type: 'tool_done', tool, summary }),
  token: (content: string): StreamEvent => ({ type: 'token', content }),
  done: (messageId: string): StreamEvent => ({ type: 'done', message_id: messageId }),
  error: (detail: string): StreamEvent => ({ type: 'error', detail }),
};

/** Serializes one event as an SSE frame: `data: <json>\n\n`. */
export function formatSseFrame(event: StreamEvent): string {
  return `data: ${JSON.stringify(event)}\n\n`;
}
