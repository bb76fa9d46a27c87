// Stream module - main exports

export { StreamPublisher, truncateSummary, DEFAULT_STREAM_BUFFER_SIZE, MAX_SUMMARY_LENGTH } from './publisher.js';
export { createBoundedChannel } from './channel.js';
export type { BoundedChannel } from './channel.js';
export { formatSseFrame, isTerminalEvent, streamEvents } from './events.js';
export type { StreamEvent, StreamEventType, TerminalEvent } from './events.js';
