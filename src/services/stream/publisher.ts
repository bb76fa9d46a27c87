// Stream Publisher
// Ordered, append-only event sequence for one turn with exactly one terminal event

import type { Logger } from '../../logger.js';
import { createBoundedChannel, type BoundedChannel } from './channel.js';
import { isTerminalEvent, streamEvents, type StreamEvent, type TerminalEvent } from './events.js';

export const DEFAULT_STREAM_BUFFER_SIZE = 64;

/** tool_done summaries are capped so events stay small */
export const MAX_SUMMARY_LENGTH = 200;

export class StreamPublisher {
  private channel: BoundedChannel<StreamEvent>;
  private terminal: TerminalEvent | null = null;
  private count = 0;

  constructor(private log: Logger, capacity: number = DEFAULT_STREAM_BUFFER_SIZE) {
    this.channel = createBoundedChannel<StreamEvent>(capacity);
  }

  /**
   * Appends an event. After a terminal event nothing more is accepted; the
   * channel closes so the subscriber finishes once it has drained.
   */
  async publish(event: StreamEvent): Promise<boolean> {
    if (this.terminal) {
      this.log.warn({ type: event.type, terminal: this.terminal.type }, 'Dropping event published after terminal event');
      return false;
    }

    if (isTerminalEvent(event)) {
      this.terminal = event;
    }

    const accepted = await this.channel.push(event);
    if (accepted) this.count++;

    if (this.terminal) {
      this.channel.close();
    }

    return accepted;
  }

  status(text: string): Promise<boolean> {
    return this.publish(streamEvents.status(text));
  }

  toolStart(tool: string, input: Record<string, unknown>): Promise<boolean> {
    return this.publish(streamEvents.toolStart(tool, input));
  }

  toolDone(tool: string, summary: string): Promise<boolean> {
    return this.publish(streamEvents.toolDone(tool, truncateSummary(summary)));
  }

  token(content: string): Promise<boolean> {
    if (!content) return Promise.resolve(true);
    return this.publish(streamEvents.token(content));
  }

  done(messageId: string): Promise<boolean> {
    return this.publish(streamEvents.done(messageId));
  }

  error(detail: string): Promise<boolean> {
    return this.publish(streamEvents.error(detail));
  }

  /** The subscriber disconnected; later events are discarded. */
  cancel(): void {
    this.channel.cancel();
  }

  get cancelled(): boolean {
    return this.channel.isCancelled();
  }

  get terminated(): boolean {
    return this.terminal !== null;
  }

  get published(): number {
    return this.count;
  }

  events(): AsyncIterable<StreamEvent> {
    return this.channel.iterator();
  }
}

export function truncateSummary(summary: string, max: number = MAX_SUMMARY_LENGTH): string {
  const singleLine = summary.replace(/\s+/g, ' ').trim();
  return singleLine.length > max ? `${singleLine.slice(0, max - 3)}...` : singleLine;
}
