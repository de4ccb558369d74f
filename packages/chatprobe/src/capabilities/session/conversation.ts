import {
  type ChatMessage,
  type SessionConfig,
  chatMessage
} from '@chatprobe/core';

/**
 * Bounded multi-turn history. Holds at most `2 * maxTurns` messages, oldest
 * first; the system prompt is not stored and is prepended per request.
 *
 * With `eviction: 'message'` the oldest message goes first, which can leave
 * an assistant reply at the front without its user turn. `eviction: 'turn'`
 * drops such an orphaned reply along with it.
 */
export class ConversationSession {
  private readonly history: ChatMessage[] = [];
  private readonly config: SessionConfig;
  /** Messages evicted by the most recent append, kept so a rollback can restore them. */
  private lastEvicted: ChatMessage[] = [];

  public constructor(config: SessionConfig) {
    this.config = config;
  }

  public get capacity(): number {
    return this.config.maxTurns * 2;
  }

  public get messages(): readonly ChatMessage[] {
    return [...this.history];
  }

  public get length(): number {
    return this.history.length;
  }

  public get turnCount(): number {
    return Math.floor(this.history.length / 2);
  }

  public appendUser(text: string): void {
    this.append(chatMessage('user', text));
  }

  public appendAssistant(text: string): void {
    this.append(chatMessage('assistant', text));
  }

  public buildRequestPayload(systemPrompt: string): ChatMessage[] {
    return [chatMessage('system', systemPrompt), ...this.history];
  }

  public reset(): void {
    this.history.length = 0;
    this.lastEvicted = [];
  }

  /**
   * Removes the newest message when it is a user turn and puts back whatever
   * its append evicted. Returns the removed message, or null (no change) when
   * the newest message is not a user turn.
   */
  public rollbackLastUserTurn(): ChatMessage | null {
    const last = this.history[this.history.length - 1];
    if (!last || last.role !== 'user') {
      return null;
    }

    this.history.pop();
    this.history.unshift(...this.lastEvicted);
    this.lastEvicted = [];
    return last;
  }

  private append(message: ChatMessage): void {
    this.history.push(message);
    this.lastEvicted = this.trim();
  }

  private trim(): ChatMessage[] {
    const evicted: ChatMessage[] = [];

    while (this.history.length > this.capacity) {
      const oldest = this.history.shift();
      if (oldest) evicted.push(oldest);

      const next = this.history[0];
      if (this.config.eviction === 'turn' && next?.role === 'assistant') {
        this.history.shift();
        evicted.push(next);
      }
    }

    return evicted;
  }
}
