import type { ChatMessage, ChatRole, MessageTiming } from '../types';

export interface AppendOptions {
  meta?: MessageTiming;
  isError?: boolean;
  rawExchange?: ChatMessage['rawExchange'];
}

/**
 * Ordered, append-only message log for one interactive session.
 * The rendered history is the whole model input; nothing is truncated.
 */
export class ChatSession {
  private readonly log: ChatMessage[] = [];
  private nextId = 1;

  append(role: ChatRole, content: string, options: AppendOptions = {}): ChatMessage {
    const message: ChatMessage = {
      id: `${role}-${this.nextId++}`,
      role,
      content,
      timestamp: Date.now(),
      ...options,
    };
    this.log.push(message);
    return message;
  }

  get messages(): readonly ChatMessage[] {
    return this.log;
  }

  get length(): number {
    return this.log.length;
  }

  renderContext(): string {
    return this.log.map(m => `${m.role}: ${m.content}`).join('\n');
  }

  clear(): void {
    this.log.length = 0;
  }
}
