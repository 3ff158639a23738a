/**
 * Append-only transcript of one interactive session.
 */

export type ChatRole = 'user' | 'assistant';

export interface ChatMessage {
  readonly role: ChatRole;
  readonly content: string;
}

export class ConversationSession {
  private readonly log: ChatMessage[] = [];

  append(role: ChatRole, content: string): ChatMessage {
    const message: ChatMessage = Object.freeze({ role, content });
    this.log.push(message);
    return message;
  }

  /** Copy of the transcript in chronological order. */
  messages(): readonly ChatMessage[] {
    return [...this.log];
  }

  last(): ChatMessage | undefined {
    return this.log[this.log.length - 1];
  }

  get size(): number {
    return this.log.length;
  }

  clear(): void {
    this.log.length = 0;
  }
}
