export type ChatRole = 'system' | 'user' | 'assistant';

export interface ChatMessage {
  readonly role    : ChatRole;
  readonly content : string;
}

export function chatMessage(role: ChatRole, content: string): ChatMessage {
  return Object.freeze({ role, content });
}
