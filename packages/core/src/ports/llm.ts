import { type ChatMessage } from '../entities/message';
import { type InferenceOutcome } from '../entities/inference';

/**
 * One-request-at-a-time streaming chat client bound to a single endpoint.
 * Implementations resolve every transport, protocol and stream failure into
 * an `{ status: 'error' }` outcome instead of rejecting.
 */
export interface ChatStreamClient {
  readonly baseUrl: string;
  readonly model: string;

  send(messages: readonly ChatMessage[]): Promise<InferenceOutcome>;
  chat(systemPrompt: string, userMessage: string): Promise<InferenceOutcome>;
  close(): Promise<void>;
}
