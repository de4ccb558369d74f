import {
    type ChatMessage,
    type ChatStreamClient,
    type InferenceOutcome,
    chatMessage
} from '@chatprobe/core';

export const FAKE_OK_OUTCOME: InferenceOutcome = {
    status: 'ok',
    result: {
        text: 'Fake response',
        timeToFirstTokenMs: 5,
        totalMs: 10,
        evalTokenCount: 2,
        tokensPerSecond: 200
    }
};

/**
 * Scripted client: hands out queued outcomes in order, cycling when the
 * queue is exhausted, and records every message list it was sent.
 */
export class FakeChatStreamClient implements ChatStreamClient {
    public readonly baseUrl: string;
    public readonly model: string;
    public readonly requests: ChatMessage[][] = [];
    private outcomes: InferenceOutcome[];
    private callCount = 0;

    public constructor(outcomes?: InferenceOutcome[], opts: { baseUrl?: string; model?: string } = {}) {
        this.outcomes = outcomes ?? [FAKE_OK_OUTCOME];
        this.baseUrl = opts.baseUrl ?? 'http://fake.local:11434';
        this.model = opts.model ?? 'fake-model';
    }

    public setOutcomes(outcomes: InferenceOutcome[]): void {
        this.outcomes = outcomes;
        this.callCount = 0;
    }

    public async chat(systemPrompt: string, userMessage: string): Promise<InferenceOutcome> {
        return this.send([chatMessage('system', systemPrompt), chatMessage('user', userMessage)]);
    }

    public async send(messages: readonly ChatMessage[]): Promise<InferenceOutcome> {
        const outcome = this.outcomes[this.callCount % this.outcomes.length];
        if (!outcome) {
            throw new Error('FakeChatStreamClient: No outcome available');
        }
        this.callCount++;
        this.requests.push([...messages]);
        return outcome;
    }

    public async close(): Promise<void> {
        // nothing to release
    }
}
