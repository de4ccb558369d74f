import { performance } from 'node:perf_hooks';
import { Agent, type Dispatcher, request } from 'undici';
import {
    type ChatClientConfig,
    type ChatMessage,
    type ChatStreamClient,
    type InferenceError,
    type InferenceOutcome,
    type Logger,
    ProtocolError,
    chatMessage,
    decodeChunk,
    extractString,
    tokensPerSecond
} from '@chatprobe/core';

import { PinoLogger } from '../logger/pino';
import { toStreamReadError, toTransportError } from './errors';
import { readLines } from './lines';

type ResponseBody = Dispatcher.ResponseData['body'];

const ERROR_DETAIL_MAX_CHARS = 200;

export interface OllamaChatClientOptions {
    config: ChatClientConfig;
    logger?: Logger;
    /** Monotonic clock in milliseconds. */
    clock?: () => number;
    dispatcher?: Dispatcher;
}

/**
 * Streaming client for Ollama's `/api/chat` endpoint.
 *
 * Reads the NDJSON response lazily, stamps the first non-empty content
 * fragment as time-to-first-token, and stops at the `done: true` chunk.
 * Every failure comes back as an error outcome; nothing is retried.
 */
export class OllamaChatClient implements ChatStreamClient {
    private readonly config: ChatClientConfig;
    private readonly logger: Logger;
    private readonly clock: () => number;
    private readonly dispatcher: Dispatcher;
    private readonly ownsDispatcher: boolean;

    public constructor(options: OllamaChatClientOptions) {
        this.config = options.config;
        this.logger = (options.logger ?? new PinoLogger({ level: 'silent' })).child({ component: 'ollama-client' });
        this.clock = options.clock ?? (() => performance.now());
        this.ownsDispatcher = options.dispatcher === undefined;
        this.dispatcher = options.dispatcher ?? new Agent({
            connect: { timeout: options.config.connectTimeoutMs },
            headersTimeout: options.config.readTimeoutMs,
            bodyTimeout: options.config.readTimeoutMs
        });
    }

    public get baseUrl(): string {
        return this.config.baseUrl;
    }

    public get model(): string {
        return this.config.model;
    }

    public async chat(systemPrompt: string, userMessage: string): Promise<InferenceOutcome> {
        return this.send([chatMessage('system', systemPrompt), chatMessage('user', userMessage)]);
    }

    public async send(messages: readonly ChatMessage[]): Promise<InferenceOutcome> {
        const startedAt = this.clock();
        let firstTokenAt: number | null = null;

        const fail = (error: InferenceError): InferenceOutcome => {
            const elapsedMs = this.clock() - startedAt;
            this.logger.warn({ kind: error.kind, elapsedMs, err: error.message }, 'chat request failed');
            return {
                status: 'error',
                error,
                elapsedMs,
                timeToFirstTokenMs: firstTokenAt === null ? elapsedMs : firstTokenAt - startedAt
            };
        };

        let response: Dispatcher.ResponseData;
        try {
            response = await request(`${this.config.baseUrl}/api/chat`, {
                method: 'POST',
                headers: { 'content-type': 'application/json; charset=UTF-8' },
                body: this.serialize(messages),
                dispatcher: this.dispatcher
            });
        } catch (error) {
            return fail(toTransportError(error, this.config));
        }

        const { statusCode, body } = response;
        try {
            if (statusCode < 200 || statusCode >= 300) {
                return fail(new ProtocolError(statusCode, await this.readErrorDetail(body)));
            }

            let text = '';
            let evalCount = 0;
            let evalDurationNs = 0;
            let chunkCount = 0;

            try {
                for await (const line of readLines(body)) {
                    const event = decodeChunk(line, this.config.chunkDecoding);
                    if (event.type === 'unknown') continue;

                    chunkCount += 1;
                    if (event.text) {
                        if (firstTokenAt === null) firstTokenAt = this.clock();
                        text += event.text;
                    }

                    if (event.type === 'done') {
                        evalCount = event.evalCount;
                        evalDurationNs = event.evalDurationNs;
                        break;
                    }
                }
            } catch (error) {
                return fail(toStreamReadError(error, this.config.readTimeoutMs));
            }

            const totalMs = this.clock() - startedAt;
            const timeToFirstTokenMs = firstTokenAt === null ? totalMs : firstTokenAt - startedAt;

            this.logger.debug({ statusCode, chunkCount, timeToFirstTokenMs, totalMs, evalCount }, 'chat stream complete');

            return {
                status: 'ok',
                result: {
                    text: text.trim(),
                    timeToFirstTokenMs,
                    totalMs,
                    evalTokenCount: evalCount,
                    tokensPerSecond: tokensPerSecond(evalCount, evalDurationNs)
                }
            };
        } finally {
            if (!body.destroyed) body.destroy();
        }
    }

    public async close(): Promise<void> {
        if (this.ownsDispatcher) {
            await this.dispatcher.close();
        }
    }

    private serialize(messages: readonly ChatMessage[]): string {
        return JSON.stringify({
            model: this.config.model,
            messages: messages.map(({ role, content }) => ({ role, content })),
            stream: true,
            options: { num_predict: this.config.numPredict }
        });
    }

    private async readErrorDetail(body: ResponseBody): Promise<string | null> {
        let raw: string;
        try {
            raw = await body.text();
        } catch (error) {
            this.logger.debug({ err: error instanceof Error ? error.message : String(error) }, 'could not read error body');
            return null;
        }

        const detail = extractString(raw, 'error') ?? raw.trim();
        return detail ? detail.slice(0, ERROR_DETAIL_MAX_CHARS) : null;
    }
}
