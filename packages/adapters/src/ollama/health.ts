import { Agent, type Dispatcher, request } from 'undici';
import { z } from 'zod';
import { tokensPerSecond } from '@chatprobe/core';

const tagsSchema = z.object({
    models: z.array(z.object({
        name: z.string(),
        size: z.number().optional(),
        details: z.object({
            family: z.string().optional(),
            parameter_size: z.string().optional(),
            quantization_level: z.string().optional()
        }).optional()
    })).default([])
});

const generateSchema = z.object({
    eval_count: z.number().optional(),
    eval_duration: z.number().optional()
});

/** Throughput above which generation is most likely running on a GPU. */
export const GPU_THROUGHPUT_HINT_TOK_S = 20;

const TEST_GENERATION = { prompt: 'Say: test', numPredict: 5 } as const;

export interface ModelInfo {
    name: string;
    sizeBytes: number;
    family: string | null;
    parameterSize: string | null;
    quantization: string | null;
}

export type GenerationCheck =
    | { ok: true; tokensPerSecond: number; likelyGpu: boolean }
    | { ok: false; error: string };

export interface HealthReport {
    reachable: boolean;
    models: ModelInfo[];
    matched: ModelInfo | null;
    /** Short test generation against the matched model; null when nothing matched. */
    generation: GenerationCheck | null;
    error: string | null;
}

export interface CheckServerInput {
    baseUrl: string;
    model: string;
    timeoutMs?: number;
    /** Header and body bound for the test generation, which may load the model. */
    generationTimeoutMs?: number;
    dispatcher?: Dispatcher;
}

function errorMessage(error: unknown): string {
    return error instanceof Error ? error.message : String(error);
}

function parseJson(text: string): unknown {
    try {
        return JSON.parse(text);
    } catch {
        return null;
    }
}

/** Exact name match first, then the same family (the part before `:`). */
export function matchModel(models: readonly ModelInfo[], target: string): ModelInfo | null {
    const exact = models.find((m) => m.name === target);
    if (exact) return exact;

    const family = target.split(':')[0];
    return models.find((m) => m.name.split(':')[0] === family) ?? null;
}

async function getJson(url: string, dispatcher: Dispatcher): Promise<{ statusCode: number; payload: unknown }> {
    const { statusCode, body } = await request(url, { method: 'GET', dispatcher });
    try {
        const text = await body.text();
        if (statusCode < 200 || statusCode >= 300 || !text.trim().startsWith('{')) {
            return { statusCode, payload: null };
        }
        return { statusCode, payload: parseJson(text) };
    } finally {
        if (!body.destroyed) body.destroy();
    }
}

async function runTestGeneration(
    baseUrl: string,
    model: string,
    timeoutMs: number,
    dispatcher: Dispatcher
): Promise<GenerationCheck> {
    let statusCode: number;
    let text: string;
    try {
        const response = await request(`${baseUrl}/api/generate`, {
            method: 'POST',
            headers: { 'content-type': 'application/json; charset=UTF-8' },
            body: JSON.stringify({
                model,
                prompt: TEST_GENERATION.prompt,
                stream: false,
                options: { num_predict: TEST_GENERATION.numPredict }
            }),
            headersTimeout: timeoutMs,
            bodyTimeout: timeoutMs,
            dispatcher
        });
        statusCode = response.statusCode;
        text = await response.body.text();
    } catch (error) {
        return { ok: false, error: errorMessage(error) };
    }

    if (statusCode < 200 || statusCode >= 300) {
        return { ok: false, error: `HTTP ${statusCode}` };
    }

    const parsed = generateSchema.safeParse(parseJson(text));
    if (!parsed.success) {
        return { ok: false, error: 'unexpected /api/generate response' };
    }

    const tps = tokensPerSecond(parsed.data.eval_count ?? 0, parsed.data.eval_duration ?? 0);
    return { ok: true, tokensPerSecond: tps, likelyGpu: tps > GPU_THROUGHPUT_HINT_TOK_S };
}

/**
 * Checks that the inference server answers, lists `model` among its local
 * models, and can run a short generation with it.
 */
export async function checkServer(input: CheckServerInput): Promise<HealthReport> {
    const timeoutMs = input.timeoutMs ?? 10_000;
    const dispatcher = input.dispatcher ?? new Agent({
        connect: { timeout: timeoutMs },
        headersTimeout: timeoutMs,
        bodyTimeout: timeoutMs
    });
    const unreachable = (error: unknown): HealthReport => ({
        reachable: false,
        models: [],
        matched: null,
        generation: null,
        error: errorMessage(error)
    });

    try {
        try {
            await getJson(`${input.baseUrl}/`, dispatcher);
        } catch (error) {
            return unreachable(error);
        }

        let tags: { statusCode: number; payload: unknown };
        try {
            tags = await getJson(`${input.baseUrl}/api/tags`, dispatcher);
        } catch (error) {
            return { ...unreachable(error), reachable: true, error: `cannot list models: ${errorMessage(error)}` };
        }

        const parsed = tagsSchema.safeParse(tags.payload);
        if (!parsed.success) {
            return {
                reachable: true,
                models: [],
                matched: null,
                generation: null,
                error: `unexpected /api/tags response (HTTP ${tags.statusCode})`
            };
        }

        const models: ModelInfo[] = parsed.data.models.map((m) => ({
            name: m.name,
            sizeBytes: m.size ?? 0,
            family: m.details?.family ?? null,
            parameterSize: m.details?.parameter_size ?? null,
            quantization: m.details?.quantization_level ?? null
        }));
        const matched = matchModel(models, input.model);
        const generation = matched
            ? await runTestGeneration(input.baseUrl, matched.name, input.generationTimeoutMs ?? 60_000, dispatcher)
            : null;

        return { reachable: true, models, matched, generation, error: null };
    } finally {
        if (input.dispatcher === undefined) {
            await dispatcher.close();
        }
    }
}
