import { z } from 'zod';

export const logLevelSchema = z.enum(['trace', 'debug', 'info', 'warn', 'error', 'fatal', 'silent']);

export const baseUrlSchema = z
  .string()
  .regex(/^https?:\/\//, 'must start with http:// or https://')
  .transform((url) => url.replace(/\/+$/, ''));

export const chatClientConfigSchema = z.object({
  baseUrl: baseUrlSchema,
  model: z.string().trim().min(1),
  numPredict: z.number().int().positive(),
  connectTimeoutMs: z.number().int().positive(),
  readTimeoutMs: z.number().int().positive(),
  chunkDecoding: z.enum(['structured', 'scan']),
});

export const sessionConfigSchema = z.object({
  maxTurns: z.number().int().positive(),
  eviction: z.enum(['message', 'turn']),
});

export const probeConfigSchema = z.object({
  mode: z.enum(['benchmark', 'chat', 'check']),
  client: chatClientConfigSchema,
  session: sessionConfigSchema,
  systemPrompt: z.string().trim().min(1),
  logFile: z.string().min(1),
  logLevel: logLevelSchema,
  prettyLogs: z.boolean(),
  promptsFile: z.string().min(1).optional(),
  systemPromptFile: z.string().min(1).optional(),
});

export const promptCorpusSchema = z.array(z.string().trim().min(1)).min(1);
