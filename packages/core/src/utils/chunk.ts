import { z } from 'zod';

import { type ChunkDecoding } from '../config/types';
import { extractInteger, extractLong, extractString } from './jsonFields';

export type ChunkEvent =
  | { type: 'content'; text: string }
  | { type: 'done'; text: string; evalCount: number; evalDurationNs: number }
  | { type: 'unknown' };

const UNKNOWN: ChunkEvent = { type: 'unknown' };

// unknown keys are ignored rather than rejected
const chatChunkSchema = z.object({
  message: z.object({ content: z.string().optional() }).optional(),
  done: z.boolean().optional(),
  eval_count: z.number().optional(),
  eval_duration: z.number().optional(),
});

const DONE_MARKER = /"done": ?true/;

function toEvent(text: string, done: boolean, evalCount: number, evalDurationNs: number): ChunkEvent {
  if (done) return { type: 'done', text, evalCount, evalDurationNs };
  if (text) return { type: 'content', text };
  return UNKNOWN;
}

function decodeStructured(line: string): ChunkEvent {
  let raw: unknown;
  try {
    raw = JSON.parse(line);
  } catch {
    return UNKNOWN;
  }

  const parsed = chatChunkSchema.safeParse(raw);
  if (!parsed.success) return UNKNOWN;

  const chunk = parsed.data;
  return toEvent(
    chunk.message?.content ?? '',
    chunk.done === true,
    chunk.eval_count ?? 0,
    chunk.eval_duration ?? 0
  );
}

function decodeScan(line: string): ChunkEvent {
  const done = DONE_MARKER.test(line);
  return toEvent(
    extractString(line, 'content') ?? '',
    done,
    done ? extractInteger(line, 'eval_count') : 0,
    done ? extractLong(line, 'eval_duration') : 0
  );
}

/**
 * Decodes one newline-delimited chunk of an `/api/chat` stream.
 * Blank, malformed and unrecognised lines all decode to `unknown`.
 */
export function decodeChunk(line: string, mode: ChunkDecoding = 'structured'): ChunkEvent {
  const trimmed = line.trim();
  if (!trimmed) return UNKNOWN;

  return mode === 'scan' ? decodeScan(trimmed) : decodeStructured(trimmed);
}
