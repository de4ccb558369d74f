import { errors } from 'undici';
import { StreamReadError, TransportError } from '@chatprobe/core';

function describe(error: unknown): string {
  if (error instanceof Error) {
    const code = 'code' in error && typeof error.code === 'string' ? error.code : null;
    return code && !error.message.includes(code) ? `${error.message} (${code})` : error.message;
  }
  return String(error);
}

export function toTransportError(error: unknown, timeouts: { connectTimeoutMs: number; readTimeoutMs: number }): TransportError {
  if (error instanceof errors.ConnectTimeoutError) {
    return new TransportError(`connect timed out after ${timeouts.connectTimeoutMs}ms`, { cause: error });
  }
  if (error instanceof errors.HeadersTimeoutError) {
    return new TransportError(`no response within ${timeouts.readTimeoutMs}ms`, { cause: error });
  }
  return new TransportError(describe(error), { cause: error });
}

export function toStreamReadError(error: unknown, readTimeoutMs: number): StreamReadError {
  if (error instanceof errors.BodyTimeoutError) {
    return new StreamReadError(`stream stalled for more than ${readTimeoutMs}ms`, { cause: error });
  }
  return new StreamReadError(describe(error), { cause: error });
}
