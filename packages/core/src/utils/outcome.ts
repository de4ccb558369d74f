import { type InferenceFailure, type InferenceOutcome, type InferenceResult } from '../entities/inference';
import { ProtocolError } from '../errors';

export function isSuccess(outcome: InferenceOutcome): outcome is { status: 'ok'; result: InferenceResult } {
  return outcome.status === 'ok';
}

/**
 * Bracketed marker text for a failed exchange, e.g. `[HTTP 500]` or
 * `[ERROR] TransportError: connect ECONNREFUSED 127.0.0.1:11434`.
 */
export function describeFailure(failure: InferenceFailure): string {
  const { error } = failure;
  if (error instanceof ProtocolError) {
    return error.detail ? `[HTTP ${error.status}] ${error.detail}` : `[HTTP ${error.status}]`;
  }
  return `[ERROR] ${error.name}: ${error.message}`;
}
