export type InferenceErrorKind = 'transport' | 'protocol' | 'stream_read';

export abstract class InferenceError extends Error {
  public abstract readonly kind: InferenceErrorKind;

  protected constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
  }
}

/** Connection refused, DNS failure, or a timeout before any response arrived. */
export class TransportError extends InferenceError {
  public readonly kind = 'transport';

  public constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'TransportError';
  }
}

export class ProtocolError extends InferenceError {
  public readonly kind = 'protocol';
  public readonly status: number;
  public readonly detail: string | null;

  public constructor(status: number, detail: string | null = null) {
    super(detail ? `HTTP ${status}: ${detail}` : `HTTP ${status}`);
    this.name = 'ProtocolError';
    this.status = status;
    this.detail = detail;
  }
}

/** I/O failure after the response started, including a stall mid-chunk. */
export class StreamReadError extends InferenceError {
  public readonly kind = 'stream_read';

  public constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'StreamReadError';
  }
}

export class ConfigError extends Error {
  public readonly issues: string[];

  public constructor(issues: string[]) {
    super(`Invalid chatprobe config: ${issues.join('; ')}`);
    this.name = 'ConfigError';
    this.issues = issues;
  }
}
