/**
 * Default constants for chatprobe configuration
 */

export const CLIENT_DEFAULTS = {
  BASE_URL: 'http://localhost:11434' as const,

  MODEL: 'llama3.2:3b' as const,

  /** ~1-2 short sentences */
  NUM_PREDICT: 60 as const,

  /** Generous on both bounds so a cold model load does not count as a stall. */
  CONNECT_TIMEOUT_MS: 120_000 as const,
  READ_TIMEOUT_MS: 120_000 as const,

  CHUNK_DECODING: 'structured' as const,
};

export const SESSION_DEFAULTS = {
  MAX_TURNS: 10 as const,
  EVICTION: 'message' as const,
};

export const PROBE_DEFAULTS = {
  SYSTEM_PROMPT:
    'You are a small tabletop assistant robot. '
    + 'Keep all responses under 2 sentences. Be natural and concise.',

  LOG_FILE: 'results/latency_log.txt',

  WARMUP_PROMPT: 'Hello.',
} as const;

/**
 * Logging Configuration
 */
export const LOGGING_DEFAULTS = {
  /** CLI output goes to stdout; diagnostics stay quiet unless asked for */
  LEVEL: 'warn' as const,
} as const;

/** TTFT thresholds, in ms, for rating perceived responsiveness. */
export const TTFT_RATING_THRESHOLDS = {
  EXCELLENT_BELOW_MS: 1000,
  ACCEPTABLE_BELOW_MS: 2000,
} as const;
