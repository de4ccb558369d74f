import {
  CLIENT_DEFAULTS,
  ConfigError,
  LOGGING_DEFAULTS,
  PROBE_DEFAULTS,
  type ProbeConfig,
  SESSION_DEFAULTS,
  probeConfigSchema
} from '@chatprobe/core';

import { type CliArgs } from '../cli/args';

export type ProbeEnv = Record<string, string | undefined>;

function envString(env: ProbeEnv, key: string): string | undefined {
  const value = env[key]?.trim();
  return value ? value : undefined;
}

/** Unparseable values become NaN so validation reports them by name. */
function envNumber(env: ProbeEnv, key: string): number | undefined {
  const value = envString(env, key);
  return value === undefined ? undefined : Number(value);
}

function envBoolean(env: ProbeEnv, key: string): boolean | undefined {
  const value = envString(env, key)?.toLowerCase();
  if (value === undefined) return undefined;
  return value === '1' || value === 'true' || value === 'yes';
}

/**
 * Merges defaults, `CHATPROBE_*` environment variables and CLI arguments
 * (highest precedence), then validates the result.
 */
export function resolveProbeConfig(args: CliArgs, env: ProbeEnv = {}): ProbeConfig {
  const systemPromptFile = args.systemPromptFile ?? envString(env, 'CHATPROBE_SYSTEM_PROMPT_FILE');
  const candidate = {
    mode: args.mode ?? 'benchmark',
    client: {
      baseUrl          : args.baseUrl ?? envString(env, 'CHATPROBE_BASE_URL') ?? CLIENT_DEFAULTS.BASE_URL,
      model            : args.model ?? envString(env, 'CHATPROBE_MODEL') ?? CLIENT_DEFAULTS.MODEL,
      numPredict       : envNumber(env, 'CHATPROBE_NUM_PREDICT') ?? CLIENT_DEFAULTS.NUM_PREDICT,
      connectTimeoutMs : envNumber(env, 'CHATPROBE_CONNECT_TIMEOUT_MS') ?? CLIENT_DEFAULTS.CONNECT_TIMEOUT_MS,
      readTimeoutMs    : envNumber(env, 'CHATPROBE_READ_TIMEOUT_MS') ?? CLIENT_DEFAULTS.READ_TIMEOUT_MS,
      chunkDecoding    : envString(env, 'CHATPROBE_CHUNK_DECODING') ?? CLIENT_DEFAULTS.CHUNK_DECODING
    },
    session: {
      maxTurns : envNumber(env, 'CHATPROBE_MAX_TURNS') ?? SESSION_DEFAULTS.MAX_TURNS,
      eviction : envString(env, 'CHATPROBE_EVICTION') ?? SESSION_DEFAULTS.EVICTION
    },
    systemPrompt : envString(env, 'CHATPROBE_SYSTEM_PROMPT') ?? PROBE_DEFAULTS.SYSTEM_PROMPT,
    logFile      : args.logFile ?? envString(env, 'CHATPROBE_LOG_FILE') ?? PROBE_DEFAULTS.LOG_FILE,
    logLevel     : envString(env, 'CHATPROBE_LOG_LEVEL') ?? LOGGING_DEFAULTS.LEVEL,
    prettyLogs   : envBoolean(env, 'CHATPROBE_PRETTY_LOGS') ?? false,
    ...(args.promptsFile !== undefined ? { promptsFile: args.promptsFile } : {}),
    ...(systemPromptFile !== undefined ? { systemPromptFile } : {})
  };

  const parsed = probeConfigSchema.safeParse(candidate);
  if (!parsed.success) {
    throw new ConfigError(
      parsed.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`)
    );
  }

  return parsed.data;
}
