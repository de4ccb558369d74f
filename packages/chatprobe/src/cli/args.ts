import { type ProbeMode } from '@chatprobe/core';

export class UsageError extends Error {
  public constructor(message: string) {
    super(message);
    this.name = 'UsageError';
  }
}

export interface CliArgs {
  help        : boolean;
  baseUrl?    : string;
  mode?       : ProbeMode;
  promptsFile?: string;
  logFile?    : string;
  model?      : string;
  systemPromptFile?: string;
  /** Positionals that were not URLs. */
  ignored     : string[];
}

const MODE_FLAGS = new Map<string, ProbeMode>([
  ['chat', 'chat'],
  ['check', 'check'],
  ['benchmark', 'benchmark']
]);

const VALUE_FLAGS = {
  prompts: 'promptsFile',
  'log-file': 'logFile',
  model: 'model',
  'system-prompt': 'systemPromptFile'
} as const satisfies Record<string, keyof CliArgs>;

function isValueFlag(name: string): name is keyof typeof VALUE_FLAGS {
  return Object.hasOwn(VALUE_FLAGS, name);
}

export function looksLikeUrl(value: string): boolean {
  return /^https?:\/\//i.test(value);
}

/**
 * `[BASE_URL] [--chat | --check | --benchmark] [--prompts FILE] [--log-file FILE] [--model NAME]
 * [--system-prompt FILE] [--help]`.
 * Value flags take `--flag value` or `--flag=value`.
 */
export function parseCliArgs(argv: readonly string[]): CliArgs {
  const args: CliArgs = { help: false, ignored: [] };

  for (let i = 0; i < argv.length; i++) {
    const arg = argv[i] ?? '';

    if (arg === '-h' || arg === '--help') {
      args.help = true;
      continue;
    }

    if (!arg.startsWith('--')) {
      if (looksLikeUrl(arg) && args.baseUrl === undefined) {
        args.baseUrl = arg;
      } else {
        args.ignored.push(arg);
      }
      continue;
    }

    const eq = arg.indexOf('=');
    const name = eq === -1 ? arg.slice(2) : arg.slice(2, eq);
    const mode = MODE_FLAGS.get(name);

    if (mode) {
      if (eq !== -1) throw new UsageError(`--${name} does not take a value`);
      if (args.mode && args.mode !== mode) {
        throw new UsageError(`--${args.mode} and --${mode} cannot be combined`);
      }
      args.mode = mode;
      continue;
    }

    if (isValueFlag(name)) {
      const value = eq === -1 ? argv[++i] : arg.slice(eq + 1);
      if (!value || (eq === -1 && value.startsWith('--'))) {
        throw new UsageError(`--${name} requires a value`);
      }
      args[VALUE_FLAGS[name]] = value;
      continue;
    }

    throw new UsageError(`unknown option: ${arg}`);
  }

  return args;
}

export const USAGE = [
  'Usage: chatprobe [BASE_URL] [--chat | --check] [options]',
  '',
  '  BASE_URL              Inference server URL (default: http://localhost:11434)',
  '  --chat                Interactive chat (default mode is the benchmark)',
  '  --check               Check the server is up and the model is available',
  '  --prompts FILE        JSON array of benchmark prompts',
  '  --log-file FILE       Benchmark log, appended to (default: results/latency_log.txt)',
  '  --model NAME          Model to request (default: llama3.2:3b)',
  '  --system-prompt FILE  Text file holding the system prompt',
  '  -h, --help            Show this message',
  '',
  'Environment: CHATPROBE_MODEL, CHATPROBE_NUM_PREDICT, CHATPROBE_CONNECT_TIMEOUT_MS,',
  '  CHATPROBE_READ_TIMEOUT_MS, CHATPROBE_MAX_TURNS, CHATPROBE_EVICTION,',
  '  CHATPROBE_CHUNK_DECODING, CHATPROBE_SYSTEM_PROMPT, CHATPROBE_SYSTEM_PROMPT_FILE,',
  '  CHATPROBE_LOG_FILE, CHATPROBE_LOG_LEVEL, CHATPROBE_PRETTY_LOGS',
  '',
  'Examples:',
  '  chatprobe                                 # benchmark localhost',
  '  chatprobe http://192.168.1.20:11434       # benchmark a remote server',
  '  chatprobe --chat                          # chat with localhost',
  '  chatprobe http://192.168.1.20:11434 --chat'
].join('\n');
