import { createInterface } from 'node:readline';
import {
  ConfigError,
  type Logger,
  type ProbeConfig,
  describeFailure
} from '@chatprobe/core';
import {
  FileReportSink,
  OllamaChatClient,
  PinoLogger,
  checkServer
} from '@chatprobe/adapters';

import {
  BenchmarkRunner,
  DEFAULT_BENCHMARK_PROMPTS,
  formatSummary,
  loadPromptCorpus,
  previewText
} from '../capabilities/benchmark';
import { InteractiveLoop } from '../capabilities/chat';
import { ConversationSession } from '../capabilities/session';
import { type ProbeEnv, resolveProbeConfig } from '../config/resolveConfig';
import { applySystemPromptFile } from '../config/systemPrompt';
import { USAGE, UsageError, parseCliArgs } from './args';

export interface CliIO {
  stdin: NodeJS.ReadableStream;
  stdout: { write(text: string): unknown };
  stderr: { write(text: string): unknown };
}

export interface MainDeps {
  io?: CliIO;
  env?: ProbeEnv;
  logger?: Logger;
  now?: () => Date;
}

const HEALTH_TIMEOUT_CAP_MS = 10_000;

type Print = (line?: string) => void;

async function runCheck(config: ProbeConfig, print: Print): Promise<number> {
  const { baseUrl, model } = config.client;
  const report = await checkServer({
    baseUrl,
    model,
    timeoutMs: Math.min(config.client.connectTimeoutMs, HEALTH_TIMEOUT_CAP_MS),
    generationTimeoutMs: config.client.readTimeoutMs
  });

  if (!report.reachable) {
    print(`[FAIL] Cannot reach ${baseUrl}: ${report.error ?? 'unknown error'}`);
    return 1;
  }
  print(`[OK] Server is reachable at ${baseUrl}`);

  if (report.error) {
    print(`[FAIL] ${report.error}`);
    return 1;
  }

  print('  Available models:');
  for (const m of report.models) print(`   - ${m.name}`);

  if (!report.matched) {
    print(`[FAIL] Model '${model}' not found. Pull it with: ollama pull ${model}`);
    return 1;
  }

  const matched = report.matched;
  print(`[OK] Model '${model}' is available as '${matched.name}'`);
  print(`  Size        : ${(matched.sizeBytes / 1024 ** 3).toFixed(2)} GB`);
  print(`  Family      : ${matched.family ?? 'unknown'}`);
  print(`  Parameters  : ${matched.parameterSize ?? 'unknown'}`);
  print(`  Quantization: ${matched.quantization ?? 'unknown'}`);

  const { generation } = report;
  if (!generation) return 0;
  if (!generation.ok) {
    print(`[FAIL] Test prompt failed: ${generation.error}`);
    return 1;
  }
  print('[OK] Test prompt responded.');
  if (generation.tokensPerSecond > 0) {
    print(`  Tokens/sec (rough): ${generation.tokensPerSecond.toFixed(1)}`);
    print(generation.likelyGpu
      ? '  [LIKELY GPU] Speed suggests GPU acceleration is active.'
      : '  [POSSIBLE CPU] Speed is low; GPU may not be active.');
  }
  return 0;
}

async function runBenchmark(
  config: ProbeConfig,
  client: OllamaChatClient,
  logger: Logger,
  print: Print,
  now?: () => Date
): Promise<number> {
  const prompts = config.promptsFile
    ? await loadPromptCorpus(config.promptsFile)
    : [...DEFAULT_BENCHMARK_PROMPTS];

  print(`  Model   : ${client.model}`);
  print(`  Target  : ${client.baseUrl}`);
  print(`  Messages: ${prompts.length}`);
  print();

  const runner = new BenchmarkRunner({
    client,
    logger,
    sink: new FileReportSink(config.logFile),
    systemPrompt: config.systemPrompt,
    ...(now ? { now } : {}),
    onWarmup: (phase) => print(phase === 'start'
      ? '  [Warm-up] Loading model...'
      : '  [Warm-up] Done. Starting benchmark.\n'),
    onResult: (entry, total) => {
      print(`  [${entry.index}/${total}] Sending: ${entry.prompt}`);
      const { outcome } = entry;
      if (outcome.status === 'error') {
        print(`  [SKIP] ${describeFailure(outcome)}`);
        return;
      }
      print(`         TTFT    : ${outcome.result.timeToFirstTokenMs.toFixed(0)} ms  (perceived)`);
      print(`         Total   : ${outcome.result.totalMs.toFixed(0)} ms`);
      print(`         TPS     : ${outcome.result.tokensPerSecond.toFixed(1)} tok/s`);
      print(`         Response: ${previewText(outcome.result.text)}`);
      print();
    }
  });

  const run = await runner.run(prompts);

  if (run.summary && run.rating) {
    print('='.repeat(60));
    print('  RESULTS SUMMARY');
    print('='.repeat(60));
    for (const line of formatSummary(run.summary, run.rating)) print(line);
    print();
  } else {
    print('[FAIL] No successful responses. Check the server is running.');
  }

  if (run.savedTo) {
    print(`[Saved] ${run.savedTo}`);
  }

  return run.summary ? 0 : 1;
}

async function runChat(
  config: ProbeConfig,
  client: OllamaChatClient,
  logger: Logger,
  io: CliIO,
  print: Print
): Promise<number> {
  print(`  Model : ${client.model}`);
  print(`  Target: ${client.baseUrl}`);
  print("  Type 'quit' to exit | 'reset' to clear history | 'help' for commands");
  print();

  const rl = createInterface({ input: io.stdin, crlfDelay: Infinity });
  try {
    const loop = new InteractiveLoop({
      client,
      logger,
      session: new ConversationSession(config.session),
      systemPrompt: config.systemPrompt,
      io: { lines: rl, write: (text) => io.stdout.write(text) }
    });
    const exit = await loop.run();
    if (exit === 'end_of_input') print();
  } finally {
    rl.close();
  }
  return 0;
}

/** Runs the CLI and resolves to the process exit code. */
export async function main(argv: readonly string[], deps: MainDeps = {}): Promise<number> {
  const io: CliIO = deps.io ?? { stdin: process.stdin, stdout: process.stdout, stderr: process.stderr };
  const print: Print = (line = '') => io.stdout.write(`${line}\n`);
  const printError: Print = (line = '') => io.stderr.write(`${line}\n`);

  let config: ProbeConfig;
  try {
    const args = parseCliArgs(argv);
    if (args.help) {
      print(USAGE);
      return 0;
    }
    for (const arg of args.ignored) {
      printError(`[WARN] ignoring argument '${arg}' (base URLs must start with http:// or https://)`);
    }
    config = await applySystemPromptFile(resolveProbeConfig(args, deps.env ?? {}));
  } catch (error) {
    if (error instanceof UsageError) {
      printError(`chatprobe: ${error.message}`);
      printError(USAGE);
      return 2;
    }
    if (error instanceof ConfigError) {
      printError(error.message);
      return 1;
    }
    throw error;
  }

  const logger = deps.logger ?? new PinoLogger({
    level: config.logLevel,
    prettyPrint: config.prettyLogs,
    name: 'chatprobe',
    destination: 2
  });

  if (config.mode === 'check') {
    return runCheck(config, print);
  }

  const client = new OllamaChatClient({ config: config.client, logger });
  try {
    return config.mode === 'chat'
      ? await runChat(config, client, logger, io, print)
      : await runBenchmark(config, client, logger, print, deps.now);
  } catch (error) {
    if (error instanceof ConfigError) {
      printError(error.message);
      return 1;
    }
    throw error;
  } finally {
    await client.close();
  }
}
