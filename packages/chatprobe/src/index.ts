export * from './capabilities/session';
export * from './capabilities/benchmark';
export * from './capabilities/chat';
export * from './config/resolveConfig';
export * from './config/systemPrompt';
export { parseCliArgs, looksLikeUrl, USAGE, UsageError, type CliArgs } from './cli/args';
export { main, type CliIO, type MainDeps } from './cli/main';
