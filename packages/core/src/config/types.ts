import { type LogLevel } from '../ports/logger';

export type ChunkDecoding = 'structured' | 'scan';

export type HistoryEviction = 'message' | 'turn';

export interface ChatClientConfig {
  baseUrl          : string;
  model            : string;
  /** Generation cap sent as `options.num_predict`. */
  numPredict       : number;
  connectTimeoutMs : number;
  /** Bound on waiting for headers and on any stall between body chunks. */
  readTimeoutMs    : number;
  chunkDecoding    : ChunkDecoding;
}

export interface SessionConfig {
  maxTurns : number;
  eviction : HistoryEviction;
}

export type ProbeMode = 'benchmark' | 'chat' | 'check';

export interface ProbeConfig {
  mode         : ProbeMode;
  client       : ChatClientConfig;
  session      : SessionConfig;
  systemPrompt : string;
  logFile      : string;
  logLevel     : LogLevel;
  prettyLogs   : boolean;
  promptsFile? : string;
  /** Read at startup; its trimmed contents replace `systemPrompt`. */
  systemPromptFile?: string;
}
