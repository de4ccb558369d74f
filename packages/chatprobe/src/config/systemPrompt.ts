import { readFile } from 'node:fs/promises';
import { ConfigError, type ProbeConfig } from '@chatprobe/core';

/** Replaces `systemPrompt` with the trimmed contents of `systemPromptFile`, when one is set. */
export async function applySystemPromptFile(config: ProbeConfig): Promise<ProbeConfig> {
  const path = config.systemPromptFile;
  if (path === undefined) return config;

  let text: string;
  try {
    text = (await readFile(path, 'utf8')).trim();
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    throw new ConfigError([`systemPromptFile: cannot read ${path}: ${reason}`]);
  }

  if (!text) {
    throw new ConfigError([`systemPromptFile: ${path} is empty`]);
  }
  return { ...config, systemPrompt: text };
}
