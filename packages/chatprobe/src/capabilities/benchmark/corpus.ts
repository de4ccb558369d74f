import { readFile } from 'node:fs/promises';
import { ConfigError, promptCorpusSchema } from '@chatprobe/core';

/** Reads a JSON array of non-empty prompt strings. */
export async function loadPromptCorpus(path: string): Promise<string[]> {
  let raw: unknown;
  try {
    raw = JSON.parse(await readFile(path, 'utf8'));
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    throw new ConfigError([`promptsFile: cannot read ${path}: ${reason}`]);
  }

  const parsed = promptCorpusSchema.safeParse(raw);
  if (!parsed.success) {
    throw new ConfigError(
      parsed.error.issues.map((issue) => `promptsFile${issue.path.map((p) => `[${String(p)}]`).join('')}: ${issue.message}`)
    );
  }

  return parsed.data;
}
