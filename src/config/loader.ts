import { readFile } from 'node:fs/promises';

import { parse as parseYaml } from 'yaml';

import { fileConfigSchema } from '../schema/config.js';
import type { FileConfig } from '../schema/config.js';

// ── Public API ──────────────────────────────────────────────

/**
 * Load and validate a `.flowshot.yaml` (or JSON) config file.
 * Throws a descriptive error if the file is missing or invalid.
 */
export async function loadConfigFile(configPath: string): Promise<FileConfig> {
  const raw = await readFile(configPath, 'utf-8');
  return parseConfig(raw, configPath.endsWith('.json') ? 'json' : 'yaml');
}

/**
 * Like `loadConfigFile`, but a missing file yields the defaults.
 * An existing file that fails validation still throws.
 */
export async function loadConfigOrDefaults(configPath: string): Promise<FileConfig> {
  try {
    return await loadConfigFile(configPath);
  } catch (err) {
    if (isMissingFile(err)) return fileConfigSchema.parse({});
    throw err;
  }
}

export function parseConfig(raw: string, format: 'json' | 'yaml'): FileConfig {
  const parsed: unknown = format === 'json' ? JSON.parse(raw) : parseYaml(raw);
  // An empty YAML document parses to null.
  return fileConfigSchema.parse(parsed ?? {});
}

function isMissingFile(err: unknown): boolean {
  return (
    err instanceof Error &&
    'code' in err &&
    err.code === 'ENOENT'
  );
}
