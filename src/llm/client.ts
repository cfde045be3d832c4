import { z } from 'zod';

import type { LLMFileConfig } from '../schema/config.js';
import { llmProviderNameSchema } from '../schema/config.js';

// ── LLMClient interface ──────────────────────────────────────

export interface LLMClient {
  generate(systemPrompt: string, userPrompt: string): Promise<string>;
}

// ── Config schema ────────────────────────────────────────────

export const llmProviderSchema = llmProviderNameSchema;

export type LLMProvider = z.infer<typeof llmProviderSchema>;

export const llmConfigSchema = z.object({
  provider: llmProviderSchema,
  apiKey: z.string().min(1).optional(),
  model: z.string().min(1).optional(),
  baseUrl: z.string().url().optional(),
  temperature: z.number().min(0).max(2).default(0.2),
});

export type LLMConfig = z.infer<typeof llmConfigSchema>;

// ── Env + file loader ────────────────────────────────────────

/**
 * Resolve the planner's LLM settings. Values from the config file win
 * over the environment. Without an explicit provider, whichever API
 * key is present picks one; with neither, planning is heuristic only.
 */
export function loadLLMConfig(
  fileConfig: LLMFileConfig = {},
  env: NodeJS.ProcessEnv = process.env,
): LLMConfig {
  const provider =
    fileConfig.provider ?? env['LLM_PROVIDER'] ?? inferProvider(env);

  const apiKey = provider === 'anthropic'
    ? env['ANTHROPIC_API_KEY']
    : provider === 'openai'
      ? env['OPENAI_API_KEY']
      : undefined;

  return llmConfigSchema.parse({
    provider,
    apiKey: apiKey || undefined,
    model: fileConfig.model ?? (env['FLOWSHOT_MODEL'] || undefined),
    baseUrl: fileConfig.baseUrl ?? (env['LLM_BASE_URL'] || undefined),
    temperature: fileConfig.temperature,
  });
}

function inferProvider(env: NodeJS.ProcessEnv): LLMProvider {
  if (env['ANTHROPIC_API_KEY']) return 'anthropic';
  if (env['OPENAI_API_KEY']) return 'openai';
  return 'none';
}
