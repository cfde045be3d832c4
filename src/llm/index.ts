/**
 * LLM abstraction module.
 * Provider-agnostic interface for the planner.
 * Only module allowed to make LLM API calls.
 */

import type { LLMClient, LLMConfig } from './client.js';
import { createAnthropicClient } from './anthropic.js';
import { createOpenAIClient } from './openai.js';
import { createMockClient } from './mock.js';

export * from './client.js';
export { createAnthropicClient } from './anthropic.js';
export { createOpenAIClient } from './openai.js';
export { createMockClient } from './mock.js';
export type { MockClient } from './mock.js';

// ── Provider factory ─────────────────────────────────────────

/** Build a client for `config`; `none` means heuristic planning only. */
export function createLLMClient(config: LLMConfig): LLMClient | null {
  switch (config.provider) {
    case 'anthropic': {
      if (!config.apiKey) {
        throw new Error(
          'ANTHROPIC_API_KEY is required when using the anthropic provider',
        );
      }
      return createAnthropicClient(config.apiKey, {
        model: config.model,
        temperature: config.temperature,
      });
    }
    case 'openai': {
      if (!config.apiKey) {
        throw new Error(
          'OPENAI_API_KEY is required when using the openai provider',
        );
      }
      return createOpenAIClient(config.apiKey, {
        model: config.model,
        baseUrl: config.baseUrl,
        temperature: config.temperature,
      });
    }
    case 'mock':
      return createMockClient();
    case 'none':
      return null;
  }
}
