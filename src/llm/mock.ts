import type { LLMClient } from './client.js';

const DEFAULT_RESPONSE = '{"actions":[]}';

export interface MockClient extends LLMClient {
  /** User prompts received so far, in call order. */
  readonly prompts: string[];
}

/**
 * Mock LLM provider for testing.
 * Cycles through provided canned responses, falling back to a default.
 */
export function createMockClient(
  responses?: readonly string[],
): MockClient {
  let callIndex = 0;
  const prompts: string[] = [];

  return {
    prompts,
    async generate(
      _systemPrompt: string,
      userPrompt: string,
    ): Promise<string> {
      prompts.push(userPrompt);
      const response = responses?.[callIndex] ?? DEFAULT_RESPONSE;
      callIndex++;
      return response;
    },
  };
}
