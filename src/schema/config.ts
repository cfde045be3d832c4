import { z } from 'zod';

import { MATCHER_WEIGHTS, OUTPUT, SUBMIT_BUTTON_TEXTS } from '../config/defaults.js';

// ── Timeouts block ──────────────────────────────────────────

const ms = z.number().int().nonnegative();

export const timeoutOverridesSchema = z.object({
  navigation: ms.optional(),
  action: ms.optional(),
  field: ms.optional(),
  probe: ms.optional(),
  networkIdle: ms.optional(),
});

export type TimeoutOverrides = z.infer<typeof timeoutOverridesSchema>;

// ── Matcher block ───────────────────────────────────────────

export const matcherWeightsSchema = z.object({
  actionKeyword: z.number().int().default(MATCHER_WEIGHTS.actionKeyword),
  objectKeyword: z.number().int().default(MATCHER_WEIGHTS.objectKeyword),
  actionObjectCombo: z.number().int().default(MATCHER_WEIGHTS.actionObjectCombo),
  inModal: z.number().int().default(MATCHER_WEIGHTS.inModal),
  createPreference: z.number().int().default(MATCHER_WEIGHTS.createPreference),
  addPenalty: z.number().int().default(MATCHER_WEIGHTS.addPenalty),
});

export type MatcherWeights = z.infer<typeof matcherWeightsSchema>;

// ── Auth block ──────────────────────────────────────────────

export const loginButtonTriggerSchema = z.enum(['always', 'root-only', 'never']);

export type LoginButtonTrigger = z.infer<typeof loginButtonTriggerSchema>;

export const checkpointPolicySchema = z.object({
  loginPage: z.boolean().default(true),
  loginButton: loginButtonTriggerSchema.default('always'),
});

export type CheckpointPolicy = z.infer<typeof checkpointPolicySchema>;

export const authConfigSchema = z.object({
  cookie: z.string().optional(),
  checkpoint: checkpointPolicySchema.default({}),
});

export type AuthConfig = z.infer<typeof authConfigSchema>;

// ── LLM block ───────────────────────────────────────────────

export const llmProviderNameSchema = z.enum(['anthropic', 'openai', 'mock', 'none']);

export const llmFileConfigSchema = z.object({
  provider: llmProviderNameSchema.optional(),
  model: z.string().min(1).optional(),
  baseUrl: z.string().url().optional(),
  temperature: z.number().min(0).max(2).optional(),
});

export type LLMFileConfig = z.infer<typeof llmFileConfigSchema>;

// ── Full config file ────────────────────────────────────────

export const fileConfigSchema = z.object({
  outputDir: z.string().min(1).default(OUTPUT.DATASET_ROOT),
  headless: z.boolean().default(false),
  slowMo: z.number().int().nonnegative().default(OUTPUT.SLOW_MO),
  persistentContext: z.boolean().default(true),
  persistentContextDir: z.string().min(1).default(OUTPUT.PERSISTENT_CONTEXT_DIR),
  submitButtonTexts: z
    .array(z.string().min(1))
    .min(1)
    .default([...SUBMIT_BUTTON_TEXTS]),
  dismissCookieBanners: z.boolean().default(true),
  timeouts: timeoutOverridesSchema.default({}),
  matcher: z
    .object({ weights: matcherWeightsSchema.default({}) })
    .default({}),
  auth: authConfigSchema.default({}),
  llm: llmFileConfigSchema.default({}),
});

export type FileConfig = z.infer<typeof fileConfigSchema>;
