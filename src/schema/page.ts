import { z } from 'zod';

// ── Page summary entries ─────────────────────────────────────

export const buttonInfoSchema = z.object({
  text: z.string().min(1),
  ariaLabel: z.string(),
  inModal: z.boolean(),
});

export type ButtonInfo = z.infer<typeof buttonInfoSchema>;

export const navigationLinkSchema = z.object({
  text: z.string().min(1),
});

export type NavigationLink = z.infer<typeof navigationLinkSchema>;

export const inputFieldSchema = z.object({
  type: z.string(),
  name: z.string(),
  placeholder: z.string(),
  label: z.string(),
});

export type InputField = z.infer<typeof inputFieldSchema>;

// ── PageSummary ──────────────────────────────────────────────
// Structural view of the live page at query time. Never cached:
// the page may have mutated since the last action.

export const pageSummarySchema = z.object({
  url: z.string(),
  buttons: z.array(buttonInfoSchema),
  navigation: z.array(navigationLinkSchema),
  inputs: z.array(inputFieldSchema),
  hasModal: z.boolean(),
});

export type PageSummary = z.infer<typeof pageSummarySchema>;

// ── AuthState ────────────────────────────────────────────────

export const authStateSchema = z.object({
  url: z.string(),
  isLoginPage: z.boolean(),
  requiresLogin: z.boolean(),
  hasLoginButton: z.boolean(),
  loginButtonText: z.string().optional(),
  hasEmailField: z.boolean(),
  hasPasswordField: z.boolean(),
});

export type AuthState = z.infer<typeof authStateSchema>;
