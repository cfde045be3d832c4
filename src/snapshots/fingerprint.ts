import { createHash } from 'node:crypto';

const SCRIPT_BLOCK = /<script\b[^>]*>[\s\S]*?<\/script>/gi;
const STYLE_BLOCK = /<style\b[^>]*>[\s\S]*?<\/style>/gi;

/**
 * Markup with script and style blocks removed and whitespace runs
 * collapsed to a single space. Those blocks churn without changing
 * what is on screen.
 */
export function normalizeMarkup(html: string): string {
  return html
    .replace(SCRIPT_BLOCK, '')
    .replace(STYLE_BLOCK, '')
    .trim()
    .replace(/\s+/g, ' ');
}

/** SHA-256 hex digest of the normalized markup. */
export function fingerprint(html: string): string {
  return createHash('sha256').update(normalizeMarkup(html), 'utf8').digest('hex');
}
