/**
 * flowshot: drive a browser through abstract UI actions for a
 * natural-language task and capture each distinct page state.
 */

export * from './schema/index.js';
export * from './config/index.js';
export * from './browser/index.js';
export * from './core/index.js';
export { SnapshotStore } from './snapshots/store.js';
export type { CaptureOutcome, SnapshotStoreOptions } from './snapshots/store.js';
export { fingerprint, normalizeMarkup } from './snapshots/fingerprint.js';
export { generateJSON, generateMarkdown, serializeJSON, writeReports } from './report/index.js';
export type { WrittenReport } from './report/index.js';
export { createLLMClient, loadLLMConfig, createMockClient } from './llm/index.js';
export type { LLMClient, LLMConfig, LLMProvider } from './llm/index.js';
