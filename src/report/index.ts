/**
 * Report generation module.
 * Deterministic, no LLM calls.
 * Turns a run's results and captured states into markdown + JSON artifacts.
 */

export { generateMarkdown, generateJSON, serializeJSON, writeReports } from './reporter.js';
export type { JsonOutput, WrittenReport } from './reporter.js';
