/**
 * CLI module: a thin wrapper over core.
 * Parses arguments, delegates to core, handles exit codes.
 */

export { registerCaptureCommand, registerPlanCommand } from './run.js';
export { createStdinResume } from './resume.js';
