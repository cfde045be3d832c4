/**
 * Core module.
 * Plans a task, resolves abstract actions against the live page, and
 * gates on logins. Browser access goes through the `PageDriver` port.
 */

export { ActionEngine } from './engine.js';
export type { EngineOptions } from './engine.js';
export { executeAction } from './actions.js';
export type { ActionContext } from './actions.js';
export { runAuthCheckpoint } from './checkpoint.js';
export type { LoginGate, ResumeSignal, CheckpointOutcome } from './checkpoint.js';
export { classifyAuthState, detectAuthState, loginGateReason } from './auth.js';
export type { AuthSignals, LoginGateReason } from './auth.js';
export { extractIntent, scoreButton, matchButton, matchNavigation, matchInput } from './matcher.js';
export type { TaskIntent, ButtonMatch } from './matcher.js';
export { plan, planActions, planWithHeuristics, parsePlan, loadPlanFile, PlannerError } from './planner.js';
export type { Plan, PlanSource } from './planner.js';
export { RunAbortedError } from './errors.js';
