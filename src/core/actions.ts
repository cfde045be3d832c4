import type {
  Action,
  ActionResult,
  CaptureStateResult,
  ClickByTextResult,
  ClickSubmitResult,
  FillInputsResult,
  GotoResult,
  WaitForModalResult,
} from '../schema/index.js';
import type { PageDriver } from '../browser/driver.js';
import { NavigationError } from '../browser/driver.js';
import { findOpenModal } from '../browser/summary.js';
import type { EngineSettings } from '../config/settings.js';
import * as log from '../utils/logger.js';
import { detectAuthState, isDedicatedLoginUrl } from './auth.js';
import { CLICK_TIERS } from './tiers/click.js';
import { FILL_TIERS, dismissCookieBanner, isSearchField } from './tiers/fill.js';
import { SUBMIT_TIERS } from './tiers/submit.js';
import { runTiers } from './tiers/tier.js';

// ── Context ──────────────────────────────────────────────────

export interface ActionContext {
  driver: PageDriver;
  settings: EngineSettings;
  task?: string | undefined;
  /** Skip the login-page pre-check of `click_by_text`. */
  skipAuthCheck?: boolean | undefined;
}

const LOGIN_PAGE_SUFFIX = ' - appears to be on login/authentication page';

function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

// ── Dispatcher ───────────────────────────────────────────────

export function executeAction(action: Action, ctx: ActionContext): Promise<ActionResult> {
  switch (action.type) {
    case 'goto':
      return goto(ctx, action.url);
    case 'click_by_text':
      return clickByText(ctx, action.text);
    case 'wait_for_modal':
      return waitForModal(ctx);
    case 'fill_inputs':
      return fillInputs(ctx, action.inputs);
    case 'click_submit':
      return clickSubmit(ctx, action.buttons ?? ctx.settings.submitButtonTexts);
    case 'capture_state':
      return captureState(ctx);
  }
}

// ── Executors ────────────────────────────────────────────────

export async function goto(ctx: ActionContext, url: string): Promise<GotoResult> {
  try {
    await ctx.driver.goto(url, ctx.settings.timeouts.navigation);
    return { success: true, action: 'goto', url };
  } catch (err) {
    return {
      success: false,
      action: 'goto',
      url,
      error: errorMessage(err),
      reason: err instanceof NavigationError ? err.kind : 'failed',
    };
  }
}

export async function clickByText(ctx: ActionContext, text: string): Promise<ClickByTextResult> {
  const { driver, settings } = ctx;

  if (!ctx.skipAuthCheck) {
    const auth = await detectAuthState(driver, settings.timeouts.probe);
    if (auth.isLoginPage && isDedicatedLoginUrl(driver.url())) {
      return {
        success: false,
        action: 'click_by_text',
        error: `Element with text '${text}' not found${LOGIN_PAGE_SUFFIX}`,
        authState: auth,
      };
    }
  }

  const win = await runTiers(CLICK_TIERS, { driver, settings, task: ctx.task, text });
  if (win) {
    log.detail(`Clicked "${win.label}" via ${win.method}`);
    return { success: true, action: 'click_by_text', text: win.label, method: win.method };
  }

  const auth = await detectAuthState(driver, settings.timeouts.probe);
  return {
    success: false,
    action: 'click_by_text',
    error: `Element with text '${text}' not found${auth.isLoginPage ? LOGIN_PAGE_SUFFIX : ''}`,
    authState: auth,
  };
}

export async function waitForModal(ctx: ActionContext): Promise<WaitForModalResult> {
  const modal = await findOpenModal(ctx.driver, ctx.settings.timeouts.modalProbe);
  return modal
    ? { success: true, action: 'wait_for_modal', selector: modal.selector }
    : { success: false, action: 'wait_for_modal', error: 'No modal found' };
}

export async function fillInputs(
  ctx: ActionContext,
  inputs: Record<string, string>,
): Promise<FillInputsResult> {
  const { driver, settings } = ctx;
  const filled: Record<string, string> = {};
  const methods: Record<string, string> = {};
  const errors: Record<string, string> = {};

  if (settings.dismissCookieBanners) {
    await dismissCookieBanner({ driver, settings });
  }

  for (const [field, value] of Object.entries(inputs)) {
    const win = await runTiers(FILL_TIERS, { driver, settings, task: ctx.task, field, value });
    if (win) {
      filled[field] = value;
      methods[field] = win.method;
      log.detail(`Filled "${field}" via ${win.method}`);
    } else {
      errors[field] = 'Field not found';
    }
  }

  const filledFields = Object.keys(filled);
  return {
    success: filledFields.length > 0,
    action: 'fill_inputs',
    filled,
    methods,
    errors,
    isSearch: filledFields.some(isSearchField),
  };
}

export async function clickSubmit(
  ctx: ActionContext,
  buttons: readonly string[],
): Promise<ClickSubmitResult> {
  const { driver, settings } = ctx;
  const win = await runTiers(SUBMIT_TIERS, { driver, settings, task: ctx.task, buttons });

  if (!win) {
    return { success: false, action: 'click_submit', error: 'No submit button found' };
  }
  log.detail(`Submitted with "${win.label}" via ${win.method}`);
  return { success: true, action: 'click_submit', button: win.label, method: win.method };
}

export async function captureState(ctx: ActionContext): Promise<CaptureStateResult> {
  try {
    return {
      success: true,
      action: 'capture_state',
      url: ctx.driver.url(),
      title: await ctx.driver.title(),
    };
  } catch (err) {
    return { success: false, action: 'capture_state', error: errorMessage(err) };
  }
}
