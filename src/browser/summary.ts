import type { ButtonInfo, InputField, NavigationLink, PageSummary } from '../schema/index.js';
import { LIMITS } from '../config/defaults.js';
import type { EngineTimeouts } from '../config/settings.js';
import type { ElementHandle, ElementSet, PageDriver } from './driver.js';
import { cssString } from './driver.js';
import {
  BUTTON_SELECTOR,
  INPUT_SELECTOR,
  MODAL_REGION,
  MODAL_SELECTORS,
  NAV_LINK_SELECTORS,
} from './regions.js';

type ProbeTimeouts = Pick<EngineTimeouts, 'quickProbe' | 'labelProbe'>;

// ── Public API ───────────────────────────────────────────────

/**
 * Structural summary of the live page: visible buttons, navigation
 * links and inputs, plus whether a modal is open. Built from bounded
 * visibility probes; every call re-reads the page.
 */
export async function summarizePage(
  driver: PageDriver,
  timeouts: ProbeTimeouts,
): Promise<PageSummary> {
  const modal = await findOpenModal(driver, timeouts.quickProbe);
  const hasModal = modal !== null;

  return {
    url: driver.url(),
    buttons: await collectButtons(driver, hasModal, timeouts),
    navigation: await collectNavigation(driver, timeouts),
    inputs: await collectInputs(driver, timeouts),
    hasModal,
  };
}

/** First visible modal-like container, or null. */
export async function findOpenModal(
  driver: PageDriver,
  timeout: number,
): Promise<{ selector: string; element: ElementHandle } | null> {
  for (const selector of MODAL_SELECTORS) {
    const element = driver.find({ strategy: 'css', value: selector }).first();
    if (await element.isVisible(timeout)) return { selector, element };
  }
  return null;
}

// ── Collectors ───────────────────────────────────────────────

async function collectButtons(
  driver: PageDriver,
  hasModal: boolean,
  timeouts: ProbeTimeouts,
): Promise<ButtonInfo[]> {
  const buttons: ButtonInfo[] = [];
  const elements = driver.find({ strategy: 'css', value: BUTTON_SELECTOR });

  for (const el of await visibleElements(elements, LIMITS.MAX_SCANNED_ELEMENTS, timeouts.quickProbe)) {
    const ariaLabel = ((await el.getAttribute('aria-label')) ?? '').trim();
    const text = (await el.textContent()).trim() || ariaLabel;
    if (!text) continue;

    buttons.push({
      text,
      ariaLabel,
      inModal: hasModal && (await el.hasAncestor(MODAL_REGION)),
    });
  }

  return buttons;
}

export async function collectNavigation(
  driver: PageDriver,
  timeouts: ProbeTimeouts,
): Promise<NavigationLink[]> {
  const seen = new Set<string>();
  const links: NavigationLink[] = [];

  for (const selector of NAV_LINK_SELECTORS) {
    const elements = driver.find({ strategy: 'css', value: selector });
    for (const el of await visibleElements(elements, LIMITS.MAX_SCANNED_LINKS, timeouts.quickProbe)) {
      const text = (await el.textContent()).trim();
      if (!text || seen.has(text)) continue;
      seen.add(text);
      links.push({ text });
    }
  }

  return links;
}

export async function collectInputs(
  driver: PageDriver,
  timeouts: ProbeTimeouts,
): Promise<InputField[]> {
  const inputs: InputField[] = [];
  const elements = driver.find({ strategy: 'css', value: INPUT_SELECTOR });

  for (const el of await visibleElements(elements, LIMITS.MAX_SCANNED_INPUTS, timeouts.quickProbe)) {
    inputs.push({
      type: (await el.getAttribute('type')) ?? 'text',
      name: (await el.getAttribute('name')) ?? '',
      placeholder: (await el.getAttribute('placeholder')) ?? '',
      label: await labelFor(driver, el, timeouts.labelProbe),
    });
  }

  return inputs;
}

async function labelFor(
  driver: PageDriver,
  el: ElementHandle,
  timeout: number,
): Promise<string> {
  const id = await el.getAttribute('id');
  if (!id) return '';

  const label = driver.find({ strategy: 'css', value: `label[for=${cssString(id)}]` }).first();
  if (!(await label.isVisible(timeout))) return '';
  return (await label.textContent()).trim();
}

// ── Helpers ──────────────────────────────────────────────────

export async function visibleElements(
  elements: ElementSet,
  limit: number,
  timeout: number,
): Promise<ElementHandle[]> {
  const count = Math.min(await elements.count(), limit);
  const visible: ElementHandle[] = [];

  for (let i = 0; i < count; i++) {
    const el = elements.nth(i);
    if (await el.isVisible(timeout)) visible.push(el);
  }

  return visible;
}
