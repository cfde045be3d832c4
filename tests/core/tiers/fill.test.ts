import { describe, it, expect } from 'vitest';

import { fillInputs } from '../../../src/core/actions.js';
import { dismissCookieBanner } from '../../../src/core/tiers/fill.js';
import { defaultEngineSettings } from '../../../src/config/settings.js';
import { DomDriver, page } from '../../helpers/dom-driver.js';

const settings = defaultEngineSettings();

describe('fill_inputs tiers', () => {
  it('should route search fields through the search tier', async () => {
    const driver = new DomDriver(page('<form><input name="q"></form>'));
    const result = await fillInputs({ driver, settings }, { q: 'vitest' });

    expect(result).toEqual({
      success: true,
      action: 'fill_inputs',
      filled: { q: 'vitest' },
      methods: { q: 'search' },
      errors: {},
      isSearch: true,
    });
    expect(driver.events).toContain('fill:q=vitest');
  });

  it('should fill by label', async () => {
    const driver = new DomDriver(page('<label for="title">Title</label><input id="title" type="text">'));
    const result = await fillInputs({ driver, settings }, { Title: 'Roadmap' });

    expect(result.methods).toEqual({ Title: 'label' });
    expect(driver.events).toContain('fill:title=Roadmap');
  });

  it('should fill by placeholder', async () => {
    const driver = new DomDriver(page('<input name="x1" placeholder="Project name">'));
    const result = await fillInputs({ driver, settings }, { 'project name': 'Apollo' });

    expect(result.methods).toEqual({ 'project name': 'placeholder' });
  });

  it('should fill by a name attribute substring', async () => {
    const driver = new DomDriver(page('<input name="project_name">'));
    const result = await fillInputs({ driver, settings }, { name: 'Apollo' });

    expect(result.methods).toEqual({ name: 'name-attribute' });
    expect(driver.events).toContain('fill:project_name=Apollo');
  });

  it('should fill by an id substring', async () => {
    const driver = new DomDriver(page('<input id="user-email-field" type="email">'));
    const result = await fillInputs({ driver, settings }, { email: 'dev@example.com' });

    expect(result.methods).toEqual({ email: 'id-attribute' });
  });

  it('should fall back to the first text input', async () => {
    const driver = new DomDriver(page('<input type="text" name="foo">'));
    const result = await fillInputs({ driver, settings }, { description: 'Quarterly goals' });

    expect(result.methods).toEqual({ description: 'first-text-input' });
    expect(driver.events).toContain('fill:foo=Quarterly goals');
  });

  it('should clear and fill a code editor', async () => {
    const driver = new DomDriver(page('<div class="code-editor" contenteditable="true">old</div>'));
    const result = await fillInputs({ driver, settings }, { code: 'print(1)' });

    expect(result.methods).toEqual({ code: 'code-editor' });
    expect(driver.events).toContain('fill:div=print(1)');
  });

  it('should prefer the matcher when a task is given', async () => {
    const driver = new DomDriver(
      page(
        '<label for="issue-title">Issue title</label>' +
          '<input id="issue-title" name="title" type="text">',
      ),
    );
    const result = await fillInputs(
      { driver, settings, task: 'create an issue' },
      { title: 'Broken link' },
    );

    expect(result.methods).toEqual({ title: 'context-aware' });
  });

  it('should record fields it cannot find', async () => {
    const driver = new DomDriver(page('<p>No form</p>'));
    const result = await fillInputs({ driver, settings }, { title: 'x' });

    expect(result).toEqual({
      success: false,
      action: 'fill_inputs',
      filled: {},
      methods: {},
      errors: { title: 'Field not found' },
      isSearch: false,
    });
  });

  it('should succeed when at least one field is filled', async () => {
    const driver = new DomDriver(page('<input name="q">'));
    const result = await fillInputs({ driver, settings }, { q: 'docs', missing_field: 'x' });

    expect(result.success).toBe(true);
    expect(result.errors).toEqual({ missing_field: 'Field not found' });
  });

  it('should dismiss a cookie banner before filling', async () => {
    const driver = new DomDriver(
      page('<div class="consent"><button>Accept all</button></div><input name="q">'),
    );
    await fillInputs({ driver, settings }, { q: 'docs' });

    expect(driver.clicked()).toEqual(['Accept all', '']);
  });

  it('should leave the banner alone when disabled', async () => {
    const driver = new DomDriver(
      page('<div class="consent"><button>Accept all</button></div><input name="q">'),
    );
    await fillInputs({ driver, settings: { ...settings, dismissCookieBanners: false } }, { q: 'docs' });

    expect(driver.clicked()).toEqual(['']);
  });
});

describe('dismissCookieBanner', () => {
  it('should report whether it clicked anything', async () => {
    const driver = new DomDriver(page('<p>No banner</p>'));
    expect(await dismissCookieBanner({ driver, settings })).toBe(false);
    expect(driver.pausedMs).toBe(0);
  });
});
