import { mkdtemp, rm, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import path from 'node:path';

import { afterEach, beforeEach, describe, it, expect } from 'vitest';

import {
  MATCHER_WEIGHTS,
  SUBMIT_BUTTON_TEXTS,
  TIMEOUTS,
  loadConfigFile,
  loadConfigOrDefaults,
  parseConfig,
  resolveEngineSettings,
} from '../../src/config/index.js';

describe('parseConfig', () => {
  it('should yield defaults for an empty document', () => {
    const config = parseConfig('', 'yaml');

    expect(config.outputDir).toBe('dataset');
    expect(config.headless).toBe(false);
    expect(config.persistentContext).toBe(true);
    expect(config.submitButtonTexts).toEqual([...SUBMIT_BUTTON_TEXTS]);
    expect(config.matcher.weights).toEqual({ ...MATCHER_WEIGHTS });
    expect(config.auth.checkpoint).toEqual({ loginPage: true, loginButton: 'always' });
    expect(config.llm).toEqual({});
  });

  it('should merge partial weight overrides over the defaults', () => {
    const config = parseConfig('matcher:\n  weights:\n    inModal: 40\n', 'yaml');

    expect(config.matcher.weights).toEqual({ ...MATCHER_WEIGHTS, inModal: 40 });
  });

  it('should read JSON', () => {
    const config = parseConfig('{"headless": true, "auth": {"checkpoint": {"loginButton": "root-only"}}}', 'json');

    expect(config.headless).toBe(true);
    expect(config.auth.checkpoint).toEqual({ loginPage: true, loginButton: 'root-only' });
  });

  it('should reject invalid values', () => {
    expect(() => parseConfig('slowMo: -5\n', 'yaml')).toThrow();
    expect(() => parseConfig('auth:\n  checkpoint:\n    loginButton: sometimes\n', 'yaml')).toThrow();
  });
});

describe('config files', () => {
  let dir: string;

  beforeEach(async () => {
    dir = await mkdtemp(path.join(tmpdir(), 'flowshot-config-'));
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  it('should fall back to defaults when the file is missing', async () => {
    const config = await loadConfigOrDefaults(path.join(dir, 'missing.yaml'));
    expect(config.outputDir).toBe('dataset');
  });

  it('should still fail on a missing file when loaded strictly', async () => {
    await expect(loadConfigFile(path.join(dir, 'missing.yaml'))).rejects.toThrow();
  });

  it('should surface validation errors from an existing file', async () => {
    const file = path.join(dir, '.flowshot.yaml');
    await writeFile(file, 'headless: maybe\n', 'utf-8');

    await expect(loadConfigOrDefaults(file)).rejects.toThrow();
  });

  it('should pick the format from the extension', async () => {
    const file = path.join(dir, 'flowshot.json');
    await writeFile(file, '{"outputDir": "shots"}', 'utf-8');

    const config = await loadConfigFile(file);
    expect(config.outputDir).toBe('shots');
  });
});

describe('resolveEngineSettings', () => {
  it('should override only the timeouts that are set', () => {
    const settings = resolveEngineSettings(parseConfig('timeouts:\n  navigation: 45000\n', 'yaml'));

    expect(settings.timeouts.navigation).toBe(45_000);
    expect(settings.timeouts.action).toBe(TIMEOUTS.ACTION_TIMEOUT);
    expect(settings.timeouts.quickProbe).toBe(TIMEOUTS.QUICK_PROBE_TIMEOUT);
  });

  it('should carry the checkpoint policy and submit texts through', () => {
    const settings = resolveEngineSettings(
      parseConfig('submitButtonTexts: [Publish]\nauth:\n  checkpoint:\n    loginPage: false\n', 'yaml'),
    );

    expect(settings.submitButtonTexts).toEqual(['Publish']);
    expect(settings.checkpoint).toEqual({ loginPage: false, loginButton: 'always' });
  });
});
