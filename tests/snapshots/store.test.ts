import { mkdtemp, readFile, readdir, rm } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import path from 'node:path';

import { afterEach, beforeEach, describe, it, expect } from 'vitest';

import { SnapshotStore } from '../../src/snapshots/store.js';
import { parseCapturedState } from '../../src/schema/index.js';
import { DomDriver, page } from '../helpers/dom-driver.js';

const FIXED_NOW = new Date('2026-01-02T03:04:05.000Z');

describe('SnapshotStore', () => {
  let root: string;
  let store: SnapshotStore;
  let driver: DomDriver;

  beforeEach(async () => {
    root = await mkdtemp(path.join(tmpdir(), 'flowshot-store-'));
    store = await SnapshotStore.open({
      datasetRoot: root,
      taskSlug: 'create-a-project',
      settleMs: 0,
      now: () => FIXED_NOW,
    });
    driver = new DomDriver(page('<h1>Home</h1>'));
  });

  afterEach(async () => {
    await rm(root, { recursive: true, force: true });
  });

  it('should write the screenshot and metadata for a new state', async () => {
    const outcome = await store.captureIfChanged(driver, 'initial');

    expect(outcome.status).toBe('captured');
    expect(driver.screenshots).toEqual([path.join(root, 'create-a-project', '001_initial.png')]);

    const raw = await readFile(path.join(root, 'create-a-project', '001_initial.json'), 'utf-8');
    const record = parseCapturedState(JSON.parse(raw));
    expect(record).toMatchObject({
      index: 1,
      url: 'https://app.example.com/',
      timestamp: '2026-01-02T03:04:05.000Z',
      step: 'initial',
      screenshot: '001_initial.png',
    });
    expect(record.dom_hash).toMatch(/^[0-9a-f]{64}$/);
  });

  it('should skip an unchanged page without touching the index', async () => {
    await store.captureIfChanged(driver, 'initial');
    const outcome = await store.captureIfChanged(driver, 'click-by-text');

    expect(outcome.status).toBe('skipped');
    expect(driver.screenshots).toHaveLength(1);
    expect(store.summary().totalStates).toBe(1);
  });

  it('should always persist a forced capture', async () => {
    await store.captureIfChanged(driver, 'initial');
    const outcome = await store.captureIfChanged(driver, 'after-login', true);

    expect(outcome.status === 'captured' && outcome.state.index).toBe(2);
    expect(store.captured().map((s) => s.step)).toEqual(['initial', 'after-login']);
  });

  it('should capture again once the page changes', async () => {
    await store.captureIfChanged(driver, 'initial');
    driver.setContent(page('<h1>Projects</h1>'));
    const outcome = await store.captureIfChanged(driver, 'click-by-text');

    expect(outcome.status === 'captured' && outcome.state.screenshot).toBe('002_click-by-text.png');
  });

  it('should capture a page again when it returns after a different one', async () => {
    await store.captureIfChanged(driver, 'initial');
    driver.setContent(page('<h1>Projects</h1>'));
    await store.captureIfChanged(driver, 'click-by-text');
    driver.setContent(page('<h1>Home</h1>'));
    const outcome = await store.captureIfChanged(driver, 'goto');

    expect(outcome.status).toBe('captured');
    expect(store.captured().map((s) => s.index)).toEqual([1, 2, 3]);
    expect(store.captured()[0]?.dom_hash).toBe(store.captured()[2]?.dom_hash);
  });

  it('should report a failed capture and keep indices gap-free', async () => {
    driver.failScreenshots = true;
    const failed = await store.captureIfChanged(driver, 'initial');
    expect(failed).toEqual({ status: 'failed', error: 'Screenshot failed' });

    driver.failScreenshots = false;
    const retried = await store.captureIfChanged(driver, 'goto');
    expect(retried.status === 'captured' && retried.state.index).toBe(1);

    const files = await readdir(path.join(root, 'create-a-project'));
    expect(files.sort()).toEqual(['001_goto.json', '001_goto.png']);
  });

  it('should summarise what it holds', async () => {
    await store.captureIfChanged(driver, 'initial');

    expect(store.summary()).toMatchObject({
      taskSlug: 'create-a-project',
      totalStates: 1,
      taskDir: path.join(root, 'create-a-project'),
    });
    expect(store.taskDir).toBe(path.join(root, 'create-a-project'));
  });
});
