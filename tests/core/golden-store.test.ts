/**
 * Tests for the golden reference store and snapshot capture
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import * as fs from 'node:fs/promises';
import * as os from 'node:os';
import * as path from 'node:path';
import { captureSnapshot, isContainerTag } from '../../src/core/attribute-snapshot.js';
import { GoldenReferenceStore } from '../../src/core/golden-store.js';
import { goldenTableSchema, type GoldenTable } from '../../src/types/healing.js';
import { JsonFileStore, MemoryStore, StateValidationError } from '../../src/utils/persistent-store.js';
import { DomDriver } from '../helpers/dom-driver.js';

const LOGIN_PAGE = `<!DOCTYPE html><html><head><title>Login Page</title></head><body>
<form id="login" class="auth-form">
  <input id="email" name="email" type="email">
  <div class="card"><span>Welcome</span></div>
</form>
</body></html>`;

const EMAIL_LOCATOR = "//input[@id='email']";

describe('captureSnapshot', () => {
  let driver: DomDriver;

  beforeEach(() => {
    driver = new DomDriver(LOGIN_PAGE);
  });

  afterEach(() => {
    driver.close();
  });

  it('should capture attributes and the parent', async () => {
    expect(await captureSnapshot(driver.query('#email'), { sourceLocator: EMAIL_LOCATOR })).toEqual({
      tag: 'input',
      id: 'email',
      name: 'email',
      'data-testid': null,
      class: null,
      text: '',
      parent: { tag: 'form', id: 'login', name: null, 'data-testid': null, class: 'auth-form' },
      sourceLocator: EMAIL_LOCATOR,
    });
  });

  it('should capture innerHTML for container tags only', async () => {
    const card = await captureSnapshot(driver.query('.card'));
    expect(card.innerHTML).toBe('<span>Welcome</span>');
    expect(card.text).toBe('Welcome');
    expect((await captureSnapshot(driver.query('#email'))).innerHTML).toBeUndefined();
  });

  it('should recognize container tags', () => {
    expect(isContainerTag('DIV')).toBe(true);
    expect(isContainerTag('input')).toBe(false);
  });
});

describe('GoldenReferenceStore', () => {
  let driver: DomDriver;

  beforeEach(() => {
    driver = new DomDriver(LOGIN_PAGE);
  });

  afterEach(() => {
    driver.close();
  });

  it('should load an empty table when nothing is persisted', async () => {
    const store = new GoldenReferenceStore(new MemoryStore<GoldenTable>());
    expect(await store.load()).toEqual({});
  });

  it('should capture a golden on first sight and persist it', async () => {
    const persistence = new MemoryStore<GoldenTable>();
    const store = new GoldenReferenceStore(persistence);
    await store.load();

    const result = await store.capture(driver, 'Login Page', EMAIL_LOCATOR);

    expect(result.identifier).toBe('Login_Page_golden_email');
    expect(result.pageKey).toBe('Login_Page');
    expect(result.created).toBe(true);
    expect(persistence.peek()?.Login_Page?.Login_Page_golden_email?.id).toBe('email');
  });

  it('should create the page namespace even when capture fails', async () => {
    const persistence = new MemoryStore<GoldenTable>();
    const store = new GoldenReferenceStore(persistence);
    await store.load();

    const result = await store.capture(driver, 'Login Page', "//input[@id='missing']");

    expect(result).toEqual({
      identifier: "Login_Page_golden___inputid='missing'",
      pageKey: 'Login_Page',
      created: false,
      snapshot: null,
    });
    expect(persistence.peek()).toEqual({ Login_Page: {} });
  });

  it('should persist a new namespace only once', async () => {
    const persistence = new MemoryStore<GoldenTable>();
    const store = new GoldenReferenceStore(persistence);

    expect(await store.ensurePage('Login_Page')).toBe(true);
    expect(await store.ensurePage('Login_Page')).toBe(false);
    expect(persistence.getSaveCount()).toBe(1);
  });

  it('should find a golden through its source locator after the element is gone', async () => {
    const store = new GoldenReferenceStore(new MemoryStore<GoldenTable>());
    const first = await store.capture(driver, 'Login Page', EMAIL_LOCATOR);

    driver.setHtml(LOGIN_PAGE.replace('id="email"', 'id="email-v2"'));
    const second = await store.capture(driver, 'Login Page', EMAIL_LOCATOR);

    expect(second.identifier).toBe(first.identifier);
    expect(second.created).toBe(false);
    expect(second.snapshot).toEqual(first.snapshot);
    expect(store.findByLocator('Login_Page', EMAIL_LOCATOR)).toBe('Login_Page_golden_email');
  });

  it('should not overwrite an existing golden reached through another locator', async () => {
    const store = new GoldenReferenceStore(new MemoryStore<GoldenTable>());
    await store.capture(driver, 'Login Page', EMAIL_LOCATOR);

    const alias = await store.capture(driver, 'Login Page', "//*[@name='email']");

    expect(alias.identifier).toBe('Login_Page_golden_email');
    expect(alias.created).toBe(false);
    expect(alias.snapshot?.sourceLocator).toBe(EMAIL_LOCATOR);
  });

  it('should return a copy of the table', async () => {
    const store = new GoldenReferenceStore(new MemoryStore<GoldenTable>());
    await store.capture(driver, 'Login Page', EMAIL_LOCATOR);

    const table = store.getTable();
    delete table.Login_Page;

    expect(store.get('Login_Page', 'Login_Page_golden_email')).not.toBeNull();
  });

  describe('on disk', () => {
    let testDir: string;
    let filePath: string;

    beforeEach(async () => {
      testDir = await fs.mkdtemp(path.join(os.tmpdir(), 'golden-store-test-'));
      filePath = path.join(testDir, 'global_golden.json');
    });

    afterEach(async () => {
      await fs.rm(testDir, { recursive: true, force: true });
    });

    it('should leave the file byte-identical when capturing twice', async () => {
      const store = new GoldenReferenceStore(new JsonFileStore(filePath, goldenTableSchema));
      await store.load();

      await store.capture(driver, 'Login Page', EMAIL_LOCATOR);
      const before = await fs.readFile(filePath, 'utf-8');
      const again = await store.capture(driver, 'Login Page', EMAIL_LOCATOR);
      const after = await fs.readFile(filePath, 'utf-8');

      expect(again.created).toBe(false);
      expect(after).toBe(before);
    });

    it('should write pretty-printed JSON keyed by page', async () => {
      const store = new GoldenReferenceStore(new JsonFileStore(filePath, goldenTableSchema));
      await store.capture(driver, 'Login Page', EMAIL_LOCATOR);

      const content = await fs.readFile(filePath, 'utf-8');
      const parsed: unknown = JSON.parse(content);

      expect(content).toContain('\n  "Login_Page": {\n');
      expect(goldenTableSchema.parse(parsed).Login_Page.Login_Page_golden_email.tag).toBe('input');
    });

    it('should reload what a previous session stored', async () => {
      await new GoldenReferenceStore(new JsonFileStore(filePath, goldenTableSchema)).capture(
        driver,
        'Login Page',
        EMAIL_LOCATOR
      );

      const reloaded = new GoldenReferenceStore(new JsonFileStore(filePath, goldenTableSchema));
      const table = await reloaded.load();

      expect(Object.keys(table.Login_Page)).toEqual(['Login_Page_golden_email']);
    });

    it('should reject a table that fails validation', async () => {
      await fs.writeFile(filePath, JSON.stringify({ Login_Page: { bad: { id: 'x' } } }), 'utf-8');
      const store = new GoldenReferenceStore(new JsonFileStore(filePath, goldenTableSchema));

      await expect(store.load()).rejects.toBeInstanceOf(StateValidationError);
    });
  });
});
