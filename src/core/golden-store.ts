/**
 * Golden Reference Store
 *
 * Keyed mapping pageKey -> (goldenIdentifier -> AttributeSnapshot), persisted
 * write-through after every mutation. A golden is created once, the first
 * time its locator resolves, and never overwritten afterwards.
 */

import type { PageDriver } from '../types/driver.js';
import { GoldenCaptureFailedError } from '../types/errors.js';
import type { AttributeSnapshot, GoldenTable } from '../types/healing.js';
import type { StateStore } from '../utils/persistent-store.js';
import { logger } from '../utils/logger.js';
import { captureSnapshot } from './attribute-snapshot.js';
import { deriveIdentifier, toPageKey } from './golden-identifier.js';

const log = logger.golden;

export interface CaptureResult {
  identifier: string;
  pageKey: string;
  /** True when this call stored a new golden */
  created: boolean;
  /** The stored golden, or null when capture failed */
  snapshot: AttributeSnapshot | null;
}

export class GoldenReferenceStore {
  private table: GoldenTable = {};

  constructor(private readonly persistence: StateStore<GoldenTable>) {}

  /**
   * Read durable state. A missing file is a valid, empty start state.
   */
  async load(): Promise<GoldenTable> {
    this.table = (await this.persistence.load()) ?? {};
    log.debug('Golden table loaded', {
      pages: Object.keys(this.table).length,
    });
    return this.getTable();
  }

  /**
   * Overwrite durable state, optionally replacing the in-memory table first
   */
  async store(table?: GoldenTable): Promise<void> {
    if (table) {
      this.table = structuredClone(table);
    }
    await this.persistence.save(this.table);
  }

  /**
   * Create an empty namespace for a page the first time it is seen.
   * Returns true when the namespace was created.
   */
  async ensurePage(pageKey: string): Promise<boolean> {
    if (this.table[pageKey]) {
      return false;
    }
    this.table[pageKey] = {};
    await this.store();
    log.info('Created golden namespace for page', { page: pageKey });
    return true;
  }

  get(pageKey: string, identifier: string): AttributeSnapshot | null {
    return this.table[pageKey]?.[identifier] ?? null;
  }

  /**
   * Identifier of the golden captured through a locator, if any
   */
  findByLocator(pageKey: string, locator: string): string | null {
    const goldens = this.table[pageKey];
    if (!goldens) {
      return null;
    }
    for (const [identifier, snapshot] of Object.entries(goldens)) {
      if (snapshot.sourceLocator === locator) {
        return identifier;
      }
    }
    return null;
  }

  getTable(): GoldenTable {
    return structuredClone(this.table);
  }

  /**
   * Ensure a golden exists for a locator and return its identifier.
   *
   * Idempotent: an existing golden, found through its source locator or its
   * derived identifier, is returned untouched. Otherwise the live element is
   * captured, inserted and persisted. When the element cannot be found the
   * identifier is still returned and nothing is stored.
   */
  async capture(driver: PageDriver, pageTitle: string, locator: string): Promise<CaptureResult> {
    const pageKey = toPageKey(pageTitle);
    await this.ensurePage(pageKey);

    const known = this.findByLocator(pageKey, locator);
    if (known) {
      return { identifier: known, pageKey, created: false, snapshot: this.get(pageKey, known) };
    }

    const element = await driver.findElement(locator);
    if (!element) {
      const { identifier } = deriveIdentifier(pageTitle, locator, null);
      const existing = this.get(pageKey, identifier);
      if (!existing) {
        log.warn('Golden capture failed', {
          page: pageKey,
          goldenId: identifier,
          locator,
          error: new GoldenCaptureFailedError(locator, { pageKey, goldenId: identifier }),
        });
      }
      return { identifier, pageKey, created: false, snapshot: existing };
    }

    let snapshot: AttributeSnapshot;
    try {
      snapshot = await captureSnapshot(element, { sourceLocator: locator });
    } finally {
      await element.release();
    }
    const { identifier, source } = deriveIdentifier(pageTitle, locator, snapshot);

    const existing = this.get(pageKey, identifier);
    if (existing) {
      return { identifier, pageKey, created: false, snapshot: existing };
    }

    this.table[pageKey] = { ...this.table[pageKey], [identifier]: snapshot };
    await this.store();

    log.info('Captured golden reference', {
      page: pageKey,
      goldenId: identifier,
      identitySource: source,
      tag: snapshot.tag,
      locator,
    });

    return { identifier, pageKey, created: true, snapshot };
  }
}
