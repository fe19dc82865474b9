/**
 * Playwright Page Driver
 *
 * Adapts a Playwright Page to the PageDriver contract. Locators are XPath
 * expressions and are handed to Playwright's `xpath=` selector engine.
 */

import type { ElementHandle, Page } from 'playwright-core';
import type { DriverElement, PageDriver } from '../types/driver.js';
import { logger } from '../utils/logger.js';

const log = logger.driver;

function toSelector(locator: string): string {
  return locator.startsWith('xpath=') ? locator : `xpath=${locator}`;
}

export class PlaywrightElement implements DriverElement {
  constructor(readonly handle: ElementHandle) {}

  async tagName(): Promise<string> {
    return this.handle.evaluate((node) => node.nodeName.toLowerCase());
  }

  async attribute(name: string): Promise<string | null> {
    return this.handle.getAttribute(name);
  }

  async text(): Promise<string> {
    return this.handle.innerText();
  }

  async innerHTML(): Promise<string> {
    return this.handle.innerHTML();
  }

  async parent(): Promise<DriverElement | null> {
    const parentHandle = await this.handle.evaluateHandle((node) => node.parentElement);
    const parent = parentHandle.asElement();
    if (!parent) {
      await parentHandle.dispose();
      return null;
    }
    return new PlaywrightElement(parent);
  }

  async isSameElement(other: DriverElement): Promise<boolean> {
    if (!(other instanceof PlaywrightElement)) {
      return false;
    }
    return this.handle.evaluate((node, otherNode) => node === otherNode, other.handle);
  }

  async click(): Promise<void> {
    await this.handle.click();
  }

  async clear(): Promise<void> {
    await this.handle.fill('');
  }

  async type(text: string): Promise<void> {
    await this.handle.type(text);
  }

  async release(): Promise<void> {
    await this.handle.dispose();
  }
}

export class PlaywrightDriver implements PageDriver {
  constructor(private readonly page: Page) {}

  async title(): Promise<string> {
    return this.page.title();
  }

  async findElement(locator: string): Promise<DriverElement | null> {
    const handle = await this.page.$(toSelector(locator));
    if (!handle) {
      log.debug('No element for locator', { locator });
      return null;
    }
    return new PlaywrightElement(handle);
  }

  async findElements(tag: string): Promise<DriverElement[]> {
    const handles = await this.page.$$(tag);
    log.debug('Enumerated elements', { tag, count: handles.length });
    return handles.map((handle) => new PlaywrightElement(handle));
  }
}
