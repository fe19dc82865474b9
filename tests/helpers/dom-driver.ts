/**
 * In-process PageDriver backed by jsdom
 *
 * Real DOM, real XPath evaluation through document.evaluate. setHtml()
 * swaps the whole document to simulate a deploy that changed the markup.
 */

import { JSDOM } from 'jsdom';
import type { DriverElement, PageDriver } from '../../src/types/driver.js';

const ELEMENT_NODE = 1;
/** XPathResult.FIRST_ORDERED_NODE_TYPE */
const FIRST_ORDERED_NODE_TYPE = 9;

function isElement(node: Node | null): node is Element {
  return node !== null && node.nodeType === ELEMENT_NODE;
}

export class DomElement implements DriverElement {
  released = false;

  /** Elements handed out through a driver register in its handle list */
  constructor(
    readonly node: Element,
    private readonly handles?: DomElement[]
  ) {
    handles?.push(this);
  }

  async tagName(): Promise<string> {
    return this.node.tagName.toLowerCase();
  }

  async attribute(name: string): Promise<string | null> {
    return this.node.getAttribute(name);
  }

  async text(): Promise<string> {
    return this.node.textContent ?? '';
  }

  async innerHTML(): Promise<string> {
    return this.node.innerHTML;
  }

  async parent(): Promise<DriverElement | null> {
    const parent = this.node.parentElement;
    return parent ? new DomElement(parent, this.handles) : null;
  }

  async isSameElement(other: DriverElement): Promise<boolean> {
    return other instanceof DomElement && other.node === this.node;
  }

  async click(): Promise<void> {
    const view = this.window();
    this.node.dispatchEvent(new view.MouseEvent('click', { bubbles: true }));
  }

  async clear(): Promise<void> {
    this.field().value = '';
  }

  async type(text: string): Promise<void> {
    this.field().value += text;
  }

  async release(): Promise<void> {
    if (this.released) {
      throw new Error('Element handle released twice');
    }
    this.released = true;
  }

  private window(): Window & typeof globalThis {
    const view = this.node.ownerDocument.defaultView;
    if (!view) {
      throw new Error('Element is detached from its window');
    }
    return view;
  }

  private field(): HTMLInputElement | HTMLTextAreaElement {
    const view = this.window();
    if (this.node instanceof view.HTMLInputElement || this.node instanceof view.HTMLTextAreaElement) {
      return this.node;
    }
    throw new Error(`<${this.node.tagName.toLowerCase()}> is not a text field`);
  }
}

export class DomDriver implements PageDriver {
  private dom: JSDOM;
  /** Every element handed out by findElement/findElements and their parents */
  readonly handles: DomElement[] = [];

  constructor(html: string) {
    this.dom = new JSDOM(html);
  }

  get document(): Document {
    return this.dom.window.document;
  }

  /** Replace the page markup */
  setHtml(html: string): void {
    this.dom.window.close();
    this.dom = new JSDOM(html);
  }

  /** First element matching a CSS selector, for assertions */
  query(selector: string): DomElement {
    const node = this.document.querySelector(selector);
    if (!node) {
      throw new Error(`No element matches ${selector}`);
    }
    return new DomElement(node);
  }

  /** Value of a text field, for assertions */
  valueOf(selector: string): string {
    const node = this.document.querySelector(selector);
    const view = this.dom.window;
    if (node instanceof view.HTMLInputElement || node instanceof view.HTMLTextAreaElement) {
      return node.value;
    }
    throw new Error(`${selector} is not a text field`);
  }

  /** Handed-out elements not yet released */
  liveHandles(): DomElement[] {
    return this.handles.filter((handle) => !handle.released);
  }

  close(): void {
    this.dom.window.close();
  }

  async title(): Promise<string> {
    return this.document.title;
  }

  async findElement(locator: string): Promise<DriverElement | null> {
    const result = this.document.evaluate(locator, this.document, null, FIRST_ORDERED_NODE_TYPE, null);
    const node = result.singleNodeValue;
    return isElement(node) ? new DomElement(node, this.handles) : null;
  }

  async findElements(tag: string): Promise<DriverElement[]> {
    return Array.from(this.document.getElementsByTagName(tag), (node) => new DomElement(node, this.handles));
  }
}

/**
 * Wraps a driver and lets a test rewrite what findElement returns,
 * e.g. to simulate a reference that goes stale between synthesis and verification
 */
export class InterceptingDriver implements PageDriver {
  constructor(
    private readonly inner: PageDriver,
    private readonly intercept: (locator: string, found: DriverElement | null) => Promise<DriverElement | null> | DriverElement | null
  ) {}

  title(): Promise<string> {
    return this.inner.title();
  }

  async findElement(locator: string): Promise<DriverElement | null> {
    return this.intercept(locator, await this.inner.findElement(locator));
  }

  findElements(tag: string): Promise<DriverElement[]> {
    return this.inner.findElements(tag);
  }
}
