/**
 * Page Driver Boundary
 *
 * The page-automation driver is an external collaborator. These interfaces are
 * the whole contract the healing engine consumes; an adapter for Playwright
 * lives in src/drivers/, tests use an in-process DOM.
 */

/**
 * A live element on the page
 */
export interface DriverElement {
  /** Lowercase tag name */
  tagName(): Promise<string>;

  /** Attribute value, or null when the attribute is absent */
  attribute(name: string): Promise<string | null>;

  /** Visible text of the element */
  text(): Promise<string>;

  innerHTML(): Promise<string>;

  /** The parent element, or null at the document root */
  parent(): Promise<DriverElement | null>;

  /** True when both handles point at the same node */
  isSameElement(other: DriverElement): Promise<boolean>;

  click(): Promise<void>;
  clear(): Promise<void>;
  type(text: string): Promise<void>;

  /** Drop the driver-side handle. The element must not be used afterwards. */
  release(): Promise<void>;
}

/**
 * A live page session
 */
export interface PageDriver {
  /** Page identity, used to namespace golden references */
  title(): Promise<string>;

  /**
   * First element matching a locator expression (XPath dialect),
   * or null when nothing matches
   */
  findElement(locator: string): Promise<DriverElement | null>;

  /** Every element with the given tag name, in document order */
  findElements(tag: string): Promise<DriverElement[]>;
}
