/**
 * Attribute Snapshot capture
 *
 * Reads an element's stable attributes and its parent's through the driver
 * and validates the result, so nothing downstream touches raw attributes.
 */

import type { DriverElement } from '../types/driver.js';
import {
  attributeSnapshotSchema,
  parentSnapshotSchema,
  type AttributeSnapshot,
  type ParentSnapshot,
} from '../types/healing.js';

/** Tags whose markup is worth keeping as a structural hint */
export const CONTAINER_TAGS: ReadonlySet<string> = new Set([
  'div',
  'section',
  'article',
  'nav',
  'main',
  'aside',
  'header',
  'footer',
  'form',
  'ul',
  'ol',
  'table',
]);

export function isContainerTag(tag: string): boolean {
  return CONTAINER_TAGS.has(tag.toLowerCase());
}

export interface CaptureOptions {
  /**
   * Capture innerHTML. Defaults to "only for container tags"; candidates pass
   * true when their golden carries markup to compare against.
   */
  includeInnerHTML?: boolean;
  sourceLocator?: string;
}

async function captureParent(element: DriverElement): Promise<ParentSnapshot | null> {
  const parent = await element.parent();
  if (!parent) {
    return null;
  }
  try {
    return parentSnapshotSchema.parse({
      tag: await parent.tagName(),
      id: await parent.attribute('id'),
      name: await parent.attribute('name'),
      'data-testid': await parent.attribute('data-testid'),
      class: await parent.attribute('class'),
    });
  } finally {
    await parent.release();
  }
}

/**
 * Snapshot a live element
 */
export async function captureSnapshot(
  element: DriverElement,
  options: CaptureOptions = {}
): Promise<AttributeSnapshot> {
  const tag = (await element.tagName()).toLowerCase();
  const includeInnerHTML = options.includeInnerHTML ?? isContainerTag(tag);

  const snapshot: AttributeSnapshot = {
    tag,
    id: await element.attribute('id'),
    name: await element.attribute('name'),
    'data-testid': await element.attribute('data-testid'),
    class: await element.attribute('class'),
    text: (await element.text()).trim(),
    parent: await captureParent(element),
  };

  if (includeInnerHTML) {
    snapshot.innerHTML = (await element.innerHTML()).trim();
  }
  if (options.sourceLocator !== undefined) {
    snapshot.sourceLocator = options.sourceLocator;
  }

  return attributeSnapshotSchema.parse(snapshot);
}
