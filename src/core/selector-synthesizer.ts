/**
 * Selector Synthesizer
 *
 * Builds a new XPath locator for a chosen live element. Rules are tried in a
 * fixed order, unique stable attributes first and broad structural matches
 * last:
 *
 *   id -> data-testid -> placeholder -> text -> class tokens -> bare tag
 *
 * The result is never trusted as-is; the resolver re-resolves it on the live
 * page before returning it.
 */

import type { DriverElement } from '../types/driver.js';
import type { SynthesisRule } from '../types/healing.js';

export interface SynthesizedLocator {
  rule: SynthesisRule;
  locator: string;
}

/**
 * Quote a string as an XPath 1.0 literal. XPath has no escape sequences, so a
 * value holding both quote kinds is split into a concat() of literals.
 */
export function xpathLiteral(value: string): string {
  if (!value.includes("'")) {
    return `'${value}'`;
  }
  if (!value.includes('"')) {
    return `"${value}"`;
  }
  const parts = value.split("'").map((part) => `'${part}'`);
  return `concat(${parts.join(`, "'", `)})`;
}

function classTokenPredicate(token: string): string {
  return `[contains(concat(' ', normalize-space(@class), ' '), ${xpathLiteral(` ${token} `)})]`;
}

function nonEmpty(value: string | null): value is string {
  return value !== null && value.trim() !== '';
}

/**
 * Every applicable rule for the element, in priority order. The bare tag
 * rule always applies, so the result is never empty.
 */
export async function synthesizeAll(element: DriverElement): Promise<SynthesizedLocator[]> {
  const tag = (await element.tagName()).toLowerCase();
  const locators: SynthesizedLocator[] = [];

  const id = await element.attribute('id');
  if (nonEmpty(id)) {
    locators.push({ rule: 'id', locator: `//*[@id=${xpathLiteral(id)}]` });
  }

  const testId = await element.attribute('data-testid');
  if (nonEmpty(testId)) {
    locators.push({ rule: 'data-testid', locator: `//*[@data-testid=${xpathLiteral(testId)}]` });
  }

  const placeholder = await element.attribute('placeholder');
  if (nonEmpty(placeholder)) {
    locators.push({ rule: 'placeholder', locator: `//${tag}[@placeholder=${xpathLiteral(placeholder)}]` });
  }

  const text = (await element.text()).trim();
  if (text) {
    locators.push({ rule: 'text', locator: `//${tag}[contains(text(), ${xpathLiteral(text)})]` });
  }

  const classes = (await element.attribute('class'))?.trim().split(/\s+/).filter(Boolean) ?? [];
  if (classes.length > 0) {
    locators.push({ rule: 'class', locator: `//${tag}${classes.map(classTokenPredicate).join('')}` });
  }

  locators.push({ rule: 'tag', locator: `//${tag}` });
  return locators;
}

/**
 * The highest-priority locator for the element
 */
export async function synthesize(element: DriverElement): Promise<SynthesizedLocator> {
  const [first] = await synthesizeAll(element);
  if (!first) {
    throw new Error('No synthesis rule applied');
  }
  return first;
}
