/**
 * Golden identifiers
 *
 * Pure derivation of the key a golden reference is stored under. Identical
 * inputs always give the identical key, so separate runs agree on identity
 * without coordinating.
 */

import type { IdentityAttributes } from '../types/healing.js';

/** Texts at or above this length are not used as an identity */
const MAX_TEXT_IDENTITY_LENGTH = 20;

const UNTITLED_PAGE_KEY = 'untitled';

/**
 * Namespace for a page, derived from its title
 */
export function toPageKey(title: string): string {
  const trimmed = title.trim();
  return trimmed ? trimmed.replace(/ /g, '_') : UNTITLED_PAGE_KEY;
}

export function sanitizeLocator(locator: string): string {
  return locator.replace(/\//g, '_').replace(/[[\]@]/g, '');
}

/**
 * Which attribute class produced an identifier
 */
export type IdentifierSource = 'data-testid' | 'id' | 'name' | 'class' | 'text' | 'locator';

export interface DerivedIdentifier {
  identifier: string;
  source: IdentifierSource;
}

function identitySuffix(
  locator: string,
  attributes: IdentityAttributes | null
): { suffix: string; source: IdentifierSource } {
  if (attributes) {
    const testId = attributes['data-testid'];
    if (testId) return { suffix: testId, source: 'data-testid' };

    if (attributes.id) return { suffix: attributes.id, source: 'id' };
    if (attributes.name) return { suffix: attributes.name, source: 'name' };

    const classes = attributes.class?.trim();
    if (classes) {
      return { suffix: `${attributes.tag}_${classes.replace(/\s+/g, '_')}`, source: 'class' };
    }

    const text = attributes.text.trim();
    if (text && text.length < MAX_TEXT_IDENTITY_LENGTH) {
      return { suffix: `${attributes.tag}_${text.replace(/ /g, '_')}`, source: 'text' };
    }
  }

  return { suffix: sanitizeLocator(locator), source: 'locator' };
}

/**
 * Derive the golden identifier with the attribute class it came from.
 * Without attributes the sanitized locator is used.
 */
export function deriveIdentifier(
  pageTitle: string,
  locator: string,
  attributes: IdentityAttributes | null
): DerivedIdentifier {
  const { suffix, source } = identitySuffix(locator, attributes);
  return { identifier: `${toPageKey(pageTitle)}_golden_${suffix}`, source };
}

export function deriveGoldenIdentifier(
  pageTitle: string,
  locator: string,
  attributes: IdentityAttributes | null
): string {
  return deriveIdentifier(pageTitle, locator, attributes).identifier;
}
