/**
 * Closed-vocabulary entity recognition over question text
 *
 * Scans for known surface forms (full names and short aliases) with a
 * case-insensitive substring test. Longer forms are tried first so a full
 * name is claimed before its aliases, and each canonical name is emitted at
 * most once no matter how many of its aliases appear.
 */

import type { EntityMention, NodeKind } from '../core/types.js';

/**
 * One known entity and the short forms that refer to it
 */
export interface CatalogEntry {
  /** Canonical display name */
  name: string;
  aliases: string[];
}

export interface EntityCatalog {
  entities: CatalogEntry[];
  /** Lowercase name tokens that mark a canonical name as a person */
  personSurnames: string[];
}

interface SurfaceForm {
  text: string;
  canonical: string;
}

export class EntityRecognizer {
  private surfaceForms: SurfaceForm[];
  private personSurnames: Set<string>;

  constructor(catalog: EntityCatalog) {
    const forms: SurfaceForm[] = [];
    for (const entry of catalog.entities) {
      forms.push({ text: entry.name.toLowerCase(), canonical: entry.name });
      for (const alias of entry.aliases) {
        forms.push({ text: alias.toLowerCase(), canonical: entry.name });
      }
    }

    // Array.prototype.sort is stable, so equal lengths keep catalog order
    this.surfaceForms = forms
      .filter(form => form.text.length > 0)
      .sort((a, b) => b.text.length - a.text.length);
    this.personSurnames = new Set(catalog.personSurnames.map(s => s.toLowerCase()));
  }

  /**
   * Detect known entity mentions in free text
   */
  detect(text: string): EntityMention[] {
    const haystack = text.toLowerCase();
    const detected: EntityMention[] = [];
    const seenNames = new Set<string>();

    for (const form of this.surfaceForms) {
      if (!haystack.includes(form.text)) continue;
      if (seenNames.has(form.canonical)) continue;

      seenNames.add(form.canonical);
      detected.push({
        name: form.canonical,
        kind: this.classify(form.canonical),
        matchedText: form.text
      });
    }

    return detected;
  }

  /**
   * Person when any name token is a known surname, organization otherwise
   */
  classify(canonicalName: string): NodeKind {
    const tokens = canonicalName.toLowerCase().split(/\s+/).filter(Boolean);
    return tokens.some(token => this.personSurnames.has(token)) ? 'person' : 'organization';
  }
}
