/**
 * Copyright (c) 2025 LangPatrol (Gavel Inc.)
 * Licensed under the MIT License.
 * See LICENSE file for details.
 */
// SPDX-License-Identifier: MIT

import type { Direction, IrregularEntry, IrregularMatch } from '../types';
import { restoreCase } from '../util/casing';

// "snow-goose", "wisdom tooth", "field_mouse"
const COMPOUND_SEPARATOR = /[\s_-]$/;

type Candidate = { key: string; entry: IrregularEntry; kind: IrregularMatch['kind'] };

function counterpart(entry: IrregularEntry, direction: Direction): string {
  return direction === 'plural' ? entry.plural : entry.singular;
}

/**
 * Bidirectional singular/plural table for words no suffix rule covers.
 * Keys are lower-cased; adding a key again replaces its counterpart.
 */
export class IrregularTable {
  private readonly singles = new Map<string, IrregularEntry>();
  private readonly plurals = new Map<string, IrregularEntry>();

  get size(): number {
    return this.singles.size;
  }

  add(singular: string, plural: string, compound = false): IrregularEntry {
    const entry: IrregularEntry = {
      singular: singular.toLowerCase(),
      plural: plural.toLowerCase(),
      compound
    };

    const previous = this.singles.get(entry.singular);
    if (previous && this.plurals.get(previous.plural) === previous) {
      this.plurals.delete(previous.plural);
    }

    this.singles.set(entry.singular, entry);
    this.plurals.set(entry.plural, entry);
    return entry;
  }

  lookup(word: string, direction: Direction): IrregularMatch | null {
    const token = word.toLowerCase();
    const { source, target } = this.maps(direction);

    // Already in the requested form
    const kept = target.get(token);
    if (kept) {
      return { entry: kept, kind: 'keep', output: restoreCase(word, token) };
    }

    const replaced = source.get(token);
    if (replaced) {
      return { entry: replaced, kind: 'replace', output: restoreCase(word, counterpart(replaced, direction)) };
    }

    return this.lookupCompound(word, token, direction);
  }

  clear(): void {
    this.singles.clear();
    this.plurals.clear();
  }

  private maps(direction: Direction): {
    source: Map<string, IrregularEntry>;
    target: Map<string, IrregularEntry>;
  } {
    return direction === 'plural'
      ? { source: this.singles, target: this.plurals }
      : { source: this.plurals, target: this.singles };
  }

  /**
   * Match an irregular noun at the end of a longer word. Separated compounds
   * match any entry; closed compounds ("forefoot") only entries flagged `compound`.
   * The longest suffix wins, and on a tie the word is kept.
   */
  private lookupCompound(word: string, token: string, direction: Direction): IrregularMatch | null {
    // Lower-casing changed the length (e.g. dotted capital I), so offsets would not line up
    if (word.length !== token.length) return null;

    const { source, target } = this.maps(direction);
    const searches: Array<[Map<string, IrregularEntry>, IrregularMatch['kind']]> = [
      [target, 'keep'],
      [source, 'replace']
    ];

    let best: Candidate | null = null;
    for (const [map, kind] of searches) {
      for (const [key, entry] of map) {
        if (key.length >= token.length || !token.endsWith(key)) continue;
        const prefix = token.slice(0, token.length - key.length);
        if (!entry.compound && !COMPOUND_SEPARATOR.test(prefix)) continue;
        if (!best || key.length > best.key.length) {
          best = { key, entry, kind };
        }
      }
    }

    if (!best) return null;

    const split = word.length - best.key.length;
    const replacement = best.kind === 'keep' ? best.key : counterpart(best.entry, direction);
    return {
      entry: best.entry,
      kind: best.kind,
      output: word.slice(0, split) + restoreCase(word.slice(split), replacement)
    };
  }
}
