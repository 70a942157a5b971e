/**
 * Copyright (c) 2025 LangPatrol (Gavel Inc.)
 * Licensed under the MIT License.
 * See LICENSE file for details.
 */
// SPDX-License-Identifier: MIT

export class UncountableSet {
  private readonly words = new Set<string>();

  get size(): number {
    return this.words.size;
  }

  add(word: string): void {
    this.words.add(word.toLowerCase());
  }

  has(word: string): boolean {
    return this.words.has(word.toLowerCase());
  }

  clear(): void {
    this.words.clear();
  }
}
