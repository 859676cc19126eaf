/**
 * Collection Registry
 *
 * Lookup and lifecycle operations for collections. Mutating functions
 * change the registry they are given in place; the store runs them on an
 * immer draft, so a thrown error discards the whole change.
 */

import type { Collection, CollectionSummary, Registry } from './types';
import { createFlashcardError } from './errors';

export function createEmptyRegistry(): Registry {
  return { collections: new Map() };
}

/**
 * All collection names, sorted by code point
 */
export function listCollectionNames(registry: Registry): string[] {
  return [...registry.collections.keys()].sort(compareNames);
}

/**
 * Names with card counts, in the same order as listCollectionNames
 */
export function listCollectionSummaries(registry: Registry): CollectionSummary[] {
  return listCollectionNames(registry).map(name => ({
    name,
    cardCount: registry.collections.get(name)?.cards.length ?? 0,
  }));
}

/**
 * Get a collection by exact name
 */
export function getCollection(registry: Registry, name: string): Collection | null {
  return registry.collections.get(name) ?? null;
}

/**
 * Get a collection by exact name, failing with not_found when absent
 */
export function requireCollection(registry: Registry, name: string): Collection {
  const collection = registry.collections.get(name);
  if (!collection) {
    throw createFlashcardError(`Collection '${name}' not found.`, 'not_found');
  }
  return collection;
}

/**
 * Create an empty collection. The name is trimmed first.
 */
export function createCollection(registry: Registry, name: string): Collection {
  const trimmed = name.trim();
  if (!trimmed) {
    throw createFlashcardError('Collection name cannot be empty.', 'empty_field');
  }
  if (registry.collections.has(trimmed)) {
    throw createFlashcardError('A collection with that name already exists.', 'duplicate_name');
  }

  const collection: Collection = { name: trimmed, cards: [] };
  registry.collections.set(trimmed, collection);
  return collection;
}

/**
 * Delete a collection together with all of its cards
 */
export function deleteCollection(registry: Registry, name: string): void {
  if (!registry.collections.delete(name)) {
    throw createFlashcardError(`Collection '${name}' not found.`, 'not_found');
  }
}

// Code point order, not UTF-16 code unit order
function compareNames(a: string, b: string): number {
  const left = [...a];
  const right = [...b];
  const length = Math.min(left.length, right.length);
  for (let i = 0; i < length; i++) {
    const diff = (left[i].codePointAt(0) ?? 0) - (right[i].codePointAt(0) ?? 0);
    if (diff !== 0) return diff;
  }
  return left.length - right.length;
}
