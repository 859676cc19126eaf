/**
 * Collection Registry Tests
 *
 * Tests creation, lookup, listing and cascading deletion of collections.
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import {
  createCollection,
  createEmptyRegistry,
  deleteCollection,
  getCollection,
  isFlashcardError,
  listCollectionNames,
  listCollectionSummaries,
  requireCollection,
  resetIdSource,
  setIdSource,
} from '../domain';
import { buildRegistry, counterIdSource } from './testUtils';

function captureError(fn: () => unknown): unknown {
  try {
    fn();
  } catch (e) {
    return e;
  }
  return undefined;
}

describe('Collection Registry', () => {
  beforeEach(() => {
    setIdSource(counterIdSource());
  });

  afterEach(() => {
    resetIdSource();
  });

  describe('createCollection', () => {
    it('inserts an empty collection under its name', () => {
      const registry = createEmptyRegistry();

      const collection = createCollection(registry, 'Spanish');

      expect(collection).toEqual({ name: 'Spanish', cards: [] });
      expect(getCollection(registry, 'Spanish')).toBe(collection);
    });

    it('rejects a duplicate name and leaves the registry unchanged', () => {
      const registry = buildRegistry([{ name: 'Spanish', cards: [{ front: 'hola', back: 'hello' }] }]);
      const existing = getCollection(registry, 'Spanish');

      const error = captureError(() => createCollection(registry, 'Spanish'));

      expect(isFlashcardError(error) && error.type).toBe('duplicate_name');
      expect(registry.collections.size).toBe(1);
      expect(getCollection(registry, 'Spanish')).toBe(existing);
      expect(existing?.cards).toEqual([{ id: '00000001', front: 'hola', back: 'hello' }]);
    });

    it('treats names case-sensitively', () => {
      const registry = createEmptyRegistry();

      createCollection(registry, 'Spanish');
      createCollection(registry, 'spanish');

      expect(listCollectionNames(registry)).toEqual(['Spanish', 'spanish']);
    });

    it('trims surrounding whitespace from the name', () => {
      const registry = createEmptyRegistry();

      createCollection(registry, '  Art history  ');

      expect(listCollectionNames(registry)).toEqual(['Art history']);
    });

    it('rejects a blank name', () => {
      const registry = createEmptyRegistry();

      const error = captureError(() => createCollection(registry, '   '));

      expect(isFlashcardError(error) && error.type).toBe('empty_field');
      expect(registry.collections.size).toBe(0);
    });
  });

  describe('listCollectionNames', () => {
    it('returns names sorted, not in insertion order', () => {
      const registry = createEmptyRegistry();
      createCollection(registry, 'Spanish');
      createCollection(registry, 'French');
      createCollection(registry, 'German');

      expect(listCollectionNames(registry)).toEqual(['French', 'German', 'Spanish']);
    });

    it('orders by code point', () => {
      const registry = createEmptyRegistry();
      createCollection(registry, '\u{1F600} Emoji');
      createCollection(registry, '\uFF01 Fullwidth');
      createCollection(registry, 'Zebra');
      createCollection(registry, 'Zeb');

      expect(listCollectionNames(registry)).toEqual(['Zeb', 'Zebra', '\uFF01 Fullwidth', '\u{1F600} Emoji']);
    });

    it('returns an empty list for an empty registry', () => {
      expect(listCollectionNames(createEmptyRegistry())).toEqual([]);
    });
  });

  describe('listCollectionSummaries', () => {
    it('pairs each sorted name with its card count', () => {
      const registry = buildRegistry([
        { name: 'Spanish', cards: [{ front: 'hola', back: 'hello' }, { front: 'gato', back: 'cat' }] },
        { name: 'Chemistry', cards: [] },
      ]);

      expect(listCollectionSummaries(registry)).toEqual([
        { name: 'Chemistry', cardCount: 0 },
        { name: 'Spanish', cardCount: 2 },
      ]);
    });
  });

  describe('deleteCollection', () => {
    it('removes the collection with all of its cards', () => {
      const registry = buildRegistry([
        { name: 'Spanish', cards: [{ front: 'hola', back: 'hello' }, { front: 'gato', back: 'cat' }] },
        { name: 'French', cards: [{ front: 'chat', back: 'cat' }] },
      ]);
      const french = getCollection(registry, 'French');

      deleteCollection(registry, 'Spanish');

      expect(getCollection(registry, 'Spanish')).toBeNull();
      expect(listCollectionNames(registry)).toEqual(['French']);
      expect(getCollection(registry, 'French')).toBe(french);
      expect(french?.cards).toEqual([{ id: '00000003', front: 'chat', back: 'cat' }]);
    });

    it('fails with not_found for an unknown name', () => {
      const registry = buildRegistry([{ name: 'Spanish', cards: [] }]);

      const error = captureError(() => deleteCollection(registry, 'spanish'));

      expect(isFlashcardError(error) && error.type).toBe('not_found');
      expect(listCollectionNames(registry)).toEqual(['Spanish']);
    });
  });

  describe('lookup', () => {
    it('getCollection returns null for a missing name', () => {
      expect(getCollection(createEmptyRegistry(), 'Nope')).toBeNull();
    });

    it('requireCollection throws not_found for a missing name', () => {
      const error = captureError(() => requireCollection(createEmptyRegistry(), 'Nope'));

      expect(isFlashcardError(error) && error.type).toBe('not_found');
      expect(isFlashcardError(error) && error.message).toBe("Collection 'Nope' not found.");
    });
  });
});
