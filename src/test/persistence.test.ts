/**
 * Persistence Gateway Tests
 *
 * Tests the document encoding, strict decoding, and the JSON file gateway
 * against a temporary directory.
 */

import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import { mkdirSync, mkdtempSync, readFileSync, readdirSync, rmSync, writeFileSync } from 'node:fs';
import { join } from 'node:path';
import { tmpdir } from 'node:os';
import { createEmptyRegistry, isFlashcardError, resetIdSource, setIdSource } from '../domain';
import { JsonFileGateway, decodeRegistry, encodeRegistry } from '../services/persistence';
import { buildRegistry, counterIdSource } from './testUtils';

describe('Persistence', () => {
  let testDir: string;

  beforeEach(() => {
    setIdSource(counterIdSource());
    testDir = mkdtempSync(join(tmpdir(), 'flashcards-test-'));
  });

  afterEach(() => {
    resetIdSource();
    vi.restoreAllMocks();
    rmSync(testDir, { recursive: true, force: true });
  });

  describe('encodeRegistry', () => {
    it('produces the collections/cards document shape', () => {
      const registry = buildRegistry([
        { name: 'Spanish', cards: [{ front: 'hola', back: 'hello' }] },
        { name: 'Empty', cards: [] },
      ]);

      expect(encodeRegistry(registry)).toEqual({
        collections: {
          Spanish: { cards: [{ id: '00000001', front: 'hola', back: 'hello' }] },
          Empty: { cards: [] },
        },
      });
    });
  });

  describe('decodeRegistry', () => {
    it('allows the same card id in different collections', () => {
      const registry = decodeRegistry({
        collections: {
          A: { cards: [{ id: 'x', front: 'one', back: 'uno' }] },
          B: { cards: [{ id: 'x', front: 'two', back: 'dos' }] },
        },
      });

      expect(registry?.collections.size).toBe(2);
    });

    it('builds a registry from a valid document', () => {
      const registry = decodeRegistry({
        collections: {
          Spanish: { cards: [{ id: 'abc12345', front: 'gato', back: 'cat' }] },
        },
      });

      expect(registry?.collections.get('Spanish')).toEqual({
        name: 'Spanish',
        cards: [{ id: 'abc12345', front: 'gato', back: 'cat' }],
      });
    });

    it.each([
      ['null', null],
      ['an array', []],
      ['a missing collections key', {}],
      ['collections that is an array', { collections: [] }],
      ['an unknown top-level key', { collections: {}, version: 1 }],
      ['a collection without cards', { collections: { A: {} } }],
      ['a collection with an extra key', { collections: { A: { cards: [], color: 'red' } } }],
      ['cards that is not an array', { collections: { A: { cards: {} } } }],
      ['a card missing back', { collections: { A: { cards: [{ id: 'x', front: 'f' }] } } }],
      ['a card with a numeric id', { collections: { A: { cards: [{ id: 1, front: 'f', back: 'b' }] } } }],
      ['a card with an extra field', { collections: { A: { cards: [{ id: 'x', front: 'f', back: 'b', due: 0 }] } } }],
      ['a blank collection name', { collections: { ' ': { cards: [] } } }],
      ['a card with a blank side', { collections: { A: { cards: [{ id: 'x', front: 'f', back: '   ' }] } } }],
      [
        'a card id repeated within a collection',
        {
          collections: {
            A: {
              cards: [
                { id: 'x', front: 'one', back: 'uno' },
                { id: 'x', front: 'two', back: 'dos' },
              ],
            },
          },
        },
      ],
    ])('rejects %s', (_label, document) => {
      expect(decodeRegistry(document)).toBeNull();
    });
  });

  describe('JsonFileGateway', () => {
    it('loads an empty registry when the file does not exist', () => {
      const gateway = new JsonFileGateway(join(testDir, 'missing.json'));

      expect(gateway.load()).toEqual(createEmptyRegistry());
    });

    it('reproduces the saved registry on load', () => {
      const registry = buildRegistry([
        { name: 'Spanish', cards: [{ front: 'hola', back: 'hello' }, { front: 'gato', back: 'cat' }] },
        { name: 'French', cards: [{ front: 'chat', back: 'cat' }] },
      ]);
      const gateway = new JsonFileGateway(join(testDir, 'flashcards.json'));

      gateway.save(registry);

      expect(gateway.load()).toEqual(registry);
    });

    it('writes indented JSON with non-ASCII text as-is', () => {
      const filePath = join(testDir, 'flashcards.json');
      const registry = buildRegistry([{ name: 'Español', cards: [{ front: 'señor', back: 'mister' }] }]);

      new JsonFileGateway(filePath).save(registry);

      expect(readFileSync(filePath, 'utf-8')).toBe(
        [
          '{',
          '  "collections": {',
          '    "Español": {',
          '      "cards": [',
          '        {',
          '          "id": "00000001",',
          '          "front": "señor",',
          '          "back": "mister"',
          '        }',
          '      ]',
          '    }',
          '  }',
          '}',
          '',
        ].join('\n')
      );
    });

    it('creates missing parent directories', () => {
      const filePath = join(testDir, 'nested', 'deeper', 'flashcards.json');
      const gateway = new JsonFileGateway(filePath);

      gateway.save(buildRegistry([{ name: 'A', cards: [] }]));

      expect(JSON.parse(readFileSync(filePath, 'utf-8'))).toEqual({ collections: { A: { cards: [] } } });
    });

    it('falls back to an empty registry for invalid JSON', () => {
      const warn = vi.spyOn(console, 'warn').mockImplementation(() => {});
      const filePath = join(testDir, 'flashcards.json');
      writeFileSync(filePath, '{ not json', 'utf-8');

      expect(new JsonFileGateway(filePath).load()).toEqual(createEmptyRegistry());
      expect(warn).toHaveBeenCalledTimes(1);
    });

    it('falls back to an empty registry when the top-level key is missing', () => {
      const warn = vi.spyOn(console, 'warn').mockImplementation(() => {});
      const filePath = join(testDir, 'flashcards.json');
      writeFileSync(filePath, JSON.stringify({ decks: {} }), 'utf-8');

      expect(new JsonFileGateway(filePath).load()).toEqual(createEmptyRegistry());
      expect(warn).toHaveBeenCalledWith(`Ignoring ${filePath}: unexpected document structure`);
    });

    it('reports a failed write as persistence_error', () => {
      const blocker = join(testDir, 'blocker');
      writeFileSync(blocker, 'not a directory', 'utf-8');
      const gateway = new JsonFileGateway(join(blocker, 'flashcards.json'));

      let error: unknown;
      try {
        gateway.save(createEmptyRegistry());
      } catch (e) {
        error = e;
      }

      expect(isFlashcardError(error) && error.type).toBe('persistence_error');
      expect(error instanceof Error && error.cause).toBeInstanceOf(Error);
    });

    it('removes the temporary file when the rename fails', () => {
      const filePath = join(testDir, 'flashcards.json');
      mkdirSync(filePath);

      expect(() => new JsonFileGateway(filePath).save(createEmptyRegistry())).toThrow(`Failed to save ${filePath}.`);
      expect(readdirSync(testDir)).toEqual(['flashcards.json']);
    });
  });
});
