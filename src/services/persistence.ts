/**
 * Persistence Gateway
 *
 * Loads and saves the whole registry as one JSON document:
 *
 *   { "collections": { "<name>": { "cards": [{ "id", "front", "back" }] } } }
 *
 * Loading never fails: a missing, unreadable or malformed file yields an
 * empty registry. Saving fails loudly with a persistence_error.
 */

import { existsSync, mkdirSync, readFileSync, renameSync, rmSync, writeFileSync } from 'node:fs';
import { dirname } from 'node:path';
import type { Card, Registry } from '../domain';
import { createEmptyRegistry, createFlashcardError } from '../domain';

export interface PersistenceGateway {
  load(): Registry;
  /** Throws a persistence_error FlashcardError when the write fails */
  save(registry: Registry): void;
}

/** Serialized document shape */
export interface PersistedRegistry {
  collections: Record<string, PersistedCollection>;
}

export interface PersistedCollection {
  cards: Card[];
}

// ============================================================================
// Encoding
// ============================================================================

export function encodeRegistry(registry: Registry): PersistedRegistry {
  const entries = [...registry.collections].map(([name, collection]): [string, PersistedCollection] => [
    name,
    { cards: collection.cards.map(c => ({ id: c.id, front: c.front, back: c.back })) },
  ]);
  return { collections: Object.fromEntries(entries) };
}

const isObject = (value: unknown): value is Record<string, unknown> =>
  !!value && typeof value === 'object' && !Array.isArray(value);

function hasExactKeys(value: Record<string, unknown>, keys: string[]): boolean {
  const own = Object.keys(value);
  return own.length === keys.length && keys.every(k => Object.prototype.hasOwnProperty.call(value, k));
}

function decodeCard(value: unknown): Card | null {
  if (!isObject(value) || !hasExactKeys(value, ['id', 'front', 'back'])) return null;
  const { id, front, back } = value;
  if (typeof id !== 'string' || typeof front !== 'string' || typeof back !== 'string') return null;
  if (!front.trim() || !back.trim()) return null;
  return { id, front, back };
}

/**
 * Validate a parsed document and build a registry from it.
 * Returns null when any part of the document has missing or unknown fields,
 * a blank collection name, a blank card side, or a card id repeated within
 * a collection.
 */
export function decodeRegistry(value: unknown): Registry | null {
  if (!isObject(value) || !hasExactKeys(value, ['collections'])) return null;
  const { collections } = value;
  if (!isObject(collections)) return null;

  const registry = createEmptyRegistry();
  for (const [name, entry] of Object.entries(collections)) {
    if (!name.trim()) return null;
    if (!isObject(entry) || !hasExactKeys(entry, ['cards']) || !Array.isArray(entry.cards)) {
      return null;
    }
    const cards: Card[] = [];
    const ids = new Set<string>();
    for (const raw of entry.cards) {
      const card = decodeCard(raw);
      if (!card || ids.has(card.id)) return null;
      ids.add(card.id);
      cards.push(card);
    }
    registry.collections.set(name, { name, cards });
  }
  return registry;
}

// ============================================================================
// JSON file gateway
// ============================================================================

export class JsonFileGateway implements PersistenceGateway {
  readonly filePath: string;

  constructor(filePath: string) {
    this.filePath = filePath;
  }

  load(): Registry {
    if (!existsSync(this.filePath)) {
      return createEmptyRegistry();
    }

    let parsed: unknown;
    try {
      parsed = JSON.parse(readFileSync(this.filePath, 'utf-8'));
    } catch (e) {
      console.warn(`Failed to read ${this.filePath}, starting with no collections:`, e);
      return createEmptyRegistry();
    }

    const registry = decodeRegistry(parsed);
    if (!registry) {
      console.warn(`Ignoring ${this.filePath}: unexpected document structure`);
      return createEmptyRegistry();
    }
    return registry;
  }

  save(registry: Registry): void {
    const json = JSON.stringify(encodeRegistry(registry), null, 2) + '\n';
    const tmp = `${this.filePath}.tmp-${process.pid}-${Date.now()}`;
    try {
      mkdirSync(dirname(this.filePath), { recursive: true });
      writeFileSync(tmp, json, 'utf-8');
      renameSync(tmp, this.filePath);
    } catch (e) {
      if (existsSync(tmp)) {
        rmSync(tmp, { force: true });
      }
      throw createFlashcardError(`Failed to save ${this.filePath}.`, 'persistence_error', e);
    }
  }
}
