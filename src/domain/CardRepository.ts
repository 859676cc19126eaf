/**
 * Card Repository
 *
 * Card operations scoped to a single collection. Like the registry
 * functions, mutations work in place and are expected to run on a draft.
 *
 * Key responsibilities:
 * - Validating card text (trimmed, never empty)
 * - Assigning ids that are unique within the collection
 * - Keeping insertion order stable across edits and deletes
 */

import type { Card, CardUpdate, Collection } from './types';
import { createFlashcardError } from './errors';
import { generateUniqueCardId } from './id';

/**
 * Add a card to the end of the collection
 */
export function addCard(collection: Collection, front: string, back: string): Card {
  const trimmedFront = front.trim();
  const trimmedBack = back.trim();
  if (!trimmedFront || !trimmedBack) {
    throw createFlashcardError('Front and back cannot be empty.', 'empty_field');
  }

  const card: Card = {
    id: generateUniqueCardId(collection.cards.map(c => c.id)),
    front: trimmedFront,
    back: trimmedBack,
  };
  collection.cards.push(card);
  return card;
}

export function findCard(collection: Collection, id: string): Card | null {
  return collection.cards.find(c => c.id === id) ?? null;
}

/**
 * Partially update a card. Fields that are missing or blank keep their
 * current value, so a field is never cleared.
 */
export function editCard(collection: Collection, id: string, update: CardUpdate): Card {
  const card = findCard(collection, id);
  if (!card) {
    throw createFlashcardError(`Card id '${id}' not found.`, 'not_found');
  }

  const front = update.front?.trim();
  const back = update.back?.trim();
  if (front) card.front = front;
  if (back) card.back = back;

  return card;
}

/**
 * Remove a card; the remaining cards keep their relative order
 */
export function deleteCard(collection: Collection, id: string): Card {
  const index = collection.cards.findIndex(c => c.id === id);
  if (index === -1) {
    throw createFlashcardError(`Card id '${id}' not found.`, 'not_found');
  }
  const [removed] = collection.cards.splice(index, 1);
  return removed;
}

/**
 * Case-insensitive substring search over front and back, in stored order.
 * An empty query matches every card.
 */
export function searchCards(collection: Collection, query: string): Card[] {
  const q = query.toLowerCase();
  return collection.cards.filter(
    c => c.front.toLowerCase().includes(q) || c.back.toLowerCase().includes(q)
  );
}
