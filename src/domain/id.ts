import { randomUUID } from 'node:crypto';

// ============================================================================
// ID Generation
// ============================================================================

const CARD_ID_LENGTH = 8;
const MAX_ID_ATTEMPTS = 16;

const randomHex = (): string => randomUUID().replace(/-/g, '');

let idSource: () => string = randomHex;

/**
 * Generate a short card identifier: the first 8 hex digits of a random UUID.
 * Uniqueness is not checked here; see generateUniqueCardId.
 */
export function generateCardId(): string {
  return idSource().slice(0, CARD_ID_LENGTH);
}

/**
 * Generate an id that does not collide with any of the given ids.
 * Regenerates on collision, giving up after a bounded number of attempts.
 */
export function generateUniqueCardId(existingIds: Iterable<string>): string {
  const taken = new Set(existingIds);
  for (let attempt = 0; attempt < MAX_ID_ATTEMPTS; attempt++) {
    const id = generateCardId();
    if (!taken.has(id)) {
      return id;
    }
  }
  throw new Error(`Could not generate a unique card id after ${MAX_ID_ATTEMPTS} attempts`);
}

/**
 * Replace the random source (for testing purposes)
 * @param source - Returns a string of at least 8 characters per call
 */
export function setIdSource(source: () => string): void {
  idSource = source;
}

/**
 * Restore the default random source
 */
export function resetIdSource(): void {
  idSource = randomHex;
}
