/**
 * Domain Module
 *
 * This module exports the collection, card and drill session domain models.
 * All registry mutations should go through these exports.
 */

// Types
export type {
  Card,
  CardUpdate,
  Collection,
  CollectionSummary,
  Registry,
  DrillOrder,
  DrillPhase,
  DrillState,
  DrillTallies,
  Judgment,
} from './types';

// Errors
export {
  FlashcardError,
  createFlashcardError,
  isFlashcardError,
} from './errors';

export type { FlashcardErrorType } from './errors';

// Identifiers
export {
  generateCardId,
  generateUniqueCardId,
  setIdSource,
  resetIdSource,
} from './id';

// Collection registry
export {
  createEmptyRegistry,
  listCollectionNames,
  listCollectionSummaries,
  getCollection,
  requireCollection,
  createCollection,
  deleteCollection,
} from './CollectionRegistry';

// Card repository
export {
  addCard,
  findCard,
  editCard,
  deleteCard,
  searchCards,
} from './CardRepository';

// Drill session
export {
  startDrill,
  shuffle,
  currentCard,
  isDrillFinished,
  revealCard,
  judgeCard,
  parseJudgment,
  submitAnswer,
  getTallies,
} from './DrillSession';
