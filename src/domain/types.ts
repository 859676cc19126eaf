/**
 * Domain Model Types
 *
 * Core types for the flashcard manager. The data forms a strict tree:
 * Registry -> Collection -> Card, with no back references.
 */

/**
 * A front/back text pair. The id is assigned on creation and never changes.
 */
export interface Card {
  id: string;
  front: string;
  back: string;
}

/**
 * A named, ordered set of cards. Insertion order is the display and
 * sequential drill order.
 */
export interface Collection {
  name: string;
  cards: Card[];
}

/**
 * The top-level aggregate: every collection keyed by its exact name.
 */
export interface Registry {
  collections: Map<string, Collection>;
}

/** Partial update for a card; blank or missing values keep the stored text */
export interface CardUpdate {
  front?: string;
  back?: string;
}

/** Collection name with its card count, for listings */
export interface CollectionSummary {
  name: string;
  cardCount: number;
}

// ============================================================================
// Drill Session
// ============================================================================

export type DrillOrder = 'sequential' | 'random';

export type Judgment = 'correct' | 'wrong' | 'skipped' | 'quit';

/**
 * - presented: front is shown, waiting for reveal
 * - revealed: back is shown, waiting for a judgment
 * - completed: every card was judged
 * - terminated: the user quit early
 */
export type DrillPhase = 'presented' | 'revealed' | 'completed' | 'terminated';

export interface DrillTallies {
  correct: number;
  wrong: number;
  skipped: number;
  totalCards: number;
  cardsSeen: number;
}

export interface DrillState {
  readonly collectionName: string;
  /** Snapshot taken at session start, already in drill order */
  readonly cards: Card[];
  readonly index: number;
  readonly phase: DrillPhase;
  readonly correct: number;
  readonly wrong: number;
  readonly skipped: number;
  /** Set when the last submitted answer was not a valid judgment */
  readonly lastInputRejected: boolean;
}
