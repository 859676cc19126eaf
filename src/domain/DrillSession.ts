/**
 * Drill Session
 *
 * The Learn-mode state machine. A session is an immutable value; each
 * transition takes one input event and returns the next state, in the same
 * way card state updates return new objects.
 *
 * presented --reveal--> revealed --correct/wrong/skipped--> presented (next card)
 *                                                       \-> completed (last card)
 *                       revealed --quit--> terminated
 */

import type { Card, DrillOrder, DrillState, DrillTallies, Judgment } from './types';
import { createFlashcardError } from './errors';

/**
 * Start a session over a snapshot of the given cards.
 * The cards are copied so later edits to the collection do not leak in.
 *
 * @param random - Source of uniform numbers in [0, 1), used for random order
 */
export function startDrill(
  collectionName: string,
  cards: readonly Card[],
  order: DrillOrder,
  random: () => number = Math.random
): DrillState {
  if (cards.length === 0) {
    throw createFlashcardError('No cards to learn yet.', 'nothing_to_learn');
  }

  const snapshot = cards.map(c => ({ ...c }));

  return {
    collectionName,
    cards: order === 'random' ? shuffle(snapshot, random) : snapshot,
    index: 0,
    phase: 'presented',
    correct: 0,
    wrong: 0,
    skipped: 0,
    lastInputRejected: false,
  };
}

/**
 * Fisher-Yates shuffle into a new array
 */
export function shuffle<T>(items: readonly T[], random: () => number = Math.random): T[] {
  const result = [...items];
  for (let i = result.length - 1; i > 0; i--) {
    const j = Math.floor(random() * (i + 1));
    [result[i], result[j]] = [result[j], result[i]];
  }
  return result;
}

export function currentCard(state: DrillState): Card | null {
  if (isDrillFinished(state)) return null;
  return state.cards[state.index] ?? null;
}

export function isDrillFinished(state: DrillState): boolean {
  return state.phase === 'completed' || state.phase === 'terminated';
}

/**
 * Show the back of the current card. Only valid while presented.
 */
export function revealCard(state: DrillState): DrillState {
  if (state.phase !== 'presented') return state;
  return { ...state, phase: 'revealed', lastInputRejected: false };
}

/**
 * Record a judgment for the revealed card and advance
 */
export function judgeCard(state: DrillState, judgment: Judgment): DrillState {
  if (state.phase !== 'revealed') return state;

  if (judgment === 'quit') {
    return { ...state, phase: 'terminated', lastInputRejected: false };
  }

  const next: DrillState = {
    ...state,
    correct: state.correct + (judgment === 'correct' ? 1 : 0),
    wrong: state.wrong + (judgment === 'wrong' ? 1 : 0),
    skipped: state.skipped + (judgment === 'skipped' ? 1 : 0),
    lastInputRejected: false,
  };

  if (state.index + 1 >= state.cards.length) {
    return { ...next, phase: 'completed' };
  }
  return { ...next, index: state.index + 1, phase: 'presented' };
}

const JUDGMENT_INPUTS: Record<string, Judgment> = {
  y: 'correct',
  yes: 'correct',
  n: 'wrong',
  no: 'wrong',
  s: 'skipped',
  skip: 'skipped',
  q: 'quit',
  quit: 'quit',
};

/**
 * Map typed input to a judgment, or null when it is not one
 */
export function parseJudgment(input: string): Judgment | null {
  const key = input.trim().toLowerCase();
  return Object.prototype.hasOwnProperty.call(JUDGMENT_INPUTS, key) ? JUDGMENT_INPUTS[key] : null;
}

/**
 * Apply a typed answer at the judgment prompt. Input that is not a
 * judgment leaves the session where it is and flags the rejection.
 */
export function submitAnswer(state: DrillState, input: string): DrillState {
  if (state.phase !== 'revealed') return state;

  const judgment = parseJudgment(input);
  if (!judgment) {
    return { ...state, lastInputRejected: true };
  }
  return judgeCard(state, judgment);
}

export function getTallies(state: DrillState): DrillTallies {
  return {
    correct: state.correct,
    wrong: state.wrong,
    skipped: state.skipped,
    totalCards: state.cards.length,
    // The card at index has been presented, whatever the phase
    cardsSeen: state.index + 1,
  };
}
