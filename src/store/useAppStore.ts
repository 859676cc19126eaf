/**
 * Application Store
 *
 * This is the single source of truth for all application state.
 * It uses Zustand with immer and owns the registry value, the running
 * drill session and the notice shown to the user.
 *
 * Key design decisions:
 * - Registry mutations run on an immer draft through the domain functions
 * - Every mutation is saved through the gateway BEFORE it is committed, so
 *   the store never exposes unsaved state and a failed save changes nothing
 * - Domain errors are recorded in `error`/`notice`; anything else propagates
 */

import { createContext, useContext } from 'react';
import { createStore } from 'zustand/vanilla';
import { useStore } from 'zustand';
import { immer } from 'zustand/middleware/immer';
import { castDraft, enableMapSet, produce } from 'immer';
import type {
  Card,
  CardUpdate,
  Collection,
  CollectionSummary,
  DrillOrder,
  DrillState,
  Registry,
} from '../domain';
import * as domain from '../domain';
import type { PersistenceGateway } from '../services/persistence';
import type { Notice } from '../types';

// Enable immer support for the registry's Map
enableMapSet();

// ============================================================================
// Store State Interface
// ============================================================================

interface AppState {
  registry: Registry;
  /** Running Learn-mode session */
  drill: DrillState | null;
  notice: Notice | null;
  error: domain.FlashcardError | null;
}

// ============================================================================
// Store Actions Interface
// ============================================================================

interface AppActions {
  // === Collection Actions ===
  /** Returns the stored (trimmed) name, or null on failure */
  createCollection: (name: string) => string | null;
  deleteCollection: (name: string) => boolean;

  // === Card Mutation Actions ===
  addCard: (collectionName: string, front: string, back: string) => Card | null;
  editCard: (collectionName: string, cardId: string, update: CardUpdate) => Card | null;
  deleteCard: (collectionName: string, cardId: string) => boolean;

  // === Query Methods ===
  getCollection: (name: string) => Collection | null;
  listCollectionSummaries: () => CollectionSummary[];
  searchCards: (collectionName: string, query: string) => Card[];

  // === Drill Actions ===
  startDrill: (collectionName: string, order: DrillOrder) => boolean;
  revealCard: () => void;
  submitAnswer: (input: string) => void;
  endDrill: () => void;

  // === UI Actions ===
  dismissNotice: () => void;
}

export type AppStore = AppState & AppActions;

export interface AppStoreOptions {
  gateway: PersistenceGateway;
  /** Random source for drill ordering */
  random?: () => number;
}

// ============================================================================
// Store Implementation
// ============================================================================

export const createAppStore = ({ gateway, random = Math.random }: AppStoreOptions) =>
  createStore<AppStore>()(
    immer((set, get) => {
      /**
       * Record a domain failure. Unexpected errors are rethrown.
       */
      const fail = (e: unknown): void => {
        if (!domain.isFlashcardError(e)) {
          throw e;
        }
        const error = e;
        if (error.type === 'persistence_error') {
          console.error(error.message, error.cause);
        }
        set(state => {
          state.error = castDraft(error);
          state.notice = { type: 'error', title: error.message, message: error.suggestion };
        });
      };

      /**
       * Apply a registry mutation write-through: run it on a draft, save the
       * result, then commit. Any failure leaves the registry untouched.
       */
      const commit = <T>(recipe: (draft: Registry) => T, describe: (result: T) => Notice): T | null => {
        const results: T[] = [];
        let next: Registry;
        try {
          next = produce(get().registry, draft => {
            results.push(recipe(draft));
          });
          gateway.save(next);
        } catch (e) {
          fail(e);
          return null;
        }

        const [result] = results;
        set(state => {
          state.registry = castDraft(next);
          state.error = null;
          state.notice = describe(result);
        });
        return result;
      };

      return {
        // === Initial State ===
        registry: gateway.load(),
        drill: null,
        notice: null,
        error: null,

        // === Collection Actions ===

        createCollection: (name) =>
          commit(
            draft => domain.createCollection(draft, name).name,
            created => ({ type: 'success', title: `Created collection '${created}'.` })
          ),

        deleteCollection: (name) => {
          const deleted = commit(
            draft => {
              domain.deleteCollection(draft, name);
              return true;
            },
            () => ({ type: 'success', title: 'Deleted.' })
          );
          return deleted === true;
        },

        // === Card Mutation Actions ===

        addCard: (collectionName, front, back) =>
          commit(
            draft => ({ ...domain.addCard(domain.requireCollection(draft, collectionName), front, back) }),
            card => ({ type: 'success', title: `Added card ${card.id}.` })
          ),

        editCard: (collectionName, cardId, update) =>
          commit(
            draft => ({ ...domain.editCard(domain.requireCollection(draft, collectionName), cardId, update) }),
            () => ({ type: 'success', title: 'Updated.' })
          ),

        deleteCard: (collectionName, cardId) => {
          const removed = commit(
            draft => ({ ...domain.deleteCard(domain.requireCollection(draft, collectionName), cardId) }),
            () => ({ type: 'success', title: 'Deleted.' })
          );
          return removed !== null;
        },

        // === Query Methods ===

        getCollection: (name) => domain.getCollection(get().registry, name),

        listCollectionSummaries: () => domain.listCollectionSummaries(get().registry),

        searchCards: (collectionName, query) => {
          const collection = domain.getCollection(get().registry, collectionName);
          return collection ? domain.searchCards(collection, query) : [];
        },

        // === Drill Actions ===

        startDrill: (collectionName, order) => {
          let drill: DrillState;
          try {
            const collection = domain.requireCollection(get().registry, collectionName);
            drill = domain.startDrill(collectionName, collection.cards, order, random);
          } catch (e) {
            fail(e);
            return false;
          }
          set(state => {
            state.drill = castDraft(drill);
            state.error = null;
            state.notice = null;
          });
          return true;
        },

        revealCard: () => {
          const { drill } = get();
          if (!drill) return;
          const next = domain.revealCard(drill);
          set(state => {
            state.drill = castDraft(next);
          });
        },

        submitAnswer: (input) => {
          const { drill } = get();
          if (!drill) return;
          const next = domain.submitAnswer(drill, input);
          set(state => {
            state.drill = castDraft(next);
          });
        },

        endDrill: () => {
          set(state => {
            state.drill = null;
          });
        },

        // === UI Actions ===

        dismissNotice: () => {
          set(state => {
            state.notice = null;
            state.error = null;
          });
        },
      };
    })
  );

export type AppStoreApi = ReturnType<typeof createAppStore>;

// ============================================================================
// React binding
// ============================================================================

export const AppStoreContext = createContext<AppStoreApi | null>(null);

/**
 * Select from the application store provided by AppStoreContext
 */
export function useAppStore<T>(selector: (state: AppStore) => T): T {
  const store = useContext(AppStoreContext);
  if (!store) {
    throw new Error('useAppStore must be used within an AppStoreContext provider');
  }
  return useStore(store, selector);
}
