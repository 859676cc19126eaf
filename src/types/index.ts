// Notice shown in the status line after an action
export type NoticeType = 'success' | 'error';

export interface Notice {
  type: NoticeType;
  title: string;
  message?: string;
}

/**
 * Screens of the terminal UI. Screens that act on a collection carry
 * its name so they can be rendered without extra lookups.
 */
export type Screen =
  | { name: 'main' }
  | { name: 'create-collection' }
  | { name: 'open-collection' }
  | { name: 'list-collections' }
  | { name: 'delete-collection' }
  | { name: 'collection'; collection: string }
  | { name: 'learn'; collection: string }
  | { name: 'add-card'; collection: string; returnTo: 'collection' | 'manage' }
  | { name: 'manage-cards'; collection: string }
  | { name: 'list-cards'; collection: string }
  | { name: 'edit-card'; collection: string }
  | { name: 'delete-card'; collection: string }
  | { name: 'search-cards'; collection: string };

export type Navigate = (screen: Screen) => void;
