// Error types for the flashcard domain
export type FlashcardErrorType =
  | 'duplicate_name'
  | 'not_found'
  | 'empty_field'
  | 'nothing_to_learn'
  | 'persistence_error';

/**
 * A recoverable failure of a domain or persistence operation.
 * The operation that throws it leaves all state unchanged.
 */
export class FlashcardError extends Error {
  readonly type: FlashcardErrorType;
  readonly suggestion?: string;

  constructor(message: string, type: FlashcardErrorType, options?: { cause?: unknown; suggestion?: string }) {
    super(message, { cause: options?.cause });
    this.name = 'FlashcardError';
    this.type = type;
    this.suggestion = options?.suggestion;
  }
}

/**
 * Creates a structured flashcard error with a hint for the user
 */
export function createFlashcardError(
  message: string,
  type: FlashcardErrorType,
  cause?: unknown
): FlashcardError {
  let suggestion: string | undefined;

  switch (type) {
    case 'duplicate_name':
      suggestion = 'Pick a different name or open the existing collection.';
      break;
    case 'empty_field':
      suggestion = 'Input cannot be empty.';
      break;
    case 'nothing_to_learn':
      suggestion = 'Add a card to this collection first.';
      break;
    case 'persistence_error':
      suggestion = 'Check that the data file is writable. Your last change was not applied.';
      break;
  }

  return new FlashcardError(message, type, { cause, suggestion });
}

export function isFlashcardError(value: unknown): value is FlashcardError {
  return value instanceof FlashcardError;
}
