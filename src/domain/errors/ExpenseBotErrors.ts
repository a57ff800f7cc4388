export class ExpenseBotError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

/** Input the user can fix themselves: oversized files, text or captions. The message is shown verbatim. */
export class ValidationError extends ExpenseBotError {}

export class DownloadError extends ExpenseBotError {}

/** The extraction service answered with the ERROR sentinel, or with something we cannot use. */
export class ExtractionError extends ExpenseBotError {}

export class PersistenceError extends ExpenseBotError {
  /** Set when the store call was abandoned at its deadline, so the write may still land. */
  readonly outcomeUnknown: boolean;

  constructor(message: string, options?: { cause?: unknown; outcomeUnknown?: boolean }) {
    super(message, options);
    this.outcomeUnknown = options?.outcomeUnknown ?? false;
  }
}
