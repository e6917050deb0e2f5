/**
 * Structuring Error Types
 *
 * Soft failures are returned as reason codes; they only become thrown
 * errors when the host has switched off falling back to the flat prompt.
 */

export type StructuringFailureReason =
  | 'NO_BOUNDARY_FOUND'
  | 'MISSING_CONVERSATION_ID'
  | 'EMPTY_HISTORY'
  | 'EMPTY_BLOCKS'
  | 'TOO_FEW_TURNS';

export const FAILURE_DESCRIPTIONS: Record<StructuringFailureReason, string> = {
  NO_BOUNDARY_FOUND: 'could not split the system prefix and suffix out of the prompt',
  MISSING_CONVERSATION_ID: 'the call context has no conversation id',
  EMPTY_HISTORY: 'the message store returned no history',
  EMPTY_BLOCKS: 'no history message had renderable content',
  TOO_FEW_TURNS: 'fewer than two structured turns were produced',
};

export class StructuringError extends Error {
  readonly code: string;
  readonly recoverable: boolean;

  constructor(
    message: string,
    options: { code: string; recoverable: boolean; cause?: unknown }
  ) {
    super(message, { cause: options.cause });
    this.name = 'StructuringError';
    this.code = options.code;
    this.recoverable = options.recoverable;
  }
}

export class StructuringFailedError extends StructuringError {
  readonly reason: StructuringFailureReason;

  constructor(reason: StructuringFailureReason) {
    super(`Structured message build failed: ${FAILURE_DESCRIPTIONS[reason]}`, {
      code: reason,
      recoverable: true,
    });
    this.name = 'StructuringFailedError';
    this.reason = reason;
  }
}

/** A collaborator threw while the structured request was being built or sent. */
export class UnexpectedStructuringError extends StructuringError {
  constructor(detail: string, cause: unknown) {
    super(`Structured request failed unexpectedly: ${detail}`, {
      code: 'UNEXPECTED_FAILURE',
      recoverable: false,
      cause,
    });
    this.name = 'UnexpectedStructuringError';
  }
}
