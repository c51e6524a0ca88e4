/**
 * Revision Errors
 *
 * Thrown to programmatic callers only. Turn processing itself never throws
 * these; a missing session in continueSession becomes a not-found response.
 */

export type RevisionErrorCode = 'SESSION_NOT_FOUND' | 'INVALID_INPUT';

export class RevisionError extends Error {
  readonly code: RevisionErrorCode;

  constructor(message: string, code: RevisionErrorCode) {
    super(message);
    this.name = 'RevisionError';
    this.code = code;
  }
}
