/**
 * Raised when a document is structurally or semantically unusable.
 * The message is stored on the failed report, so it is written for the
 * uploader rather than for operators.
 */
export class CompilationError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'CompilationError';
  }
}
