/**
 * Raised when an invocation names a file or directory that cannot be analysed.
 * The CLI turns it into a non-zero exit before anything is written.
 */
export class DocsInputError extends Error {
  constructor(
    message: string,
    readonly target?: string,
  ) {
    super(message);
    this.name = "DocsInputError";
  }
}

/**
 * Raised when a scan is cancelled or runs past its deadline.
 */
export class AnalysisAbortedError extends Error {
  constructor(
    readonly completed: number,
    readonly total: number,
  ) {
    super(`Analysis aborted after ${completed} of ${total} documents`);
    this.name = "AnalysisAbortedError";
  }
}
