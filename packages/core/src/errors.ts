/**
 * Errors raised by the analysis layer
 */

/**
 * An analysis session produced nothing that could be ranked
 */
export class EvaluationError extends Error {
  readonly code = 'EVALUATION_FAILED';

  constructor(
    message: string,
    /** FEN of the analysed position */
    public readonly fen: string,
    /** Moves played on top of the position before the search */
    public readonly extraMoves: readonly string[] = [],
  ) {
    super(message);
    this.name = 'EvaluationError';
    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, new.target);
    }
  }
}
