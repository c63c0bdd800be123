import { AppError } from './AppError.js';
import { ERROR_CODE } from './ErrorCode.js';

/** A lookup that must match exactly one resource matched `count` of them. */
export class CardinalityError extends AppError {
  public readonly count: number;

  public constructor(count: number, details: Record<string, unknown> = {}) {
    super(`Expected exactly one result, got ${count}.`, {
      code: ERROR_CODE.CARDINALITY_ERROR,
      details: { ...details, count },
      suggestions: count === 0 ? ['Check the id; the resource may have been deleted.'] : []
    });
    this.name = 'CardinalityError';
    this.count = count;
  }
}

/** The server acted on a different number of resources than were sent. */
export class CountMismatchError extends AppError {
  public readonly expected: number;
  public readonly actual: number;

  public constructor(expected: number, actual: number, details: Record<string, unknown> = {}) {
    super(`Expected ${expected}, got ${actual}.`, {
      code: ERROR_CODE.COUNT_MISMATCH,
      details: { ...details, expected, actual }
    });
    this.name = 'CountMismatchError';
    this.expected = expected;
    this.actual = actual;
  }
}
