import { AppError } from './AppError.js';
import { ERROR_CODE } from './ErrorCode.js';

/** A payload value matched none of the wire shapes this client knows. */
export class DecodeError extends AppError {
  public constructor(message: string, details: Record<string, unknown> = {}, cause?: unknown) {
    super(message, {
      code: ERROR_CODE.DECODE_ERROR,
      details,
      cause
    });
    this.name = 'DecodeError';
  }
}
