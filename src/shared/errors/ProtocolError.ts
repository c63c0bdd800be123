import { AppError } from './AppError.js';
import { ERROR_CODE } from './ErrorCode.js';

export type RpcErrorObject = {
  code: number;
  message: string;
  data?: string;
};

/** Error reported by the server inside a well-formed response envelope. */
export class ProtocolError extends AppError {
  public readonly rpcCode: number;
  public readonly rpcMessage: string;
  public readonly data: string;
  public readonly method: string;

  public constructor(method: string, error: RpcErrorObject) {
    const data = error.data ?? '';
    super(`${error.code} (${error.message}): ${data}`, {
      code: ERROR_CODE.PROTOCOL_ERROR,
      details: { method, rpcCode: error.code, rpcMessage: error.message, data }
    });
    this.name = 'ProtocolError';
    this.rpcCode = error.code;
    this.rpcMessage = error.message;
    this.data = data;
    this.method = method;
  }
}

export const isProtocolError = (error: unknown): error is ProtocolError => error instanceof ProtocolError;
