import { AppError } from './AppError.js';
import { ERROR_CODE } from './ErrorCode.js';

export type TransportFailureReason = 'network' | 'timeout' | 'http-status' | 'malformed-response';

export type TransportFailureOptions = {
  reason: TransportFailureReason;
  method: string;
  url: string;
  status?: number;
  body?: string;
  cause?: unknown;
};

const SUGGESTIONS: Record<TransportFailureReason, string[]> = {
  network: ['Check that the API URL is reachable from this host.', 'Retry once the endpoint is back.'],
  timeout: ['Retry the call.', 'Raise timeoutMs if the server is slow to answer.'],
  'http-status': ['Check the API URL path (usually /api_jsonrpc.php).'],
  'malformed-response': ['Check that the URL points at the JSON-RPC endpoint and not a web page.']
};

/**
 * The call never produced a decodable response envelope. Nothing about the
 * request's effect on the server is known.
 */
export class TransportFailure extends AppError {
  public readonly reason: TransportFailureReason;
  public readonly method: string;
  public readonly status?: number;

  public constructor(message: string, options: TransportFailureOptions) {
    super(message, {
      code: ERROR_CODE.TRANSPORT_FAILURE,
      details: {
        reason: options.reason,
        method: options.method,
        url: options.url,
        ...(options.status === undefined ? {} : { status: options.status }),
        ...(options.body === undefined ? {} : { body: options.body })
      },
      suggestions: SUGGESTIONS[options.reason],
      retryable: true,
      cause: options.cause
    });
    this.name = 'TransportFailure';
    this.reason = options.reason;
    this.method = options.method;
    this.status = options.status;
  }
}

export const isTransportFailure = (error: unknown): error is TransportFailure => error instanceof TransportFailure;
