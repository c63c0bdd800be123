import { ProtocolError } from '../../shared/errors/ProtocolError.js';
import { TransportFailure, type TransportFailureReason } from '../../shared/errors/TransportFailure.js';
import type { RequestEnvelope, ResponseEnvelope } from '../../shared/schema/envelopes.js';
import { DEFAULT_USER_AGENT } from '../../shared/version.js';
import { guardTraceSink, noopTraceSink, type TraceSink } from '../trace/TraceSink.js';
import { CallQueue } from './CallQueue.js';
import type { HttpPoster, PostResult } from './HttpPoster.js';
import {
  CorrelationIdCounter,
  createRequestEnvelope,
  describeRequest,
  parseResponseEnvelope,
  serializeEnvelope
} from './protocol.js';

const MAX_BODY_IN_DETAILS = 512;

export type RpcCallerOptions = {
  url: string;
  poster: HttpPoster;
  trace?: TraceSink;
  /** Allow one call in flight at a time, for servers that cannot take interleaved calls on a session. */
  serialize?: boolean;
  userAgent?: string;
};

export type CallOptions = {
  /** Session token; omitted from the envelope when empty. */
  auth?: string;
};

export type RpcExchange = {
  request: RequestEnvelope;
  response: ResponseEnvelope;
  status: number;
};

const isTimeoutError = (error: unknown): boolean =>
  error instanceof Error && (error.name === 'TimeoutError' || error.name === 'AbortError');

const describeError = (error: unknown): string => {
  if (!(error instanceof Error)) {
    return String(error);
  }
  const cause = error.cause instanceof Error ? `: ${error.cause.message}` : '';
  return `${error.message}${cause}`;
};

const clip = (body: string): string =>
  body.length > MAX_BODY_IN_DETAILS ? `${body.slice(0, MAX_BODY_IN_DETAILS)}...` : body;

/**
 * Executes single JSON-RPC calls. Every call is one POST with no retries;
 * failures before a response envelope is decoded surface as
 * TransportFailure, server-reported errors as ProtocolError.
 */
export class RpcCaller {
  private readonly ids = new CorrelationIdCounter();
  private readonly queue: CallQueue | null;
  private readonly trace: TraceSink;
  private readonly headers: Record<string, string>;

  public constructor(private readonly options: RpcCallerOptions) {
    this.queue = options.serialize ? new CallQueue() : null;
    this.trace = guardTraceSink(options.trace ?? noopTraceSink);
    this.headers = {
      'Content-Type': 'application/json-rpc',
      'User-Agent': options.userAgent ?? DEFAULT_USER_AGENT
    };
  }

  public get url(): string {
    return this.options.url;
  }

  public get serialized(): boolean {
    return this.queue !== null;
  }

  /** Performs the exchange and returns the decoded envelope, error or not. */
  public async send(method: string, params: unknown, options: CallOptions = {}): Promise<RpcExchange> {
    const exchange = () => this.exchange(method, params, options.auth);
    return this.queue ? this.queue.run(exchange) : exchange();
  }

  /** Resolves the call's result; rejects with ProtocolError when the envelope carries an error. */
  public async call(method: string, params: unknown, options: CallOptions = {}): Promise<unknown> {
    const { response } = await this.send(method, params, options);
    if (response.error) {
      throw new ProtocolError(method, response.error);
    }
    return response.result;
  }

  private async exchange(method: string, params: unknown, auth?: string): Promise<RpcExchange> {
    const request = createRequestEnvelope(this.ids.next(), method, params, auth);
    await this.trace.write(`Request (POST): ${describeRequest(request)}`);

    let posted: PostResult;
    try {
      posted = await this.options.poster.post(this.options.url, serializeEnvelope(request), this.headers);
    } catch (error) {
      const reason: TransportFailureReason = isTimeoutError(error) ? 'timeout' : 'network';
      await this.trace.write(`Error   : ${describeError(error)}`);
      throw new TransportFailure(
        reason === 'timeout' ? `${method} timed out.` : `${method} could not reach ${this.options.url}.`,
        { reason, method, url: this.options.url, cause: error }
      );
    }

    await this.trace.write(`Response (${posted.status}): ${posted.body}`);

    let response: ResponseEnvelope;
    try {
      response = parseResponseEnvelope(posted.body);
    } catch (error) {
      const ok = posted.status >= 200 && posted.status < 300;
      throw new TransportFailure(
        ok ? `${method} returned a body that is not a JSON-RPC response.` : `${method} failed with HTTP ${posted.status}.`,
        {
          reason: ok ? 'malformed-response' : 'http-status',
          method,
          url: this.options.url,
          status: posted.status,
          body: clip(posted.body),
          cause: error
        }
      );
    }

    // A null id is allowed: servers send it with errors for requests they could not parse.
    if (response.id !== null && response.id !== request.id) {
      throw new TransportFailure(`${method} received the response to request ${response.id}, not ${request.id}.`, {
        reason: 'malformed-response',
        method,
        url: this.options.url,
        status: posted.status,
        body: clip(posted.body)
      });
    }

    return { request, response, status: posted.status };
  }
}
