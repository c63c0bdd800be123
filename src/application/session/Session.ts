import { z } from 'zod';

import { AppError, isAppError } from '../../shared/errors/AppError.js';
import { DecodeError } from '../../shared/errors/DecodeError.js';
import { ERROR_CODE } from '../../shared/errors/ErrorCode.js';
import type { RpcCaller } from '../../infrastructure/rpc/RpcCaller.js';
import { RPC_METHOD, UNAUTHENTICATED_METHODS } from '../../infrastructure/rpc/protocol.js';
import { guardTraceSink, noopTraceSink, type TraceSink } from '../../infrastructure/trace/TraceSink.js';
import { selectAdapters, type AdapterSet } from '../adapters/selectAdapters.js';
import { VersionManager } from '../version/VersionManager.js';

/** What resource operations need from a session: calls that carry its token. */
export interface RpcInvoker {
  call(method: string, params: unknown): Promise<unknown>;
}

export type SessionOptions = {
  caller: RpcCaller;
  versions?: VersionManager;
  trace?: TraceSink;
};

const tokenSchema = z.string().min(1);

/**
 * Owns the session token and the adapter selection. Not safe to log in, log
 * out or change version while other calls on the same session are in flight.
 */
export class Session implements RpcInvoker {
  public readonly versions: VersionManager;
  private readonly caller: RpcCaller;
  private readonly trace: TraceSink;
  private token = '';
  private selected: AdapterSet | null = null;

  public constructor(options: SessionOptions) {
    this.caller = options.caller;
    this.versions = options.versions ?? new VersionManager();
    this.trace = guardTraceSink(options.trace ?? noopTraceSink);

    this.versions.subscribe(() => {
      this.selected = this.versions.isKnown ? selectAdapters(this.versions) : null;
    });
    if (this.versions.isKnown) {
      this.selected = selectAdapters(this.versions);
    }
  }

  /**
   * Calls user.login without a token. On success keeps the token and, when no
   * version is known yet, detects it. A failed detection is traced and the
   * login still succeeds; the version stays unknown until detectVersion() or
   * forceVersion() succeeds.
   */
  public async login(user: string, password: string): Promise<string> {
    const result = await this.caller.call(RPC_METHOD.USER_LOGIN, { username: user, password });
    const token = tokenSchema.safeParse(result);
    if (!token.success) {
      throw new DecodeError(`${RPC_METHOD.USER_LOGIN} did not return a session token.`, { resultType: typeof result });
    }

    this.token = token.data;

    if (!this.versions.isKnown) {
      try {
        await this.detectVersion();
      } catch (error) {
        if (!isAppError(error)) {
          throw error;
        }
        await this.trace.write(`Warning: logged in without a server version; retry detectVersion() or call forceVersion()`);
      }
    }

    return this.token;
  }

  /**
   * Ends the session. The local token is dropped even when the server call
   * fails; that failure is still raised.
   */
  public async logout(): Promise<void> {
    if (!this.token) {
      return;
    }

    const auth = this.token;
    try {
      await this.caller.call(RPC_METHOD.USER_LOGOUT, [], { auth });
    } finally {
      this.token = '';
    }
  }

  /** Installs an API token issued outside this client. */
  public useToken(token: string): void {
    const parsed = tokenSchema.safeParse(token);
    if (!parsed.success) {
      throw new AppError('API token must be a non-empty string.', {
        code: ERROR_CODE.VALIDATION_ERROR,
        details: { issues: parsed.error.issues.map((issue) => issue.message) },
        suggestions: ['Pass the token issued by the server, or call login().']
      });
    }
    this.token = parsed.data;
  }

  public currentToken(): string {
    return this.token;
  }

  public get isAuthenticated(): boolean {
    return this.token.length > 0;
  }

  public async detectVersion(): Promise<string> {
    let version: string;
    try {
      version = await this.versions.detect(this.caller);
    } catch (error) {
      const summary = isAppError(error) ? JSON.stringify(error) : String(error);
      await this.trace.write(`Version detection failed: ${summary}`);
      throw error;
    }
    await this.trace.write(`Detected version: ${version}`);

    if (!this.versions.isCompatible) {
      await this.trace.write(`Warning: version ${version} is outside the supported 6.x/7.x range`);
    }
    await this.trace.write(`Selected ${this.adapters.item.shape} adapters`);

    return version;
  }

  public forceVersion(version: string): void {
    this.versions.forceVersion(version);
  }

  public get adapters(): AdapterSet {
    if (!this.selected) {
      throw new AppError('Server version is not known yet.', {
        code: ERROR_CODE.VERSION_UNKNOWN,
        suggestions: ['Call login() or detectVersion() first, or force a version.']
      });
    }
    return this.selected;
  }

  public async call(method: string, params: unknown): Promise<unknown> {
    if (UNAUTHENTICATED_METHODS.has(method)) {
      return this.caller.call(method, params);
    }
    if (!this.token) {
      throw new AppError(`${method} needs a session token.`, {
        code: ERROR_CODE.NOT_AUTHENTICATED,
        details: { method },
        suggestions: ['Call login() or useToken() first.']
      });
    }
    return this.caller.call(method, params, { auth: this.token });
  }
}
