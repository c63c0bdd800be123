import { z } from 'zod';

import { AppError } from '../../shared/errors/AppError.js';
import { DecodeError } from '../../shared/errors/DecodeError.js';
import { ERROR_CODE } from '../../shared/errors/ErrorCode.js';
import type { RpcCaller } from '../../infrastructure/rpc/RpcCaller.js';
import { RPC_METHOD } from '../../infrastructure/rpc/protocol.js';
import { ALL_FEATURES, COMPATIBLE_MAJORS, computeFeatures, parseVersion, type FeatureName, type ParsedVersion } from './features.js';

export type VersionChangeListener = (manager: VersionManager) => void;

const versionResultSchema = z.string().trim().min(1);

/**
 * Holds the server version and the feature flags derived from it. Flags only
 * change through detect() or forceVersion(); each change recomputes the whole
 * table and notifies subscribers.
 */
export class VersionManager {
  private raw = '';
  private parsed: ParsedVersion = { major: 0, minor: 0 };
  private features = computeFeatures(this.parsed);
  private readonly listeners = new Set<VersionChangeListener>();

  /** Asks the server for its version. The call never carries a session token. */
  public static async query(caller: RpcCaller): Promise<string> {
    const result = await caller.call(RPC_METHOD.API_VERSION, []);
    const parsed = versionResultSchema.safeParse(result);
    if (!parsed.success) {
      throw new DecodeError(`${RPC_METHOD.API_VERSION} returned an unexpected result.`, { result });
    }
    return parsed.data;
  }

  public async detect(caller: RpcCaller): Promise<string> {
    const version = await VersionManager.query(caller);
    this.apply(version);
    return this.raw;
  }

  /** Sets the version without asking the server. A blank version is refused and changes nothing. */
  public forceVersion(version: string): void {
    if (version.trim().length === 0) {
      throw new AppError('A forced version must not be blank.', {
        code: ERROR_CODE.VALIDATION_ERROR,
        details: { version },
        suggestions: ['Pass a version such as "7.0.0".']
      });
    }
    this.apply(version);
  }

  public subscribe(listener: VersionChangeListener): () => void {
    this.listeners.add(listener);
    return () => {
      this.listeners.delete(listener);
    };
  }

  public get version(): string {
    return this.raw;
  }

  public get major(): number {
    return this.parsed.major;
  }

  public get minor(): number {
    return this.parsed.minor;
  }

  public get isKnown(): boolean {
    return this.raw.length > 0;
  }

  /** Whether the major is one whose wire formats this client knows. */
  public get isCompatible(): boolean {
    return COMPATIBLE_MAJORS.has(this.parsed.major);
  }

  public isFeatureSupported(feature: string): boolean {
    return this.features.get(feature) ?? false;
  }

  public majorAtLeast(major: number): boolean {
    return this.parsed.major >= major;
  }

  public supportedFeatures(): FeatureName[] {
    return ALL_FEATURES.filter((feature) => this.isFeatureSupported(feature));
  }

  private apply(version: string): void {
    this.raw = version.trim();
    this.parsed = parseVersion(this.raw);
    this.features = computeFeatures(this.parsed);

    for (const listener of [...this.listeners]) {
      listener(this);
    }
  }
}
