import { AppError } from './AppError.js';
import { ERROR_CODE } from './ErrorCode.js';

export class UnsupportedFeatureError extends AppError {
  public readonly feature: string;

  public constructor(feature: string, version: string) {
    super(`${feature} is not supported by server version ${version || 'unknown'}.`, {
      code: ERROR_CODE.UNSUPPORTED_FEATURE,
      details: { feature, version },
      suggestions: version ? [] : ['Log in or force a version before calling version-gated operations.']
    });
    this.name = 'UnsupportedFeatureError';
    this.feature = feature;
  }
}
