export const FEATURE = {
  HISTORY_PUSH: 'history.push',
  MFA: 'mfa',
  PROXY_GROUP: 'proxygroup',
  BROWSER_ITEM: 'browser_item',
  HEADERS_V7: 'headers_v7',
  PROXY_ID: 'proxyid',
  MONITORED_BY: 'monitored_by',
  USER_ROLES: 'user_roles'
} as const;

export type FeatureName = (typeof FEATURE)[keyof typeof FEATURE];

export type ParsedVersion = {
  major: number;
  minor: number;
};

type VersionPredicate = (version: ParsedVersion) => boolean;

const since =
  (major: number, minor = 0): VersionPredicate =>
  (version) =>
    version.major > major || (version.major === major && version.minor >= minor);

/**
 * Every version-dependent decision in the client reads this table. Nothing
 * else compares version numbers.
 */
export const FEATURE_TABLE: Readonly<Record<FeatureName, VersionPredicate>> = {
  [FEATURE.HISTORY_PUSH]: since(7),
  [FEATURE.MFA]: since(7),
  [FEATURE.PROXY_GROUP]: since(7),
  [FEATURE.BROWSER_ITEM]: since(7),
  [FEATURE.HEADERS_V7]: since(7),
  [FEATURE.PROXY_ID]: since(7),
  [FEATURE.MONITORED_BY]: since(7),
  [FEATURE.USER_ROLES]: since(6)
};

/** Majors whose wire formats this client knows. */
export const COMPATIBLE_MAJORS: ReadonlySet<number> = new Set([6, 7]);

export const ALL_FEATURES: readonly FeatureName[] = Object.values(FEATURE);

export const computeFeatures = (version: ParsedVersion): Map<string, boolean> =>
  new Map(ALL_FEATURES.map((feature) => [feature, FEATURE_TABLE[feature](version)]));

const toVersionPart = (token: string | undefined): number => {
  if (token === undefined || !/^\d+$/.test(token.trim())) {
    return 0;
  }
  return Number.parseInt(token.trim(), 10);
};

/** "7.0.3" -> 7/0. Missing or non-numeric parts read as 0. */
export const parseVersion = (raw: string): ParsedVersion => {
  const parts = raw.trim().split('.');
  return {
    major: toVersionPart(parts[0]),
    minor: toVersionPart(parts[1])
  };
};
