export interface DuelConfig {
  readonly turnTimeoutSeconds: number;
  readonly roomCodeLength: number;
  readonly roomCodeAttempts: number;
  readonly defaultRating: number;
  readonly kFactor: number;
  readonly defaultTargetScore: number;
  readonly banSeconds: number;
  readonly maxJoinFailuresPerMinute: number;
  readonly suspiciousAttemptsPerMinute: number;
  readonly submitsPerMinute: number;
  readonly farmWinsPerMinuteThreshold: number;
  readonly scoreCacheTtlSeconds: number;
  readonly oracleTimeoutMs: number;
  readonly adminDisplayNames: readonly string[];
}

export type DuelConfigOverrides = Partial<DuelConfig>;

export function createDuelConfig(overrides: DuelConfigOverrides = {}): DuelConfig {
  return {
    turnTimeoutSeconds: overrides.turnTimeoutSeconds ?? 30,
    roomCodeLength: overrides.roomCodeLength ?? 8,
    roomCodeAttempts: overrides.roomCodeAttempts ?? 12,
    defaultRating: overrides.defaultRating ?? 1000,
    kFactor: overrides.kFactor ?? 32,
    defaultTargetScore: overrides.defaultTargetScore ?? 10,
    banSeconds: overrides.banSeconds ?? 300,
    maxJoinFailuresPerMinute: overrides.maxJoinFailuresPerMinute ?? 12,
    suspiciousAttemptsPerMinute: overrides.suspiciousAttemptsPerMinute ?? 8,
    submitsPerMinute: overrides.submitsPerMinute ?? 40,
    farmWinsPerMinuteThreshold: overrides.farmWinsPerMinuteThreshold ?? 5,
    scoreCacheTtlSeconds: overrides.scoreCacheTtlSeconds ?? 60 * 60 * 24,
    oracleTimeoutMs: overrides.oracleTimeoutMs ?? 1_500,
    adminDisplayNames: (overrides.adminDisplayNames ?? ["admin"]).map((name) =>
      name.toLowerCase(),
    ),
  };
}
