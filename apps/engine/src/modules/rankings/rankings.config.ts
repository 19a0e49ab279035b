/**
 * Rankings Configuration
 *
 * Fixed constants of the nation and player leaderboards. Tunable
 * thresholds live in EngineConfigService.
 *
 * @module rankings/config
 */

export const RANKING_CONFIG = {
  /** Adjusted scores are expressed per 10,000 */
  SCORE_SCALE: 10_000,

  /** k = average games per nation / K_DIVISOR */
  K_DIVISOR: 2,

  /** CF = CONFIDENCE_MULTIPLIER * k */
  CONFIDENCE_MULTIPLIER: 2,

  /** Activity gate: nations need at least k / ACTIVITY_GATE_DIVISOR games */
  ACTIVITY_GATE_DIVISOR: 4,

  /** Contributors attached to each nation */
  TOP_CONTRIBUTORS_LIMIT: 3,

  /** Player leaderboard entries delivered */
  PLAYER_LEADERBOARD_LIMIT: 50,

  /** Two-letter nation codes; "??" and other placeholders fail it */
  NATION_CODE_PATTERN: /^[A-Z]{2}$/,
} as const;

export function fallbackPlayerName(playerId: string): string {
  return `Player_${playerId}`;
}
