/**
 * Teams Configuration
 *
 * Fixed constants of team detection. Tunable thresholds live in
 * EngineConfigService.
 *
 * @module teams/config
 */

export const TEAMS_CONFIG = {
  /** Separator of the two sorted ids in a pair label */
  PAIR_LABEL_SEPARATOR: "|",

  /** Lineups reported per community */
  LINEUP_LIMIT: 5,

  /** Decimal places of published metrics */
  DECIMALS: {
    RATE: 4,
    DENSITY: 4,
    STRENGTH: 2,
    ATTENDANCE: 1,
  },
} as const;

export function partyTeamName(leaderName: string): string {
  return `${leaderName}'s Party`;
}

export function communityTeamName(leaderName: string): string {
  return `${leaderName}'s Squad`;
}
