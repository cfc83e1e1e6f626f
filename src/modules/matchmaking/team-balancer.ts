import { TEAM_SIZE } from './match';
import { Player } from './player';

/** Two-team split with its form totals. */
export interface TeamSplit {
  teamA: Player[];
  teamB: Player[];
  formSumA: number;
  formSumB: number;
  /** |avg form A - avg form B| */
  balanceScore: number;
}

/** Highest form first; equal form falls back to lower id. */
export function compareByFormDesc(a: Player, b: Player): number {
  return b.form - a.form || a.id - b.id;
}

/**
 * Greedy split into two equal teams: walk players by form (high to low) and give
 * each to team A while A has room and its running sum is not ahead of B's.
 * Deterministic; approximates the minimum-difference partition, not guaranteed optimal.
 */
export function balanceTeams(
  players: readonly Player[],
  teamSize: number = TEAM_SIZE,
): TeamSplit {
  if (players.length !== teamSize * 2) {
    throw new RangeError(
      `balanceTeams expects ${teamSize * 2} players, got ${players.length}`,
    );
  }

  const teamA: Player[] = [];
  const teamB: Player[] = [];
  let formSumA = 0;
  let formSumB = 0;

  for (const p of [...players].sort(compareByFormDesc)) {
    const bFull = teamB.length >= teamSize;
    if (teamA.length < teamSize && (bFull || formSumA <= formSumB)) {
      teamA.push(p);
      formSumA += p.form;
    } else {
      teamB.push(p);
      formSumB += p.form;
    }
  }

  return {
    teamA,
    teamB,
    formSumA,
    formSumB,
    // Equal team sizes: difference of averages == difference of sums / size.
    balanceScore: Math.abs(formSumA - formSumB) / teamSize,
  };
}
