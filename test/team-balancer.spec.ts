import { Player } from '../src/modules/matchmaking/player';
import { balanceTeams } from '../src/modules/matchmaking/team-balancer';

function player(id: number, form: number): Player {
  return { id, rating: 1500, form, joinTime: 0 };
}

const ids = (team: Player[]) => team.map((p) => p.id);

describe('balanceTeams', () => {
  it('splits five +5 and five -5 players into sums 5 and -5', () => {
    const forms = [5, 5, 5, 5, 5, -5, -5, -5, -5, -5];
    const split = balanceTeams(forms.map((f, i) => player(i + 1, f)));

    expect(ids(split.teamA)).toEqual([1, 3, 5, 9, 10]);
    expect(ids(split.teamB)).toEqual([2, 4, 6, 7, 8]);
    expect(split.formSumA).toBe(5);
    expect(split.formSumB).toBe(-5);
    expect(split.balanceScore).toBe(2);
  });

  it('alternates a descending ladder by running sums', () => {
    const forms = [10, 9, 8, 7, 6, 5, 4, 3, 2, 1];
    const split = balanceTeams(forms.map((f, i) => player(i + 1, f)));

    expect(ids(split.teamA)).toEqual([1, 4, 5, 8, 9]);
    expect(ids(split.teamB)).toEqual([2, 3, 6, 7, 10]);
    expect(split.formSumA).toBe(28);
    expect(split.formSumB).toBe(27);
    expect(split.balanceScore).toBeCloseTo(0.2);
  });

  it('breaks equal form by lower id regardless of input order', () => {
    const players = [10, 9, 8, 7, 6, 5, 4, 3, 2, 1].map((id) => player(id, 0));
    const split = balanceTeams(players);

    expect(ids(split.teamA)).toEqual([1, 2, 3, 4, 5]);
    expect(ids(split.teamB)).toEqual([6, 7, 8, 9, 10]);
    expect(split.balanceScore).toBe(0);
  });

  it('always produces two disjoint teams of five', () => {
    const forms = [-10, 3, 7, -2, 0, 10, -7, 4, 1, -4];
    const split = balanceTeams(forms.map((f, i) => player(i + 1, f)));

    expect(split.teamA).toHaveLength(5);
    expect(split.teamB).toHaveLength(5);
    const all = new Set([...ids(split.teamA), ...ids(split.teamB)]);
    expect(all.size).toBe(10);
  });

  it('does not reorder the input', () => {
    const players = [3, -1, 8, 0, 2, -6, 5, 1, -3, 4].map((f, i) => player(i + 1, f));
    balanceTeams(players);
    expect(ids(players)).toEqual([1, 2, 3, 4, 5, 6, 7, 8, 9, 10]);
  });

  it('rejects a group that is not exactly two teams', () => {
    const nine = Array.from({ length: 9 }, (_, i) => player(i + 1, 0));
    expect(() => balanceTeams(nine)).toThrow(RangeError);
  });
});
