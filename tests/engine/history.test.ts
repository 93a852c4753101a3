import { describe, it, expect } from 'vitest';
import { DataIntegrityError } from '../../src/core/errors';
import { buildConflicts, computeHistory } from '../../src/engine/history';
import { makeRound, makeTeams } from '../fixtures';

const roster = makeTeams(5, [10, 10, 20, null, null]);

function roundOne(status: 'completed' | 'drawn' = 'completed') {
  return makeRound(1, 1, [
    { teamIds: [1, 3], panel: [7] },
    { teamIds: [2, 4], panel: [8] },
    { teamIds: [5], bye: true },
  ], status);
}

describe('computeHistory', () => {
  it('records meetings, opposing institutions and adjudications', () => {
    const history = computeHistory(roster, [roundOne()]);

    expect([...history.metPairs].sort()).toEqual(['1:3', '2:4']);
    expect([...history.metInstitutions].sort()).toEqual(['1>20', '3>10', '4>10']);
    expect([...history.judgedTeams].sort()).toEqual(['7>1', '7>3', '8>2', '8>4']);
    expect([...history.judgedInstitutions].sort()).toEqual(['7>10', '7>20', '8>10']);
  });

  it('records byes without counting them as meetings', () => {
    const history = computeHistory(roster, [roundOne()]);
    expect([...history.byeTeams]).toEqual([5]);
    expect([...history.metPairs].some(key => key.split(':').includes('5'))).toBe(false);
  });

  it('skips rounds that are not completed', () => {
    const history = computeHistory(roster, [roundOne('drawn')]);
    expect(history.metPairs.size).toBe(0);
    expect(history.judgedTeams.size).toBe(0);
    expect(history.byeTeams.size).toBe(0);
  });

  it('uses the same key for a pair whichever side each team took', () => {
    const again = makeRound(2, 2, [{ teamIds: [3, 1] }, { teamIds: [4, 2] }]);
    const history = computeHistory(roster, [roundOne(), again]);
    expect(history.metPairs.size).toBe(2);
  });

  it('rejects a team that appears in two pairings of one round', () => {
    const broken = makeRound(1, 1, [{ teamIds: [1, 2] }, { teamIds: [2, 3] }]);
    expect(() => computeHistory(roster, [broken])).toThrow(DataIntegrityError);
    expect(() => computeHistory(roster, [broken])).toThrow('Team 2 appears in more than one pairing of round 1');
  });

  it('rejects an adjudicator seated on two panels of one round', () => {
    const broken = makeRound(1, 1, [
      { teamIds: [1, 2], panel: [7] },
      { teamIds: [3, 4], panel: [7] },
    ]);
    expect(() => computeHistory(roster, [broken])).toThrow(DataIntegrityError);
  });

  it('rejects a pairing with a team that is not on the roster', () => {
    const broken = makeRound(1, 1, [{ teamIds: [1, 42] }]);
    expect(() => computeHistory(roster, [broken])).toThrow(
      'Pairing 100 in round 1 lists team 42, which is not on the roster',
    );
  });
});

describe('buildConflicts', () => {
  it('merges prior adjudications with declared conflicts', () => {
    const history = computeHistory(roster, [roundOne()]);
    const conflicts = buildConflicts(history, [
      { id: 1, adjudicatorId: 9, target: { kind: 'team', teamId: 2 } },
      { id: 2, adjudicatorId: 9, target: { kind: 'institution', institutionId: 20 } },
    ]);

    expect([...conflicts.teams].sort()).toEqual(['7>1', '7>3', '8>2', '8>4', '9>2']);
    expect([...conflicts.institutions]).toEqual(['9>20']);
  });
});
