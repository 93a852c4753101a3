import { describe, it, expect } from 'vitest';
import { RenderableRoom, renderDraw, renderStandings } from '../../src/output/cli-renderer';
import { makeStandings } from '../fixtures';

describe('renderStandings', () => {
  it('prints a header and one row per team in rank order', () => {
    const [first, second] = makeStandings([2, 1], { points: [2, 1] });
    const lines = renderStandings(
      'Standings',
      [{ ...second, speakerScore: 148, roundsDebated: 2 }, { ...first, speakerScore: 150.5, roundsDebated: 2 }],
      new Map([[2, 'Alpha']]),
    ).split('\n');

    expect(lines[0]).toBe('═'.repeat(72));
    expect(lines[1]).toBe(' '.repeat(31) + 'Standings');
    expect(lines[4]).toBe('  ' + '#'.padEnd(5) + 'Team'.padEnd(30) + 'Pts'.padEnd(6) + 'Speaks'.padEnd(10) + 'Rounds');
    expect(lines[5]).toBe('  ' + '─'.repeat(70));
    expect(lines[6]).toBe('  1    ' + 'Alpha'.padEnd(30) + '2     150.5     2');
    expect(lines[7]).toBe('  2    ' + '#1'.padEnd(30) + '1     148.0     2');
    expect(lines).toHaveLength(9);
  });
});

describe('renderDraw', () => {
  it('lists rooms by rank with the chair marked and byes last', () => {
    const rooms: RenderableRoom[] = [
      { roomRank: 2, teamIds: [3], bye: true, panel: [] },
      {
        roomRank: 1,
        teamIds: [1, 2],
        bye: false,
        panel: [{ adjudicatorId: 7, role: 'chair' }, { adjudicatorId: 8, role: 'panellist' }],
      },
    ];

    const lines = renderDraw(
      'Round 1',
      rooms,
      new Map([[1, 'Alpha'], [2, 'Beta']]),
      new Map([[7, 'Jo']]),
    ).split('\n');

    expect(lines[1]).toBe(' '.repeat(32) + 'Round 1');
    expect(lines[4]).toBe('  1    ' + 'Alpha vs Beta'.padEnd(40) + 'Jo (c), #8');
    expect(lines[5]).toBe('  2    BYE  #3');
    expect(lines).toHaveLength(7);
  });
});
