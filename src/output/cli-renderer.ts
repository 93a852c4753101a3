import { PanelSeat, Standing } from '../core/types';

/** A room as both committed pairings and uncommitted draws carry it. */
export interface RenderableRoom {
  roomRank: number;
  teamIds: number[];
  bye: boolean;
  panel: PanelSeat[];
}

const WIDTH = 72;

/**
 * Render team standings to the terminal, best first.
 */
export function renderStandings(
  title: string,
  standings: readonly Standing[],
  teamNames: ReadonlyMap<number, string>,
): string {
  const lines: string[] = [];
  const divider = '═'.repeat(WIDTH);

  lines.push(divider);
  lines.push(centerText(title, WIDTH));
  lines.push(divider);
  lines.push('');
  lines.push(
    '  ' +
    pad('#', 5) +
    pad('Team', 30) +
    pad('Pts', 6) +
    pad('Speaks', 10) +
    'Rounds'
  );
  lines.push('  ' + '─'.repeat(WIDTH - 2));

  for (const s of [...standings].sort((a, b) => a.rank - b.rank)) {
    lines.push(
      '  ' +
      pad(String(s.rank), 5) +
      pad(nameOf(teamNames, s.teamId), 30) +
      pad(String(s.points), 6) +
      pad(s.speakerScore.toFixed(1), 10) +
      String(s.roundsDebated)
    );
  }

  lines.push('');
  return lines.join('\n');
}

/**
 * Render a round's rooms in room-rank order. The chair is marked (c).
 */
export function renderDraw(
  title: string,
  rooms: readonly RenderableRoom[],
  teamNames: ReadonlyMap<number, string>,
  adjudicatorNames: ReadonlyMap<number, string>,
): string {
  const lines: string[] = [];
  const divider = '═'.repeat(WIDTH);

  lines.push(divider);
  lines.push(centerText(title, WIDTH));
  lines.push(divider);
  lines.push('');

  for (const room of [...rooms].sort((a, b) => a.roomRank - b.roomRank)) {
    const teams = room.teamIds.map(id => nameOf(teamNames, id));
    if (room.bye) {
      lines.push('  ' + pad(String(room.roomRank), 5) + `BYE  ${teams.join(', ')}`);
      continue;
    }
    const panel = room.panel.map(seat =>
      nameOf(adjudicatorNames, seat.adjudicatorId) + (seat.role === 'chair' ? ' (c)' : ''),
    );
    lines.push('  ' + pad(String(room.roomRank), 5) + pad(teams.join(' vs '), 40) + panel.join(', '));
  }

  lines.push('');
  return lines.join('\n');
}

function nameOf(names: ReadonlyMap<number, string>, id: number): string {
  return names.get(id) ?? `#${id}`;
}

function pad(str: string, width: number): string {
  return str.padEnd(width);
}

function centerText(text: string, width: number): string {
  const padding = Math.max(0, Math.floor((width - text.length) / 2));
  return ' '.repeat(padding) + text;
}
