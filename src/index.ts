#!/usr/bin/env node
import { CONFIG } from './config';
import { computeRoundDraw, destroyPool } from './engine/drawer';
import { renderDraw, renderStandings } from './output/cli-renderer';
import { exportToJson } from './output/json-exporter';
import { RoundDrawer, assertDrawable, buildDrawTask } from './pipeline/round-drawer';
import { tournamentStandings } from './pipeline/tournament-views';
import { serve } from './server/index';
import { closeDatabase, getDatabase } from './storage/database';
import { listPairings } from './storage/pairings';
import { requireRound } from './storage/rounds';
import { loadTournamentSnapshot } from './storage/snapshot';
import { requireTournament } from './storage/tournaments';

function printUsage(): void {
  console.log(`
Tabbit: debate tournament tabulation

Usage:
  npm run dev -- serve [--port <port>]              Serve the HTTP API
  npm run dev -- standings --tournament <id>        Print team standings
  npm run dev -- draw --round <id> [--commit]       Preview (or commit) a round's draw

Options:
  --port <port>        Port to listen on (default: ${CONFIG.PORT})
  --export             Also write the result to ${CONFIG.OUTPUT_DIR}

Examples:
  npm run dev -- standings --tournament 1
  npm run dev -- draw --round 3
  npm run dev -- draw --round 3 --commit --export
  `);
}

function parseArgs(args: string[]): Record<string, string> {
  const parsed: Record<string, string> = {};
  for (let i = 0; i < args.length; i++) {
    if (args[i].startsWith('--')) {
      const key = args[i].slice(2);
      const next = args[i + 1];
      if (next && !next.startsWith('--')) {
        parsed[key] = next;
        i++;
      } else {
        parsed[key] = 'true';
      }
    }
  }
  return parsed;
}

function requireIdFlag(flags: Record<string, string>, name: string): number {
  const id = parseInt(flags[name] ?? '');
  if (Number.isNaN(id) || id <= 0) {
    throw new Error(`--${name} <id> is required`);
  }
  return id;
}

async function main(): Promise<void> {
  const args = process.argv.slice(2);
  const command = args[0];
  const flags = parseArgs(args.slice(1));

  if (command === 'serve') {
    serve(flags.port ? parseInt(flags.port) : CONFIG.PORT);
    return;
  }

  const db = getDatabase();
  try {
    switch (command) {
      case 'standings': {
        const tournamentId = requireIdFlag(flags, 'tournament');
        const tournament = requireTournament(db, tournamentId);
        const snapshot = loadTournamentSnapshot(db, tournamentId);
        const standings = tournamentStandings(db, tournamentId);

        const teamNames = new Map(snapshot.roster.map(t => [t.id, t.name]));
        console.log(renderStandings(`${tournament.name}: standings`, standings, teamNames));

        if (flags.export === 'true') {
          const file = exportToJson(standings, `standings-${tournamentId}.json`);
          console.log(`Exported to ${file}`);
        }
        break;
      }

      case 'draw': {
        const roundId = requireIdFlag(flags, 'round');
        const round = requireRound(db, roundId);
        const snapshot = loadTournamentSnapshot(db, round.tournamentId);
        const teamNames = new Map(snapshot.roster.map(t => [t.id, t.name]));
        const adjudicatorNames = new Map(snapshot.adjudicators.map(a => [a.id, a.name]));

        if (flags.commit === 'true') {
          const pairings = await new RoundDrawer({ db }).drawRound(roundId);
          console.log(renderDraw(`${round.name}: committed draw`, pairings, teamNames, adjudicatorNames));
          if (flags.export === 'true') {
            console.log(`Exported to ${exportToJson(pairings, `draw-${roundId}.json`)}`);
          }
          break;
        }

        if (round.status !== 'pending') {
          const pairings = listPairings(db, roundId);
          console.log(renderDraw(`${round.name}: ${round.status}`, pairings, teamNames, adjudicatorNames));
          break;
        }

        assertDrawable(round, snapshot);
        const draw = computeRoundDraw(buildDrawTask(round, snapshot));
        console.log(renderDraw(`${round.name}: preview (not committed)`, draw.rooms, teamNames, adjudicatorNames));
        if (flags.export === 'true') {
          console.log(`Exported to ${exportToJson(draw, `draw-preview-${roundId}.json`)}`);
        }
        break;
      }

      default:
        printUsage();
    }
  } finally {
    await destroyPool();
    closeDatabase();
  }
}

main().catch((err: unknown) => {
  console.error('Fatal error:', err instanceof Error ? err.message : err);
  closeDatabase();
  process.exit(1);
});
