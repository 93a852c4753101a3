import { Router } from 'express';
import { defaultDrawConfig } from '../../engine/draw-config';
import { tournamentHistory, tournamentStandings } from '../../pipeline/tournament-views';
import { Db } from '../../storage/database';
import {
  createTournament,
  deleteTournament,
  listTournaments,
  requireTournament,
  updateTournament,
} from '../../storage/tournaments';
import {
  idParamSchema,
  pageQuerySchema,
  tournamentCreateSchema,
  tournamentPatchSchema,
} from '../schemas';

/**
 * Tournaments and the views derived from their completed rounds.
 * Mounted at /api/v1/tournaments.
 */
export function createTournamentsRouter(db: Db): Router {
  const router = Router();

  router.post('/', (req, res) => {
    const body = tournamentCreateSchema.parse(req.body);
    const tournament = createTournament(db, {
      name: body.name,
      abbreviation: body.abbreviation,
      settings: { ...defaultDrawConfig(), ...body.settings },
    });
    res.status(201).json(tournament);
  });

  router.get('/', (req, res) => {
    res.json(listTournaments(db, pageQuerySchema.parse(req.query)));
  });

  router.get('/:id', (req, res) => {
    const { id } = idParamSchema.parse(req.params);
    res.json(requireTournament(db, id));
  });

  router.patch('/:id', (req, res) => {
    const { id } = idParamSchema.parse(req.params);
    res.json(updateTournament(db, id, tournamentPatchSchema.parse(req.body)));
  });

  router.delete('/:id', (req, res) => {
    const { id } = idParamSchema.parse(req.params);
    deleteTournament(db, id);
    res.status(204).end();
  });

  /**
   * GET /api/v1/tournaments/:id/standings
   * Team standings from completed rounds, best first.
   */
  router.get('/:id/standings', (req, res) => {
    const { id } = idParamSchema.parse(req.params);
    res.json(tournamentStandings(db, id));
  });

  /**
   * GET /api/v1/tournaments/:id/history
   * Past meetings, adjudications and byes the next draw avoids.
   */
  router.get('/:id/history', (req, res) => {
    const { id } = idParamSchema.parse(req.params);
    res.json(tournamentHistory(db, id));
  });

  return router;
}
