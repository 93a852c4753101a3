import { Router } from 'express';
import { RoundDrawer } from '../../pipeline/round-drawer';
import { Db } from '../../storage/database';
import { listPairings } from '../../storage/pairings';
import {
  createMotion,
  createRound,
  deleteMotion,
  deleteRound,
  listMotions,
  listRounds,
  requireMotion,
  requireRound,
  updateMotion,
  updateRound,
} from '../../storage/rounds';
import {
  idParamSchema,
  motionCreateSchema,
  motionPatchSchema,
  motionQuerySchema,
  roundCreateSchema,
  roundPatchSchema,
  roundQuerySchema,
  roundStatusBodySchema,
} from '../schemas';

/**
 * Rounds, their draws and lifecycle, and motions. Mounted at /api/v1.
 */
export function createRoundsRouter(db: Db, drawer: RoundDrawer): Router {
  const router = Router();

  router.post('/rounds', (req, res) => {
    res.status(201).json(createRound(db, roundCreateSchema.parse(req.body)));
  });

  router.get('/rounds', (req, res) => {
    const { tournamentId, status, offset, limit } = roundQuerySchema.parse(req.query);
    res.json(listRounds(db, { tournamentId: tournamentId ?? null, status: status ?? null }, { offset, limit }));
  });

  router.get('/rounds/:id', (req, res) => {
    res.json(requireRound(db, idParamSchema.parse(req.params).id));
  });

  router.patch('/rounds/:id', (req, res) => {
    const { id } = idParamSchema.parse(req.params);
    res.json(updateRound(db, id, roundPatchSchema.parse(req.body)));
  });

  router.delete('/rounds/:id', (req, res) => {
    deleteRound(db, idParamSchema.parse(req.params).id);
    res.status(204).end();
  });

  // === Draw ===

  /**
   * POST /api/v1/rounds/:id/draw
   * Generate the draw and commit it; the round becomes `drawn`.
   */
  router.post('/rounds/:id/draw', async (req, res) => {
    const { id } = idParamSchema.parse(req.params);
    const pairings = await drawer.drawRound(id);
    res.status(201).json(pairings);
  });

  router.get('/rounds/:id/draw', (req, res) => {
    const { id } = idParamSchema.parse(req.params);
    requireRound(db, id);
    res.json(listPairings(db, id));
  });

  /**
   * DELETE /api/v1/rounds/:id/draw
   * Discard the committed draw; the round returns to `pending`.
   */
  router.delete('/rounds/:id/draw', async (req, res) => {
    const { id } = idParamSchema.parse(req.params);
    res.json(await drawer.discardDraw(id));
  });

  /**
   * POST /api/v1/rounds/:id/status
   * Body: { status }
   */
  router.post('/rounds/:id/status', async (req, res) => {
    const { id } = idParamSchema.parse(req.params);
    const { status } = roundStatusBodySchema.parse(req.body);
    res.json(await drawer.setStatus(id, status));
  });

  // === Motions ===

  router.post('/motions', (req, res) => {
    res.status(201).json(createMotion(db, motionCreateSchema.parse(req.body)));
  });

  router.get('/motions', (req, res) => {
    const { roundId, offset, limit } = motionQuerySchema.parse(req.query);
    res.json(listMotions(db, roundId ?? null, { offset, limit }));
  });

  router.get('/motions/:id', (req, res) => {
    res.json(requireMotion(db, idParamSchema.parse(req.params).id));
  });

  router.patch('/motions/:id', (req, res) => {
    const { id } = idParamSchema.parse(req.params);
    res.json(updateMotion(db, id, motionPatchSchema.parse(req.body)));
  });

  router.delete('/motions/:id', (req, res) => {
    deleteMotion(db, idParamSchema.parse(req.params).id);
    res.status(204).end();
  });

  return router;
}
