import { Router } from 'express';
import { RoundDrawer } from '../../pipeline/round-drawer';
import { listBallots, requireBallot } from '../../storage/ballots';
import { Db } from '../../storage/database';
import { ballotCreateSchema, ballotQuerySchema, idParamSchema } from '../schemas';

/**
 * Ballot intake. Every submission is kept; the highest version per room
 * counts. Mounted at /api/v1/ballots.
 */
export function createBallotsRouter(db: Db, drawer: RoundDrawer): Router {
  const router = Router();

  router.post('/', async (req, res) => {
    const ballot = await drawer.submitBallot(ballotCreateSchema.parse(req.body));
    res.status(201).json(ballot);
  });

  router.get('/', (req, res) => {
    const { pairingId, adjudicatorId, offset, limit } = ballotQuerySchema.parse(req.query);
    res.json(listBallots(
      db,
      { pairingId: pairingId ?? null, adjudicatorId: adjudicatorId ?? null },
      { offset, limit },
    ));
  });

  router.get('/:id', (req, res) => {
    res.json(requireBallot(db, idParamSchema.parse(req.params).id));
  });

  return router;
}
