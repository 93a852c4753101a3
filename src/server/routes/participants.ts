import { Router } from 'express';
import {
  createAdjudicator,
  createConflict,
  deleteAdjudicator,
  deleteConflict,
  listAdjudicators,
  listConflicts,
  requireAdjudicator,
  updateAdjudicator,
} from '../../storage/adjudicators';
import { Db } from '../../storage/database';
import {
  createInstitution,
  deleteInstitution,
  listInstitutions,
  requireInstitution,
} from '../../storage/institutions';
import {
  createSpeaker,
  createTeam,
  deleteSpeaker,
  deleteTeam,
  listSpeakers,
  listTeams,
  requireSpeaker,
  requireTeam,
  updateTeam,
} from '../../storage/teams';
import {
  adjudicatorCreateSchema,
  adjudicatorPatchSchema,
  conflictCreateSchema,
  idParamSchema,
  institutionCreateSchema,
  speakerCreateSchema,
  speakerQuerySchema,
  teamCreateSchema,
  teamPatchSchema,
  teamQuerySchema,
  tournamentQuerySchema,
} from '../schemas';

/**
 * Registration: institutions, teams, speakers, adjudicators and their
 * declared conflicts. Mounted at /api/v1.
 */
export function createParticipantsRouter(db: Db): Router {
  const router = Router();

  // === Institutions ===

  router.post('/institutions', (req, res) => {
    res.status(201).json(createInstitution(db, institutionCreateSchema.parse(req.body)));
  });

  router.get('/institutions', (req, res) => {
    const { tournamentId, offset, limit } = tournamentQuerySchema.parse(req.query);
    res.json(listInstitutions(db, tournamentId ?? null, { offset, limit }));
  });

  router.get('/institutions/:id', (req, res) => {
    res.json(requireInstitution(db, idParamSchema.parse(req.params).id));
  });

  router.delete('/institutions/:id', (req, res) => {
    deleteInstitution(db, idParamSchema.parse(req.params).id);
    res.status(204).end();
  });

  // === Teams ===

  router.post('/teams', (req, res) => {
    res.status(201).json(createTeam(db, teamCreateSchema.parse(req.body)));
  });

  router.get('/teams', (req, res) => {
    const { tournamentId, name, offset, limit } = teamQuerySchema.parse(req.query);
    res.json(listTeams(db, { tournamentId: tournamentId ?? null, name: name ?? null }, { offset, limit }));
  });

  router.get('/teams/:id', (req, res) => {
    res.json(requireTeam(db, idParamSchema.parse(req.params).id));
  });

  router.patch('/teams/:id', (req, res) => {
    const { id } = idParamSchema.parse(req.params);
    res.json(updateTeam(db, id, teamPatchSchema.parse(req.body)));
  });

  router.delete('/teams/:id', (req, res) => {
    deleteTeam(db, idParamSchema.parse(req.params).id);
    res.status(204).end();
  });

  // === Speakers ===

  router.post('/speakers', (req, res) => {
    const { teamId, name } = speakerCreateSchema.parse(req.body);
    res.status(201).json(createSpeaker(db, teamId, name));
  });

  router.get('/speakers', (req, res) => {
    const { teamId, offset, limit } = speakerQuerySchema.parse(req.query);
    res.json(listSpeakers(db, teamId ?? null, { offset, limit }));
  });

  router.get('/speakers/:id', (req, res) => {
    res.json(requireSpeaker(db, idParamSchema.parse(req.params).id));
  });

  router.delete('/speakers/:id', (req, res) => {
    deleteSpeaker(db, idParamSchema.parse(req.params).id);
    res.status(204).end();
  });

  // === Adjudicators ===

  router.post('/adjudicators', (req, res) => {
    res.status(201).json(createAdjudicator(db, adjudicatorCreateSchema.parse(req.body)));
  });

  router.get('/adjudicators', (req, res) => {
    const { tournamentId, offset, limit } = tournamentQuerySchema.parse(req.query);
    res.json(listAdjudicators(db, tournamentId ?? null, { offset, limit }));
  });

  router.get('/adjudicators/:id', (req, res) => {
    res.json(requireAdjudicator(db, idParamSchema.parse(req.params).id));
  });

  router.patch('/adjudicators/:id', (req, res) => {
    const { id } = idParamSchema.parse(req.params);
    res.json(updateAdjudicator(db, id, adjudicatorPatchSchema.parse(req.body)));
  });

  router.delete('/adjudicators/:id', (req, res) => {
    deleteAdjudicator(db, idParamSchema.parse(req.params).id);
    res.status(204).end();
  });

  // === Declared conflicts ===

  router.post('/adjudicators/:id/conflicts', (req, res) => {
    const { id } = idParamSchema.parse(req.params);
    res.status(201).json(createConflict(db, id, conflictCreateSchema.parse(req.body)));
  });

  router.get('/adjudicators/:id/conflicts', (req, res) => {
    const { id } = idParamSchema.parse(req.params);
    requireAdjudicator(db, id);
    res.json(listConflicts(db, id));
  });

  router.delete('/conflicts/:id', (req, res) => {
    deleteConflict(db, idParamSchema.parse(req.params).id);
    res.status(204).end();
  });

  return router;
}
