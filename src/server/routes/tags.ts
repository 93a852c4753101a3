import { Router } from 'express';
import { Db } from '../../storage/database';
import {
  addAdjudicatorsToTag,
  addSpeakersToTag,
  createTag,
  deleteTag,
  listTagAdjudicators,
  listTagSpeakers,
  listTags,
  removeAdjudicatorFromTag,
  removeSpeakerFromTag,
  requireTag,
  updateTag,
} from '../../storage/tags';
import {
  idParamSchema,
  tagAdjudicatorsSchema,
  tagCreateSchema,
  tagMemberParamSchema,
  tagPatchSchema,
  tagQuerySchema,
  tagSpeakersSchema,
} from '../schemas';

/**
 * Tags and their speaker and adjudicator members. Mounted at /api/v1/tags.
 */
export function createTagsRouter(db: Db): Router {
  const router = Router();

  router.post('/', (req, res) => {
    res.status(201).json(createTag(db, tagCreateSchema.parse(req.body)));
  });

  router.get('/', (req, res) => {
    const { tournamentId, name, speakerId, adjudicatorId, offset, limit } = tagQuerySchema.parse(req.query);
    res.json(listTags(db, {
      tournamentId: tournamentId ?? null,
      name: name ?? null,
      speakerId: speakerId ?? null,
      adjudicatorId: adjudicatorId ?? null,
    }, { offset, limit }));
  });

  router.get('/:id', (req, res) => {
    res.json(requireTag(db, idParamSchema.parse(req.params).id));
  });

  router.patch('/:id', (req, res) => {
    const { id } = idParamSchema.parse(req.params);
    res.json(updateTag(db, id, tagPatchSchema.parse(req.body)));
  });

  router.delete('/:id', (req, res) => {
    deleteTag(db, idParamSchema.parse(req.params).id);
    res.status(204).end();
  });

  // === Members ===

  /**
   * POST /api/v1/tags/:id/speakers
   * Body: { speakerIds }. Responds with every speaker now carrying the tag.
   */
  router.post('/:id/speakers', (req, res) => {
    const { id } = idParamSchema.parse(req.params);
    const { speakerIds } = tagSpeakersSchema.parse(req.body);
    res.status(201).json(addSpeakersToTag(db, id, speakerIds));
  });

  router.get('/:id/speakers', (req, res) => {
    res.json(listTagSpeakers(db, idParamSchema.parse(req.params).id));
  });

  router.delete('/:id/speakers/:memberId', (req, res) => {
    const { id, memberId } = tagMemberParamSchema.parse(req.params);
    removeSpeakerFromTag(db, id, memberId);
    res.status(204).end();
  });

  router.post('/:id/adjudicators', (req, res) => {
    const { id } = idParamSchema.parse(req.params);
    const { adjudicatorIds } = tagAdjudicatorsSchema.parse(req.body);
    res.status(201).json(addAdjudicatorsToTag(db, id, adjudicatorIds));
  });

  router.get('/:id/adjudicators', (req, res) => {
    res.json(listTagAdjudicators(db, idParamSchema.parse(req.params).id));
  });

  router.delete('/:id/adjudicators/:memberId', (req, res) => {
    const { id, memberId } = tagMemberParamSchema.parse(req.params);
    removeAdjudicatorFromTag(db, id, memberId);
    res.status(204).end();
  });

  return router;
}
