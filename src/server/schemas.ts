import { z } from 'zod';
import { DEFAULT_LIST_LIMIT, MAX_LIST_LIMIT } from '../core/constants';

const id = z.coerce.number().int().positive();
const name = z.string().trim().min(1).max(200);
const abbreviation = z.string().trim().min(1).max(40).nullable();

export const idParamSchema = z.object({ id });

export const pageQuerySchema = z.object({
  offset: z.coerce.number().int().min(0).default(0),
  limit: z.coerce.number().int().min(1).max(MAX_LIST_LIMIT).default(DEFAULT_LIST_LIMIT),
});

export const roundStatusSchema = z.enum(['pending', 'drawn', 'in-progress', 'completed']);

// === Tournaments ===

export const drawSettingsSchema = z.object({
  sidesPerRoom: z.number().int().positive(),
  panelSize: z.number().int().positive(),
  avoidInstitutionClash: z.boolean(),
  byePolicy: z.enum(['lowest-rank-bye', 'no-bye']),
  pairingMethod: z.enum(['adjacent', 'folded', 'random']),
  tieBreakSeed: z.number().int().nullable(),
  maxSwapDistance: z.number().int().positive(),
});

export const tournamentCreateSchema = z.object({
  name,
  abbreviation: abbreviation.default(null),
  settings: drawSettingsSchema.partial().default({}),
});

export const tournamentPatchSchema = z.object({
  name: name.optional(),
  abbreviation: abbreviation.optional(),
  settings: drawSettingsSchema.partial().optional(),
});

// === Registration ===

export const institutionCreateSchema = z.object({
  tournamentId: id,
  name,
  abbreviation: abbreviation.default(null),
});

export const tournamentQuerySchema = pageQuerySchema.extend({
  tournamentId: id.optional(),
});

export const teamCreateSchema = z.object({
  tournamentId: id,
  name,
  abbreviation: abbreviation.default(null),
  institutionId: id.nullable().default(null),
  speakers: z.array(name).default([]),
});

export const teamPatchSchema = z.object({
  name: name.optional(),
  abbreviation: abbreviation.optional(),
  institutionId: id.nullable().optional(),
});

export const teamQuerySchema = tournamentQuerySchema.extend({
  name: z.string().min(1).optional(),
});

export const speakerCreateSchema = z.object({
  teamId: id,
  name,
});

export const speakerQuerySchema = pageQuerySchema.extend({
  teamId: id.optional(),
});

export const adjudicatorCreateSchema = z.object({
  tournamentId: id,
  name,
  institutionId: id.nullable().default(null),
  experience: z.number().int().min(0).default(0),
  independent: z.boolean().default(false),
  active: z.boolean().default(true),
});

export const adjudicatorPatchSchema = z.object({
  name: name.optional(),
  institutionId: id.nullable().optional(),
  experience: z.number().int().min(0).optional(),
  independent: z.boolean().optional(),
  active: z.boolean().optional(),
});

export const conflictCreateSchema = z.discriminatedUnion('kind', [
  z.object({ kind: z.literal('team'), teamId: id }),
  z.object({ kind: z.literal('institution'), institutionId: id }),
]);

// === Rounds ===

export const roundCreateSchema = z.object({
  tournamentId: id,
  sequence: z.number().int().positive().nullable().default(null),
  name,
  abbreviation: abbreviation.default(null),
});

export const roundPatchSchema = z.object({
  name: name.optional(),
  abbreviation: abbreviation.optional(),
});

export const roundQuerySchema = tournamentQuerySchema.extend({
  status: roundStatusSchema.optional(),
});

export const roundStatusBodySchema = z.object({
  status: roundStatusSchema,
});

export const motionCreateSchema = z.object({
  roundId: id,
  text: z.string().trim().min(1),
  infoslide: z.string().trim().min(1).nullable().default(null),
});

export const motionPatchSchema = z.object({
  text: z.string().trim().min(1).optional(),
  infoslide: z.string().trim().min(1).nullable().optional(),
});

export const motionQuerySchema = pageQuerySchema.extend({
  roundId: id.optional(),
});

// === Ballots ===

export const ballotCreateSchema = z.object({
  pairingId: id,
  adjudicatorId: id.nullable().default(null),
  teamResults: z.array(z.object({
    teamId: id,
    points: z.number().int().min(0),
    speakerScore: z.number().min(0),
  })).min(1),
  speakerScores: z.array(z.object({
    speakerId: id,
    position: z.number().int().positive(),
    score: z.number().min(0),
  })).default([]),
});

export const ballotQuerySchema = pageQuerySchema.extend({
  pairingId: id.optional(),
  adjudicatorId: id.optional(),
});

// === Tags ===

export const tagCreateSchema = z.object({
  tournamentId: id,
  name,
});

export const tagPatchSchema = z.object({
  name: name.optional(),
});

export const tagQuerySchema = tournamentQuerySchema.extend({
  name: z.string().min(1).optional(),
  speakerId: id.optional(),
  adjudicatorId: id.optional(),
});

export const tagMemberParamSchema = z.object({ id, memberId: id });

export const tagSpeakersSchema = z.object({
  speakerIds: z.array(id).min(1),
});

export const tagAdjudicatorsSchema = z.object({
  adjudicatorIds: z.array(id).min(1),
});
