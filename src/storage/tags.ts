import { NotFoundError, ValidationError } from '../core/errors';
import { Adjudicator, Speaker, Tag } from '../core/types';
import { requireAdjudicator } from './adjudicators';
import { Db, FIRST_PAGE, Page } from './database';
import { requireSpeaker, requireTeam } from './teams';
import { requireTournament } from './tournaments';

interface TagRow {
  id: number;
  tournament_id: number;
  name: string;
}

export interface NewTag {
  tournamentId: number;
  name: string;
}

export interface TagPatch {
  name?: string;
}

export interface TagFilter {
  tournamentId: number | null;
  /** Substring match, case-insensitive for ASCII. */
  name: string | null;
  speakerId: number | null;
  adjudicatorId: number | null;
}

function toTag(row: TagRow): Tag {
  return { id: row.id, tournamentId: row.tournament_id, name: row.name };
}

// === Tags ===

export function createTag(db: Db, input: NewTag): Tag {
  requireTournament(db, input.tournamentId);
  const result = db.prepare('INSERT INTO tags (tournament_id, name) VALUES (?, ?)')
    .run(input.tournamentId, input.name);
  return requireTag(db, Number(result.lastInsertRowid));
}

export function getTag(db: Db, id: number): Tag | null {
  const row = db.prepare<[number], TagRow>('SELECT * FROM tags WHERE id = ?').get(id);
  return row ? toTag(row) : null;
}

export function requireTag(db: Db, id: number): Tag {
  const tag = getTag(db, id);
  if (!tag) throw new NotFoundError('Tag', id);
  return tag;
}

export function listTags(db: Db, filter: TagFilter, page: Page = FIRST_PAGE): Tag[] {
  return db.prepare<
    [number | null, number | null, string | null, string | null, number | null, number | null, number | null, number | null, number, number],
    TagRow
  >(`
    SELECT * FROM tags
    WHERE (? IS NULL OR tournament_id = ?)
      AND (? IS NULL OR name LIKE '%' || ? || '%')
      AND (? IS NULL OR id IN (SELECT tag_id FROM speaker_tags WHERE speaker_id = ?))
      AND (? IS NULL OR id IN (SELECT tag_id FROM adjudicator_tags WHERE adjudicator_id = ?))
    ORDER BY id LIMIT ? OFFSET ?
  `).all(
    filter.tournamentId, filter.tournamentId,
    filter.name, filter.name,
    filter.speakerId, filter.speakerId,
    filter.adjudicatorId, filter.adjudicatorId,
    page.limit, page.offset,
  ).map(toTag);
}

export function updateTag(db: Db, id: number, patch: TagPatch): Tag {
  const current = requireTag(db, id);
  db.prepare('UPDATE tags SET name = ? WHERE id = ?').run(patch.name ?? current.name, id);
  return requireTag(db, id);
}

export function deleteTag(db: Db, id: number): void {
  const result = db.prepare('DELETE FROM tags WHERE id = ?').run(id);
  if (result.changes === 0) throw new NotFoundError('Tag', id);
}

// === Speaker tags ===

/**
 * Tag several speakers at once. All are added or none: a speaker from
 * another tournament, or one who already carries the tag, fails the batch.
 */
export function addSpeakersToTag(db: Db, tagId: number, speakerIds: readonly number[]): Speaker[] {
  const tag = requireTag(db, tagId);
  for (const speakerId of speakerIds) {
    const speaker = requireSpeaker(db, speakerId);
    if (requireTeam(db, speaker.teamId).tournamentId !== tag.tournamentId) {
      throw new ValidationError(`Speaker ${speakerId} belongs to another tournament than tag ${tagId}`);
    }
  }

  const insert = db.prepare('INSERT INTO speaker_tags (speaker_id, tag_id) VALUES (?, ?)');
  db.transaction((ids: readonly number[]) => {
    for (const speakerId of ids) insert.run(speakerId, tagId);
  })(speakerIds);

  return listTagSpeakers(db, tagId);
}

export function listTagSpeakers(db: Db, tagId: number): Speaker[] {
  requireTag(db, tagId);
  return db.prepare<[number], { speaker_id: number }>(
    'SELECT speaker_id FROM speaker_tags WHERE tag_id = ? ORDER BY speaker_id'
  ).all(tagId).map(row => requireSpeaker(db, row.speaker_id));
}

export function removeSpeakerFromTag(db: Db, tagId: number, speakerId: number): void {
  const result = db.prepare('DELETE FROM speaker_tags WHERE tag_id = ? AND speaker_id = ?').run(tagId, speakerId);
  if (result.changes === 0) throw new NotFoundError(`Speaker ${speakerId} on tag`, tagId);
}

// === Adjudicator tags ===

export function addAdjudicatorsToTag(db: Db, tagId: number, adjudicatorIds: readonly number[]): Adjudicator[] {
  const tag = requireTag(db, tagId);
  for (const adjudicatorId of adjudicatorIds) {
    if (requireAdjudicator(db, adjudicatorId).tournamentId !== tag.tournamentId) {
      throw new ValidationError(`Adjudicator ${adjudicatorId} belongs to another tournament than tag ${tagId}`);
    }
  }

  const insert = db.prepare('INSERT INTO adjudicator_tags (adjudicator_id, tag_id) VALUES (?, ?)');
  db.transaction((ids: readonly number[]) => {
    for (const adjudicatorId of ids) insert.run(adjudicatorId, tagId);
  })(adjudicatorIds);

  return listTagAdjudicators(db, tagId);
}

export function listTagAdjudicators(db: Db, tagId: number): Adjudicator[] {
  requireTag(db, tagId);
  return db.prepare<[number], { adjudicator_id: number }>(
    'SELECT adjudicator_id FROM adjudicator_tags WHERE tag_id = ? ORDER BY adjudicator_id'
  ).all(tagId).map(row => requireAdjudicator(db, row.adjudicator_id));
}

export function removeAdjudicatorFromTag(db: Db, tagId: number, adjudicatorId: number): void {
  const result = db.prepare('DELETE FROM adjudicator_tags WHERE tag_id = ? AND adjudicator_id = ?')
    .run(tagId, adjudicatorId);
  if (result.changes === 0) throw new NotFoundError(`Adjudicator ${adjudicatorId} on tag`, tagId);
}
