/**
 * Readable messages for SQLite constraint failures, keyed by the message
 * SQLite reports.
 */

const UNIQUE_CONSTRAINT_PATTERNS: [string, string][] = [
  ['teams.tournament_id, teams.name', 'A team with this name already exists in this tournament'],
  ['institutions.tournament_id, institutions.name', 'An institution with this name already exists in this tournament'],
  ['tags.tournament_id, tags.name', 'A tag with this name already exists in this tournament'],
  ['speaker_tags.speaker_id, speaker_tags.tag_id', 'This speaker already has this tag'],
  ['adjudicator_tags.adjudicator_id, adjudicator_tags.tag_id', 'This adjudicator already has this tag'],
  ['rounds.tournament_id, rounds.sequence', 'A round with this sequence already exists in this tournament'],
  ['ballot_speaker_scores.ballot_id, ballot_speaker_scores.speaker_id', 'This speaker already has a score on this ballot'],
  ['ballot_team_results.ballot_id, ballot_team_results.team_id', 'This team already has a result on this ballot'],
  ['adjudicator_conflicts.adjudicator_id, adjudicator_conflicts.team_id', 'This conflict is already declared'],
  ['adjudicator_conflicts.adjudicator_id, adjudicator_conflicts.institution_id', 'This conflict is already declared'],
];

const CONSTRAINT_MESSAGES = new Map<string, string>([
  ...UNIQUE_CONSTRAINT_PATTERNS.map(([columns, message]): [string, string] => [
    `UNIQUE constraint failed: ${columns}`,
    message,
  ]),
  ['FOREIGN KEY constraint failed', 'Referenced resource does not exist or is still in use'],
]);

export function constraintViolationMessage(sqliteMessage: string): string {
  return CONSTRAINT_MESSAGES.get(sqliteMessage) ?? 'Database constraint violated';
}
