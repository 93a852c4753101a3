/**
 * Error kinds surfaced by the draw engine and its collaborators.
 *
 * None of these are retried: every computation is deterministic, so the same
 * input fails the same way until the data or configuration changes.
 */

export type DrawStage = 'draw' | 'allocation';

export type InfeasibleConstraint =
  | 'uneven-field'
  | 'repeat-pairing'
  | 'institution-clash'
  | 'panel-size';

export interface InfeasibleDetail {
  stage: DrawStage;
  constraint: InfeasibleConstraint;
  roomRank: number;
  teamIds: number[];
}

/** A referenced entity is missing, or something participates twice. */
export class DataIntegrityError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'DataIntegrityError';
  }
}

/** No legal draw or allocation exists under the current configuration. */
export class InfeasibleError extends Error {
  readonly detail: InfeasibleDetail;

  constructor(message: string, detail: InfeasibleDetail) {
    super(message);
    this.name = 'InfeasibleError';
    this.detail = detail;
  }
}

/** The draw configuration is unusable; raised before any computation. */
export class ConfigurationError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ConfigurationError';
  }
}

/** A round is not in the state the requested operation needs. */
export class RoundStateError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'RoundStateError';
  }
}

/** A referenced record does not exist. */
export class NotFoundError extends Error {
  constructor(entity: string, id: number) {
    super(`${entity} ${id} not found`);
    this.name = 'NotFoundError';
  }
}

/** A request is well-formed but refers to records that do not fit together. */
export class ValidationError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ValidationError';
  }
}

/** Plain-data form of the typed failures, for crossing a worker boundary. */
export type SerializedFailure =
  | { kind: 'data-integrity'; message: string }
  | { kind: 'infeasible'; message: string; detail: InfeasibleDetail }
  | { kind: 'configuration'; message: string };

export function serializeFailure(error: unknown): SerializedFailure | null {
  if (error instanceof InfeasibleError) {
    return { kind: 'infeasible', message: error.message, detail: error.detail };
  }
  if (error instanceof DataIntegrityError) {
    return { kind: 'data-integrity', message: error.message };
  }
  if (error instanceof ConfigurationError) {
    return { kind: 'configuration', message: error.message };
  }
  return null;
}

export function deserializeFailure(failure: SerializedFailure): Error {
  switch (failure.kind) {
    case 'infeasible':
      return new InfeasibleError(failure.message, failure.detail);
    case 'data-integrity':
      return new DataIntegrityError(failure.message);
    case 'configuration':
      return new ConfigurationError(failure.message);
  }
}
