import { isRecord } from '../storage/json_file';

export type JobKind = 'train' | 'tournament' | 'automl';

export interface TrainJobRequest {
  kind: 'train';
  episodes?: number;
  evalGames?: number;
  evalSeeds?: number;
  baseSeed?: number;
  name?: string;
  /** Model to continue training from instead of a fresh table. */
  resume?: string;
  alpha?: number;
  gamma?: number;
  epsilonMin?: number;
  epsilonDecay?: number;
}

export type TournamentMode = 'round_robin' | 'elimination';

export interface TournamentJobRequest {
  kind: 'tournament';
  mode: TournamentMode;
  /** Stored model names or paths; every stored model when absent. */
  models?: string[];
  gamesPerMatch?: number;
  updateElo?: boolean;
  includeRandom?: boolean;
}

export interface AutoMLJobRequest {
  kind: 'automl';
  mode: 'grid' | 'random';
  iterations?: number;
  maxConfigs?: number;
  numEpisodes?: number;
  evalGames?: number;
  evalSeeds?: number;
}

export type JobRequest = TrainJobRequest | TournamentJobRequest | AutoMLJobRequest;

/** Thrown for a request body that cannot be turned into a job. */
export class InvalidRequestError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'InvalidRequestError';
  }
}

type Fields = Record<string, unknown>;

function optionalInteger(fields: Fields, key: string, min: number): number | undefined {
  const value = fields[key];
  if (value === undefined || value === null) {
    return undefined;
  }
  if (typeof value !== 'number' || !Number.isInteger(value) || value < min) {
    throw new InvalidRequestError(`${key} must be an integer >= ${min}`);
  }
  return value;
}

function optionalRate(fields: Fields, key: string, exclusiveZero: boolean): number | undefined {
  const value = fields[key];
  if (value === undefined || value === null) {
    return undefined;
  }
  if (typeof value !== 'number' || !Number.isFinite(value) || value < 0 || value > 1) {
    throw new InvalidRequestError(`${key} must be a number in [0, 1]`);
  }
  if (exclusiveZero && value === 0) {
    throw new InvalidRequestError(`${key} must be greater than 0`);
  }
  return value;
}

function optionalString(fields: Fields, key: string): string | undefined {
  const value = fields[key];
  if (value === undefined || value === null) {
    return undefined;
  }
  if (typeof value !== 'string' || value.trim() === '') {
    throw new InvalidRequestError(`${key} must be a non-empty string`);
  }
  return value;
}

function optionalBoolean(fields: Fields, key: string): boolean | undefined {
  const value = fields[key];
  if (value === undefined || value === null) {
    return undefined;
  }
  if (typeof value !== 'boolean') {
    throw new InvalidRequestError(`${key} must be a boolean`);
  }
  return value;
}

function parseTrain(fields: Fields): TrainJobRequest {
  return {
    kind: 'train',
    episodes: optionalInteger(fields, 'episodes', 0),
    evalGames: optionalInteger(fields, 'evalGames', 0),
    evalSeeds: optionalInteger(fields, 'evalSeeds', 1),
    baseSeed: optionalInteger(fields, 'baseSeed', 0),
    name: optionalString(fields, 'name'),
    resume: optionalString(fields, 'resume'),
    alpha: optionalRate(fields, 'alpha', true),
    gamma: optionalRate(fields, 'gamma', false),
    epsilonMin: optionalRate(fields, 'epsilonMin', false),
    epsilonDecay: optionalRate(fields, 'epsilonDecay', true),
  };
}

function parseTournament(fields: Fields): TournamentJobRequest {
  const mode = fields.mode ?? 'round_robin';
  if (mode !== 'round_robin' && mode !== 'elimination') {
    throw new InvalidRequestError('mode must be "round_robin" or "elimination"');
  }
  let models: string[] | undefined;
  if (fields.models !== undefined && fields.models !== null) {
    if (!Array.isArray(fields.models)) {
      throw new InvalidRequestError('models must be an array of strings');
    }
    models = [];
    for (const item of fields.models) {
      if (typeof item !== 'string' || item.trim() === '') {
        throw new InvalidRequestError('models must be an array of strings');
      }
      models.push(item);
    }
  }
  return {
    kind: 'tournament',
    mode,
    models,
    gamesPerMatch: optionalInteger(fields, 'gamesPerMatch', 1),
    updateElo: optionalBoolean(fields, 'updateElo'),
    includeRandom: optionalBoolean(fields, 'includeRandom'),
  };
}

function parseAutoML(fields: Fields): AutoMLJobRequest {
  const mode = fields.mode ?? 'random';
  if (mode !== 'grid' && mode !== 'random') {
    throw new InvalidRequestError('mode must be "grid" or "random"');
  }
  return {
    kind: 'automl',
    mode,
    iterations: optionalInteger(fields, 'iterations', 1),
    maxConfigs: optionalInteger(fields, 'maxConfigs', 1),
    numEpisodes: optionalInteger(fields, 'numEpisodes', 0),
    evalGames: optionalInteger(fields, 'evalGames', 1),
    evalSeeds: optionalInteger(fields, 'evalSeeds', 1),
  };
}

/**
 * Validates a job request. `kind` may be given in the body or by the caller
 * (the HTTP route); an explicit body kind must agree with it.
 */
export function parseJobRequest(value: unknown, kind?: JobKind): JobRequest {
  if (value !== undefined && value !== null && !isRecord(value)) {
    throw new InvalidRequestError('Request body must be a JSON object');
  }
  const fields: Fields = isRecord(value) ? value : {};
  const requested = fields.kind ?? kind;
  if (kind !== undefined && requested !== kind) {
    throw new InvalidRequestError(`Request kind "${String(requested)}" does not match "${kind}"`);
  }
  switch (requested) {
    case 'train':
      return parseTrain(fields);
    case 'tournament':
      return parseTournament(fields);
    case 'automl':
      return parseAutoML(fields);
    default:
      throw new InvalidRequestError(`Unknown job kind: ${String(requested)}`);
  }
}
