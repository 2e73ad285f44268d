import { AgentOptions, QLearningAgent, RandomAgent } from '../ai/agent';
import { Settings } from '../config/settings';
import { CancelSignal } from '../core/errors';
import { TicTacToeEnvironment } from '../core/tictactoe';
import { EloSystem } from '../ranking/elo';
import {
  Participant,
  Tournament,
  TournamentProgress,
  TournamentResult,
} from '../ranking/tournament';
import { ModelStore } from '../storage/model_store';
import {
  AutoMLProgress,
  AutoMLTuner,
  DEFAULT_DISTRIBUTIONS,
  DEFAULT_GRID,
  SearchResult,
} from '../training/automl';
import { Trainer, TrainingProgress, TrainingSummary } from '../training/trainer';
import { TrainingLog } from '../training/training_log';
import {
  AutoMLJobRequest,
  JobRequest,
  TournamentJobRequest,
  TrainJobRequest,
} from './requests';

export type JobProgress = TrainingProgress | TournamentProgress | AutoMLProgress;
export type JobResult = TrainingSummary | TournamentResult | SearchResult;

export interface JobHooks {
  signal?: CancelSignal;
  onProgress?: (progress: JobProgress) => void;
  verbose?: boolean;
}

export const RANDOM_PARTICIPANT = 'random';

/**
 * Loads stored models as tournament participants, rated under their model id.
 * Every stored model is used when no targets are given; one that fails to load
 * is then skipped, while a named target that fails to load is an error.
 */
export function loadParticipants(
  store: ModelStore,
  targets?: readonly string[],
  includeRandom = false,
): Participant[] {
  const paths = targets ?? store.list().map((model) => model.path);
  const participants: Participant[] = [];
  for (const target of paths) {
    const record = store.readRecord(target);
    const agent = new QLearningAgent();
    if (!record || !store.load(agent, target)) {
      const message = `Model could not be loaded: ${store.resolvePath(target)}`;
      if (targets) {
        throw new Error(message);
      }
      // eslint-disable-next-line no-console
      console.warn(`${message}, skipping`);
      continue;
    }
    participants.push({ name: record.name, policy: agent, ratingId: record.id });
  }
  if (includeRandom) {
    participants.push({ name: RANDOM_PARTICIPANT, policy: new RandomAgent() });
  }
  return participants;
}

export function runTrainJob(
  request: TrainJobRequest,
  settings: Settings,
  hooks: JobHooks = {},
): TrainingSummary {
  const overrides: AgentOptions = {};
  if (request.alpha !== undefined) {
    overrides.alpha = request.alpha;
  }
  if (request.gamma !== undefined) {
    overrides.gamma = request.gamma;
  }
  if (request.epsilonMin !== undefined) {
    overrides.epsilonMin = request.epsilonMin;
  }
  if (request.epsilonDecay !== undefined) {
    overrides.epsilonDecay = request.epsilonDecay;
  }

  const store = new ModelStore(settings.modelsDir);
  const agent = new QLearningAgent({ ...settings.agent, ...overrides });
  if (request.resume !== undefined && !store.load(agent, request.resume)) {
    throw new Error(`Model could not be loaded: ${store.resolvePath(request.resume)}`);
  }
  const trainer = new Trainer(agent, new TicTacToeEnvironment(), {
    store,
    log: settings.trainingLogPath ? new TrainingLog(settings.trainingLogPath) : undefined,
    logInterval: settings.logInterval,
    verbose: hooks.verbose ?? settings.verbose,
  });
  return trainer.train(request.episodes ?? settings.trainEpisodes, {
    evalGames: request.evalGames ?? settings.evalGames,
    evalSeeds: request.evalSeeds ?? settings.evalSeeds,
    baseSeed: request.baseSeed ?? settings.evalBaseSeed,
    name: request.name,
    signal: hooks.signal,
    onProgress: hooks.onProgress,
  });
}

export function runTournamentJob(
  request: TournamentJobRequest,
  settings: Settings,
  hooks: JobHooks = {},
): TournamentResult {
  const store = new ModelStore(settings.modelsDir);
  const participants = loadParticipants(store, request.models, request.includeRandom ?? false);
  const tournament = new Tournament(new TicTacToeEnvironment(), {
    elo: new EloSystem({
      filePath: settings.eloPath,
      kFactor: settings.eloKFactor,
      initialRating: settings.eloInitialRating,
    }),
    historyPath: settings.tournamentHistoryPath,
    verbose: hooks.verbose ?? settings.verbose,
  });
  const options = {
    gamesPerMatch: request.gamesPerMatch ?? settings.tournamentGames,
    updateElo: request.updateElo,
    signal: hooks.signal,
    onProgress: hooks.onProgress,
  };
  return request.mode === 'elimination'
    ? tournament.eliminationBracket(participants, options)
    : tournament.roundRobin(participants, options);
}

export function runAutoMLJob(
  request: AutoMLJobRequest,
  settings: Settings,
  hooks: JobHooks = {},
): SearchResult {
  const tuner = new AutoMLTuner(() => new TicTacToeEnvironment(), {
    resultsPath: settings.automlResultsPath,
    verbose: hooks.verbose ?? settings.verbose,
  });
  const options = {
    numEpisodes: request.numEpisodes,
    evalGames: request.evalGames,
    evalSeeds: request.evalSeeds,
    baseSeed: settings.evalBaseSeed,
    signal: hooks.signal,
    onProgress: hooks.onProgress,
  };
  return request.mode === 'grid'
    ? tuner.gridSearch(DEFAULT_GRID, { ...options, maxConfigs: request.maxConfigs })
    : tuner.randomSearch(DEFAULT_DISTRIBUTIONS, { ...options, iterations: request.iterations });
}

export function runJob(request: JobRequest, settings: Settings, hooks: JobHooks = {}): JobResult {
  switch (request.kind) {
    case 'train':
      return runTrainJob(request, settings, hooks);
    case 'tournament':
      return runTournamentJob(request, settings, hooks);
    case 'automl':
      return runAutoMLJob(request, settings, hooks);
  }
}
