import path from 'path';

import { AgentHyperparameters, DEFAULT_HYPERPARAMETERS } from '../ai/agent';

export type Env = Record<string, string | undefined>;

export interface Settings {
  modelsDir: string;
  eloPath: string;
  tournamentHistoryPath: string;
  automlResultsPath: string;
  /** JSON-lines training log; null when TRAINING_LOG_PATH is empty. */
  trainingLogPath: string | null;
  eloKFactor: number;
  eloInitialRating: number;
  agent: AgentHyperparameters;
  trainEpisodes: number;
  evalGames: number;
  evalSeeds: number;
  evalBaseSeed: number;
  tournamentGames: number;
  logInterval: number;
  verbose: boolean;
  port: number;
}

function readNumber(env: Env, key: string, fallback: number): number {
  const value = Number(env[key] ?? fallback);
  return Number.isFinite(value) ? value : fallback;
}

function readBoolean(env: Env, key: string, fallback: boolean): boolean {
  const value = env[key];
  if (value === undefined || value === '') {
    return fallback;
  }
  return value.toLowerCase() === 'true' || value === '1';
}

export function loadSettings(env: Env = process.env): Settings {
  const modelsDir = path.resolve(env.MODELS_DIR ?? 'models');
  const epsilon = readNumber(env, 'TRAIN_EPSILON', DEFAULT_HYPERPARAMETERS.epsilon);
  const logPath = env.TRAINING_LOG_PATH ?? path.join(modelsDir, 'training_log.jsonl');
  return {
    modelsDir,
    eloPath: path.resolve(env.ELO_PATH ?? path.join(modelsDir, 'elo_ratings.json')),
    tournamentHistoryPath: path.resolve(
      env.TOURNAMENT_HISTORY_PATH ?? path.join(modelsDir, 'tournament_history.json'),
    ),
    automlResultsPath: path.resolve(
      env.AUTOML_RESULTS_PATH ?? path.join(modelsDir, 'automl_results.json'),
    ),
    trainingLogPath: logPath === '' ? null : path.resolve(logPath),
    eloKFactor: readNumber(env, 'ELO_K_FACTOR', 32),
    eloInitialRating: readNumber(env, 'ELO_INITIAL_RATING', 1500),
    agent: {
      alpha: readNumber(env, 'TRAIN_ALPHA', DEFAULT_HYPERPARAMETERS.alpha),
      gamma: readNumber(env, 'TRAIN_GAMMA', DEFAULT_HYPERPARAMETERS.gamma),
      epsilon,
      epsilonStart: epsilon,
      epsilonMin: readNumber(env, 'TRAIN_EPSILON_MIN', DEFAULT_HYPERPARAMETERS.epsilonMin),
      epsilonDecay: readNumber(env, 'TRAIN_EPSILON_DECAY', DEFAULT_HYPERPARAMETERS.epsilonDecay),
    },
    trainEpisodes: readNumber(env, 'TRAIN_EPISODES', 20000),
    evalGames: readNumber(env, 'EVAL_GAMES', 200),
    evalSeeds: readNumber(env, 'EVAL_SEEDS', 5),
    evalBaseSeed: readNumber(env, 'EVAL_BASE_SEED', 42),
    tournamentGames: readNumber(env, 'TOURNAMENT_GAMES', 100),
    logInterval: readNumber(env, 'LOG_INTERVAL', 1000),
    verbose: readBoolean(env, 'VERBOSE', true),
    port: readNumber(env, 'PORT', 5173),
  };
}
