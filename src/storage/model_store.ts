import { randomUUID } from 'crypto';
import fs from 'fs';
import path from 'path';

import { QLearningAgent, QTableSnapshot, QTableStats } from '../ai/agent';
import {
  isFiniteNumber,
  isRecord,
  numberOr,
  readJsonSafe,
  stringOr,
  writeJsonSafe,
} from './json_file';

export const DEFAULT_MODEL_NAME = 'q_table';
const MODEL_EXTENSION = '.json';

export interface StoredHyperparameters {
  alpha: number;
  gamma: number;
  epsilon: number;
  epsilon_start: number;
  epsilon_min: number;
  epsilon_decay: number;
}

export interface TrainingHyperparameters {
  alpha: number;
  gamma: number;
  epsilon_start: number;
  epsilon_final: number;
  epsilon_min: number;
  epsilon_decay: number;
}

export interface PerformanceSummary {
  states_learned: number;
  avg_reward: number;
  avg_moves: number;
}

export interface SeedResult {
  seed: number;
  numGames: number;
  wins: number;
  draws: number;
  losses: number;
  winRate: number;
  drawRate: number;
  lossRate: number;
}

export interface EvalRobustness {
  win_rate_std: number;
  win_rate_min: number;
  win_rate_max: number;
  seed_results: SeedResult[];
}

export interface TrainingStats {
  train_win_rate: number;
  train_draw_rate: number;
  train_loss_rate: number;
}

export type MetricsSource = 'evaluation' | 'training';

/** Field names are part of the file format and stay snake_case. */
export interface ModelMetadata {
  final_win_rate?: number;
  final_draw_rate?: number;
  final_loss_rate?: number;
  total_episodes?: number;
  states_learned?: number;
  hyperparameters?: TrainingHyperparameters;
  performance?: PerformanceSummary;
  training_time?: number;
  eval_games?: number;
  eval_seeds?: number;
  metrics_source?: MetricsSource;
  eval_robustness?: EvalRobustness;
  training_stats?: TrainingStats;
  episode_rewards?: number[];
}

export interface ModelRecord {
  id: string;
  name: string;
  timestamp: string;
  q_table: QTableSnapshot;
  hyperparameters: StoredHyperparameters;
  stats: QTableStats;
  metadata: ModelMetadata;
}

export interface ModelSummary {
  id: string;
  name: string;
  path: string;
  fileName: string;
  timestamp: string;
  states: number;
  epsilon: number;
  sizeKb: number;
  metadata: ModelMetadata;
}

export interface SaveOptions {
  versioned?: boolean;
}

function pad(value: number): string {
  return String(value).padStart(2, '0');
}

function versionSuffix(date: Date): string {
  return (
    `${date.getFullYear()}${pad(date.getMonth() + 1)}${pad(date.getDate())}_` +
    `${pad(date.getHours())}${pad(date.getMinutes())}${pad(date.getSeconds())}`
  );
}

function describe(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

export class ModelStore {
  readonly modelsDir: string;

  constructor(modelsDir = 'models') {
    this.modelsDir = path.resolve(modelsDir);
  }

  /** Bare names live in the models directory; anything with a separator is taken as a path. */
  resolvePath(target: string): string {
    if (path.isAbsolute(target)) {
      return target;
    }
    if (target.includes('/') || target.includes(path.sep)) {
      return path.resolve(target);
    }
    const fileName = target.endsWith(MODEL_EXTENSION) ? target : `${target}${MODEL_EXTENSION}`;
    return path.join(this.modelsDir, fileName);
  }

  save(
    agent: QLearningAgent,
    name: string = DEFAULT_MODEL_NAME,
    metadata: ModelMetadata = {},
    options: SaveOptions = {},
  ): string | null {
    const now = new Date();
    let fileName = name;
    if (options.versioned) {
      fileName = `${name}_${versionSuffix(now)}`;
      let counter = 1;
      while (fs.existsSync(this.resolvePath(fileName))) {
        fileName = `${name}_${versionSuffix(now)}_${counter}`;
        counter += 1;
      }
    }
    const params = agent.getHyperparameters();
    const record: ModelRecord = {
      id: randomUUID(),
      name: fileName,
      timestamp: now.toISOString(),
      q_table: agent.snapshotQTable(),
      hyperparameters: {
        alpha: params.alpha,
        gamma: params.gamma,
        epsilon: params.epsilon,
        epsilon_start: params.epsilonStart,
        epsilon_min: params.epsilonMin,
        epsilon_decay: params.epsilonDecay,
      },
      stats: agent.getStats(),
      metadata,
    };
    const filePath = this.resolvePath(fileName);
    if (!writeJsonSafe(filePath, record)) {
      return null;
    }
    // eslint-disable-next-line no-console
    console.log(
      `Model saved: ${filePath} (states=${record.stats.totalStates}, epsilon=${record.stats.epsilon.toFixed(6)})`,
    );
    return filePath;
  }

  readRecord(target: string): ModelRecord | null {
    const filePath = this.resolvePath(target);
    const raw = readJsonSafe(filePath);
    if (raw === null) {
      return null;
    }
    const record = parseModelRecord(raw, path.basename(filePath, MODEL_EXTENSION));
    if (!record) {
      // eslint-disable-next-line no-console
      console.warn(`Not a model file: ${filePath}`);
    }
    return record;
  }

  load(agent: QLearningAgent, target: string = DEFAULT_MODEL_NAME): boolean {
    const record = this.readRecord(target);
    if (!record) {
      // eslint-disable-next-line no-console
      console.warn(`Model could not be loaded: ${this.resolvePath(target)}`);
      return false;
    }
    const params = record.hyperparameters;
    try {
      agent.setHyperparameters({
        alpha: params.alpha,
        gamma: params.gamma,
        epsilonMin: params.epsilon_min,
        epsilonStart: Math.max(params.epsilon_start, params.epsilon_min),
        epsilon: Math.max(params.epsilon, params.epsilon_min),
        epsilonDecay: params.epsilon_decay,
      });
    } catch (error) {
      // eslint-disable-next-line no-console
      console.warn(`Model ${record.name} has invalid hyperparameters: ${describe(error)}`);
      return false;
    }
    agent.loadQTable(record.q_table);
    return true;
  }

  exists(target: string = DEFAULT_MODEL_NAME): boolean {
    return fs.existsSync(this.resolvePath(target));
  }

  list(): ModelSummary[] {
    if (!fs.existsSync(this.modelsDir)) {
      return [];
    }
    const summaries: ModelSummary[] = [];
    for (const fileName of fs.readdirSync(this.modelsDir)) {
      if (!fileName.endsWith(MODEL_EXTENSION)) {
        continue;
      }
      const filePath = path.join(this.modelsDir, fileName);
      const record = this.readRecord(filePath);
      if (!record) {
        continue;
      }
      summaries.push({
        id: record.id,
        name: record.name,
        path: filePath,
        fileName,
        timestamp: record.timestamp,
        states: record.stats.totalStates,
        epsilon: record.stats.epsilon,
        sizeKb: fs.statSync(filePath).size / 1024,
        metadata: record.metadata,
      });
    }
    summaries.sort((a, b) => b.timestamp.localeCompare(a.timestamp));
    return summaries;
  }

  delete(target: string): boolean {
    const filePath = this.resolvePath(target);
    if (!fs.existsSync(filePath)) {
      // eslint-disable-next-line no-console
      console.warn(`Model not found: ${filePath}`);
      return false;
    }
    try {
      fs.unlinkSync(filePath);
      return true;
    } catch (error) {
      // eslint-disable-next-line no-console
      console.warn(`Could not delete ${filePath}: ${describe(error)}`);
      return false;
    }
  }
}

function parseQTable(value: unknown): QTableSnapshot | null {
  if (!isRecord(value)) {
    return null;
  }
  const table: QTableSnapshot = {};
  for (const [state, row] of Object.entries(value)) {
    if (!isRecord(row)) {
      return null;
    }
    const values: Record<string, number> = {};
    for (const [action, q] of Object.entries(row)) {
      if (!isFiniteNumber(q)) {
        return null;
      }
      values[action] = q;
    }
    table[state] = values;
  }
  return table;
}

function parseStoredHyperparameters(value: unknown): StoredHyperparameters | null {
  if (!isRecord(value)) {
    return null;
  }
  const { alpha, gamma, epsilon } = value;
  if (!isFiniteNumber(alpha) || !isFiniteNumber(gamma) || !isFiniteNumber(epsilon)) {
    return null;
  }
  return {
    alpha,
    gamma,
    epsilon,
    epsilon_start: numberOr(value.epsilon_start, epsilon),
    epsilon_min: numberOr(value.epsilon_min, Math.min(epsilon, 0.01)),
    epsilon_decay: numberOr(value.epsilon_decay, 1),
  };
}

function parseStats(value: unknown, qTable: QTableSnapshot, epsilon: number): QTableStats {
  const stats = isRecord(value) ? value : {};
  const totalStates = Object.keys(qTable).length;
  return {
    totalStates: numberOr(stats.totalStates, totalStates),
    totalStateActions: numberOr(stats.totalStateActions, 0),
    avgQValue: numberOr(stats.avgQValue, 0),
    maxQValue: numberOr(stats.maxQValue, 0),
    minQValue: numberOr(stats.minQValue, 0),
    stdQValue: numberOr(stats.stdQValue, 0),
    epsilon: numberOr(stats.epsilon, epsilon),
    alpha: numberOr(stats.alpha, 0),
    gamma: numberOr(stats.gamma, 0),
  };
}

const NUMERIC_METADATA_FIELDS = [
  'final_win_rate',
  'final_draw_rate',
  'final_loss_rate',
  'total_episodes',
  'states_learned',
  'training_time',
  'eval_games',
  'eval_seeds',
] as const;

function parseSeedResults(value: unknown): SeedResult[] {
  if (!Array.isArray(value)) {
    return [];
  }
  const results: SeedResult[] = [];
  for (const item of value) {
    if (!isRecord(item)) {
      continue;
    }
    results.push({
      seed: numberOr(item.seed, 0),
      numGames: numberOr(item.numGames, 0),
      wins: numberOr(item.wins, 0),
      draws: numberOr(item.draws, 0),
      losses: numberOr(item.losses, 0),
      winRate: numberOr(item.winRate, 0),
      drawRate: numberOr(item.drawRate, 0),
      lossRate: numberOr(item.lossRate, 0),
    });
  }
  return results;
}

/** Keeps the fields it recognises and drops anything malformed. */
export function parseMetadata(value: unknown): ModelMetadata {
  if (!isRecord(value)) {
    return {};
  }
  const metadata: ModelMetadata = {};
  for (const field of NUMERIC_METADATA_FIELDS) {
    const fieldValue = value[field];
    if (isFiniteNumber(fieldValue)) {
      metadata[field] = fieldValue;
    }
  }
  const { hyperparameters, performance, eval_robustness, training_stats } = value;
  if (isRecord(hyperparameters)) {
    metadata.hyperparameters = {
      alpha: numberOr(hyperparameters.alpha, 0),
      gamma: numberOr(hyperparameters.gamma, 0),
      epsilon_start: numberOr(hyperparameters.epsilon_start, 1),
      epsilon_final: numberOr(hyperparameters.epsilon_final, 1),
      epsilon_min: numberOr(hyperparameters.epsilon_min, 0.01),
      epsilon_decay: numberOr(hyperparameters.epsilon_decay, 1),
    };
  }
  if (isRecord(performance)) {
    metadata.performance = {
      states_learned: numberOr(performance.states_learned, 0),
      avg_reward: numberOr(performance.avg_reward, 0),
      avg_moves: numberOr(performance.avg_moves, 0),
    };
  }
  if (value.metrics_source === 'evaluation' || value.metrics_source === 'training') {
    metadata.metrics_source = value.metrics_source;
  }
  if (isRecord(eval_robustness)) {
    metadata.eval_robustness = {
      win_rate_std: numberOr(eval_robustness.win_rate_std, 0),
      win_rate_min: numberOr(eval_robustness.win_rate_min, 0),
      win_rate_max: numberOr(eval_robustness.win_rate_max, 0),
      seed_results: parseSeedResults(eval_robustness.seed_results),
    };
  }
  if (isRecord(training_stats)) {
    metadata.training_stats = {
      train_win_rate: numberOr(training_stats.train_win_rate, 0),
      train_draw_rate: numberOr(training_stats.train_draw_rate, 0),
      train_loss_rate: numberOr(training_stats.train_loss_rate, 0),
    };
  }
  if (Array.isArray(value.episode_rewards)) {
    metadata.episode_rewards = value.episode_rewards.filter(isFiniteNumber);
  }
  return metadata;
}

export function parseModelRecord(value: unknown, fallbackName: string): ModelRecord | null {
  if (!isRecord(value)) {
    return null;
  }
  const qTable = parseQTable(value.q_table);
  const hyperparameters = parseStoredHyperparameters(value.hyperparameters);
  if (!qTable || !hyperparameters) {
    return null;
  }
  return {
    id: stringOr(value.id, fallbackName),
    name: stringOr(value.name, fallbackName),
    timestamp: stringOr(value.timestamp, ''),
    q_table: qTable,
    hyperparameters,
    stats: parseStats(value.stats, qTable, hyperparameters.epsilon),
    metadata: parseMetadata(value.metadata),
  };
}
