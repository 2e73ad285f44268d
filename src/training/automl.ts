import path from 'path';

import { AgentOptions, QLearningAgent, resolveHyperparameters } from '../ai/agent';
import { CancelSignal, throwIfCancelled } from '../core/errors';
import { GameEnvironment, RandomSource } from '../core/types';
import { computeAllMetrics } from '../ranking/metrics';
import { writeJsonSafe } from '../storage/json_file';
import { formatNumber } from './common';
import { Trainer } from './trainer';

export type TunableParam = 'alpha' | 'gamma' | 'epsilon' | 'epsilonMin' | 'epsilonDecay';

export const TUNABLE_PARAMS: readonly TunableParam[] = [
  'alpha',
  'gamma',
  'epsilon',
  'epsilonMin',
  'epsilonDecay',
];

export type ParamGrid = Partial<Record<TunableParam, number[]>>;
export type ParamDistributions = Partial<Record<TunableParam, [number, number]>>;
export type TrialConfig = Partial<Record<TunableParam, number>>;

export const DEFAULT_GRID: ParamGrid = {
  alpha: [0.1, 0.15, 0.2, 0.25, 0.3],
  gamma: [0.9, 0.92, 0.95, 0.97, 0.99],
  epsilonDecay: [0.99, 0.995, 0.997, 0.999],
};

export const DEFAULT_DISTRIBUTIONS: ParamDistributions = {
  alpha: [0.05, 0.5],
  gamma: [0.85, 0.99],
  epsilonDecay: [0.98, 0.9999],
  epsilonMin: [0.001, 0.1],
};

export type SearchMode = 'grid' | 'random';

export interface TrialResult {
  configId: number;
  timestamp: string;
  config: TrialConfig;
  trainDuration: number;
  trainWinRate: number;
  evalWinRate: number;
  evalDrawRate: number;
  evalLossRate: number;
  statesLearned: number;
  finalEpsilon: number;
  compositeScore: number;
  performanceScore: number;
  efficiencyScore: number;
  robustnessScore: number;
  learningSpeed: number;
}

export interface SkippedTrial {
  configId: number;
  config: TrialConfig;
  error: string;
}

export interface SearchResult {
  mode: SearchMode;
  bestConfig: TrialConfig | null;
  bestScore: number;
  results: TrialResult[];
  /** Configurations whose hyperparameters were rejected before training. */
  skipped: SkippedTrial[];
  duration: number;
}

export interface AutoMLProgress {
  readonly mode: SearchMode;
  readonly completed: number;
  readonly total: number;
  readonly bestScore: number;
  readonly lastScore: number;
}

export interface SearchOptions {
  numEpisodes?: number;
  evalGames?: number;
  evalSeeds?: number;
  baseSeed?: number;
  signal?: CancelSignal;
  onProgress?: (progress: AutoMLProgress) => void;
}

export interface GridSearchOptions extends SearchOptions {
  maxConfigs?: number;
}

export interface RandomSearchOptions extends SearchOptions {
  iterations?: number;
}

export interface AutoMLTunerOptions {
  /** JSON file the latest search is written to; null skips writing. */
  resultsPath?: string | null;
  random?: RandomSource;
  verbose?: boolean;
}

/** Cartesian product of the grid, parameters in {@link TUNABLE_PARAMS} order. */
export function expandGrid(grid: ParamGrid): TrialConfig[] {
  let configs: TrialConfig[] = [{}];
  for (const param of TUNABLE_PARAMS) {
    const values = grid[param];
    if (!values || values.length === 0) {
      continue;
    }
    const next: TrialConfig[] = [];
    for (const config of configs) {
      for (const value of values) {
        next.push({ ...config, [param]: value });
      }
    }
    configs = next;
  }
  return configs;
}

export function sampleConfig(distributions: ParamDistributions, random: RandomSource): TrialConfig {
  const config: TrialConfig = {};
  for (const param of TUNABLE_PARAMS) {
    const range = distributions[param];
    if (!range) {
      continue;
    }
    const [min, max] = range;
    config[param] = min + random() * (max - min);
  }
  return config;
}

function describeConfig(config: TrialConfig): string {
  return TUNABLE_PARAMS.filter((param) => config[param] !== undefined)
    .map((param) => `${param}=${formatNumber(config[param] ?? 0, 4)}`)
    .join(' ');
}

function rejectionOf(config: TrialConfig): string | null {
  try {
    resolveHyperparameters(config);
    return null;
  } catch (error) {
    if (error instanceof RangeError) {
      return error.message;
    }
    throw error;
  }
}

export class AutoMLTuner {
  private readonly envFactory: () => GameEnvironment;
  private readonly resultsPath: string | null;
  private readonly random: RandomSource;
  private readonly verbose: boolean;

  constructor(envFactory: () => GameEnvironment, options: AutoMLTunerOptions = {}) {
    this.envFactory = envFactory;
    this.resultsPath =
      options.resultsPath === undefined || options.resultsPath === null
        ? null
        : path.resolve(options.resultsPath);
    this.random = options.random ?? Math.random;
    this.verbose = options.verbose ?? false;
  }

  private print(message: string): void {
    if (this.verbose) {
      // eslint-disable-next-line no-console
      console.log(message);
    }
  }

  gridSearch(grid: ParamGrid = DEFAULT_GRID, options: GridSearchOptions = {}): SearchResult {
    let configs = expandGrid(grid);
    if (options.maxConfigs !== undefined && configs.length > options.maxConfigs) {
      this.print(`${configs.length} combinations, keeping the first ${options.maxConfigs}`);
      configs = configs.slice(0, options.maxConfigs);
    }
    return this.run('grid', configs.length, (index) => configs[index] ?? {}, options);
  }

  randomSearch(
    distributions: ParamDistributions = DEFAULT_DISTRIBUTIONS,
    options: RandomSearchOptions = {},
  ): SearchResult {
    const iterations = options.iterations ?? 20;
    return this.run('random', iterations, () => sampleConfig(distributions, this.random), options);
  }

  private run(
    mode: SearchMode,
    total: number,
    configAt: (index: number) => TrialConfig,
    options: SearchOptions,
  ): SearchResult {
    const startedAt = Date.now();
    const results: TrialResult[] = [];
    const skipped: SkippedTrial[] = [];
    let bestConfig: TrialConfig | null = null;
    let bestScore = -Infinity;
    this.print(`AutoML ${mode} search: ${total} configurations`);

    for (let index = 0; index < total; index += 1) {
      throwIfCancelled(options.signal, 'AutoML search');
      const config = configAt(index);
      const rejection = rejectionOf(config);
      if (rejection !== null) {
        skipped.push({ configId: index + 1, config, error: rejection });
        // eslint-disable-next-line no-console
        console.warn(`[${index + 1}/${total}] ${describeConfig(config)} skipped: ${rejection}`);
        continue;
      }
      const result = this.trainAndEvaluate(config, index + 1, options);
      results.push(result);
      if (result.compositeScore > bestScore) {
        bestScore = result.compositeScore;
        bestConfig = config;
        this.print(`[${index + 1}/${total}] ${describeConfig(config)} new best ${formatNumber(bestScore)}`);
      } else {
        this.print(
          `[${index + 1}/${total}] ${describeConfig(config)} score ${formatNumber(result.compositeScore)}`,
        );
      }
      options.onProgress?.(
        Object.freeze({
          mode,
          completed: index + 1,
          total,
          bestScore,
          lastScore: result.compositeScore,
        }),
      );
    }

    const summary: SearchResult = {
      mode,
      bestConfig,
      bestScore: results.length > 0 ? bestScore : 0,
      results,
      skipped,
      duration: (Date.now() - startedAt) / 1000,
    };
    if (this.resultsPath) {
      writeJsonSafe(this.resultsPath, summary);
    }
    return summary;
  }

  private trainAndEvaluate(config: TrialConfig, configId: number, options: SearchOptions): TrialResult {
    const agentOptions: AgentOptions = { ...config };
    const agent = new QLearningAgent(agentOptions);
    const trainer = new Trainer(agent, this.envFactory());
    const numEpisodes = options.numEpisodes ?? 10000;
    const startedAt = Date.now();
    const summary = trainer.train(numEpisodes, {
      evalGames: options.evalGames ?? 100,
      evalSeeds: options.evalSeeds ?? 1,
      baseSeed: options.baseSeed,
      signal: options.signal,
      save: false,
    });
    const trainDuration = (Date.now() - startedAt) / 1000;
    const metrics = computeAllMetrics({
      metadata: summary.metadata,
      stats: { totalStates: agent.statesLearned, epsilon: agent.epsilon },
    });
    const scores = metrics.available
      ? metrics
      : {
          compositeScore: 0,
          performanceScore: 0,
          efficiencyScore: 0,
          robustnessScore: 0,
          learningSpeed: 0,
        };
    return {
      configId,
      timestamp: new Date().toISOString(),
      config,
      trainDuration,
      trainWinRate: summary.winRate,
      evalWinRate: summary.metadata.final_win_rate ?? 0,
      evalDrawRate: summary.metadata.final_draw_rate ?? 0,
      evalLossRate: summary.metadata.final_loss_rate ?? 0,
      statesLearned: agent.statesLearned,
      finalEpsilon: agent.epsilon,
      compositeScore: scores.compositeScore,
      performanceScore: scores.performanceScore,
      efficiencyScore: scores.efficiencyScore,
      robustnessScore: scores.robustnessScore,
      learningSpeed: scores.learningSpeed,
    };
  }
}
