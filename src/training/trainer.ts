import { ActionPolicy, QLearningAgent, RandomAgent } from '../ai/agent';
import {
  CancelSignal,
  NoLegalActionsError,
  throwIfCancelled,
  TrainerBusyError,
} from '../core/errors';
import { createSeededRandom } from '../core/random';
import {
  Action,
  GameEnvironment,
  Player,
  PLAYER_O,
  PLAYER_X,
  RandomSource,
  REWARD_DRAW,
  REWARD_LOSS,
  REWARD_ONGOING,
  StateKey,
} from '../core/types';
import {
  DEFAULT_MODEL_NAME,
  ModelMetadata,
  ModelStore,
  SeedResult,
} from '../storage/model_store';
import { BoundedHistory, formatNumber, percent, summarise } from './common';
import { TrainingLog } from './training_log';

export type TrainerPhase = 'idle' | 'training' | 'evaluating' | 'done';

export interface EpisodeOutcome {
  winner: Player | null;
  moves: number;
  agentPlayer: Player;
}

export interface TrainingProgress {
  readonly phase: TrainerPhase;
  readonly episode: number;
  readonly totalEpisodes: number;
  readonly epsilon: number;
  readonly winRate: number;
  readonly drawRate: number;
  readonly lossRate: number;
  readonly avgReward: number;
  readonly avgMoves: number;
  readonly statesLearned: number;
}

export interface EvaluationOptions {
  epsilon?: number;
  numSeeds?: number;
  baseSeed?: number;
  signal?: CancelSignal;
}

export interface EvaluationResult {
  numGames: number;
  numSeeds: number;
  epsilon: number;
  seedResults: SeedResult[];
  meanWinRate: number;
  stdWinRate: number;
  minWinRate: number;
  maxWinRate: number;
  meanDrawRate: number;
  meanLossRate: number;
}

export interface TrainOptions {
  evalGames?: number;
  evalSeeds?: number;
  baseSeed?: number;
  signal?: CancelSignal;
  onProgress?: (progress: TrainingProgress) => void;
  /** Persist the trained agent when a store is configured. Defaults to true. */
  save?: boolean;
  name?: string;
}

export interface TrainingSummary {
  numEpisodes: number;
  duration: number;
  wins: number;
  draws: number;
  losses: number;
  winRate: number;
  drawRate: number;
  lossRate: number;
  avgEpisodeLength: number;
  avgReward: number;
  finalEpsilon: number;
  statesLearned: number;
  evaluation: EvaluationResult | null;
  metadata: ModelMetadata;
  savedPaths: string[];
}

export interface TrainerOptions {
  opponent?: ActionPolicy;
  store?: ModelStore;
  log?: TrainingLog;
  logInterval?: number;
  historySize?: number;
  verbose?: boolean;
}

export const DEFAULT_BASE_SEED = 42;
const ROLLING_WINDOW = 100;

/**
 * Drives a Q-learning agent against a fixed opponent and evaluates it with
 * reproducible seeds.
 */
export class Trainer {
  readonly agent: QLearningAgent;
  readonly env: GameEnvironment;
  readonly opponent: ActionPolicy;
  private readonly store?: ModelStore;
  private readonly log?: TrainingLog;
  private readonly logInterval: number;
  private readonly historySize: number;
  private readonly verbose: boolean;

  private phase: TrainerPhase = 'idle';
  private wins = 0;
  private draws = 0;
  private losses = 0;
  private rewards: BoundedHistory;
  private lengths: BoundedHistory;

  constructor(agent: QLearningAgent, env: GameEnvironment, options: TrainerOptions = {}) {
    this.agent = agent;
    this.env = env;
    this.opponent = options.opponent ?? new RandomAgent();
    this.store = options.store;
    this.log = options.log;
    this.logInterval = Math.max(1, options.logInterval ?? 100);
    this.historySize = Math.max(1, options.historySize ?? 1000);
    this.verbose = options.verbose ?? false;
    this.rewards = new BoundedHistory(this.historySize);
    this.lengths = new BoundedHistory(this.historySize);
  }

  getPhase(): TrainerPhase {
    return this.phase;
  }

  private legalOrThrow(state: StateKey): Action[] {
    const legal = this.env.legalActions(state);
    if (legal.length === 0) {
      throw new NoLegalActionsError(state);
    }
    return legal;
  }

  /**
   * Plays one game. The agent's previous move is updated once the opponent
   * has replied, so every update sees the state the agent acts from next.
   */
  playEpisode(agentStarts: boolean, updateAgent: boolean, epsilon?: number): EpisodeOutcome {
    let state = this.env.reset();
    let done = false;
    let moves = 0;
    const agentPlayer: Player = agentStarts ? PLAYER_X : PLAYER_O;

    if (!agentStarts) {
      const opening = this.opponent.chooseAction(state, this.legalOrThrow(state));
      ({ state, done } = this.env.applyAction(opening));
      moves += 1;
    }

    while (!done) {
      const agentState = state;
      const action = this.agent.chooseAction(agentState, this.legalOrThrow(agentState), epsilon);
      const agentStep = this.env.applyAction(action);
      moves += 1;
      state = agentStep.state;
      done = agentStep.done;

      if (done) {
        if (updateAgent) {
          this.agent.update(agentState, action, agentStep.reward, state, [], true);
        }
        break;
      }

      const reply = this.opponent.chooseAction(state, this.legalOrThrow(state));
      const opponentStep = this.env.applyAction(reply);
      moves += 1;
      state = opponentStep.state;
      done = opponentStep.done;

      if (updateAgent) {
        let reward = REWARD_ONGOING;
        if (done) {
          reward = this.env.getWinner() === null ? REWARD_DRAW : REWARD_LOSS;
        }
        const nextLegal = done ? [] : this.env.legalActions(state);
        this.agent.update(agentState, action, reward, state, nextLegal, done);
      }
    }

    return { winner: this.env.getWinner(), moves, agentPlayer };
  }

  private assertIdle(): void {
    if (this.phase === 'training' || this.phase === 'evaluating') {
      throw new TrainerBusyError(this.phase);
    }
  }

  private resetCounters(): void {
    this.wins = 0;
    this.draws = 0;
    this.losses = 0;
    this.rewards = new BoundedHistory(this.historySize);
    this.lengths = new BoundedHistory(this.historySize);
  }

  private progress(episode: number, totalEpisodes: number): TrainingProgress {
    return Object.freeze({
      phase: this.phase,
      episode,
      totalEpisodes,
      epsilon: this.agent.epsilon,
      winRate: percent(this.wins, episode),
      drawRate: percent(this.draws, episode),
      lossRate: percent(this.losses, episode),
      avgReward: this.rewards.rollingMean(ROLLING_WINDOW),
      avgMoves: this.lengths.rollingMean(ROLLING_WINDOW),
      statesLearned: this.agent.statesLearned,
    });
  }

  private report(progress: TrainingProgress, onProgress?: (p: TrainingProgress) => void): void {
    this.log?.append({
      ts: new Date().toISOString(),
      episode: progress.episode,
      totalEpisodes: progress.totalEpisodes,
      epsilon: progress.epsilon,
      winRate: progress.winRate,
      drawRate: progress.drawRate,
      lossRate: progress.lossRate,
      avgReward: progress.avgReward,
      avgMoves: progress.avgMoves,
      statesLearned: progress.statesLearned,
    });
    if (this.verbose) {
      // eslint-disable-next-line no-console
      console.log(
        `Episode ${progress.episode}/${progress.totalEpisodes}: epsilon=${progress.epsilon.toFixed(4)} ` +
          `win=${formatNumber(progress.winRate, 1)}% draw=${formatNumber(progress.drawRate, 1)}% ` +
          `loss=${formatNumber(progress.lossRate, 1)}% avgReward=${formatNumber(progress.avgReward, 3)} ` +
          `states=${progress.statesLearned}`,
      );
    }
    onProgress?.(progress);
  }

  train(numEpisodes: number, options: TrainOptions = {}): TrainingSummary {
    this.assertIdle();
    if (!Number.isInteger(numEpisodes) || numEpisodes < 0) {
      throw new RangeError(`numEpisodes must be a non-negative integer, got ${numEpisodes}`);
    }
    this.phase = 'training';
    try {
      return this.runTraining(numEpisodes, options);
    } catch (error) {
      this.phase = 'idle';
      throw error;
    }
  }

  private runTraining(numEpisodes: number, options: TrainOptions): TrainingSummary {
    const startedAt = Date.now();
    const initialEpsilon = this.agent.epsilon;
    const params = this.agent.getHyperparameters();
    this.resetCounters();

    if (this.verbose) {
      // eslint-disable-next-line no-console
      console.log(
        `Training ${numEpisodes} episodes: alpha=${params.alpha} gamma=${params.gamma} ` +
          `epsilon=${initialEpsilon.toFixed(4)} min=${params.epsilonMin} decay=${params.epsilonDecay}`,
      );
    }

    for (let episode = 0; episode < numEpisodes; episode += 1) {
      throwIfCancelled(options.signal, 'Training');
      const outcome = this.playEpisode(episode % 2 === 0, true);
      let reward = 0;
      if (outcome.winner === outcome.agentPlayer) {
        this.wins += 1;
        reward = 1;
      } else if (outcome.winner === null) {
        this.draws += 1;
      } else {
        this.losses += 1;
        reward = -1;
      }
      this.rewards.push(reward);
      this.lengths.push(outcome.moves);
      this.agent.decayEpsilon();

      const completed = episode + 1;
      if (completed % this.logInterval === 0 || completed === numEpisodes) {
        this.report(this.progress(completed, numEpisodes), options.onProgress);
      }
    }

    const trainWinRate = percent(this.wins, numEpisodes);
    const trainDrawRate = percent(this.draws, numEpisodes);
    const trainLossRate = percent(this.losses, numEpisodes);
    const rewardHistory = this.rewards.toArray();
    const lengthHistory = this.lengths.toArray();
    const avgReward = summarise(rewardHistory).mean;
    const avgMoves = summarise(lengthHistory).mean;

    const evalGames = options.evalGames ?? 0;
    let evaluation: EvaluationResult | null = null;
    if (evalGames > 0) {
      this.phase = 'evaluating';
      options.onProgress?.(this.progress(numEpisodes, numEpisodes));
      evaluation = this.runEvaluation(evalGames, {
        epsilon: 0,
        numSeeds: options.evalSeeds ?? 1,
        baseSeed: options.baseSeed,
        signal: options.signal,
      });
    }

    const metadata: ModelMetadata = {
      final_win_rate: evaluation ? evaluation.meanWinRate : trainWinRate,
      final_draw_rate: evaluation ? evaluation.meanDrawRate : trainDrawRate,
      final_loss_rate: evaluation ? evaluation.meanLossRate : trainLossRate,
      total_episodes: numEpisodes,
      states_learned: this.agent.statesLearned,
      hyperparameters: {
        alpha: params.alpha,
        gamma: params.gamma,
        epsilon_start: initialEpsilon,
        epsilon_final: this.agent.epsilon,
        epsilon_min: params.epsilonMin,
        epsilon_decay: params.epsilonDecay,
      },
      performance: {
        states_learned: this.agent.statesLearned,
        avg_reward: avgReward,
        avg_moves: avgMoves,
      },
      training_time: (Date.now() - startedAt) / 1000,
      eval_games: evalGames,
      eval_seeds: evaluation ? evaluation.numSeeds : 0,
      metrics_source: evaluation ? 'evaluation' : 'training',
      training_stats: {
        train_win_rate: trainWinRate,
        train_draw_rate: trainDrawRate,
        train_loss_rate: trainLossRate,
      },
      episode_rewards: rewardHistory,
    };
    if (evaluation) {
      metadata.eval_robustness = {
        win_rate_std: evaluation.stdWinRate,
        win_rate_min: evaluation.minWinRate,
        win_rate_max: evaluation.maxWinRate,
        seed_results: evaluation.seedResults,
      };
    }

    const savedPaths: string[] = [];
    if (this.store && options.save !== false) {
      const name = options.name ?? DEFAULT_MODEL_NAME;
      const written = [
        this.store.save(this.agent, name, metadata),
        this.store.save(this.agent, `model_${numEpisodes}ep`, metadata, { versioned: true }),
      ];
      for (const savedPath of written) {
        if (savedPath !== null) {
          savedPaths.push(savedPath);
        }
      }
    }

    this.phase = 'done';
    const duration = (Date.now() - startedAt) / 1000;
    if (this.verbose) {
      // eslint-disable-next-line no-console
      console.log(
        `Training finished in ${formatNumber(duration)}s: win=${formatNumber(trainWinRate, 1)}% ` +
          `draw=${formatNumber(trainDrawRate, 1)}% loss=${formatNumber(trainLossRate, 1)}% ` +
          `states=${this.agent.statesLearned} epsilon=${this.agent.epsilon.toFixed(6)}`,
      );
    }
    options.onProgress?.(this.progress(numEpisodes, numEpisodes));

    return {
      numEpisodes,
      duration,
      wins: this.wins,
      draws: this.draws,
      losses: this.losses,
      winRate: trainWinRate,
      drawRate: trainDrawRate,
      lossRate: trainLossRate,
      avgEpisodeLength: avgMoves,
      avgReward,
      finalEpsilon: this.agent.epsilon,
      statesLearned: this.agent.statesLearned,
      evaluation,
      metadata,
      savedPaths,
    };
  }

  evaluate(numGames: number, options: EvaluationOptions = {}): EvaluationResult {
    this.assertIdle();
    this.phase = 'evaluating';
    try {
      const result = this.runEvaluation(numGames, options);
      this.phase = 'done';
      return result;
    } catch (error) {
      this.phase = 'idle';
      throw error;
    }
  }

  private runEvaluation(numGames: number, options: EvaluationOptions): EvaluationResult {
    if (!Number.isInteger(numGames) || numGames < 1) {
      throw new RangeError(`numGames must be a positive integer, got ${numGames}`);
    }
    const epsilon = options.epsilon ?? 0;
    const numSeeds = Math.max(1, options.numSeeds ?? 1);
    const baseSeed = options.baseSeed ?? DEFAULT_BASE_SEED;

    const seedResults: SeedResult[] = [];
    for (let index = 0; index < numSeeds; index += 1) {
      throwIfCancelled(options.signal, 'Evaluation');
      const seed = baseSeed + index;
      seedResults.push(this.evaluateSeed(seed, numGames, epsilon));
    }

    const winRates = summarise(seedResults.map((result) => result.winRate));
    const result: EvaluationResult = {
      numGames,
      numSeeds,
      epsilon,
      seedResults,
      meanWinRate: winRates.mean,
      stdWinRate: winRates.std,
      minWinRate: winRates.min,
      maxWinRate: winRates.max,
      meanDrawRate: summarise(seedResults.map((r) => r.drawRate)).mean,
      meanLossRate: summarise(seedResults.map((r) => r.lossRate)).mean,
    };

    if (this.verbose) {
      // eslint-disable-next-line no-console
      console.log(
        `Evaluation over ${numSeeds} seed(s) x ${numGames} games: ` +
          `win=${formatNumber(result.meanWinRate, 1)}% ± ${formatNumber(result.stdWinRate, 1)} ` +
          `[${formatNumber(result.minWinRate, 1)}, ${formatNumber(result.maxWinRate, 1)}] ` +
          `draw=${formatNumber(result.meanDrawRate, 1)}% loss=${formatNumber(result.meanLossRate, 1)}%`,
      );
    }
    return result;
  }

  private evaluateSeed(seed: number, numGames: number, epsilon: number): SeedResult {
    const agentPrevious = this.agent.useRandom(createSeededRandom(seed));
    let opponentPrevious: RandomSource | undefined;
    if (this.opponent.useRandom) {
      opponentPrevious = this.opponent.useRandom(createSeededRandom(seed));
    }
    let wins = 0;
    let draws = 0;
    let losses = 0;
    try {
      for (let game = 0; game < numGames; game += 1) {
        const outcome = this.playEpisode(game % 2 === 0, false, epsilon);
        if (outcome.winner === outcome.agentPlayer) {
          wins += 1;
        } else if (outcome.winner === null) {
          draws += 1;
        } else {
          losses += 1;
        }
      }
    } finally {
      this.agent.useRandom(agentPrevious);
      if (opponentPrevious && this.opponent.useRandom) {
        this.opponent.useRandom(opponentPrevious);
      }
    }
    return {
      seed,
      numGames,
      wins,
      draws,
      losses,
      winRate: percent(wins, numGames),
      drawRate: percent(draws, numGames),
      lossRate: percent(losses, numGames),
    };
  }
}

export interface ReevaluateOptions extends EvaluationOptions {
  numGames?: number;
  opponent?: ActionPolicy;
  verbose?: boolean;
}

/** Loads a stored model into a fresh agent and evaluates it; null when it cannot be loaded. */
export function reevaluateModel(
  store: ModelStore,
  target: string,
  env: GameEnvironment,
  options: ReevaluateOptions = {},
): EvaluationResult | null {
  const agent = new QLearningAgent();
  if (!store.load(agent, target)) {
    return null;
  }
  const trainer = new Trainer(agent, env, { opponent: options.opponent, verbose: options.verbose });
  return trainer.evaluate(options.numGames ?? 100, options);
}
