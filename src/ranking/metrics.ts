import { QTableSnapshot } from '../ai/agent';
import { MetricsSource, ModelMetadata } from '../storage/model_store';
import { mean, summarise, variance } from '../training/common';

export const DEFAULT_RETURN_VARIANCE = 0.3;
export const DEFAULT_POLICY_ENTROPY = 0.5;
const DEFAULT_GAMMA = 0.95;

export const COMPOSITE_WEIGHTS = {
  performance: 0.3,
  efficiency: 0.12,
  robustness: 0.15,
  learningSpeed: 0.12,
  convergence: 0.08,
  sampleEfficiency: 0.1,
  returnVariance: 0.08,
  policyEntropy: 0.05,
} as const;

export type CompositeTerm = keyof typeof COMPOSITE_WEIGHTS;

const COMPOSITE_TERMS: readonly CompositeTerm[] = [
  'performance',
  'efficiency',
  'robustness',
  'learningSpeed',
  'convergence',
  'sampleEfficiency',
  'returnVariance',
  'policyEntropy',
];

export interface QTableQuality {
  mean: number;
  std: number;
  min: number;
  max: number;
  range: number;
  variance: number;
}

export interface CompositeInputs {
  performanceScore: number;
  efficiencyScore: number;
  robustnessScore: number;
  learningSpeed: number;
  sampleEfficiency: number;
  epsilon: number;
  epsilonMin: number;
  returnVariance: number;
  policyEntropy: number;
}

export interface AvailableMetrics extends CompositeInputs {
  available: true;
  winRate: number;
  drawRate: number;
  lossRate: number;
  statesLearned: number;
  totalEpisodes: number;
  avgReward: number;
  avgMoves: number;
  convergenceScore: number;
  bellmanError: number | null;
  qTableQuality: QTableQuality | null;
  metricsSource: MetricsSource | 'unknown';
  compositeScore: number;
}

export interface UnavailableMetrics {
  available: false;
  reason: string;
}

export type ModelMetrics = AvailableMetrics | UnavailableMetrics;

/** The parts of a stored record the metrics read. */
export interface MetricsSubject {
  metadata: ModelMetadata;
  stats?: { totalStates: number; epsilon: number };
}

export interface MetricsOptions {
  qTable?: QTableSnapshot;
  episodeRewards?: readonly number[];
  temperature?: number;
}

function clamp(value: number, min: number, max: number): number {
  if (Number.isNaN(value)) {
    return min;
  }
  return Math.min(max, Math.max(min, value));
}

export function performanceScore(winRate: number, drawRate: number): number {
  return winRate + 0.5 * drawRate;
}

export function efficiencyScore(winRate: number, statesLearned: number): number {
  if (statesLearned <= 0) {
    return 0;
  }
  return winRate / Math.log10(statesLearned + 10);
}

export function robustnessScore(avgReward: number, avgMoves: number): number {
  if (avgMoves === 0) {
    return 0;
  }
  return avgReward * (10 / Math.max(avgMoves, 1));
}

export function learningSpeed(winRate: number, totalEpisodes: number): number {
  if (totalEpisodes <= 0) {
    return 0;
  }
  return winRate / Math.log10(totalEpisodes + 10);
}

/** Win rate per thousand training episodes. */
export function sampleEfficiency(winRate: number, totalEpisodes: number): number {
  if (totalEpisodes <= 0) {
    return 0;
  }
  return winRate / (totalEpisodes / 1000);
}

export function convergenceScore(epsilon: number, epsilonMin: number): number {
  if (epsilonMin >= 1) {
    return 100;
  }
  return (1 - (epsilon - epsilonMin) / (1 - epsilonMin)) * 100;
}

function allValues(qTable: QTableSnapshot): number[] {
  const values: number[] = [];
  for (const row of Object.values(qTable)) {
    values.push(...Object.values(row));
  }
  return values;
}

export function qTableQuality(qTable: QTableSnapshot): QTableQuality {
  const values = allValues(qTable);
  const stats = summarise(values);
  return {
    mean: stats.mean,
    std: stats.std,
    min: stats.min,
    max: stats.max,
    range: stats.max - stats.min,
    variance: variance(values),
  };
}

/**
 * Mean |Q(s,a) - gamma * max_a' Q(s,a')| over stored pairs. No transitions
 * are recorded, so this measures internal consistency of the table rather
 * than a true temporal-difference error.
 */
export function bellmanError(qTable: QTableSnapshot, gamma: number): number {
  const errors: number[] = [];
  for (const row of Object.values(qTable)) {
    const values = Object.values(row);
    if (values.length === 0) {
      continue;
    }
    const best = Math.max(...values);
    for (const value of values) {
      errors.push(Math.abs(value - gamma * best));
    }
  }
  return mean(errors);
}

/** Mean softmax entropy (nats) over states with at least one stored action. */
export function policyEntropy(qTable: QTableSnapshot, temperature = 1): number {
  const entropies: number[] = [];
  for (const row of Object.values(qTable)) {
    const values = Object.values(row);
    if (values.length === 0) {
      continue;
    }
    const scaled = values.map((value) => value / temperature);
    const peak = Math.max(...scaled);
    const exps = scaled.map((value) => Math.exp(value - peak));
    const total = exps.reduce((sum, value) => sum + value, 0);
    let entropy = 0;
    for (const weight of exps) {
      const p = Math.max(weight / total, 1e-10);
      entropy -= p * Math.log(p);
    }
    entropies.push(entropy);
  }
  return mean(entropies);
}

/** Population variance of episode rewards, or null with fewer than two. */
export function returnVariance(rewards: readonly number[]): number | null {
  if (rewards.length < 2) {
    return null;
  }
  return variance(rewards);
}

/** Every term mapped onto [0, 100] before weighting. */
export function normaliseTerms(inputs: CompositeInputs): Record<CompositeTerm, number> {
  return {
    performance: clamp(inputs.performanceScore, 0, 100),
    efficiency: clamp(inputs.efficiencyScore, 0, 100),
    robustness: clamp(((inputs.robustnessScore + 10) / 20) * 100, 0, 100),
    learningSpeed: clamp(inputs.learningSpeed, 0, 100),
    convergence: clamp(convergenceScore(inputs.epsilon, inputs.epsilonMin), 0, 100),
    sampleEfficiency: clamp(inputs.sampleEfficiency, 0, 100),
    returnVariance: (1 - Math.min(Math.max(inputs.returnVariance, 0), 1)) * 100,
    policyEntropy: (1 - Math.min(Math.max(inputs.policyEntropy, 0) / 2, 1)) * 100,
  };
}

export function compositeScore(inputs: CompositeInputs): number {
  const terms = normaliseTerms(inputs);
  let score = 0;
  for (const term of COMPOSITE_TERMS) {
    score += terms[term] * COMPOSITE_WEIGHTS[term];
  }
  return score;
}

export function computeAllMetrics(
  subject: MetricsSubject,
  options: MetricsOptions = {},
): ModelMetrics {
  const { metadata } = subject;
  if (metadata.final_win_rate === undefined) {
    return { available: false, reason: 'metadata has no final_win_rate' };
  }
  const winRate = metadata.final_win_rate;
  const drawRate = metadata.final_draw_rate ?? 0;
  const lossRate = metadata.final_loss_rate ?? Math.max(0, 100 - winRate - drawRate);
  const statesLearned =
    subject.stats?.totalStates ??
    metadata.states_learned ??
    metadata.performance?.states_learned ??
    0;
  const totalEpisodes = metadata.total_episodes ?? 0;
  const avgReward = metadata.performance?.avg_reward ?? 0;
  const avgMoves = metadata.performance?.avg_moves ?? 0;
  const epsilon = subject.stats?.epsilon ?? metadata.hyperparameters?.epsilon_final ?? 1;
  const epsilonMin = metadata.hyperparameters?.epsilon_min ?? 0.01;
  const gamma = metadata.hyperparameters?.gamma ?? DEFAULT_GAMMA;

  const rewards = options.episodeRewards ?? metadata.episode_rewards ?? [];
  const qTable =
    options.qTable && Object.keys(options.qTable).length > 0 ? options.qTable : null;

  const inputs: CompositeInputs = {
    performanceScore: performanceScore(winRate, drawRate),
    efficiencyScore: efficiencyScore(winRate, statesLearned),
    robustnessScore: robustnessScore(avgReward, avgMoves),
    learningSpeed: learningSpeed(winRate, totalEpisodes),
    sampleEfficiency: sampleEfficiency(winRate, totalEpisodes),
    epsilon,
    epsilonMin,
    returnVariance: returnVariance(rewards) ?? DEFAULT_RETURN_VARIANCE,
    policyEntropy: qTable
      ? policyEntropy(qTable, options.temperature ?? 1)
      : DEFAULT_POLICY_ENTROPY,
  };

  return {
    available: true,
    ...inputs,
    winRate,
    drawRate,
    lossRate,
    statesLearned,
    totalEpisodes,
    avgReward,
    avgMoves,
    convergenceScore: convergenceScore(epsilon, epsilonMin),
    bellmanError: qTable ? bellmanError(qTable, gamma) : null,
    qTableQuality: qTable ? qTableQuality(qTable) : null,
    metricsSource: metadata.metrics_source ?? 'unknown',
    compositeScore: compositeScore(inputs),
  };
}
