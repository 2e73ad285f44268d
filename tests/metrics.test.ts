import { describe, expect, it } from 'vitest';

import {
  bellmanError,
  COMPOSITE_WEIGHTS,
  compositeScore,
  computeAllMetrics,
  convergenceScore,
  DEFAULT_POLICY_ENTROPY,
  DEFAULT_RETURN_VARIANCE,
  efficiencyScore,
  learningSpeed,
  performanceScore,
  policyEntropy,
  qTableQuality,
  returnVariance,
  robustnessScore,
  sampleEfficiency,
} from '../src/ranking/metrics';

describe('individual scores', () => {
  it('weights draws at half a win', () => {
    expect(performanceScore(60, 20)).toBe(70);
  });

  it('discounts the win rate by table size and episode count', () => {
    expect(efficiencyScore(90, 990)).toBeCloseTo(30, 10);
    expect(efficiencyScore(90, 0)).toBe(0);
    expect(learningSpeed(80, 90)).toBeCloseTo(40, 10);
    expect(learningSpeed(80, 0)).toBe(0);
    expect(sampleEfficiency(50, 5000)).toBe(10);
    expect(sampleEfficiency(50, 0)).toBe(0);
  });

  it('scales the average reward by game length', () => {
    expect(robustnessScore(0.5, 5)).toBe(1);
    expect(robustnessScore(1, 0.5)).toBe(10);
    expect(robustnessScore(1, 0)).toBe(0);
  });

  it('measures how far epsilon has decayed', () => {
    expect(convergenceScore(0.01, 0.01)).toBe(100);
    expect(convergenceScore(1, 0.01)).toBe(0);
    expect(convergenceScore(1, 1)).toBe(100);
  });
});

describe('Q-table metrics', () => {
  it('computes softmax entropy per state', () => {
    expect(policyEntropy({ s: { '0': 0.3, '1': 0.3 } })).toBeCloseTo(Math.log(2), 10);
    expect(policyEntropy({ s: { '0': 0.3 } })).toBeCloseTo(0, 10);
    expect(policyEntropy({})).toBe(0);
  });

  it('averages the gap to the discounted best value', () => {
    expect(bellmanError({ s: { '0': 1, '1': 0 } }, 0.5)).toBe(0.5);
  });

  it('describes the value distribution', () => {
    expect(qTableQuality({ s: { '0': 1, '1': -1 } })).toEqual({
      mean: 0,
      std: 1,
      min: -1,
      max: 1,
      range: 2,
      variance: 1,
    });
  });

  it('needs two rewards for a variance', () => {
    expect(returnVariance([1])).toBeNull();
    expect(returnVariance([1, -1])).toBe(1);
  });
});

describe('compositeScore', () => {
  it('uses weights that sum to one', () => {
    const total = Object.values(COMPOSITE_WEIGHTS).reduce((sum, weight) => sum + weight, 0);
    expect(total).toBeCloseTo(1, 10);
  });

  it('reaches 100 when every term is at its best', () => {
    const score = compositeScore({
      performanceScore: 100,
      efficiencyScore: 150,
      robustnessScore: 10,
      learningSpeed: 100,
      sampleEfficiency: 400,
      epsilon: 0.01,
      epsilonMin: 0.01,
      returnVariance: 0,
      policyEntropy: 0,
    });
    expect(score).toBeCloseTo(100, 10);
  });

  it('bottoms out at 0', () => {
    const score = compositeScore({
      performanceScore: 0,
      efficiencyScore: 0,
      robustnessScore: -10,
      learningSpeed: 0,
      sampleEfficiency: 0,
      epsilon: 1,
      epsilonMin: 0,
      returnVariance: 5,
      policyEntropy: 3,
    });
    expect(score).toBeCloseTo(0, 10);
  });
});

describe('computeAllMetrics', () => {
  it('reports models without a final win rate as unavailable', () => {
    expect(computeAllMetrics({ metadata: {} })).toEqual({
      available: false,
      reason: 'metadata has no final_win_rate',
    });
  });

  it('fills missing inputs with defaults', () => {
    const metrics = computeAllMetrics({
      metadata: { final_win_rate: 60, final_draw_rate: 20, total_episodes: 90, states_learned: 990 },
    });
    if (!metrics.available) {
      throw new Error(metrics.reason);
    }
    expect(metrics.lossRate).toBe(20);
    expect(metrics.statesLearned).toBe(990);
    expect(metrics.efficiencyScore).toBeCloseTo(20, 10);
    expect(metrics.learningSpeed).toBeCloseTo(30, 10);
    expect(metrics.returnVariance).toBe(DEFAULT_RETURN_VARIANCE);
    expect(metrics.policyEntropy).toBe(DEFAULT_POLICY_ENTROPY);
    expect(metrics.convergenceScore).toBe(0);
    expect(metrics.bellmanError).toBeNull();
    expect(metrics.qTableQuality).toBeNull();
    expect(metrics.metricsSource).toBe('unknown');
  });

  it('prefers live stats and stored rewards', () => {
    const metrics = computeAllMetrics(
      {
        metadata: {
          final_win_rate: 50,
          metrics_source: 'evaluation',
          episode_rewards: [1, -1, 1, -1],
          hyperparameters: {
            alpha: 0.2,
            gamma: 0.5,
            epsilon_start: 1,
            epsilon_final: 0.5,
            epsilon_min: 0.01,
            epsilon_decay: 0.99,
          },
        },
        stats: { totalStates: 90, epsilon: 0.01 },
      },
      { qTable: { s: { '0': 1, '1': 0 } } },
    );
    if (!metrics.available) {
      throw new Error(metrics.reason);
    }
    expect(metrics.statesLearned).toBe(90);
    expect(metrics.convergenceScore).toBe(100);
    expect(metrics.returnVariance).toBe(1);
    expect(metrics.bellmanError).toBe(0.5);
    expect(metrics.metricsSource).toBe('evaluation');
  });
});
