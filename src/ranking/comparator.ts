import { ModelStore, ModelSummary } from '../storage/model_store';
import { AvailableMetrics, computeAllMetrics, MetricsOptions } from './metrics';

export type RankCriterion =
  | 'compositeScore'
  | 'winRate'
  | 'performanceScore'
  | 'efficiencyScore'
  | 'robustnessScore'
  | 'learningSpeed'
  | 'sampleEfficiency'
  | 'statesLearned';

export const RANK_CRITERIA: readonly RankCriterion[] = [
  'compositeScore',
  'winRate',
  'performanceScore',
  'efficiencyScore',
  'robustnessScore',
  'learningSpeed',
  'sampleEfficiency',
  'statesLearned',
];

export function isRankCriterion(value: string): value is RankCriterion {
  return RANK_CRITERIA.some((criterion) => criterion === value);
}

export interface RankedModel {
  model: ModelSummary;
  metrics: AvailableMetrics;
}

export interface UnavailableModel {
  model: ModelSummary;
  reason: string;
}

export interface ComparisonResult {
  models: RankedModel[];
  unavailable: UnavailableModel[];
}

export interface ComputeOptions {
  /** Read each Q-table for entropy and Bellman metrics; slower on large stores. */
  includeQTable?: boolean;
}

export class ModelComparator {
  private readonly store: ModelStore;
  private cache: ComparisonResult | null = null;

  constructor(store: ModelStore) {
    this.store = store;
  }

  computeMetricsForAll(options: ComputeOptions = {}): ComparisonResult {
    const models: RankedModel[] = [];
    const unavailable: UnavailableModel[] = [];
    for (const model of this.store.list()) {
      const metricsOptions: MetricsOptions = {};
      if (options.includeQTable) {
        const record = this.store.readRecord(model.path);
        if (record) {
          metricsOptions.qTable = record.q_table;
        }
      }
      const metrics = computeAllMetrics(
        { metadata: model.metadata, stats: { totalStates: model.states, epsilon: model.epsilon } },
        metricsOptions,
      );
      if (metrics.available) {
        models.push({ model, metrics });
      } else {
        unavailable.push({ model, reason: metrics.reason });
      }
    }
    this.cache = { models, unavailable };
    return this.cache;
  }

  rankModels(criterion: RankCriterion = 'compositeScore', topN?: number): RankedModel[] {
    const { models } = this.cache ?? this.computeMetricsForAll();
    const ranked = [...models].sort((a, b) => b.metrics[criterion] - a.metrics[criterion]);
    return topN !== undefined && topN > 0 ? ranked.slice(0, topN) : ranked;
  }

  getBestModel(criterion: RankCriterion = 'compositeScore'): RankedModel | null {
    return this.rankModels(criterion, 1)[0] ?? null;
  }
}
