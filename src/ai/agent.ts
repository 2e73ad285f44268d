import { NoLegalActionsError } from '../core/errors';
import { pickRandom } from '../core/random';
import { Action, RandomSource, StateKey } from '../core/types';
import { summarise } from '../training/common';

/** Serialised Q-table: state key → (action as string → value). */
export type QTableSnapshot = Record<StateKey, Record<string, number>>;

export interface ActionPolicy {
  chooseAction(state: StateKey, legalActions: readonly Action[], epsilon?: number): Action;
  /** Swap the policy's random source; returns the previous one. */
  useRandom?(random: RandomSource): RandomSource;
}

export interface AgentHyperparameters {
  alpha: number;
  gamma: number;
  epsilon: number;
  epsilonStart: number;
  epsilonMin: number;
  epsilonDecay: number;
}

export interface AgentOptions extends Partial<AgentHyperparameters> {
  random?: RandomSource;
}

export interface QTableStats {
  totalStates: number;
  totalStateActions: number;
  avgQValue: number;
  maxQValue: number;
  minQValue: number;
  stdQValue: number;
  epsilon: number;
  alpha: number;
  gamma: number;
}

export const DEFAULT_HYPERPARAMETERS: AgentHyperparameters = {
  alpha: 0.2,
  gamma: 0.99,
  epsilon: 1.0,
  epsilonStart: 1.0,
  epsilonMin: 0.01,
  epsilonDecay: 0.9995,
};

function assertInRange(
  name: string,
  value: number,
  min: number,
  max: number,
  minInclusive = true,
): void {
  const aboveMin = minInclusive ? value >= min : value > min;
  if (!Number.isFinite(value) || !aboveMin || value > max) {
    const lower = minInclusive ? '[' : '(';
    throw new RangeError(`${name} must be in ${lower}${min}, ${max}], got ${value}`);
  }
}

export function validateHyperparameters(params: AgentHyperparameters): void {
  assertInRange('alpha', params.alpha, 0, 1, false);
  assertInRange('gamma', params.gamma, 0, 1);
  assertInRange('epsilonMin', params.epsilonMin, 0, 1);
  assertInRange('epsilonDecay', params.epsilonDecay, 0, 1, false);
  assertInRange('epsilonStart', params.epsilonStart, params.epsilonMin, 1);
  assertInRange('epsilon', params.epsilon, params.epsilonMin, 1);
}

/** Fills in defaults, with `epsilon` also standing in for `epsilonStart`, then validates. */
export function resolveHyperparameters(options: Partial<AgentHyperparameters>): AgentHyperparameters {
  const epsilonStart =
    options.epsilonStart ?? options.epsilon ?? DEFAULT_HYPERPARAMETERS.epsilonStart;
  const params: AgentHyperparameters = {
    alpha: options.alpha ?? DEFAULT_HYPERPARAMETERS.alpha,
    gamma: options.gamma ?? DEFAULT_HYPERPARAMETERS.gamma,
    epsilon: options.epsilon ?? epsilonStart,
    epsilonStart,
    epsilonMin: options.epsilonMin ?? DEFAULT_HYPERPARAMETERS.epsilonMin,
    epsilonDecay: options.epsilonDecay ?? DEFAULT_HYPERPARAMETERS.epsilonDecay,
  };
  validateHyperparameters(params);
  return params;
}

export class RandomAgent implements ActionPolicy {
  private random: RandomSource;

  constructor(random: RandomSource = Math.random) {
    this.random = random;
  }

  chooseAction(state: StateKey, legalActions: readonly Action[]): Action {
    const action = pickRandom(legalActions, this.random);
    if (action === undefined) {
      throw new NoLegalActionsError(state);
    }
    return action;
  }

  useRandom(random: RandomSource): RandomSource {
    const previous = this.random;
    this.random = random;
    return previous;
  }
}

/**
 * Tabular Q-learning with an epsilon-greedy behaviour policy.
 * Entries are created on write only: reading an unseen pair yields 0.
 */
export class QLearningAgent implements ActionPolicy {
  private readonly qTable = new Map<StateKey, Map<Action, number>>();
  private params: AgentHyperparameters;
  private random: RandomSource;

  constructor(options: AgentOptions = {}) {
    this.params = resolveHyperparameters(options);
    this.random = options.random ?? Math.random;
  }

  get epsilon(): number {
    return this.params.epsilon;
  }

  get statesLearned(): number {
    return this.qTable.size;
  }

  getQValue(state: StateKey, action: Action): number {
    return this.qTable.get(state)?.get(action) ?? 0;
  }

  getMaxQValue(state: StateKey, legalActions: readonly Action[]): number {
    if (legalActions.length === 0) {
      return 0;
    }
    let best = -Infinity;
    for (const action of legalActions) {
      best = Math.max(best, this.getQValue(state, action));
    }
    return best;
  }

  getBestAction(state: StateKey, legalActions: readonly Action[]): Action {
    if (legalActions.length === 0) {
      throw new NoLegalActionsError(state);
    }
    let bestValue = -Infinity;
    let bestActions: Action[] = [];
    for (const action of legalActions) {
      const value = this.getQValue(state, action);
      if (value > bestValue) {
        bestValue = value;
        bestActions = [action];
      } else if (value === bestValue) {
        bestActions.push(action);
      }
    }
    if (bestActions.length === 1) {
      return bestActions[0]!;
    }
    const picked = pickRandom(bestActions, this.random);
    if (picked === undefined) {
      throw new NoLegalActionsError(state);
    }
    return picked;
  }

  chooseAction(state: StateKey, legalActions: readonly Action[], epsilon?: number): Action {
    if (legalActions.length === 0) {
      throw new NoLegalActionsError(state);
    }
    const explorationRate = epsilon ?? this.params.epsilon;
    if (explorationRate > 0 && this.random() < explorationRate) {
      const action = pickRandom(legalActions, this.random);
      if (action !== undefined) {
        return action;
      }
    }
    return this.getBestAction(state, legalActions);
  }

  update(
    state: StateKey,
    action: Action,
    reward: number,
    nextState: StateKey,
    nextLegalActions: readonly Action[],
    done: boolean,
  ): void {
    const current = this.getQValue(state, action);
    const target = done
      ? reward
      : reward + this.params.gamma * this.getMaxQValue(nextState, nextLegalActions);
    const updated = current + this.params.alpha * (target - current);
    if (!Number.isFinite(updated)) {
      throw new RangeError(`Q-value for ${state}/${action} became ${updated}`);
    }
    let row = this.qTable.get(state);
    if (!row) {
      row = new Map<Action, number>();
      this.qTable.set(state, row);
    }
    row.set(action, updated);
  }

  decayEpsilon(): void {
    this.params.epsilon = Math.max(
      this.params.epsilonMin,
      this.params.epsilon * this.params.epsilonDecay,
    );
  }

  setEpsilon(value: number): void {
    this.params.epsilon = Math.min(1, Math.max(this.params.epsilonMin, value));
  }

  resetEpsilon(): void {
    this.params.epsilon = this.params.epsilonStart;
  }

  useRandom(random: RandomSource): RandomSource {
    const previous = this.random;
    this.random = random;
    return previous;
  }

  getHyperparameters(): AgentHyperparameters {
    return { ...this.params };
  }

  setHyperparameters(update: Partial<AgentHyperparameters>): void {
    const next = { ...this.params, ...update };
    validateHyperparameters(next);
    this.params = next;
  }

  /** Actions stored for a state with their values. */
  getActionValues(state: StateKey): Map<Action, number> {
    return new Map<Action, number>(this.qTable.get(state) ?? []);
  }

  snapshotQTable(): QTableSnapshot {
    const snapshot: QTableSnapshot = {};
    for (const [state, row] of this.qTable) {
      const values: Record<string, number> = {};
      for (const [action, value] of row) {
        values[String(action)] = value;
      }
      snapshot[state] = values;
    }
    return snapshot;
  }

  loadQTable(snapshot: QTableSnapshot): void {
    this.qTable.clear();
    for (const [state, values] of Object.entries(snapshot)) {
      const row = new Map<Action, number>();
      for (const [action, value] of Object.entries(values)) {
        const parsed = Number(action);
        if (Number.isInteger(parsed) && Number.isFinite(value)) {
          row.set(parsed, value);
        }
      }
      this.qTable.set(state, row);
    }
  }

  getStats(): QTableStats {
    const values: number[] = [];
    for (const row of this.qTable.values()) {
      values.push(...row.values());
    }
    const { mean, std, min, max } = summarise(values);
    return {
      totalStates: this.qTable.size,
      totalStateActions: values.length,
      avgQValue: mean,
      maxQValue: max,
      minQValue: min,
      stdQValue: std,
      epsilon: this.params.epsilon,
      alpha: this.params.alpha,
      gamma: this.params.gamma,
    };
  }
}
