import { NoLegalActionsError } from '../core/errors';
import { Action, StateKey } from '../core/types';
import { QLearningAgent } from './agent';

export type Confidence =
  | 'certain'
  | 'very confident'
  | 'confident'
  | 'fairly sure'
  | 'unsure'
  | 'hesitant';

export interface RankedAction {
  action: Action;
  qValue: number;
}

export interface Advice {
  action: Action;
  qValue: number;
  confidence: Confidence;
  /** Gap between the best and second-best value; null with a single legal move. */
  margin: number | null;
  ranked: RankedAction[];
}

export function confidenceFor(margin: number | null): Confidence {
  if (margin === null) {
    return 'certain';
  }
  if (margin > 0.5) {
    return 'very confident';
  }
  if (margin > 0.2) {
    return 'confident';
  }
  if (margin > 0.05) {
    return 'fairly sure';
  }
  if (margin > 0) {
    return 'unsure';
  }
  return 'hesitant';
}

export function describeQValue(qValue: number): string {
  if (qValue > 0.8) {
    return `excellent move (Q=${qValue.toFixed(3)})`;
  }
  if (qValue > 0.5) {
    return `good move (Q=${qValue.toFixed(3)})`;
  }
  if (qValue > 0) {
    return `acceptable move (Q=${qValue.toFixed(3)})`;
  }
  if (qValue === 0) {
    return `unexplored move (Q=${qValue.toFixed(3)})`;
  }
  return `risky move (Q=${qValue.toFixed(3)})`;
}

/** Reads an agent's Q-values for a position without changing it. */
export class Coach {
  private readonly agent: QLearningAgent;

  constructor(agent: QLearningAgent) {
    this.agent = agent;
  }

  /** Legal actions by descending value; equal values keep the given order. */
  rankActions(state: StateKey, legalActions: readonly Action[]): RankedAction[] {
    return legalActions
      .map((action) => ({ action, qValue: this.agent.getQValue(state, action) }))
      .sort((a, b) => b.qValue - a.qValue);
  }

  advise(state: StateKey, legalActions: readonly Action[]): Advice {
    const ranked = this.rankActions(state, legalActions);
    const best = ranked[0];
    if (!best) {
      throw new NoLegalActionsError(state);
    }
    const second = ranked[1];
    const margin = second ? best.qValue - second.qValue : null;
    return {
      action: best.action,
      qValue: best.qValue,
      confidence: confidenceFor(margin),
      margin,
      ranked,
    };
  }

  hints(state: StateKey, legalActions: readonly Action[], count = 3): string[] {
    return this.rankActions(state, legalActions)
      .slice(0, count)
      .map((entry, index) => `${index + 1}. cell ${entry.action}: ${describeQValue(entry.qValue)}`);
  }
}
