import { describe, expect, it } from 'vitest';

import { QLearningAgent } from '../src/ai/agent';
import { Coach, confidenceFor } from '../src/ai/coach';
import { NoLegalActionsError } from '../src/core/errors';

function coached(): Coach {
  const agent = new QLearningAgent({ alpha: 0.5 });
  agent.update('s', 2, 1, 't', [], true);
  agent.update('s', 5, -1, 't', [], true);
  return new Coach(agent);
}

describe('Coach', () => {
  it('ranks legal actions by value', () => {
    expect(coached().rankActions('s', [0, 2, 5])).toEqual([
      { action: 2, qValue: 0.5 },
      { action: 0, qValue: 0 },
      { action: 5, qValue: -0.5 },
    ]);
  });

  it('advises the best action with its margin', () => {
    const advice = coached().advise('s', [0, 2, 5]);
    expect(advice.action).toBe(2);
    expect(advice.margin).toBe(0.5);
    expect(advice.confidence).toBe('confident');
  });

  it('is certain with a single option and refuses none', () => {
    const coach = coached();
    expect(coach.advise('s', [5])).toMatchObject({ action: 5, margin: null, confidence: 'certain' });
    expect(() => coach.advise('s', [])).toThrow(NoLegalActionsError);
  });

  it('writes readable hints', () => {
    expect(coached().hints('s', [0, 2, 5], 2)).toEqual([
      '1. cell 2: acceptable move (Q=0.500)',
      '2. cell 0: unexplored move (Q=0.000)',
    ]);
  });
});

describe('confidenceFor', () => {
  it('maps margins onto labels', () => {
    expect(confidenceFor(0.6)).toBe('very confident');
    expect(confidenceFor(0.1)).toBe('fairly sure');
    expect(confidenceFor(0.01)).toBe('unsure');
    expect(confidenceFor(0)).toBe('hesitant');
  });
});
