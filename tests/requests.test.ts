import { describe, expect, it } from 'vitest';

import { InvalidRequestError, parseJobRequest } from '../src/tasks/requests';

describe('parseJobRequest', () => {
  it('takes the kind from the route', () => {
    expect(parseJobRequest({ episodes: 500, alpha: 0.3 }, 'train')).toEqual({
      kind: 'train',
      episodes: 500,
      alpha: 0.3,
    });
    expect(parseJobRequest(undefined, 'automl')).toEqual({ kind: 'automl', mode: 'random' });
  });

  it('reads tournament requests', () => {
    expect(
      parseJobRequest({ kind: 'tournament', mode: 'elimination', models: ['a', 'b'], includeRandom: true }),
    ).toEqual({ kind: 'tournament', mode: 'elimination', models: ['a', 'b'], includeRandom: true });
    expect(parseJobRequest({}, 'tournament')).toMatchObject({ mode: 'round_robin' });
  });

  it('rejects malformed fields', () => {
    expect(() => parseJobRequest({ episodes: -1 }, 'train')).toThrow(InvalidRequestError);
    expect(() => parseJobRequest({ episodes: 1.5 }, 'train')).toThrow('episodes must be an integer >= 0');
    expect(() => parseJobRequest({ alpha: 0 }, 'train')).toThrow('alpha must be greater than 0');
    expect(() => parseJobRequest({ gamma: 2 }, 'train')).toThrow(InvalidRequestError);
    expect(() => parseJobRequest({ models: 'a' }, 'tournament')).toThrow('models must be an array of strings');
    expect(() => parseJobRequest({ mode: 'swiss' }, 'tournament')).toThrow(InvalidRequestError);
    expect(() => parseJobRequest({ updateElo: 'yes' }, 'tournament')).toThrow('updateElo must be a boolean');
  });

  it('rejects bodies that are not objects or name another job', () => {
    expect(() => parseJobRequest([1, 2], 'train')).toThrow('Request body must be a JSON object');
    expect(() => parseJobRequest({ kind: 'automl' }, 'train')).toThrow(InvalidRequestError);
    expect(() => parseJobRequest({ kind: 'dance' })).toThrow('Unknown job kind: dance');
  });
});
