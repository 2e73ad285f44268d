import fs from 'fs';
import os from 'os';
import path from 'path';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';

import { OperationCancelledError } from '../src/core/errors';
import { AutoMLProgress, AutoMLTuner, expandGrid, sampleConfig } from '../src/training/automl';
import { CountdownEnvironment, sequenceRandom } from './support/countdown';

describe('expandGrid', () => {
  it('builds the cartesian product in parameter order', () => {
    expect(expandGrid({ gamma: [0.9, 0.95], alpha: [0.1, 0.2] })).toEqual([
      { alpha: 0.1, gamma: 0.9 },
      { alpha: 0.1, gamma: 0.95 },
      { alpha: 0.2, gamma: 0.9 },
      { alpha: 0.2, gamma: 0.95 },
    ]);
    expect(expandGrid({})).toEqual([{}]);
  });
});

describe('sampleConfig', () => {
  it('draws each parameter uniformly from its range', () => {
    expect(sampleConfig({ alpha: [0, 1], gamma: [0.5, 1] }, sequenceRandom([0.25, 0.5]))).toEqual({
      alpha: 0.25,
      gamma: 0.75,
    });
  });
});

describe('AutoMLTuner', () => {
  let dir: string;

  beforeEach(() => {
    dir = fs.mkdtempSync(path.join(os.tmpdir(), 'automl-'));
  });

  afterEach(() => {
    fs.rmSync(dir, { recursive: true, force: true });
  });

  it('trains every grid point and keeps the first best', () => {
    const resultsPath = path.join(dir, 'results.json');
    const tuner = new AutoMLTuner(() => new CountdownEnvironment(3), { resultsPath });
    const progress: AutoMLProgress[] = [];
    const result = tuner.gridSearch(
      { alpha: [0.1, 0.2], gamma: [0.9] },
      { numEpisodes: 10, evalGames: 10, onProgress: (update) => progress.push(update) },
    );

    expect(result.mode).toBe('grid');
    expect(result.results.map((trial) => trial.config)).toEqual([
      { alpha: 0.1, gamma: 0.9 },
      { alpha: 0.2, gamma: 0.9 },
    ]);
    expect(result.results.map((trial) => trial.evalWinRate)).toEqual([50, 50]);
    expect(result.bestConfig).toEqual({ alpha: 0.1, gamma: 0.9 });
    expect(result.bestScore).toBe(result.results[0]?.compositeScore);
    expect(progress.map((update) => `${update.completed}/${update.total}`)).toEqual(['1/2', '2/2']);

    const stored: unknown = JSON.parse(fs.readFileSync(resultsPath, 'utf-8'));
    expect(stored).toMatchObject({ mode: 'grid', bestConfig: { alpha: 0.1, gamma: 0.9 } });
  });

  it('caps the grid at maxConfigs', () => {
    const tuner = new AutoMLTuner(() => new CountdownEnvironment(3));
    const result = tuner.gridSearch({ alpha: [0.1, 0.2, 0.3] }, { maxConfigs: 1, numEpisodes: 2, evalGames: 2 });
    expect(result.results).toHaveLength(1);
  });

  it('samples the requested number of random configurations', () => {
    const tuner = new AutoMLTuner(() => new CountdownEnvironment(3), { random: sequenceRandom([0.5]) });
    const result = tuner.randomSearch({ alpha: [0.1, 0.3] }, { iterations: 3, numEpisodes: 2, evalGames: 2 });
    expect(result.mode).toBe('random');
    expect(result.results).toHaveLength(3);
    for (const trial of result.results) {
      expect(trial.config.alpha).toBeCloseTo(0.2, 10);
    }
  });

  it('records a rejected configuration and keeps the finished trials', () => {
    const tuner = new AutoMLTuner(() => new CountdownEnvironment(3));
    const result = tuner.gridSearch({ epsilon: [1, 0.001] }, { numEpisodes: 2, evalGames: 2 });
    expect(result.results.map((trial) => trial.config)).toEqual([{ epsilon: 1 }]);
    expect(result.skipped).toEqual([
      { configId: 2, config: { epsilon: 0.001 }, error: 'epsilonStart must be in [0.01, 1], got 0.001' },
    ]);
    expect(result.bestConfig).toEqual({ epsilon: 1 });
  });

  it('stops when cancelled', () => {
    const tuner = new AutoMLTuner(() => new CountdownEnvironment(3));
    expect(() => tuner.randomSearch(undefined, { signal: { aborted: true } })).toThrow(OperationCancelledError);
  });
});
