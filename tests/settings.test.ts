import path from 'path';
import { describe, expect, it } from 'vitest';

import { DEFAULT_HYPERPARAMETERS } from '../src/ai/agent';
import { loadSettings } from '../src/config/settings';

describe('loadSettings', () => {
  it('falls back to defaults inside the models directory', () => {
    const settings = loadSettings({});
    const modelsDir = path.resolve('models');
    expect(settings.modelsDir).toBe(modelsDir);
    expect(settings.eloPath).toBe(path.join(modelsDir, 'elo_ratings.json'));
    expect(settings.trainingLogPath).toBe(path.join(modelsDir, 'training_log.jsonl'));
    expect(settings.agent).toEqual(DEFAULT_HYPERPARAMETERS);
    expect(settings.eloKFactor).toBe(32);
    expect(settings.verbose).toBe(true);
    expect(settings.port).toBe(5173);
  });

  it('reads overrides from the environment', () => {
    const settings = loadSettings({
      MODELS_DIR: 'store',
      TRAIN_ALPHA: '0.3',
      TRAIN_EPSILON: '0.5',
      ELO_K_FACTOR: '16',
      TRAINING_LOG_PATH: '',
      VERBOSE: 'false',
      EVAL_SEEDS: 'many',
    });
    expect(settings.modelsDir).toBe(path.resolve('store'));
    expect(settings.tournamentHistoryPath).toBe(path.resolve('store', 'tournament_history.json'));
    expect(settings.agent.alpha).toBe(0.3);
    expect(settings.agent.epsilon).toBe(0.5);
    expect(settings.agent.epsilonStart).toBe(0.5);
    expect(settings.eloKFactor).toBe(16);
    expect(settings.trainingLogPath).toBeNull();
    expect(settings.verbose).toBe(false);
    expect(settings.evalSeeds).toBe(5);
  });
});
