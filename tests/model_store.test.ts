import fs from 'fs';
import os from 'os';
import path from 'path';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';

import { QLearningAgent } from '../src/ai/agent';
import { ModelStore, parseMetadata } from '../src/storage/model_store';

describe('ModelStore', () => {
  let dir: string;
  let store: ModelStore;

  beforeEach(() => {
    dir = fs.mkdtempSync(path.join(os.tmpdir(), 'models-'));
    store = new ModelStore(dir);
  });

  afterEach(() => {
    fs.rmSync(dir, { recursive: true, force: true });
  });

  function trainedAgent(): QLearningAgent {
    const agent = new QLearningAgent({ alpha: 0.5, gamma: 0.9, epsilon: 0.4, epsilonMin: 0.05 });
    agent.update('s', 1, 1, 't', [], true);
    return agent;
  }

  it('resolves bare names inside the models directory', () => {
    expect(store.resolvePath('alpha')).toBe(path.join(dir, 'alpha.json'));
    expect(store.resolvePath('alpha.json')).toBe(path.join(dir, 'alpha.json'));
    expect(store.resolvePath('elsewhere/alpha.json')).toBe(path.resolve('elsewhere/alpha.json'));
  });

  it('saves and restores the table and hyperparameters', () => {
    const filePath = store.save(trainedAgent(), 'alpha', { final_win_rate: 70 });
    expect(filePath).toBe(path.join(dir, 'alpha.json'));
    expect(store.exists('alpha')).toBe(true);

    const record = store.readRecord('alpha');
    expect(record?.name).toBe('alpha');
    expect(record?.metadata).toEqual({ final_win_rate: 70 });
    expect(record?.id).toMatch(/^[0-9a-f-]{36}$/);

    const restored = new QLearningAgent();
    expect(store.load(restored, 'alpha')).toBe(true);
    expect(restored.getQValue('s', 1)).toBe(0.5);
    expect(restored.getHyperparameters()).toMatchObject({ alpha: 0.5, gamma: 0.9, epsilon: 0.4, epsilonMin: 0.05 });
  });

  it('adds a timestamp to versioned names and never overwrites', () => {
    const agent = trainedAgent();
    const first = store.save(agent, 'beta', {}, { versioned: true });
    const second = store.save(agent, 'beta', {}, { versioned: true });
    expect(path.basename(first ?? '')).toMatch(/^beta_\d{8}_\d{6}(_\d+)?\.json$/);
    expect(second).not.toBe(first);
    expect(store.list()).toHaveLength(2);
  });

  it('lists only readable model files', () => {
    store.save(trainedAgent(), 'alpha');
    fs.writeFileSync(path.join(dir, 'notes.txt'), 'hello');
    fs.writeFileSync(path.join(dir, 'broken.json'), '{"q_table": 3}');
    const models = store.list();
    expect(models.map((model) => model.name)).toEqual(['alpha']);
    expect(models[0]?.states).toBe(1);
    expect(models[0]?.epsilon).toBe(0.4);
  });

  it('fills in defaults for a bare record', () => {
    fs.writeFileSync(
      path.join(dir, 'legacy.json'),
      JSON.stringify({ q_table: { s: { '2': 0.25 } }, hyperparameters: { alpha: 0.1, gamma: 0.9, epsilon: 0.5 } }),
    );
    const record = store.readRecord('legacy');
    expect(record?.id).toBe('legacy');
    expect(record?.hyperparameters).toEqual({
      alpha: 0.1,
      gamma: 0.9,
      epsilon: 0.5,
      epsilon_start: 0.5,
      epsilon_min: 0.01,
      epsilon_decay: 1,
    });
    expect(record?.stats.totalStates).toBe(1);
    expect(record?.metadata).toEqual({});
  });

  it('refuses missing files and invalid hyperparameters', () => {
    const agent = new QLearningAgent();
    expect(store.load(agent, 'missing')).toBe(false);
    fs.writeFileSync(
      path.join(dir, 'bad.json'),
      JSON.stringify({ q_table: {}, hyperparameters: { alpha: 5, gamma: 0.9, epsilon: 0.5 } }),
    );
    expect(store.load(agent, 'bad')).toBe(false);
    expect(agent.getHyperparameters().alpha).toBe(0.2);
  });

  it('returns null when the file cannot be written', () => {
    const blocker = path.join(dir, 'blocker');
    fs.writeFileSync(blocker, 'not a directory');
    const blocked = new ModelStore(blocker);
    expect(blocked.save(trainedAgent(), 'alpha')).toBeNull();
    expect(blocked.exists('alpha')).toBe(false);
  });

  it('deletes models', () => {
    store.save(trainedAgent(), 'alpha');
    expect(store.delete('alpha')).toBe(true);
    expect(store.exists('alpha')).toBe(false);
    expect(store.delete('alpha')).toBe(false);
  });
});

describe('parseMetadata', () => {
  it('keeps well-formed fields and drops the rest', () => {
    expect(
      parseMetadata({
        final_win_rate: 'high',
        total_episodes: 10,
        metrics_source: 'other',
        episode_rewards: [1, 'x', 2],
      }),
    ).toEqual({ total_episodes: 10, episode_rewards: [1, 2] });
    expect(parseMetadata(null)).toEqual({});
  });
});
