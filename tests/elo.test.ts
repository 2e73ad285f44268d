import fs from 'fs';
import os from 'os';
import path from 'path';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';

import { EloSystem, expectedScore } from '../src/ranking/elo';

describe('expectedScore', () => {
  it('is even between equal ratings', () => {
    expect(expectedScore(1500, 1500)).toBe(0.5);
  });

  it('favours the higher rating', () => {
    expect(expectedScore(1900, 1500)).toBeCloseTo(1 / 1.1, 10);
    expect(expectedScore(1500, 1900)).toBeCloseTo(1 - 1 / 1.1, 10);
  });
});

describe('EloSystem', () => {
  it('moves both ratings by K times the surprise', () => {
    const elo = new EloSystem({ filePath: null });
    expect(elo.updateRatings('a', 'b', 1, 0)).toEqual([1516, 1484]);
    expect(elo.getRating('a')).toBe(1516);
    expect(elo.getMatchHistory()).toHaveLength(1);
  });

  it('honours a custom K factor and leaves an even draw unchanged', () => {
    const elo = new EloSystem({ filePath: null, kFactor: 16 });
    expect(elo.updateRatings('a', 'b', 0.5, 0.5)).toEqual([1500, 1500]);
    expect(elo.updateRatings('a', 'b', 1, 0)).toEqual([1508, 1492]);
  });

  it('reads unknown ids at the initial rating without adding them', () => {
    const elo = new EloSystem({ filePath: null, initialRating: 1200 });
    expect(elo.getRating('nobody')).toBe(1200);
    expect(elo.hasRating('nobody')).toBe(false);
    expect(elo.getLeaderboard()).toEqual([]);
    expect(elo.getStats()).toEqual({ totalModels: 0, avgRating: 0, maxRating: 0, minRating: 0, topModel: null });
  });

  it('ranks, resets and removes entries', () => {
    const elo = new EloSystem({ filePath: null });
    elo.updateRatings('a', 'b', 1, 0);
    elo.setLabel('a', 'Alpha');
    expect(elo.getLeaderboard()).toEqual([
      { id: 'a', label: 'Alpha', rating: 1516 },
      { id: 'b', label: 'b', rating: 1484 },
    ]);
    expect(elo.getLeaderboard(1)).toHaveLength(1);
    expect(elo.getStats()).toMatchObject({ totalModels: 2, avgRating: 1500, maxRating: 1516, minRating: 1484 });

    elo.resetRating('a');
    expect(elo.getRating('a')).toBe(1500);
    elo.removeModel('b');
    expect(elo.hasRating('b')).toBe(false);
  });

  describe('persistence', () => {
    let dir: string;

    beforeEach(() => {
      dir = fs.mkdtempSync(path.join(os.tmpdir(), 'elo-'));
    });

    afterEach(() => {
      fs.rmSync(dir, { recursive: true, force: true });
    });

    it('writes ratings and labels and reads them back', () => {
      const filePath = path.join(dir, 'ratings.json');
      const elo = new EloSystem({ filePath });
      elo.updateRatings('a', 'b', 1, 0);
      elo.setLabel('a', 'Alpha');

      const stored: unknown = JSON.parse(fs.readFileSync(filePath, 'utf-8'));
      expect(stored).toMatchObject({ ratings: { a: 1516, b: 1484 }, labels: { a: 'Alpha' }, k_factor: 32 });

      const reloaded = new EloSystem({ filePath });
      expect(reloaded.getRating('b')).toBe(1484);
      expect(reloaded.getLabel('a')).toBe('Alpha');
    });

    it('starts empty from an unreadable file', () => {
      const filePath = path.join(dir, 'broken.json');
      fs.writeFileSync(filePath, '{not json');
      expect(new EloSystem({ filePath }).getLeaderboard()).toEqual([]);
    });
  });
});
