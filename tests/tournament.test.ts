import fs from 'fs';
import os from 'os';
import path from 'path';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';

import { EloSystem } from '../src/ranking/elo';
import { Participant, Tournament, TournamentProgress } from '../src/ranking/tournament';
import { fixedPolicy, PickEnvironment } from './support/pick';

const strong = fixedPolicy(1);
const weak = fixedPolicy(0);

function field(): Participant[] {
  return [
    { name: 'A', policy: strong },
    { name: 'B', policy: weak },
    { name: 'C', policy: weak },
    { name: 'D', policy: strong },
  ];
}

describe('Tournament.playMatch', () => {
  it('counts wins from each side regardless of who starts', () => {
    const tournament = new Tournament(new PickEnvironment());
    expect(tournament.playMatch(strong, weak, 4, 'S', 'W')).toEqual({
      nameA: 'S',
      nameB: 'W',
      games: 4,
      winsA: 4,
      winsB: 0,
      draws: 0,
      winRateA: 100,
      winRateB: 0,
      drawRate: 0,
      scoreA: 1,
      scoreB: 0,
    });
  });

  it('scores draws as half a point each', () => {
    const result = new Tournament(new PickEnvironment()).playMatch(weak, weak, 3);
    expect(result.draws).toBe(3);
    expect(result.scoreA).toBe(0.5);
    expect(result.scoreB).toBe(0.5);
  });

  it('rejects a match without games', () => {
    expect(() => new Tournament(new PickEnvironment()).playMatch(weak, weak, 0)).toThrow(RangeError);
  });
});

describe('Tournament.roundRobin', () => {
  it('plays every pair once and awards 3/1/0 points', () => {
    const elo = new EloSystem({ filePath: null });
    const tournament = new Tournament(new PickEnvironment(), { elo });
    const progress: TournamentProgress[] = [];
    const result = tournament.roundRobin(field(), {
      gamesPerMatch: 2,
      onProgress: (update) => progress.push(update),
    });

    expect(result.totalMatches).toBe(6);
    expect(result.matches.map((match) => `${match.nameA}-${match.nameB}`)).toEqual([
      'A-B',
      'A-C',
      'A-D',
      'B-C',
      'B-D',
      'C-D',
    ]);
    expect(result.standings.map((row) => [row.name, row.points, row.wins, row.draws, row.losses])).toEqual([
      ['A', 7, 2, 1, 0],
      ['D', 7, 2, 1, 0],
      ['B', 1, 0, 1, 2],
      ['C', 1, 0, 1, 2],
    ]);
    expect(result.champion).toBe('A');
    expect(progress.map((update) => update.completed)).toEqual([1, 2, 3, 4, 5, 6]);
    expect(elo.getRating('A')).toBeGreaterThan(1500);
    expect(elo.getRating('B')).toBeLessThan(1500);
    expect(result.standings[0]?.rating).toBe(elo.getRating('A'));
  });

  it('leaves ratings alone when asked', () => {
    const elo = new EloSystem({ filePath: null });
    new Tournament(new PickEnvironment(), { elo }).roundRobin(field(), { gamesPerMatch: 1, updateElo: false });
    expect(elo.getLeaderboard()).toEqual([]);
  });

  it('rates under the rating id and labels it with the name', () => {
    const elo = new EloSystem({ filePath: null });
    const tournament = new Tournament(new PickEnvironment(), { elo });
    tournament.roundRobin(
      [
        { name: 'A', policy: strong, ratingId: 'id-a' },
        { name: 'B', policy: weak, ratingId: 'id-b' },
      ],
      { gamesPerMatch: 1 },
    );
    expect(elo.getLeaderboard()).toEqual([
      { id: 'id-a', label: 'A', rating: 1516 },
      { id: 'id-b', label: 'B', rating: 1484 },
    ]);
  });

  it('needs two uniquely named participants', () => {
    const tournament = new Tournament(new PickEnvironment());
    expect(() => tournament.roundRobin([{ name: 'A', policy: strong }])).toThrow(RangeError);
    expect(() =>
      tournament.roundRobin([
        { name: 'A', policy: strong },
        { name: 'A', policy: weak },
      ]),
    ).toThrow(RangeError);
  });

  it('stops when cancelled', () => {
    const tournament = new Tournament(new PickEnvironment());
    expect(() => tournament.roundRobin(field(), { signal: { aborted: true } })).toThrow('Tournament was cancelled');
  });
});

describe('Tournament.eliminationBracket', () => {
  it('gives byes to the odd one out and settles draws by sudden death', () => {
    const tournament = new Tournament(new PickEnvironment());
    const result = tournament.eliminationBracket(
      [...field(), { name: 'E', policy: strong }],
      { gamesPerMatch: 2 },
    );

    expect(result.totalRounds).toBe(3);
    expect(result.matches).toHaveLength(4);
    expect(result.rounds.map((round) => round.advanced)).toEqual([['A', 'D', 'E'], ['D', 'E'], ['E']]);
    expect(result.rounds[0]?.byes).toEqual(['E']);
    expect(result.rounds[1]?.byes).toEqual(['E']);

    const drawn = result.rounds[0]?.matches[1];
    expect(drawn?.result.draws).toBe(2);
    expect(drawn?.suddenDeath?.games).toBe(1);
    expect(drawn?.winner).toBe('D');
    expect(result.champion).toBe('E');
  });

  it('does not touch ratings by default', () => {
    const elo = new EloSystem({ filePath: null });
    new Tournament(new PickEnvironment(), { elo }).eliminationBracket(field(), { gamesPerMatch: 1 });
    expect(elo.getLeaderboard()).toEqual([]);
  });
});

describe('tournament history', () => {
  let dir: string;

  beforeEach(() => {
    dir = fs.mkdtempSync(path.join(os.tmpdir(), 'tournament-'));
  });

  afterEach(() => {
    fs.rmSync(dir, { recursive: true, force: true });
  });

  it('appends every result and lists the newest first', () => {
    const historyPath = path.join(dir, 'history.json');
    const tournament = new Tournament(new PickEnvironment(), { historyPath });
    tournament.roundRobin(field(), { gamesPerMatch: 1 });
    tournament.eliminationBracket(field(), { gamesPerMatch: 1 });

    const history = tournament.getHistory();
    expect(history).toHaveLength(2);
    expect(history[0]).toMatchObject({ type: 'elimination_bracket' });
    expect(history[1]).toMatchObject({ type: 'round_robin' });
    expect(tournament.getHistory(1)).toHaveLength(1);
  });
});
