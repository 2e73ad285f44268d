import path from 'path';

import { ActionPolicy } from '../ai/agent';
import { CancelSignal, throwIfCancelled } from '../core/errors';
import { GameEnvironment, PLAYER_O, PLAYER_X } from '../core/types';
import { readJsonSafe, writeJsonSafe } from '../storage/json_file';
import { formatNumber, percent } from '../training/common';
import { EloSystem } from './elo';

export interface Participant {
  name: string;
  policy: ActionPolicy;
  /** Elo key; defaults to the name. */
  ratingId?: string;
}

export interface MatchResult {
  nameA: string;
  nameB: string;
  games: number;
  winsA: number;
  winsB: number;
  draws: number;
  winRateA: number;
  winRateB: number;
  drawRate: number;
  /** (wins + 0.5 * draws) / games, as fed to Elo. */
  scoreA: number;
  scoreB: number;
}

export interface Standing {
  name: string;
  ratingId: string;
  wins: number;
  draws: number;
  losses: number;
  points: number;
  rating: number;
}

export interface RoundRobinResult {
  type: 'round_robin';
  timestamp: string;
  participants: string[];
  gamesPerMatch: number;
  totalMatches: number;
  duration: number;
  standings: Standing[];
  matches: MatchResult[];
  champion: string | null;
}

export interface BracketMatch {
  result: MatchResult;
  winner: string;
  suddenDeath: MatchResult | null;
}

export interface EliminationRound {
  round: number;
  matches: BracketMatch[];
  byes: string[];
  advanced: string[];
}

export interface EliminationResult {
  type: 'elimination_bracket';
  timestamp: string;
  participants: string[];
  gamesPerMatch: number;
  totalRounds: number;
  duration: number;
  rounds: EliminationRound[];
  matches: MatchResult[];
  champion: string;
}

export type TournamentResult = RoundRobinResult | EliminationResult;

export interface TournamentProgress {
  readonly completed: number;
  readonly total: number;
  readonly current: string;
}

export interface TournamentRunOptions {
  gamesPerMatch?: number;
  updateElo?: boolean;
  signal?: CancelSignal;
  onProgress?: (progress: TournamentProgress) => void;
}

export interface TournamentOptions {
  elo?: EloSystem;
  /** JSON file results are appended to; null disables history. */
  historyPath?: string | null;
  verbose?: boolean;
}

export const POINTS_WIN = 3;
export const POINTS_DRAW = 1;
const DEFAULT_GAMES_PER_MATCH = 100;

function validateParticipants(participants: readonly Participant[]): void {
  if (participants.length < 2) {
    throw new RangeError(`A tournament needs at least two participants, got ${participants.length}`);
  }
  const seen = new Set<string>();
  for (const participant of participants) {
    if (seen.has(participant.name)) {
      throw new RangeError(`Duplicate participant name: ${participant.name}`);
    }
    seen.add(participant.name);
  }
}

function validateGames(games: number): void {
  if (!Number.isInteger(games) || games < 1) {
    throw new RangeError(`gamesPerMatch must be a positive integer, got ${games}`);
  }
}

export class Tournament {
  readonly elo: EloSystem;
  private readonly env: GameEnvironment;
  private readonly historyPath: string | null;
  private readonly verbose: boolean;

  constructor(env: GameEnvironment, options: TournamentOptions = {}) {
    this.env = env;
    this.elo = options.elo ?? new EloSystem({ filePath: null });
    this.historyPath =
      options.historyPath === undefined || options.historyPath === null
        ? null
        : path.resolve(options.historyPath);
    this.verbose = options.verbose ?? false;
  }

  private print(message: string): void {
    if (this.verbose) {
      // eslint-disable-next-line no-console
      console.log(message);
    }
  }

  /** Both sides play greedily; A moves first on even game indices. */
  playMatch(
    a: ActionPolicy,
    b: ActionPolicy,
    games: number,
    nameA = 'A',
    nameB = 'B',
  ): MatchResult {
    validateGames(games);
    let winsA = 0;
    let winsB = 0;
    let draws = 0;
    for (let game = 0; game < games; game += 1) {
      const aStarts = game % 2 === 0;
      const symbolA = aStarts ? PLAYER_X : PLAYER_O;
      let state = this.env.reset();
      let done = false;
      while (!done) {
        const mover = this.env.currentPlayer() === symbolA ? a : b;
        const action = mover.chooseAction(state, this.env.legalActions(state), 0);
        ({ state, done } = this.env.applyAction(action));
      }
      const winner = this.env.getWinner();
      if (winner === null) {
        draws += 1;
      } else if (winner === symbolA) {
        winsA += 1;
      } else {
        winsB += 1;
      }
    }
    return {
      nameA,
      nameB,
      games,
      winsA,
      winsB,
      draws,
      winRateA: percent(winsA, games),
      winRateB: percent(winsB, games),
      drawRate: percent(draws, games),
      scoreA: (winsA + 0.5 * draws) / games,
      scoreB: (winsB + 0.5 * draws) / games,
    };
  }

  private rateMatch(a: Participant, b: Participant, result: MatchResult): void {
    const idA = a.ratingId ?? a.name;
    const idB = b.ratingId ?? b.name;
    if (idA !== a.name) {
      this.elo.setLabel(idA, a.name);
    }
    if (idB !== b.name) {
      this.elo.setLabel(idB, b.name);
    }
    const [ratingA, ratingB] = this.elo.updateRatings(idA, idB, result.scoreA, result.scoreB);
    this.print(`  Elo: ${a.name} ${ratingA.toFixed(0)}, ${b.name} ${ratingB.toFixed(0)}`);
  }

  roundRobin(
    participants: readonly Participant[],
    options: TournamentRunOptions = {},
  ): RoundRobinResult {
    validateParticipants(participants);
    const gamesPerMatch = options.gamesPerMatch ?? DEFAULT_GAMES_PER_MATCH;
    validateGames(gamesPerMatch);
    const updateElo = options.updateElo ?? true;
    const startedAt = Date.now();

    const rows = new Map<string, Standing>();
    for (const participant of participants) {
      const ratingId = participant.ratingId ?? participant.name;
      rows.set(participant.name, {
        name: participant.name,
        ratingId,
        wins: 0,
        draws: 0,
        losses: 0,
        points: 0,
        rating: this.elo.getRating(ratingId),
      });
    }

    const totalMatches = (participants.length * (participants.length - 1)) / 2;
    const matches: MatchResult[] = [];
    this.print(`Round robin: ${participants.length} participants, ${totalMatches} matches`);

    for (let i = 0; i < participants.length; i += 1) {
      for (let j = i + 1; j < participants.length; j += 1) {
        throwIfCancelled(options.signal, 'Tournament');
        const a = participants[i]!;
        const b = participants[j]!;
        const result = this.playMatch(a.policy, b.policy, gamesPerMatch, a.name, b.name);
        matches.push(result);
        this.print(
          `Match ${matches.length}/${totalMatches}: ${a.name} vs ${b.name} ` +
            `${result.winsA}-${result.draws}-${result.winsB}`,
        );

        const rowA = rows.get(a.name);
        const rowB = rows.get(b.name);
        if (rowA && rowB) {
          if (result.winsA > result.winsB) {
            rowA.wins += 1;
            rowA.points += POINTS_WIN;
            rowB.losses += 1;
          } else if (result.winsB > result.winsA) {
            rowB.wins += 1;
            rowB.points += POINTS_WIN;
            rowA.losses += 1;
          } else {
            rowA.draws += 1;
            rowB.draws += 1;
            rowA.points += POINTS_DRAW;
            rowB.points += POINTS_DRAW;
          }
        }
        if (updateElo) {
          this.rateMatch(a, b, result);
        }
        options.onProgress?.(
          Object.freeze({ completed: matches.length, total: totalMatches, current: `${a.name} vs ${b.name}` }),
        );
      }
    }

    // Stable sort: ties keep entry order.
    const standings = [...rows.values()]
      .map((row) => ({ ...row, rating: this.elo.getRating(row.ratingId) }))
      .sort((x, y) => y.points - x.points || y.wins - x.wins);

    standings.forEach((row, index) => {
      this.print(
        `${index + 1}. ${row.name}  points=${row.points} W-D-L=${row.wins}-${row.draws}-${row.losses} ` +
          `elo=${formatNumber(row.rating, 0)}`,
      );
    });

    const result: RoundRobinResult = {
      type: 'round_robin',
      timestamp: new Date().toISOString(),
      participants: participants.map((participant) => participant.name),
      gamesPerMatch,
      totalMatches,
      duration: (Date.now() - startedAt) / 1000,
      standings,
      matches,
      champion: standings[0]?.name ?? null,
    };
    this.appendHistory(result);
    return result;
  }

  eliminationBracket(
    participants: readonly Participant[],
    options: TournamentRunOptions = {},
  ): EliminationResult {
    validateParticipants(participants);
    const gamesPerMatch = options.gamesPerMatch ?? DEFAULT_GAMES_PER_MATCH;
    validateGames(gamesPerMatch);
    const updateElo = options.updateElo ?? false;
    const startedAt = Date.now();

    const totalMatches = participants.length - 1;
    let remaining = [...participants];
    const rounds: EliminationRound[] = [];
    const matches: MatchResult[] = [];

    while (remaining.length > 1) {
      const round: EliminationRound = { round: rounds.length + 1, matches: [], byes: [], advanced: [] };
      const nextRound: Participant[] = [];
      this.print(`Round ${round.round}: ${remaining.length} participants`);

      for (let i = 0; i < remaining.length; i += 2) {
        const a = remaining[i]!;
        const b = remaining[i + 1];
        if (!b) {
          round.byes.push(a.name);
          nextRound.push(a);
          this.print(`  ${a.name} advances on a bye`);
          continue;
        }
        throwIfCancelled(options.signal, 'Tournament');
        const result = this.playMatch(a.policy, b.policy, gamesPerMatch, a.name, b.name);
        matches.push(result);
        if (updateElo) {
          this.rateMatch(a, b, result);
        }

        let winner: Participant;
        let suddenDeath: MatchResult | null = null;
        if (result.winsA > result.winsB) {
          winner = a;
        } else if (result.winsB > result.winsA) {
          winner = b;
        } else {
          suddenDeath = this.playMatch(a.policy, b.policy, 1, a.name, b.name);
          winner = suddenDeath.winsA > 0 ? a : b;
        }
        round.matches.push({ result, winner: winner.name, suddenDeath });
        nextRound.push(winner);
        this.print(
          `  ${a.name} vs ${b.name} ${result.winsA}-${result.draws}-${result.winsB}` +
            `${suddenDeath ? ' (sudden death)' : ''} -> ${winner.name}`,
        );
        options.onProgress?.(
          Object.freeze({ completed: matches.length, total: totalMatches, current: `${a.name} vs ${b.name}` }),
        );
      }

      round.advanced = nextRound.map((participant) => participant.name);
      rounds.push(round);
      remaining = nextRound;
    }

    const champion = remaining[0]?.name ?? '';
    this.print(`Champion: ${champion}`);

    const result: EliminationResult = {
      type: 'elimination_bracket',
      timestamp: new Date().toISOString(),
      participants: participants.map((participant) => participant.name),
      gamesPerMatch,
      totalRounds: rounds.length,
      duration: (Date.now() - startedAt) / 1000,
      rounds,
      matches,
      champion,
    };
    this.appendHistory(result);
    return result;
  }

  private readHistory(): unknown[] {
    if (!this.historyPath) {
      return [];
    }
    const stored = readJsonSafe(this.historyPath);
    return Array.isArray(stored) ? stored : [];
  }

  private appendHistory(result: TournamentResult): void {
    if (!this.historyPath) {
      return;
    }
    const history = this.readHistory();
    history.push(result);
    writeJsonSafe(this.historyPath, history);
  }

  /** Stored results, newest first. */
  getHistory(limit = 10): unknown[] {
    return this.readHistory().slice(-limit).reverse();
  }
}
