import path from 'path';

import { isFiniteNumber, isRecord, readJsonSafe, writeJsonSafe } from '../storage/json_file';

export const DEFAULT_K_FACTOR = 32;
export const DEFAULT_INITIAL_RATING = 1500;

export interface EloOptions {
  kFactor?: number;
  initialRating?: number;
  /** JSON file the table is persisted to; null keeps it in memory. */
  filePath?: string | null;
}

export interface LeaderboardEntry {
  id: string;
  label: string;
  rating: number;
}

export interface RatingChange {
  timestamp: string;
  idA: string;
  idB: string;
  scoreA: number;
  scoreB: number;
  ratingABefore: number;
  ratingBBefore: number;
  ratingAAfter: number;
  ratingBAfter: number;
}

export interface EloStats {
  totalModels: number;
  avgRating: number;
  maxRating: number;
  minRating: number;
  topModel: LeaderboardEntry | null;
}

/** Expected score of A against B, in [0, 1]. */
export function expectedScore(ratingA: number, ratingB: number): number {
  return 1 / (1 + Math.pow(10, (ratingB - ratingA) / 400));
}

export class EloSystem {
  readonly kFactor: number;
  readonly initialRating: number;
  readonly filePath: string | null;
  private ratings = new Map<string, number>();
  private labels = new Map<string, string>();
  private history: RatingChange[] = [];

  constructor(options: EloOptions = {}) {
    this.kFactor = options.kFactor ?? DEFAULT_K_FACTOR;
    this.initialRating = options.initialRating ?? DEFAULT_INITIAL_RATING;
    this.filePath = options.filePath === undefined || options.filePath === null
      ? null
      : path.resolve(options.filePath);
    this.load();
  }

  private load(): void {
    if (!this.filePath) {
      return;
    }
    const data = readJsonSafe(this.filePath);
    if (!isRecord(data)) {
      return;
    }
    const ratings = isRecord(data.ratings) ? data.ratings : {};
    for (const [id, rating] of Object.entries(ratings)) {
      if (isFiniteNumber(rating)) {
        this.ratings.set(id, rating);
      }
    }
    const labels = isRecord(data.labels) ? data.labels : {};
    for (const [id, label] of Object.entries(labels)) {
      if (typeof label === 'string') {
        this.labels.set(id, label);
      }
    }
  }

  save(): void {
    if (!this.filePath) {
      return;
    }
    writeJsonSafe(this.filePath, {
      ratings: Object.fromEntries(this.ratings),
      labels: Object.fromEntries(this.labels),
      last_updated: new Date().toISOString(),
      k_factor: this.kFactor,
      initial_rating: this.initialRating,
    });
  }

  getRating(id: string): number {
    return this.ratings.get(id) ?? this.initialRating;
  }

  hasRating(id: string): boolean {
    return this.ratings.has(id);
  }

  getLabel(id: string): string {
    return this.labels.get(id) ?? id;
  }

  setLabel(id: string, label: string): void {
    if (this.labels.get(id) === label) {
      return;
    }
    this.labels.set(id, label);
    this.save();
  }

  expectedScore(ratingA: number, ratingB: number): number {
    return expectedScore(ratingA, ratingB);
  }

  /** Both deltas come from the ratings held before this call. */
  updateRatings(idA: string, idB: string, scoreA: number, scoreB: number): [number, number] {
    const ratingA = this.getRating(idA);
    const ratingB = this.getRating(idB);
    const nextA = ratingA + this.kFactor * (scoreA - expectedScore(ratingA, ratingB));
    const nextB = ratingB + this.kFactor * (scoreB - expectedScore(ratingB, ratingA));
    this.ratings.set(idA, nextA);
    this.ratings.set(idB, nextB);
    this.save();
    this.history.push({
      timestamp: new Date().toISOString(),
      idA,
      idB,
      scoreA,
      scoreB,
      ratingABefore: ratingA,
      ratingBBefore: ratingB,
      ratingAAfter: nextA,
      ratingBAfter: nextB,
    });
    return [nextA, nextB];
  }

  getLeaderboard(topN?: number): LeaderboardEntry[] {
    const entries = [...this.ratings.entries()]
      .map(([id, rating]) => ({ id, label: this.getLabel(id), rating }))
      .sort((a, b) => b.rating - a.rating);
    return topN !== undefined && topN > 0 ? entries.slice(0, topN) : entries;
  }

  resetRating(id: string): void {
    if (!this.ratings.has(id)) {
      return;
    }
    this.ratings.set(id, this.initialRating);
    this.save();
  }

  removeModel(id: string): void {
    const removed = this.ratings.delete(id);
    const unlabelled = this.labels.delete(id);
    if (removed || unlabelled) {
      this.save();
    }
  }

  getMatchHistory(): RatingChange[] {
    return [...this.history];
  }

  getStats(): EloStats {
    const values = [...this.ratings.values()];
    if (values.length === 0) {
      return { totalModels: 0, avgRating: 0, maxRating: 0, minRating: 0, topModel: null };
    }
    return {
      totalModels: values.length,
      avgRating: values.reduce((sum, value) => sum + value, 0) / values.length,
      maxRating: Math.max(...values),
      minRating: Math.min(...values),
      topModel: this.getLeaderboard(1)[0] ?? null,
    };
  }
}
