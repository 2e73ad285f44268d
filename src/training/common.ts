export interface SummaryStats {
  mean: number;
  std: number;
  min: number;
  max: number;
}

export function mean(values: readonly number[]): number {
  if (values.length === 0) {
    return 0;
  }
  return values.reduce((sum, value) => sum + value, 0) / values.length;
}

/** Population variance; 0 for fewer than two values. */
export function variance(values: readonly number[]): number {
  if (values.length < 2) {
    return 0;
  }
  const average = mean(values);
  return values.reduce((sum, value) => sum + (value - average) ** 2, 0) / values.length;
}

export function summarise(values: readonly number[]): SummaryStats {
  if (values.length === 0) {
    return { mean: 0, std: 0, min: 0, max: 0 };
  }
  let min = Infinity;
  let max = -Infinity;
  for (const value of values) {
    min = Math.min(min, value);
    max = Math.max(max, value);
  }
  return { mean: mean(values), std: Math.sqrt(variance(values)), min, max };
}

export function percent(count: number, total: number): number {
  return total > 0 ? (count / total) * 100 : 0;
}

export function formatNumber(value: number, digits = 2): string {
  if (!Number.isFinite(value)) {
    return (0).toFixed(digits);
  }
  return value.toFixed(digits);
}

/** Fixed-capacity history; the oldest values fall off first. */
export class BoundedHistory {
  private readonly values: number[] = [];

  constructor(private readonly capacity: number) {}

  push(value: number): void {
    this.values.push(value);
    if (this.values.length > this.capacity) {
      this.values.shift();
    }
  }

  get length(): number {
    return this.values.length;
  }

  rollingMean(window: number): number {
    return mean(this.values.slice(-window));
  }

  toArray(): number[] {
    return [...this.values];
  }
}
