import fs from 'fs';
import path from 'path';

export interface TrainingLogEntry {
  ts: string;
  episode: number;
  totalEpisodes: number;
  epsilon: number;
  winRate: number;
  drawRate: number;
  lossRate: number;
  avgReward: number;
  avgMoves: number;
  statesLearned: number;
}

/** Append-only JSON-lines log, one object per progress report. */
export class TrainingLog {
  readonly filePath: string;

  constructor(filePath: string) {
    this.filePath = path.resolve(filePath);
  }

  append(entry: TrainingLogEntry): void {
    fs.mkdirSync(path.dirname(this.filePath), { recursive: true });
    fs.appendFileSync(this.filePath, `${JSON.stringify(entry)}\n`);
  }

  read(): TrainingLogEntry[] {
    if (!fs.existsSync(this.filePath)) {
      return [];
    }
    const entries: TrainingLogEntry[] = [];
    for (const line of fs.readFileSync(this.filePath, 'utf-8').split('\n')) {
      if (line.trim().length === 0) {
        continue;
      }
      const parsed = parseLine(line);
      if (isTrainingLogEntry(parsed)) {
        entries.push(parsed);
      }
    }
    return entries;
  }
}

/** A torn trailing line from an interrupted append reads as nothing. */
function parseLine(line: string): unknown {
  try {
    return JSON.parse(line);
  } catch {
    return null;
  }
}

function isTrainingLogEntry(value: unknown): value is TrainingLogEntry {
  if (typeof value !== 'object' || value === null) {
    return false;
  }
  return 'episode' in value && typeof value.episode === 'number' && 'ts' in value;
}
