import fs from 'fs';
import path from 'path';

function describe(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/** Parsed JSON contents, or null when the file is missing or unreadable. */
export function readJsonSafe(filePath: string): unknown {
  if (!fs.existsSync(filePath)) {
    return null;
  }
  try {
    return JSON.parse(fs.readFileSync(filePath, 'utf-8'));
  } catch (error) {
    // eslint-disable-next-line no-console
    console.warn(`Could not read ${filePath}: ${describe(error)}`);
    return null;
  }
}

export function writeJsonSafe(filePath: string, data: unknown): boolean {
  try {
    fs.mkdirSync(path.dirname(filePath), { recursive: true });
    fs.writeFileSync(filePath, JSON.stringify(data, null, 2), { encoding: 'utf-8' });
    return true;
  } catch (error) {
    // eslint-disable-next-line no-console
    console.warn(`Could not write ${filePath}: ${describe(error)}`);
    return false;
  }
}

export function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

export function isFiniteNumber(value: unknown): value is number {
  return typeof value === 'number' && Number.isFinite(value);
}

export function numberOr(value: unknown, fallback: number): number {
  return isFiniteNumber(value) ? value : fallback;
}

export function stringOr(value: unknown, fallback: string): string {
  return typeof value === 'string' ? value : fallback;
}
