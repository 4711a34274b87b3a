import * as fs from 'fs';
import { gaussian, type Rng } from './Random';

/**
 * One labelled two-feature sample.
 * @public
 */
export interface DataPoint {
  x: number;
  y: number;
  label: number;
}

/**
 * Feature rows and labels, index-aligned.
 * @public
 */
export interface Dataset {
  xs: number[][];
  ys: number[];
}

export class DatasetError extends Error {
  readonly line?: number;

  constructor(message: string, line?: number) {
    super(line === undefined ? message : `line ${line}: ${message}`);
    this.name = 'DatasetError';
    this.line = line;
  }
}

function parseField(raw: string | undefined, name: string, line: number): number {
  if (raw === undefined || raw.trim() === '') {
    throw new DatasetError(`missing field "${name}"`, line);
  }
  const n = Number(raw.trim());
  if (!Number.isFinite(n)) {
    throw new DatasetError(`field "${name}" is not a number: ${raw.trim()}`, line);
  }
  return n;
}

/**
 * Parses `x,y,label` rows. The first line is a header and is skipped, as are
 * blank lines. Rows with extra fields are rejected.
 */
export function parseCsv(text: string): DataPoint[] {
  const points: DataPoint[] = [];
  const lines = text.split(/\r?\n/);
  for (let i = 1; i < lines.length; i++) {
    const row = lines[i];
    if (!row.trim()) continue;
    const fields = row.split(',');
    if (fields.length > 3) {
      throw new DatasetError(`expected 3 fields, got ${fields.length}`, i + 1);
    }
    points.push({
      x: parseField(fields[0], 'x', i + 1),
      y: parseField(fields[1], 'y', i + 1),
      label: parseField(fields[2], 'label', i + 1),
    });
  }
  return points;
}

export function readCsvFile(filename: string): DataPoint[] {
  return parseCsv(fs.readFileSync(filename, 'utf-8'));
}

export function toDataset(points: readonly DataPoint[]): Dataset {
  return {
    xs: points.map(p => [p.x, p.y]),
    ys: points.map(p => p.label),
  };
}

export function loadMoonsData(filename: string): Dataset {
  return toDataset(readCsvFile(filename));
}

export interface MoonsOptions {
  noise?: number;
  rng?: Rng;
}

/**
 * Two interleaving half circles. The upper moon is labelled -1, the lower one 1.
 * With `noise` > 0 each coordinate gets gaussian jitter of that standard deviation.
 */
export function makeMoons(n: number, opts: MoonsOptions = {}): DataPoint[] {
  const noise = opts.noise ?? 0.1;
  const rng = opts.rng ?? Math.random;
  const nOuter = Math.floor(n / 2);
  const nInner = n - nOuter;

  const angle = (i: number, count: number) => (count > 1 ? (Math.PI * i) / (count - 1) : 0);
  const jitter = () => (noise > 0 ? gaussian(rng) * noise : 0);

  const points: DataPoint[] = [];
  for (let i = 0; i < nOuter; i++) {
    const t = angle(i, nOuter);
    points.push({ x: Math.cos(t) + jitter(), y: Math.sin(t) + jitter(), label: -1 });
  }
  for (let i = 0; i < nInner; i++) {
    const t = angle(i, nInner);
    points.push({ x: 1 - Math.cos(t) + jitter(), y: 0.5 - Math.sin(t) + jitter(), label: 1 });
  }
  return points;
}
