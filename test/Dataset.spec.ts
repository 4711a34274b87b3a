import * as path from 'path';
import { DatasetError, loadMoonsData, makeMoons, parseCsv, readCsvFile, toDataset } from "../src/Dataset";
import { seededRandom } from "../src/Random";

const fixture = path.join(__dirname, 'fixtures', 'moons.csv');

describe('parseCsv', () => {
  it('skips the header and blank lines', () => {
    const points = parseCsv('x,y,label\n1.5,-0.5,1\n\n0,2,-1\n');
    expect(points).toEqual([
      { x: 1.5, y: -0.5, label: 1 },
      { x: 0, y: 2, label: -1 },
    ]);
  });

  it('accepts CRLF line endings and padded fields', () => {
    expect(parseCsv('x,y,label\r\n 1 , 2 ,-1\r\n')).toEqual([{ x: 1, y: 2, label: -1 }]);
  });

  it('names the line of a non-numeric field', () => {
    expect(() => parseCsv('x,y,label\n1,2,1\n1,abc,1')).toThrow('line 3: field "y" is not a number: abc');
  });

  it('names the line of a missing field', () => {
    try {
      parseCsv('x,y,label\n1,2\n');
      expect.unreachable();
    } catch (err) {
      expect(err).toBeInstanceOf(DatasetError);
      if (err instanceof DatasetError) {
        expect(err.line).toBe(2);
        expect(err.message).toBe('line 2: missing field "label"');
      }
    }
  });

  it('rejects rows with extra fields', () => {
    expect(() => parseCsv('x,y,label\n1,2,1\n1,2,1,999\n')).toThrow(
      new DatasetError('expected 3 fields, got 4', 3)
    );
  });

  it('returns nothing for a header-only file', () => {
    expect(parseCsv('x,y,label\n')).toEqual([]);
  });
});

describe('reading files', () => {
  it('reads the fixture', () => {
    const points = readCsvFile(fixture);
    expect(points).toHaveLength(8);
    expect(points[0]).toEqual({ x: 1.0, y: 0.1, label: -1 });
  });

  it('loadMoonsData splits features and labels', () => {
    const { xs, ys } = loadMoonsData(fixture);
    expect(xs).toHaveLength(8);
    expect(xs[4]).toEqual([0.0, 0.45]);
    expect(ys).toEqual([-1, -1, -1, -1, 1, 1, 1, 1]);
  });

  it('toDataset keeps rows aligned', () => {
    expect(toDataset([{ x: 1, y: 2, label: 1 }])).toEqual({ xs: [[1, 2]], ys: [1] });
  });
});

describe('makeMoons', () => {
  it('traces two half circles without noise', () => {
    const points = makeMoons(10, { noise: 0 });
    expect(points.filter(p => p.label === -1)).toHaveLength(5);
    expect(points.filter(p => p.label === 1)).toHaveLength(5);

    expect(points[0].x).toBeCloseTo(1);
    expect(points[0].y).toBeCloseTo(0);
    expect(points[4].x).toBeCloseTo(-1);
    expect(points[4].y).toBeCloseTo(0);
    expect(points[5].x).toBeCloseTo(0);
    expect(points[5].y).toBeCloseTo(0.5);
    expect(points[9].x).toBeCloseTo(2);
    expect(points[9].y).toBeCloseTo(0.5);
  });

  it('puts the extra sample of an odd count in the lower moon', () => {
    const points = makeMoons(7, { noise: 0 });
    expect(points.filter(p => p.label === -1)).toHaveLength(3);
    expect(points.filter(p => p.label === 1)).toHaveLength(4);
  });

  it('is reproducible for a seeded random source', () => {
    const first = makeMoons(20, { noise: 0.2, rng: seededRandom(42) });
    const second = makeMoons(20, { noise: 0.2, rng: seededRandom(42) });
    expect(first).toEqual(second);
    expect(first).not.toEqual(makeMoons(20, { noise: 0 }));
  });
});

describe('seededRandom', () => {
  it('stays in [0, 1) and repeats for the same seed', () => {
    const a = seededRandom(7);
    const b = seededRandom(7);
    for (let i = 0; i < 1000; i++) {
      const v = a();
      expect(v).toBe(b());
      expect(v).toBeGreaterThanOrEqual(0);
      expect(v).toBeLessThan(1);
    }
    expect(seededRandom(1)()).not.toBe(seededRandom(2)());
  });
});
