import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import { CliError, parseArgs } from "../src/cli/cli-error";
import { demoSchema, runDemo } from "../src/cli/commands/demo";
import { graphSchema, runGraph } from "../src/cli/commands/graph";
import { runTrain, trainSchema } from "../src/cli/commands/train";
import { main } from "../src/cli/main";
import { recordingLogger } from "./testUtils";

const fixture = path.join(__dirname, 'fixtures', 'moons.csv');

let tmpDir: string;

beforeAll(() => {
  tmpDir = fs.mkdtempSync(path.join(os.tmpdir(), 'dagrad-cli-'));
});

afterAll(() => {
  fs.rmSync(tmpDir, { recursive: true, force: true });
});

describe('demo command', () => {
  it('prints the reference results to four decimals', () => {
    const logger = recordingLogger();
    runDemo(parseArgs(demoSchema, {}), logger);
    expect(logger.infoLines).toEqual(['g = 24.7041', 'dg/da = 138.8338', 'dg/db = 645.5773']);
  });

  it('runs through the yargs entry point', () => {
    const logger = recordingLogger();
    main(['demo'], logger);
    expect(logger.infoLines).toEqual(['g = 24.7041', 'dg/da = 138.8338', 'dg/db = 645.5773']);
  });
});

describe('graph command', () => {
  it('prints the DOT text of the sample expression after backward', () => {
    const logger = recordingLogger();
    const dot = runGraph(parseArgs(graphSchema, {}), logger);
    expect(logger.infoLines).toEqual([dot]);
    const lines = dot.split('\n');
    expect(lines).toContain('    0 [ label = "data=1.0 grad=294.0" ]');
    expect(lines).toContain('    3 [ label = "data=3.0 grad=126.0" ]');
    expect(lines).toContain('    7 [ label = "data=441.0 grad=1.0" ]');
    expect(lines).toContain('    6 -> 7 [ label = "^" ]');
  });

  it('writes to a file when asked', () => {
    const logger = recordingLogger();
    const out = path.join(tmpDir, 'neuron.dot');
    const dot = runGraph(parseArgs(graphSchema, { kind: 'neuron', out }), logger);
    expect(fs.readFileSync(out, 'utf-8')).toBe(dot + '\n');
    expect(logger.infoLines).toEqual([]);
    expect(logger.errorLines).toEqual([`Output written to ${out}`]);
  });

  it('rejects an unknown kind', () => {
    expect(() => parseArgs(graphSchema, { kind: 'tree' })).toThrow(CliError);
  });
});

describe('train command', () => {
  it('logs one line per step', () => {
    const logger = recordingLogger();
    const args = parseArgs(trainSchema, { data: fixture, steps: 3, hidden: '4' });
    expect(args.hidden).toEqual([4]);

    const { model, history } = runTrain(args, logger);
    expect(history).toHaveLength(3);
    expect(model.parameters()).toHaveLength(4 * 3 + 5);
    expect(logger.infoLines).toHaveLength(3);
    expect(logger.infoLines[0]).toMatch(/^step 0 loss \d+\.\d{3}, accuracy \d+\.\d{2}%$/);
    expect(logger.errorLines).toEqual(['MLP of [Layer of [ReLU(2), ReLU(2), ReLU(2), ReLU(2)], Layer of [Linear(4)]]', 'number of parameters 17']);
  });

  it('trains on generated moons and plots on request', () => {
    const logger = recordingLogger();
    runTrain(parseArgs(trainSchema, { samples: 10, steps: 2, hidden: '3', plot: true }), logger);
    expect(logger.infoLines).toHaveLength(3);
    expect(logger.infoLines[2].split('\n')).toHaveLength(40);
  });

  it('reports a missing data file', () => {
    const args = parseArgs(trainSchema, { data: path.join(tmpDir, 'missing.csv') });
    expect(() => runTrain(args, recordingLogger())).toThrow(
      new CliError(`Data file not found: ${path.join(tmpDir, 'missing.csv')}`, 2)
    );
  });

  it('reports malformed rows with the file name', () => {
    const bad = path.join(tmpDir, 'bad.csv');
    fs.writeFileSync(bad, 'x,y,label\n1,2\n');
    try {
      runTrain(parseArgs(trainSchema, { data: bad }), recordingLogger());
      expect.unreachable();
    } catch (err) {
      expect(err).toBeInstanceOf(CliError);
      if (err instanceof CliError) {
        expect(err.exitCode).toBe(2);
        expect(err.message).toBe(`${bad}: line 2: missing field "label"`);
      }
    }
  });

  it('validates hidden layer sizes', () => {
    expect(() => parseArgs(trainSchema, { hidden: '16,,16' })).toThrow(
      'Invalid arguments:\n  --hidden: expected comma-separated positive layer sizes, e.g. 16,16'
    );
  });

  it('rejects a zero-width layer before building the model', () => {
    expect(() => parseArgs(trainSchema, { hidden: '16,0' })).toThrow(
      'Invalid arguments:\n  --hidden: expected comma-separated positive layer sizes, e.g. 16,16'
    );
    expect(() => parseArgs(trainSchema, { hidden: '08' })).toThrow(CliError);
  });

  it('reports an empty dataset', () => {
    const empty = path.join(tmpDir, 'empty.csv');
    fs.writeFileSync(empty, 'x,y,label\n');
    expect(() => runTrain(parseArgs(trainSchema, { data: empty }), recordingLogger())).toThrow(
      new CliError('Dataset is empty', 2)
    );
  });
});
