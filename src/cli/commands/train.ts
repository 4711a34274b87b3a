import * as fs from "fs";
import { z } from "zod";
import { DatasetError, loadMoonsData, makeMoons, toDataset, type Dataset } from "../../Dataset";
import { MLP } from "../../nn/MLP";
import { seededRandom } from "../../Random";
import { renderDecisionBoundary, train, type StepResult } from "../../Trainer";
import { assert, CliError } from "../cli-error";
import type { Logger } from "../logger";

export const trainSchema = z.object({
  data: z.string().min(1, "--data must name a CSV file").optional(),
  samples: z.number().int().positive().default(100),
  noise: z.number().nonnegative().default(0.1),
  steps: z.number().int().positive().default(100),
  hidden: z
    .string()
    .regex(/^[1-9]\d*(,[1-9]\d*)*$/, "expected comma-separated positive layer sizes, e.g. 16,16")
    .default("16,16")
    .transform(s => s.split(",").map(Number)),
  alpha: z.number().nonnegative().default(1e-4),
  seed: z.number().int().default(1337),
  plot: z.boolean().default(false),
});

export type TrainArgs = z.infer<typeof trainSchema>;

export interface TrainReport {
  model: MLP;
  history: StepResult[];
}

function loadDataset(args: TrainArgs): Dataset {
  if (!args.data) {
    return toDataset(makeMoons(args.samples, { noise: args.noise, rng: seededRandom(args.seed) }));
  }
  assert(fs.existsSync(args.data), `Data file not found: ${args.data}`, 2);
  try {
    return loadMoonsData(args.data);
  } catch (err) {
    if (err instanceof DatasetError) {
      throw new CliError(`${args.data}: ${err.message}`, 2);
    }
    throw err;
  }
}

export function runTrain(args: TrainArgs, logger: Logger): TrainReport {
  const dataset = loadDataset(args);
  assert(dataset.ys.length > 0, "Dataset is empty", 2);

  const model = new MLP(2, [...args.hidden, 1], { rng: seededRandom(args.seed) });
  logger.error(model.toString());
  logger.error(`number of parameters ${model.parameters().length}`);

  const history = train(model, dataset, {
    steps: args.steps,
    alpha: args.alpha,
    onStep: ({ step, loss, accuracy }) =>
      logger.info(`step ${step} loss ${loss.toFixed(3)}, accuracy ${(accuracy * 100).toFixed(2)}%`),
  });

  if (args.plot) {
    logger.info(renderDecisionBoundary(model));
  }
  return { model, history };
}
