import type { Dataset } from './Dataset';
import { Losses } from './Losses';
import type { MLP } from './nn/MLP';
import { SGD } from './Optimizers';
import { Value } from './Value';

export interface LossResult {
  loss: Value;
  accuracy: number;
}

export interface StepResult {
  step: number;
  loss: number;
  accuracy: number;
}

/**
 * Training loop settings.
 * @property steps: Number of full-batch SGD steps (default 100).
 * @property alpha: L2 regularization strength (default 1e-4).
 * @property onStep: Called after every update with that step's loss and accuracy.
 */
export interface TrainOptions {
  steps?: number;
  alpha?: number;
  onStep?: (result: StepResult) => void;
}

/**
 * Full-batch max-margin loss plus L2 regularization, and the share of
 * samples whose score has the label's sign.
 */
export function computeLoss(model: MLP, dataset: Dataset, alpha = 1e-4): LossResult {
  const { xs, ys } = dataset;
  const scores = xs.map(row => model.forward(row.map(x => new Value(x)))[0]);

  const dataLoss = Losses.maxMargin(scores, ys);
  const regLoss = Losses.l2(model.parameters(), alpha);
  const loss = dataLoss.add(regLoss);

  const correct = ys.filter((y, i) => (y > 0) === (scores[i].data > 0)).length;
  const accuracy = ys.length ? correct / ys.length : 0;
  return { loss, accuracy };
}

/**
 * Trains `model` in place with SGD, decaying the learning rate linearly from 1.0 to 0.1.
 */
export function train(model: MLP, dataset: Dataset, opts: TrainOptions = {}): StepResult[] {
  const steps = opts.steps ?? 100;
  const optimizer = new SGD(model.parameters(), { learningRate: 1 });
  const history: StepResult[] = [];

  for (let k = 0; k < steps; k++) {
    const { loss, accuracy } = computeLoss(model, dataset, opts.alpha);

    optimizer.zeroGrad();
    loss.backward();

    optimizer.learningRate = 1.0 - (0.9 * k) / steps;
    optimizer.step();

    const result: StepResult = { step: k, loss: loss.data, accuracy };
    history.push(result);
    opts.onStep?.(result);
  }
  return history;
}

/**
 * ASCII contour of the model's decision boundary over [-2, 2) x (-2, 2]:
 * `*` where the score is positive, `.` elsewhere. Rows top to bottom.
 */
export function renderDecisionBoundary(model: MLP, bound = 20): string {
  const rows: string[] = [];
  for (let y = -bound; y < bound; y++) {
    const row: string[] = [];
    for (let x = -bound; x < bound; x++) {
      const [score] = model.forward([(x / bound) * 2, (-y / bound) * 2]);
      row.push(score.data > 0 ? '*' : '.');
    }
    rows.push(row.join(' '));
  }
  return rows.join('\n');
}
