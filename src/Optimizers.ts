// Optimizers.ts

import { Value } from "./Value";

/**
 * Abstract base class for all optimizers.
 * Updates parameters in place by writing their `data`.
 */
export abstract class Optimizer {
  protected trainables: Value[];
  public learningRate: number;

  /**
   * Constructs an Optimizer.
   * @param trainables Array of Value parameters to optimize.
   * @param learningRate Learning rate for updates.
   */
  constructor(trainables: readonly Value[], learningRate: number) {
    this.trainables = [...trainables];
    this.learningRate = learningRate;
  }

  /**
   * Performs a parameter update step.
   */
  abstract step(): void;

  /**
   * Sets grads of all trainables to zero.
   */
  zeroGrad(): void {
    for (const v of this.trainables) v.grad = 0;
  }
}

/**
 * Optional arguments for basic optimizers.
 * @property learningRate: Overrides the step size for parameter updates (default varies by optimizer).
 */
export interface OptimizerOptions {
  learningRate?: number;
}

/**
 * Stochastic Gradient Descent (SGD) optimizer.
 */
export class SGD extends Optimizer {
  constructor(trainables: readonly Value[], opts: OptimizerOptions = {}) {
    super(trainables, opts.learningRate ?? 1e-2);
  }

  step(): void {
    for (const v of this.trainables) {
      v.data -= this.learningRate * v.grad;
    }
  }
}
