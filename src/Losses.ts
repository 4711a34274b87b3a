import { Value } from "./Value";

/**
 * Throws an error if outputs and targets length do not match.
 */
function checkLengthMatch(outputs: readonly unknown[], targets: readonly unknown[]): void {
  if (outputs.length !== targets.length) {
    throw new Error('Outputs and targets must have the same length');
  }
}

/**
 * Loss functions used by the training loop.
 * All methods return a scalar Value representing the loss.
 * @public
 */
export class Losses {
  /**
   * SVM "max-margin" loss: mean of relu(1 - y * score).
   * @param scores Model outputs.
   * @param labels Targets, -1 or 1.
   */
  public static maxMargin(scores: readonly Value[], labels: readonly number[]): Value {
    checkLengthMatch(scores, labels);
    if (!scores.length) return new Value(0);
    const losses = scores.map((score, i) => score.mul(-labels[i]).add(1).relu());
    return Value.sum(losses).div(losses.length);
  }

  /**
   * L2 regularization: alpha * sum(p * p).
   */
  public static l2(params: readonly Value[], alpha: number): Value {
    if (!params.length) return new Value(0);
    return Value.sum(params.map(p => p.mul(p))).mul(alpha);
  }

  /**
   * Computes mean squared error (MSE) loss between outputs and targets.
   * @param outputs Array of Value predictions.
   * @param targets Array of Value or number targets.
   * @returns Mean squared error as a Value.
   */
  public static mse(outputs: readonly Value[], targets: readonly (Value | number)[]): Value {
    checkLengthMatch(outputs, targets);
    if (!outputs.length) return new Value(0);
    const diffs = outputs.map((out, i) => out.sub(targets[i]).pow(2));
    return Value.sum(diffs).div(diffs.length);
  }
}
