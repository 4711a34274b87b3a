import { V } from "../V";
import type { Rng } from "../Random";
import { Value } from "../Value";

/**
 * Options for a single neuron.
 * @property nonlin: Apply relu to the output (default true).
 * @property rng: Random source for weight initialisation (default Math.random).
 */
export interface NeuronOptions {
  nonlin?: boolean;
  rng?: Rng;
}

/**
 * One unit: relu(sum(w_i * x_i) + b), or the bare affine sum when linear.
 * Weights start uniform in [-1, 1), the bias at 0.
 * @public
 */
export class Neuron {
  readonly w: Value[];
  readonly b: Value;
  readonly nonlin: boolean;

  constructor(nin: number, opts: NeuronOptions = {}) {
    if (!Number.isInteger(nin) || nin < 1) {
      throw new Error(`Neuron needs at least one input, got ${nin}`);
    }
    const rng = opts.rng ?? Math.random;
    this.w = Array.from({ length: nin }, (_, i) => V.W(rng() * 2 - 1, `w${i}`));
    this.b = V.W(0, 'b');
    this.nonlin = opts.nonlin ?? true;
  }

  forward(x: readonly (Value | number)[]): Value {
    if (x.length !== this.w.length) {
      throw new Error(`Expected ${this.w.length} inputs, got ${x.length}`);
    }
    const act = V.sum(this.w.map((wi, i) => V.mul(wi, x[i]))).add(this.b);
    return this.nonlin ? act.relu() : act;
  }

  /** Bias first, then the weights. */
  parameters(): Value[] {
    return [this.b, ...this.w];
  }

  toString(): string {
    return `${this.nonlin ? 'ReLU' : 'Linear'}(${this.w.length})`;
  }
}
