import type { Rng } from "../Random";
import { Value } from "../Value";
import { Layer } from "./Layer";

export interface MLPOptions {
  rng?: Rng;
}

/**
 * Multilayer perceptron. `new MLP(2, [16, 16, 1])` builds 2 -> 16 -> 16 -> 1;
 * every layer but the last applies relu.
 * @public
 */
export class MLP {
  readonly layers: Layer[];

  constructor(nin: number, nouts: readonly number[], opts: MLPOptions = {}) {
    if (!nouts.length) {
      throw new Error('MLP needs at least one layer');
    }
    const sizes = [nin, ...nouts];
    this.layers = nouts.map((_, i) =>
      new Layer(sizes[i], sizes[i + 1], { nonlin: i !== nouts.length - 1, rng: opts.rng })
    );
  }

  forward(x: readonly (Value | number)[]): Value[] {
    let out = this.layers[0].forward(x);
    for (const layer of this.layers.slice(1)) {
      out = layer.forward(out);
    }
    return out;
  }

  parameters(): Value[] {
    return this.layers.flatMap(l => l.parameters());
  }

  zeroGrad(): void {
    for (const p of this.parameters()) p.grad = 0;
  }

  toString(): string {
    return `MLP of [${this.layers.map(l => l.toString()).join(', ')}]`;
  }
}
