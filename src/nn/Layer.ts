import { Value } from "../Value";
import { Neuron, type NeuronOptions } from "./Neuron";

/**
 * A row of independent neurons sharing the same input.
 * @public
 */
export class Layer {
  readonly neurons: Neuron[];

  constructor(nin: number, nout: number, opts: NeuronOptions = {}) {
    this.neurons = Array.from({ length: nout }, () => new Neuron(nin, opts));
  }

  forward(x: readonly (Value | number)[]): Value[] {
    return this.neurons.map(n => n.forward(x));
  }

  parameters(): Value[] {
    return this.neurons.flatMap(n => n.parameters());
  }

  toString(): string {
    return `Layer of [${this.neurons.map(n => n.toString()).join(', ')}]`;
  }
}
