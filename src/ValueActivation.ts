import { Value } from './Value';

export class ValueActivation {
  static relu(x: Value): Value {
    const r = Math.max(0, x.data);
    return Value.make(
      r,
      [x],
      (out) => () => {
        x.grad += (x.data > 0 ? 1 : 0) * out.grad;
      },
      `relu(${x.label})`,
      'relu'
    );
  }
}
