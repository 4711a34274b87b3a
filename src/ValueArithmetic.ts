import { Value } from './Value';

export class ValueArithmetic {
  static add(a: Value, b: Value): Value {
    return Value.make(
      a.data + b.data,
      [a, b],
      (out) => () => {
        a.grad += out.grad;
        b.grad += out.grad;
      },
      `(${a.label}+${b.label})`,
      '+'
    );
  }

  static mul(a: Value, b: Value): Value {
    return Value.make(
      a.data * b.data,
      [a, b],
      (out) => () => {
        a.grad += b.data * out.grad;
        b.grad += a.data * out.grad;
      },
      `(${a.label}*${b.label})`,
      '*'
    );
  }

  static pow(a: Value, exp: number): Value {
    const out = Value.make(
      Math.pow(a.data, exp),
      [a],
      (out) => () => {
        a.grad += exp * Math.pow(a.data, exp - 1) * out.grad;
      },
      `(${a.label}^${exp})`,
      '^'
    );
    out.exponent = exp;
    return out;
  }

  // Everything below is composed from add/mul/pow and carries no rule of its own.

  static neg(a: Value): Value {
    return ValueArithmetic.mul(a, new Value(-1));
  }

  static sub(a: Value, b: Value): Value {
    return ValueArithmetic.add(a, ValueArithmetic.neg(b));
  }

  static div(a: Value, b: Value): Value {
    return ValueArithmetic.mul(a, ValueArithmetic.pow(b, -1));
  }

  static sum(vals: readonly Value[]): Value {
    if (!vals.length) {
      throw new Error('sum expects at least one Value');
    }
    return vals.slice(1).reduce((acc, v) => ValueArithmetic.add(acc, v), vals[0]);
  }
}
