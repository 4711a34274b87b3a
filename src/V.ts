import { Value } from './Value';
import { ValueActivation } from './ValueActivation';
import { ValueArithmetic } from './ValueArithmetic';

type Operand = Value | number;

function ensureValue(x: Operand): Value {
  return typeof x === 'number' ? new Value(x) : x;
}

/**
 * Function-style operations that accept a plain number on either side,
 * e.g. `V.div(10, f)` or `V.mul(3, d)`.
 * @public
 */
export class V {
  /** Constant leaf. */
  static C(data: number, label = ""): Value {
    return new Value(data, label);
  }

  /** Labelled parameter leaf (a weight the caller intends to update). */
  static W(data: number, label = ""): Value {
    return new Value(data, label);
  }

  static add(a: Operand, b: Operand): Value {
    return ValueArithmetic.add(ensureValue(a), ensureValue(b));
  }

  static sub(a: Operand, b: Operand): Value {
    return ValueArithmetic.sub(ensureValue(a), ensureValue(b));
  }

  static mul(a: Operand, b: Operand): Value {
    return ValueArithmetic.mul(ensureValue(a), ensureValue(b));
  }

  static div(a: Operand, b: Operand): Value {
    return ValueArithmetic.div(ensureValue(a), ensureValue(b));
  }

  static pow(a: Operand, exp: number): Value {
    return ValueArithmetic.pow(ensureValue(a), exp);
  }

  static neg(a: Operand): Value {
    return ValueArithmetic.neg(ensureValue(a));
  }

  static relu(a: Operand): Value {
    return ValueActivation.relu(ensureValue(a));
  }

  static sum(vals: readonly Operand[]): Value {
    return ValueArithmetic.sum(vals.map(ensureValue));
  }
}
