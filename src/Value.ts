import { backward, zeroGradAll, zeroGradTree, type BackwardOptions } from './Backward';
import { ValueActivation } from './ValueActivation';
import { ValueArithmetic } from './ValueArithmetic';

/**
 * Propagation rule of a non-leaf node: reads the node's own gradient and its
 * operands' data, adds into the operands' gradients.
 * @public
 */
export type BackwardFn = () => void;

let nextId = 0;

/**
 * Represents a scalar value in the computational graph for automatic differentiation.
 * Supports forward computation and reverse-mode autodiff (backpropagation).
 * @public
 */
export class Value {
  /**
   * The numeric value stored in this node.
   * Only parameter updates (optimizers) write it after construction.
   * @public
   */
  data: number;

  /**
   * The gradient of the backward root with respect to this value.
   * @public
   */
  grad: number = 0;

  /**
   * Stable identity, unique per node and unrelated to `data`.
   * @public
   */
  readonly id: number = nextId++;

  /**
   * Optional label for debugging and visualization.
   * @public
   */
  label: string;

  /** @internal */ prev: readonly Value[] = [];

  /** @internal */ backwardFn?: BackwardFn;

  /**
   * Operation tag ('+', '*', '^', 'relu'); undefined on leaves.
   * @internal
   */
  op?: string;

  /**
   * Constant exponent of a pow node.
   * @internal
   */
  exponent?: number;

  constructor(data: number, label = "") {
    this.data = data;
    this.label = label;
  }

  private static ensureValue(x: Value | number): Value {
    return typeof x === 'number' ? new Value(x) : x;
  }

  /**
   * Adds this and other.
   * @param other Value or number to add
   * @returns New Value with sum.
   */
  add(other: Value | number): Value {
    return ValueArithmetic.add(this, Value.ensureValue(other));
  }

  /**
   * Multiplies this and other.
   * @param other Value or number to multiply
   * @returns New Value with product.
   */
  mul(other: Value | number): Value {
    return ValueArithmetic.mul(this, Value.ensureValue(other));
  }

  /**
   * Subtracts other from this.
   * @param other Value or number to subtract
   * @returns New Value with difference.
   */
  sub(other: Value | number): Value {
    return ValueArithmetic.sub(this, Value.ensureValue(other));
  }

  /**
   * Divides this by other. A zero divisor yields Infinity or NaN.
   * @param other Value or number divisor
   * @returns New Value with quotient.
   */
  div(other: Value | number): Value {
    return ValueArithmetic.div(this, Value.ensureValue(other));
  }

  /**
   * Raises this to a constant power. The exponent is not differentiated.
   * @param exp Exponent
   * @returns New Value with pow(this, exp)
   */
  pow(exp: number): Value {
    return ValueArithmetic.pow(this, exp);
  }

  /**
   * Returns relu(this).
   * @returns New Value with relu.
   */
  relu(): Value {
    return ValueActivation.relu(this);
  }

  /**
   * Returns the negation (-this) Value.
   * @returns New Value which is the negation.
   */
  neg(): Value {
    return ValueArithmetic.neg(this);
  }

  /**
   * Returns the sum of the given Values.
   * @param vals Non-empty array of Value objects
   * @returns New Value holding their sum.
   */
  static sum(vals: readonly Value[]): Value {
    return ValueArithmetic.sum(vals);
  }

  /**
   * Performs a reverse-mode autodiff backward pass from this Value.
   * Gradients accumulate across calls unless zeroGrad is set.
   * @param zeroGrad If true, zeroes all grads in the graph before backward
   */
  backward(zeroGrad = false): void {
    const options: BackwardOptions = { zeroGrad };
    backward(this, options);
  }

  /**
   * Sets all grad fields in the computation tree (from root) to 0.
   * @param root Value to zero tree from
   */
  static zeroGradTree(root: Value): void {
    zeroGradTree(root);
  }

  /**
   * Sets all grad fields in all supplied trees to 0.
   * @param vals Values whose trees to zero
   */
  static zeroGradAll(vals: readonly Value[]): void {
    zeroGradAll(vals);
  }

  /**
   * Internal helper to construct a Value with its operands and backward fn.
   * @param data Output value data
   * @param operands Operands in the operation's natural order
   * @param backwardFnBuilder Function to create backward closure
   * @param label Node label for debugging
   * @param op Operation tag
   * @returns New Value node
   */
  static make(
    data: number,
    operands: readonly Value[],
    backwardFnBuilder: (out: Value) => BackwardFn,
    label: string,
    op: string
  ): Value {
    const out = new Value(data, label);
    out.prev = operands;
    out.op = op;
    out.backwardFn = backwardFnBuilder(out);
    return out;
  }

  /**
   * Returns string representation for debugging.
   * @returns String summary of Value
   */
  toString(): string {
    return `Value(data=${this.data.toFixed(4)}, grad=${this.grad.toFixed(4)}, label=${this.label})`;
  }
}
