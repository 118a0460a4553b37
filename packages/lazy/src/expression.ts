/**
 * Deferred elementwise expressions.
 *
 * Composition builds an immutable binary tree and touches no element data.
 * Evaluation is per index: `at(i)` walks the tree once and returns the result
 * for that index only, so a materializer can fill a destination in a single
 * pass with no intermediate collections.
 *
 * @example
 * ```typescript
 * const a = lazy([1, 2, 3], numberOps);
 * const b = lazy([10, 20, 30], numberOps);
 *
 * const expr = a.add(b).mul(2);  // nothing evaluated yet
 * expr.at(1);                    // 44
 * expr.describe();               // "((number[3] + number[3]) * 2)"
 * ```
 */

import {
  arithmeticTag,
  predicateTag,
  type ArithmeticOp,
  type BinaryOp,
  type ElementOps,
  type HasOp,
  type OperationTag,
  type PredicateOp,
} from "./operations.js";
import { booleanOps, type BooleanOps } from "./instances.js";

/** Right-hand side of a composition: another expression or a scalar broadcast to every index. */
export type Operand<A> = Expression<A> | A;

/**
 * Base of every tree node and leaf.
 *
 * `O` is the element instance of the values this expression yields; the
 * composition methods require it to carry the operator being applied.
 */
export abstract class Expression<A, O extends ElementOps<A> = ElementOps<A>> {
  constructor(readonly ops: O) {}

  /**
   * True when `at()` yields a value that nothing else references, so a parent
   * node may reuse it in place.
   */
  abstract readonly temporary: boolean;

  /** Value at `index`. The caller guarantees `0 <= index < size`. */
  abstract at(index: number): A;

  /**
   * @throws LengthMismatchError if a collection leaf does not hold exactly
   *   `expected` elements
   */
  abstract assertLength(expected: number): void;

  /** Infix rendering used in diagnostics */
  abstract describe(): string;

  // --------------------------------------------------------------------------
  // Generic composition
  // --------------------------------------------------------------------------

  /** Arithmetic or bitwise node: yields the same element type. */
  combine<K extends ArithmeticOp>(
    this: Expression<A, O & HasOp<A, K>>,
    op: K,
    rhs: Operand<A>
  ): BinaryExpression<A, A, O> {
    return new BinaryExpression<A, A, O>(
      arithmeticTag<A>(this.ops, op),
      this,
      toExpression<A>(rhs, this.ops),
      this.ops
    );
  }

  /** Logical or relational node: yields booleans. */
  compare<K extends PredicateOp>(
    this: Expression<A, O & HasOp<A, K>>,
    op: K,
    rhs: Operand<A>
  ): BinaryExpression<A, boolean, BooleanOps> {
    return new BinaryExpression<A, boolean, BooleanOps>(
      predicateTag<A>(this.ops, op),
      this,
      toExpression<A>(rhs, this.ops),
      booleanOps
    );
  }

  // --------------------------------------------------------------------------
  // Arithmetic and bitwise operators
  // --------------------------------------------------------------------------

  /** `this + rhs` */
  add(this: Expression<A, O & HasOp<A, "add">>, rhs: Operand<A>): BinaryExpression<A, A, O> {
    return this.combine("add", rhs);
  }

  /** `this - rhs` */
  sub(this: Expression<A, O & HasOp<A, "sub">>, rhs: Operand<A>): BinaryExpression<A, A, O> {
    return this.combine("sub", rhs);
  }

  /** `this * rhs` */
  mul(this: Expression<A, O & HasOp<A, "mul">>, rhs: Operand<A>): BinaryExpression<A, A, O> {
    return this.combine("mul", rhs);
  }

  /** `this / rhs` */
  div(this: Expression<A, O & HasOp<A, "div">>, rhs: Operand<A>): BinaryExpression<A, A, O> {
    return this.combine("div", rhs);
  }

  /** `this | rhs` */
  bitOr(this: Expression<A, O & HasOp<A, "bitOr">>, rhs: Operand<A>): BinaryExpression<A, A, O> {
    return this.combine("bitOr", rhs);
  }

  /** `this & rhs` */
  bitAnd(this: Expression<A, O & HasOp<A, "bitAnd">>, rhs: Operand<A>): BinaryExpression<A, A, O> {
    return this.combine("bitAnd", rhs);
  }

  /** `this ^ rhs` */
  bitXor(this: Expression<A, O & HasOp<A, "bitXor">>, rhs: Operand<A>): BinaryExpression<A, A, O> {
    return this.combine("bitXor", rhs);
  }

  /** `this << rhs` */
  shl(this: Expression<A, O & HasOp<A, "shl">>, rhs: Operand<A>): BinaryExpression<A, A, O> {
    return this.combine("shl", rhs);
  }

  /** `this >> rhs` */
  shr(this: Expression<A, O & HasOp<A, "shr">>, rhs: Operand<A>): BinaryExpression<A, A, O> {
    return this.combine("shr", rhs);
  }

  // --------------------------------------------------------------------------
  // Logical and relational operators
  // --------------------------------------------------------------------------

  /** `this && rhs` */
  and(this: Expression<A, O & HasOp<A, "and">>, rhs: Operand<A>): BinaryExpression<A, boolean, BooleanOps> {
    return this.compare("and", rhs);
  }

  /** `this || rhs` */
  or(this: Expression<A, O & HasOp<A, "or">>, rhs: Operand<A>): BinaryExpression<A, boolean, BooleanOps> {
    return this.compare("or", rhs);
  }

  /** `this == rhs` */
  eq(this: Expression<A, O & HasOp<A, "eq">>, rhs: Operand<A>): BinaryExpression<A, boolean, BooleanOps> {
    return this.compare("eq", rhs);
  }

  /** `this != rhs` */
  neq(this: Expression<A, O & HasOp<A, "neq">>, rhs: Operand<A>): BinaryExpression<A, boolean, BooleanOps> {
    return this.compare("neq", rhs);
  }

  /** `this < rhs` */
  lt(this: Expression<A, O & HasOp<A, "lt">>, rhs: Operand<A>): BinaryExpression<A, boolean, BooleanOps> {
    return this.compare("lt", rhs);
  }

  /** `this <= rhs` */
  le(this: Expression<A, O & HasOp<A, "le">>, rhs: Operand<A>): BinaryExpression<A, boolean, BooleanOps> {
    return this.compare("le", rhs);
  }

  /** `this > rhs` */
  gt(this: Expression<A, O & HasOp<A, "gt">>, rhs: Operand<A>): BinaryExpression<A, boolean, BooleanOps> {
    return this.compare("gt", rhs);
  }

  /** `this >= rhs` */
  ge(this: Expression<A, O & HasOp<A, "ge">>, rhs: Operand<A>): BinaryExpression<A, boolean, BooleanOps> {
    return this.compare("ge", rhs);
  }
}

/**
 * An internal tree node: `tag(left[i], right[i])`.
 *
 * Operands are held by reference and never copied. Nodes are frozen, so a
 * node can be shared or re-evaluated but never altered. A node is meant to
 * live for the statement that materializes it: operands are read at
 * materialization time, not at composition time.
 */
export class BinaryExpression<X, A, O extends ElementOps<A> = ElementOps<A>> extends Expression<A, O> {
  readonly temporary = true;

  constructor(
    private readonly tag: OperationTag<X, A>,
    private readonly left: Expression<X>,
    private readonly right: Expression<X>,
    ops: O
  ) {
    super(ops);
    Object.freeze(this);
  }

  get op(): BinaryOp {
    return this.tag.op;
  }

  get symbol(): string {
    return this.tag.symbol;
  }

  operandLeft(): Expression<X> {
    return this.left;
  }

  operandRight(): Expression<X> {
    return this.right;
  }

  at(index: number): A {
    return this.tag.apply(this.left.at(index), this.right.at(index), this.left.temporary);
  }

  assertLength(expected: number): void {
    this.left.assertLength(expected);
    this.right.assertLength(expected);
  }

  describe(): string {
    return `(${this.left.describe()} ${this.tag.symbol} ${this.right.describe()})`;
  }
}

/**
 * A scalar leaf: the same value at every index. Never reused in place, since
 * every index shares it.
 */
export class ScalarOperand<A, O extends ElementOps<A> = ElementOps<A>> extends Expression<A, O> {
  readonly temporary = false;

  constructor(
    readonly value: A,
    ops: O
  ) {
    super(ops);
    Object.freeze(this);
  }

  at(_index: number): A {
    return this.value;
  }

  assertLength(_expected: number): void {}

  describe(): string {
    return formatScalar(this.value);
  }
}

function formatScalar(value: unknown): string {
  if (typeof value === "string") return JSON.stringify(value);
  if (typeof value === "bigint") return `${value}n`;
  return String(value);
}

export function isExpression<A>(value: Operand<A>): value is Expression<A> {
  return value instanceof Expression;
}

/** Scalars become leaves typed with the instance of the expression they join. */
export function toExpression<A>(operand: Operand<A>, ops: ElementOps<A>): Expression<A> {
  return isExpression(operand) ? operand : new ScalarOperand<A>(operand, ops);
}
