/**
 * Operation Tags
 *
 * One enumeration of elementwise binary operators and one generic dispatch
 * from (element instance, operator) to an applicable tag. Element types take
 * part through an `ElementOps<A>` dictionary in the typeclass style: the
 * dictionary lists which operators the type supports and, optionally, an
 * in-place variant that may mutate a disposable left operand.
 */

import { UnsupportedOperationError } from "./errors.js";

// ============================================================================
// Operator enumeration
// ============================================================================

export const ARITHMETIC_OPS = [
  "add",
  "sub",
  "mul",
  "div",
  "bitOr",
  "bitAnd",
  "bitXor",
  "shl",
  "shr",
] as const;

export const PREDICATE_OPS = ["and", "or", "eq", "neq", "lt", "le", "gt", "ge"] as const;

/** Operators whose result has the operands' element type */
export type ArithmeticOp = (typeof ARITHMETIC_OPS)[number];

/** Logical and relational operators; the result is always boolean */
export type PredicateOp = (typeof PREDICATE_OPS)[number];

export type BinaryOp = ArithmeticOp | PredicateOp;

export type OpFamily = "arithmetic" | "predicate";

export const OPERATOR_SYMBOLS: Readonly<Record<BinaryOp, string>> = {
  add: "+",
  sub: "-",
  mul: "*",
  div: "/",
  bitOr: "|",
  bitAnd: "&",
  bitXor: "^",
  shl: "<<",
  shr: ">>",
  and: "&&",
  or: "||",
  eq: "==",
  neq: "!=",
  lt: "<",
  le: "<=",
  gt: ">",
  ge: ">=",
};

export function isArithmeticOp(op: string): op is ArithmeticOp {
  return ARITHMETIC_OPS.some((candidate) => candidate === op);
}

export function isPredicateOp(op: string): op is PredicateOp {
  return PREDICATE_OPS.some((candidate) => candidate === op);
}

// ============================================================================
// Element instances
// ============================================================================

export type ArithmeticFn<A> = (a: A, b: A) => A;
export type PredicateFn<A> = (a: A, b: A) => boolean;

/**
 * Mutates `target` with `operand` and returns it (the `a op= b` form).
 * Only ever called on values nobody else references.
 */
export type InPlaceFn<A> = (target: A, operand: A) => A;

export type ArithmeticTable<A> = { readonly [K in ArithmeticOp]?: ArithmeticFn<A> };
export type PredicateTable<A> = { readonly [K in PredicateOp]?: PredicateFn<A> };
export type InPlaceTable<A> = { readonly [K in ArithmeticOp]?: InPlaceFn<A> };

/**
 * ElementOps typeclass: the operators an element type supports.
 *
 * Plain operators must return a fresh value and leave both operands alone.
 * `inPlace` variants are an optimization for element types that are costly to
 * construct; they are used when the left operand is a temporary produced by a
 * child expression, and for compound assignment into a destination element.
 */
export interface ElementOps<A> extends ArithmeticTable<A>, PredicateTable<A> {
  /** Element type name, used in error messages and descriptions */
  readonly name: string;
  readonly inPlace?: InPlaceTable<A>;
  /**
   * Copy of a value for a destination to own. Element types with `inPlace`
   * variants need it: `assign` from a borrowed operand stores clones, so a
   * later in-place update cannot reach back into the source collection.
   */
  readonly clone?: (value: A) => A;
}

/** Signature of `op` for element type `A` */
export type OpFn<A, K extends BinaryOp> = K extends ArithmeticOp ? ArithmeticFn<A> : PredicateFn<A>;

/**
 * An instance statically known to support every operator in `K`.
 * Composition methods require their receiver's instance to satisfy this, so an
 * unsupported operator is rejected when the expression is written.
 */
export type HasOp<A, K extends BinaryOp> = ElementOps<A> & { readonly [P in K]-?: OpFn<A, P> };

// ============================================================================
// Tags
// ============================================================================

/**
 * A stateless policy applying one operator to two element values.
 */
export interface OperationTag<A, R> {
  readonly op: BinaryOp;
  readonly symbol: string;
  readonly family: OpFamily;
  /**
   * @param leftDisposable - the left value is a temporary nobody else holds,
   *   so an in-place variant may reuse it
   */
  apply(left: A, right: A, leftDisposable: boolean): R;
}

function unsupported(elementType: string, op: BinaryOp): UnsupportedOperationError {
  return new UnsupportedOperationError(op, OPERATOR_SYMBOLS[op], elementType);
}

/**
 * Resolve the tag for an arithmetic or bitwise operator.
 *
 * @throws UnsupportedOperationError if the instance lacks the operator
 */
export function arithmeticTag<A>(ops: ElementOps<A>, op: ArithmeticOp): OperationTag<A, A> {
  const fn = ops[op];
  if (typeof fn !== "function") throw unsupported(ops.name, op);
  const reuse = ops.inPlace?.[op];
  const symbol = OPERATOR_SYMBOLS[op];

  if (reuse === undefined) {
    return { op, symbol, family: "arithmetic", apply: (left, right) => fn(left, right) };
  }

  return {
    op,
    symbol,
    family: "arithmetic",
    apply: (left, right, leftDisposable) => (leftDisposable ? reuse(left, right) : fn(left, right)),
  };
}

/**
 * Resolve the tag for a logical or relational operator. Predicate tags never
 * mutate either operand.
 *
 * @throws UnsupportedOperationError if the instance lacks the operator
 */
export function predicateTag<A>(ops: ElementOps<A>, op: PredicateOp): OperationTag<A, boolean> {
  const fn = ops[op];
  if (typeof fn !== "function") throw unsupported(ops.name, op);
  return {
    op,
    symbol: OPERATOR_SYMBOLS[op],
    family: "predicate",
    apply: (left, right) => fn(left, right),
  };
}

/**
 * The compound-assignment form `target op= operand`: in place when the
 * instance allows it, otherwise a fresh value to store back.
 *
 * @throws UnsupportedOperationError if the instance lacks the operator
 */
export function compoundFn<A>(ops: ElementOps<A>, op: ArithmeticOp): InPlaceFn<A> {
  const fn = ops[op];
  if (typeof fn !== "function") throw unsupported(ops.name, op);
  return ops.inPlace?.[op] ?? fn;
}
