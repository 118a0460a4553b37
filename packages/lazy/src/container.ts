/**
 * Collection Wrapper
 *
 * Gives an existing collection the composition methods without copying it.
 * The wrapper is the only place that loops: `assign()` and the compound
 * assignments evaluate a whole expression tree per index and write the
 * destination in one pass.
 *
 * @example
 * ```typescript
 * const a = [1, 2, 3], b = [10, 20, 30], c = [100, 200, 300], d = [0, 0, 0];
 *
 * lazy(d, numberOps).addAssign(
 *   lazy(a, numberOps).add(lazy(b, numberOps)).add(lazy(c, numberOps))
 * );
 * // d is now [111, 222, 333]
 * ```
 */

import { config, createLogger } from "@exprfuse/core";
import { accessCollection, type Collection, type CollectionAccess } from "./collection.js";
import { LengthMismatchError } from "./errors.js";
import { Expression, toExpression, type Operand } from "./expression.js";
import {
  OPERATOR_SYMBOLS,
  compoundFn,
  type ArithmeticOp,
  type ElementOps,
  type HasOp,
} from "./operations.js";

const log = createLogger("lazy");

export interface ContainerOptions {
  /** Name used by `describe()` and in length-mismatch errors */
  readonly label?: string;
}

/**
 * Non-owning wrapper around one externally owned collection.
 *
 * The collection's size must stay fixed while expressions built over it are
 * alive; with the default `materialize.checks: "strict"` a resized operand is
 * reported as a {@link LengthMismatchError} before anything is written.
 */
export class LazyContainer<A, O extends ElementOps<A> = ElementOps<A>>
  extends Expression<A, O>
  implements Iterable<A>
{
  readonly temporary = false;
  readonly label: string | undefined;
  private readonly access: CollectionAccess<A>;

  /**
   * @throws CapabilityError if `collection` is neither array-like nor an
   *   indexed collection
   */
  constructor(
    readonly collection: Collection<A>,
    ops: O,
    options: ContainerOptions = {}
  ) {
    super(ops);
    this.access = accessCollection(collection);
    this.label = options.label;
  }

  /**
   * Wrap `collection` and immediately materialize `source` into it.
   */
  static from<A, O extends ElementOps<A>>(
    collection: Collection<A>,
    ops: O,
    source: Expression<A>,
    options?: ContainerOptions
  ): LazyContainer<A, O> {
    return new LazyContainer(collection, ops, options).assign(source);
  }

  get size(): number {
    return this.access.size();
  }

  get(index: number): A {
    return this.access.read(index);
  }

  set(index: number, value: A): void {
    this.access.write(index, value);
  }

  at(index: number): A {
    return this.access.read(index);
  }

  assertLength(expected: number): void {
    const actual = this.size;
    if (actual !== expected) {
      throw new LengthMismatchError(expected, actual, this.describe());
    }
  }

  describe(): string {
    return this.label ?? `${this.ops.name}[${this.size}]`;
  }

  *[Symbol.iterator](): Iterator<A> {
    const size = this.size;
    for (let i = 0; i < size; i++) {
      yield this.access.read(i);
    }
  }

  toArray(): A[] {
    return Array.from(this);
  }

  // --------------------------------------------------------------------------
  // Materialization
  // --------------------------------------------------------------------------

  /**
   * `this[i] = source[i]` for every index, in one pass.
   *
   * Values read from a wrapper or scalar leaf are stored through the
   * instance's `clone` when it has one; without it, object elements end up
   * shared between both collections.
   */
  assign(source: Expression<A>): this {
    const size = this.prepare(source, "=");
    const access = this.access;
    const clone = source.temporary ? undefined : this.ops.clone;
    if (clone === undefined) {
      for (let i = 0; i < size; i++) {
        access.write(i, source.at(i));
      }
    } else {
      for (let i = 0; i < size; i++) {
        access.write(i, clone(source.at(i)));
      }
    }
    return this;
  }

  /**
   * `this[i] op= rhs[i]` for every index, in one pass. A scalar `rhs` is
   * applied at every index. Destination elements are updated in place when
   * the element instance provides an in-place variant.
   */
  compoundAssign<K extends ArithmeticOp>(
    this: LazyContainer<A, O & HasOp<A, K>>,
    op: K,
    rhs: Operand<A>
  ): LazyContainer<A, O> {
    const apply = compoundFn<A>(this.ops, op);
    const source = toExpression<A>(rhs, this.ops);
    const size = this.prepare(source, `${OPERATOR_SYMBOLS[op]}=`);
    const access = this.access;
    for (let i = 0; i < size; i++) {
      access.write(i, apply(access.read(i), source.at(i)));
    }
    return this;
  }

  addAssign(this: LazyContainer<A, O & HasOp<A, "add">>, rhs: Operand<A>): LazyContainer<A, O> {
    return this.compoundAssign("add", rhs);
  }

  subAssign(this: LazyContainer<A, O & HasOp<A, "sub">>, rhs: Operand<A>): LazyContainer<A, O> {
    return this.compoundAssign("sub", rhs);
  }

  mulAssign(this: LazyContainer<A, O & HasOp<A, "mul">>, rhs: Operand<A>): LazyContainer<A, O> {
    return this.compoundAssign("mul", rhs);
  }

  divAssign(this: LazyContainer<A, O & HasOp<A, "div">>, rhs: Operand<A>): LazyContainer<A, O> {
    return this.compoundAssign("div", rhs);
  }

  bitOrAssign(this: LazyContainer<A, O & HasOp<A, "bitOr">>, rhs: Operand<A>): LazyContainer<A, O> {
    return this.compoundAssign("bitOr", rhs);
  }

  bitAndAssign(this: LazyContainer<A, O & HasOp<A, "bitAnd">>, rhs: Operand<A>): LazyContainer<A, O> {
    return this.compoundAssign("bitAnd", rhs);
  }

  bitXorAssign(this: LazyContainer<A, O & HasOp<A, "bitXor">>, rhs: Operand<A>): LazyContainer<A, O> {
    return this.compoundAssign("bitXor", rhs);
  }

  shlAssign(this: LazyContainer<A, O & HasOp<A, "shl">>, rhs: Operand<A>): LazyContainer<A, O> {
    return this.compoundAssign("shl", rhs);
  }

  shrAssign(this: LazyContainer<A, O & HasOp<A, "shr">>, rhs: Operand<A>): LazyContainer<A, O> {
    return this.compoundAssign("shr", rhs);
  }

  /** Loop bound for a materialization; checks operand sizes first under the strict policy. */
  private prepare(source: Expression<A>, symbol: string): number {
    const size = this.size;
    if (config.lengthPolicy() === "strict") {
      source.assertLength(size);
    }
    if (log.enabled("debug")) {
      log.debug(`materialize ${this.describe()} ${symbol} ${source.describe()} over ${size} elements`);
    }
    return size;
  }
}

/**
 * Wrap a caller-owned collection for lazy elementwise composition.
 *
 * @throws CapabilityError if `collection` is neither array-like nor an
 *   indexed collection
 */
export function lazy<A, O extends ElementOps<A>>(
  collection: Collection<A>,
  ops: O,
  options?: ContainerOptions
): LazyContainer<A, O> {
  return new LazyContainer(collection, ops, options);
}

/**
 * Evaluate `source` into `target` in one pass and return `target`.
 * The expression's element instance is used for the destination.
 */
export function materialize<A, C extends Collection<A>>(source: Expression<A>, target: C): C {
  new LazyContainer<A>(target, source.ops).assign(source);
  return target;
}
