/**
 * @exprfuse/lazy — Expression templates and loop fusion for indexable collections
 *
 * Wrap existing collections, chain elementwise operators, and materialize the
 * result in a single pass with no intermediate collections.
 *
 * @example
 * ```typescript
 * import { lazy, materialize, numberOps, stringOps } from "@exprfuse/lazy";
 *
 * const a = lazy([1, 2, 3], numberOps);
 * const b = lazy([10, 20, 30], numberOps);
 * const c = lazy([100, 200, 300], numberOps);
 *
 * const d = [0, 0, 0];
 * lazy(d, numberOps).addAssign(a.add(b).add(c));  // d: [111, 222, 333]
 *
 * const words = materialize(
 *   lazy(["x", "x"], stringOps).add(lazy(["y", "y"], stringOps)),
 *   new Array<string>(2)
 * ); // ["xy", "xy"]
 * ```
 */

export {
  ARITHMETIC_OPS,
  PREDICATE_OPS,
  OPERATOR_SYMBOLS,
  arithmeticTag,
  compoundFn,
  isArithmeticOp,
  isPredicateOp,
  predicateTag,
} from "./operations.js";
export type {
  ArithmeticFn,
  ArithmeticOp,
  ArithmeticTable,
  BinaryOp,
  ElementOps,
  HasOp,
  InPlaceFn,
  InPlaceTable,
  OpFamily,
  OpFn,
  OperationTag,
  PredicateFn,
  PredicateOp,
  PredicateTable,
} from "./operations.js";

export { bigintOps, booleanOps, numberOps, stringOps } from "./instances.js";
export type { BigintOps, BooleanOps, NumberOps, StringOps } from "./instances.js";

export { accessCollection, isCollection, isIndexedCollection } from "./collection.js";
export type {
  Collection,
  CollectionAccess,
  IndexedCollection,
  MutableArrayLike,
} from "./collection.js";

export {
  BinaryExpression,
  Expression,
  ScalarOperand,
  isExpression,
  toExpression,
} from "./expression.js";
export type { Operand } from "./expression.js";

export { LazyContainer, lazy, materialize } from "./container.js";
export type { ContainerOptions } from "./container.js";

export { CapabilityError, LengthMismatchError, UnsupportedOperationError } from "./errors.js";

export {
  SampleRecord,
  formatBenchmark,
  recordCase,
  runBenchmark,
  sampleRecordOps,
  stringCase,
} from "./benchmark.js";
export type { BenchmarkCase, BenchmarkResult, Strategy } from "./benchmark.js";
