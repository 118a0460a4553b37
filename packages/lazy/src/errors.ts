/**
 * Errors raised while composing or materializing elementwise expressions.
 */

import { ExprfuseError } from "@exprfuse/core";

/**
 * An operand collection's size differs from the materialization destination.
 * Thrown before the first element is written.
 */
export class LengthMismatchError extends ExprfuseError {
  constructor(
    readonly expected: number,
    readonly actual: number,
    readonly operand: string
  ) {
    super(
      "length_mismatch",
      `Operand ${operand} has ${actual} element${actual === 1 ? "" : "s"}, destination has ${expected}`
    );
    this.name = "LengthMismatchError";
  }
}

/** The element instance does not define the requested operator. */
export class UnsupportedOperationError extends ExprfuseError {
  constructor(
    readonly op: string,
    readonly symbol: string,
    readonly elementType: string
  ) {
    super("unsupported_operation", `Element type ${elementType} does not support '${symbol}' (${op})`);
    this.name = "UnsupportedOperationError";
  }
}

/** A value without `size()`/`get()`/`set()` or `length`/index access was wrapped. */
export class CapabilityError extends ExprfuseError {
  constructor(readonly received: string) {
    super(
      "not_a_collection",
      `Cannot wrap ${received}: expected an array-like value or an object with size(), get() and set()`
    );
    this.name = "CapabilityError";
  }
}
