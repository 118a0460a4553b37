/**
 * Built-in ElementOps instances for JavaScript primitives.
 *
 * Custom element types declare their own instance with
 * `satisfies ElementOps<T>` so the literal member set stays visible to the
 * composition methods.
 */

import type { ElementOps } from "./operations.js";

/**
 * Numbers: every operator. Bitwise and shift operators follow JavaScript's
 * 32-bit integer semantics; logical operators use truthiness.
 */
export const numberOps = {
  name: "number",
  add: (a, b) => a + b,
  sub: (a, b) => a - b,
  mul: (a, b) => a * b,
  div: (a, b) => a / b,
  bitOr: (a, b) => a | b,
  bitAnd: (a, b) => a & b,
  bitXor: (a, b) => a ^ b,
  shl: (a, b) => a << b,
  shr: (a, b) => a >> b,
  and: (a, b) => a !== 0 && b !== 0,
  or: (a, b) => a !== 0 || b !== 0,
  eq: (a, b) => a === b,
  neq: (a, b) => a !== b,
  lt: (a, b) => a < b,
  le: (a, b) => a <= b,
  gt: (a, b) => a > b,
  ge: (a, b) => a >= b,
} satisfies ElementOps<number>;

export type NumberOps = typeof numberOps;

/** Bigints: every operator; division truncates toward zero. */
export const bigintOps = {
  name: "bigint",
  add: (a, b) => a + b,
  sub: (a, b) => a - b,
  mul: (a, b) => a * b,
  div: (a, b) => a / b,
  bitOr: (a, b) => a | b,
  bitAnd: (a, b) => a & b,
  bitXor: (a, b) => a ^ b,
  shl: (a, b) => a << b,
  shr: (a, b) => a >> b,
  and: (a, b) => a !== 0n && b !== 0n,
  or: (a, b) => a !== 0n || b !== 0n,
  eq: (a, b) => a === b,
  neq: (a, b) => a !== b,
  lt: (a, b) => a < b,
  le: (a, b) => a <= b,
  gt: (a, b) => a > b,
  ge: (a, b) => a >= b,
} satisfies ElementOps<bigint>;

export type BigintOps = typeof bigintOps;

/**
 * Strings: concatenation and lexicographic comparison. Logical operators treat
 * the empty string as false.
 */
export const stringOps = {
  name: "string",
  add: (a, b) => a + b,
  and: (a, b) => a !== "" && b !== "",
  or: (a, b) => a !== "" || b !== "",
  eq: (a, b) => a === b,
  neq: (a, b) => a !== b,
  lt: (a, b) => a < b,
  le: (a, b) => a <= b,
  gt: (a, b) => a > b,
  ge: (a, b) => a >= b,
} satisfies ElementOps<string>;

export type StringOps = typeof stringOps;

/**
 * Booleans: logical and bitwise operators (bitwise forms stay boolean),
 * equality. Relational results are typed with this instance, so predicate
 * chains compose further.
 */
export const booleanOps = {
  name: "boolean",
  bitOr: (a, b) => a || b,
  bitAnd: (a, b) => a && b,
  bitXor: (a, b) => a !== b,
  and: (a, b) => a && b,
  or: (a, b) => a || b,
  eq: (a, b) => a === b,
  neq: (a, b) => a !== b,
} satisfies ElementOps<boolean>;

export type BooleanOps = typeof booleanOps;
