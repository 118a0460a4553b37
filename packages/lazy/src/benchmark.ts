/**
 * Lazy vs eager comparison harness.
 *
 * Runs `d += a + b + c` three ways over freshly filled collections:
 *
 * - lazy: one fused pass through an expression tree
 * - eager: one full pass per operator, each allocating an intermediate array
 * - handwritten: the fused loop written out by hand
 *
 * and reports timings plus whether all three destinations agree.
 */

import { createLogger } from "@exprfuse/core";
import { lazy } from "./container.js";
import { compoundFn, type ArithmeticFn, type ElementOps, type HasOp } from "./operations.js";
import { stringOps } from "./instances.js";

const log = createLogger("bench");

export type Strategy = "lazy" | "eager" | "handwritten";

const STRATEGIES: readonly Strategy[] = ["lazy", "eager", "handwritten"];

export interface BenchmarkCase<A> {
  readonly name: string;
  readonly size: number;
  readonly ops: HasOp<A, "add" | "eq">;
  /** Factories producing a fresh element for each collection */
  readonly fill: {
    readonly a: () => A;
    readonly b: () => A;
    readonly c: () => A;
    readonly d: () => A;
  };
}

export interface BenchmarkResult {
  readonly name: string;
  readonly size: number;
  readonly timings: Readonly<Record<Strategy, number>>;
  /** Fastest strategy by wall-clock time */
  readonly fastest: Strategy;
  /** True when every strategy produced the same destination */
  readonly consistent: boolean;
}

function filled<A>(size: number, make: () => A): A[] {
  const out = new Array<A>(size);
  for (let i = 0; i < size; i++) out[i] = make();
  return out;
}

function time(fn: () => void): number {
  const start = performance.now();
  fn();
  return performance.now() - start;
}

function eagerPass<A>(x: readonly A[], y: readonly A[], fn: ArithmeticFn<A>): A[] {
  const out = new Array<A>(x.length);
  for (let i = 0; i < x.length; i++) out[i] = fn(x[i], y[i]);
  return out;
}

function sameElements<A>(x: readonly A[], y: readonly A[], ops: HasOp<A, "eq">): boolean {
  if (x.length !== y.length) return false;
  for (let i = 0; i < x.length; i++) {
    if (!ops.eq(x[i], y[i])) return false;
  }
  return true;
}

export function runBenchmark<A>(bench: BenchmarkCase<A>): BenchmarkResult {
  const { ops, size, fill } = bench;
  const a = filled(size, fill.a);
  const b = filled(size, fill.b);
  const c = filled(size, fill.c);

  const lazyDest = filled(size, fill.d);
  const lazyMs = time(() => {
    lazy(lazyDest, ops).addAssign(lazy(a, ops).add(lazy(b, ops)).add(lazy(c, ops)));
  });

  let eagerDest = filled(size, fill.d);
  const eagerMs = time(() => {
    const ab = eagerPass(a, b, ops.add);
    const abc = eagerPass(ab, c, ops.add);
    eagerDest = eagerPass(eagerDest, abc, ops.add);
  });

  const handDest = filled(size, fill.d);
  const addAssign = compoundFn(ops, "add");
  const handMs = time(() => {
    for (let i = 0; i < size; i++) {
      handDest[i] = addAssign(handDest[i], addAssign(ops.add(a[i], b[i]), c[i]));
    }
  });

  const timings: Record<Strategy, number> = { lazy: lazyMs, eager: eagerMs, handwritten: handMs };
  const fastest = STRATEGIES.reduce((best, next) =>
    timings[next] < timings[best] ? next : best
  );
  const consistent =
    sameElements(lazyDest, eagerDest, ops) && sameElements(lazyDest, handDest, ops);

  if (!consistent) {
    log.warn(`${bench.name}: strategies disagree over ${size} elements`);
  }
  log.debug(
    `${bench.name}: lazy ${lazyMs.toFixed(2)}ms, eager ${eagerMs.toFixed(2)}ms, handwritten ${handMs.toFixed(2)}ms`
  );

  return { name: bench.name, size, timings, fastest, consistent };
}

export function formatBenchmark(result: BenchmarkResult): string {
  const lines = [`${result.name} (${result.size} elements)`];
  for (const strategy of STRATEGIES) {
    lines.push(`  ${strategy.padEnd(12)} ${result.timings[strategy].toFixed(2)} ms`);
  }
  lines.push(`  fastest: ${result.fastest}${result.consistent ? "" : " (results differ!)"}`);
  return lines.join("\n");
}

// ============================================================================
// Sample workloads
// ============================================================================

/**
 * A record with an integer, a single-precision float and a string, the kind of
 * element whose copies are costly enough for in-place reuse to matter.
 */
export class SampleRecord {
  /** Instances created so far; in-place updates do not count */
  static constructed = 0;

  constructor(
    public count: number,
    public weight: number,
    public text: string
  ) {
    SampleRecord.constructed++;
  }
}

export const sampleRecordOps = {
  name: "SampleRecord",
  add: (a, b) =>
    new SampleRecord((a.count + b.count) | 0, Math.fround(a.weight + b.weight), a.text + b.text),
  eq: (a, b) => a.count === b.count && a.weight === b.weight && a.text === b.text,
  neq: (a, b) => a.count !== b.count || a.weight !== b.weight || a.text !== b.text,
  clone: (r) => new SampleRecord(r.count, r.weight, r.text),
  inPlace: {
    add: (target, operand) => {
      target.count = (target.count + operand.count) | 0;
      target.weight = Math.fround(target.weight + operand.weight);
      target.text += operand.text;
      return target;
    },
  },
} satisfies ElementOps<SampleRecord>;

export function stringCase(size: number): BenchmarkCase<string> {
  return {
    name: "strings",
    size,
    ops: stringOps,
    fill: {
      a: () => "expression ",
      b: () => "template ",
      c: () => "rule!",
      d: () => "993766dk",
    },
  };
}

export function recordCase(size: number): BenchmarkCase<SampleRecord> {
  return {
    name: "records",
    size,
    ops: sampleRecordOps,
    fill: {
      a: () => new SampleRecord(325, -15, "hi"),
      b: () => new SampleRecord(-325, 15, " expression "),
      c: () => new SampleRecord(0, 1, "template"),
      d: () => new SampleRecord(0, 0, "__"),
    },
  };
}
