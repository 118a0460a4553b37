import { describe, it, expect, beforeEach, afterEach } from "vitest";
import { config, setLogWriter } from "@exprfuse/core";
import { LazyContainer, lazy, materialize } from "../container.js";
import { booleanOps, numberOps, stringOps } from "../instances.js";
import { CapabilityError, LengthMismatchError } from "../errors.js";
import { isCollection, type Collection, type IndexedCollection } from "../collection.js";
import { ScalarOperand } from "../expression.js";
import { SampleRecord, sampleRecordOps } from "../benchmark.js";
import type { ElementOps } from "../operations.js";

class Slots<A> implements IndexedCollection<A> {
  constructor(private readonly items: A[]) {}

  size(): number {
    return this.items.length;
  }

  get(index: number): A {
    return this.items[index];
  }

  set(index: number, value: A): void {
    this.items[index] = value;
  }
}

afterEach(() => {
  config.reset();
  setLogWriter();
});

// ===========================================================================
// Materialization
// ===========================================================================

describe("compound assignment", () => {
  it("accumulates a fused sum into the destination", () => {
    const a = [1, 2, 3];
    const b = [10, 20, 30];
    const c = [100, 200, 300];
    const d = [0, 0, 0];

    const result = lazy(d, numberOps).addAssign(
      lazy(a, numberOps).add(lazy(b, numberOps)).add(lazy(c, numberOps))
    );

    expect(d).toEqual([111, 222, 333]);
    expect(result.collection).toBe(d);
    expect(a).toEqual([1, 2, 3]);
  });

  it("matches a handwritten loop", () => {
    const size = 50;
    const a = Array.from({ length: size }, (_, i) => i * 3 - 7);
    const b = Array.from({ length: size }, (_, i) => (i % 5) + 1);
    const d = Array.from({ length: size }, (_, i) => i);

    const expected = d.map((value, i) => value - (a[i] * b[i] + 4));
    lazy(d, numberOps).subAssign(lazy(a, numberOps).mul(lazy(b, numberOps)).add(4));

    expect(d).toEqual(expected);
  });

  it("applies a scalar at every index", () => {
    const d = [1, 2, 3];
    lazy(d, numberOps).mulAssign(3);
    expect(d).toEqual([3, 6, 9]);
  });

  it("works on typed arrays", () => {
    const d = new Int32Array([1, 2, 3]);
    lazy(d, numberOps).shlAssign(2).bitOrAssign(1);
    expect(Array.from(d)).toEqual([5, 9, 13]);
  });

  it("updates destination records in place", () => {
    const record = new SampleRecord(1, 0.5, "a");
    const d = [record];

    lazy(d, sampleRecordOps).addAssign(lazy([new SampleRecord(2, 0.25, "b")], sampleRecordOps));

    expect(d[0]).toBe(record);
    expect(record.count).toBe(3);
    expect(record.text).toBe("ab");
  });
});

describe("assign", () => {
  it("overwrites every element", () => {
    const d = [9, 9, 9];
    lazy(d, numberOps).assign(lazy([5, 6, 7], numberOps).sub(lazy([1, 1, 1], numberOps)));
    expect(d).toEqual([4, 5, 6]);
  });

  it("may read the destination it writes", () => {
    const d = [1, 2, 3];
    const target = lazy(d, numberOps);
    target.assign(target.add(target));
    expect(d).toEqual([2, 4, 6]);
  });

  it("writes predicate results into a boolean collection", () => {
    const a = lazy([1, 5, 3], numberOps);
    const b = lazy([2, 5, 1], numberOps);
    const flags = [false, false, false];

    lazy(flags, booleanOps).assign(a.le(b));

    expect(flags).toEqual([true, true, false]);
  });

  it("supports indexed collections", () => {
    const items = [1, 2];
    lazy(new Slots(items), numberOps).assign(lazy(new Slots([3, 4]), numberOps).mul(10));
    expect(items).toEqual([30, 40]);
  });
});

describe("materialize", () => {
  it("fills a fresh collection and returns it", () => {
    const x = lazy(["x", "x"], stringOps);
    const y = lazy(["y", "y"], stringOps);
    const target = new Array<string>(2);

    const result = materialize(x.add(y), target);

    expect(result).toBe(target);
    expect(target).toEqual(["xy", "xy"]);
  });

  it("can wrap and fill in one step", () => {
    const words = LazyContainer.from(
      new Array<string>(2),
      stringOps,
      lazy(["x", "x"], stringOps).add(lazy(["y", "y"], stringOps))
    );
    expect(words.toArray()).toEqual(["xy", "xy"]);
  });
});

// ===========================================================================
// Element construction
// ===========================================================================

describe("element construction", () => {
  const make = (size: number, count: number, text: string): SampleRecord[] =>
    Array.from({ length: size }, () => new SampleRecord(count, 0, text));

  beforeEach(() => {
    SampleRecord.constructed = 0;
  });

  it("builds one value per index for a chained sum", () => {
    const a = make(4, 1, "a");
    const b = make(4, 2, "b");
    const c = make(4, 3, "c");
    const d = new Array<SampleRecord>(4);
    SampleRecord.constructed = 0;

    materialize(
      lazy(a, sampleRecordOps).add(lazy(b, sampleRecordOps)).add(lazy(c, sampleRecordOps)),
      d
    );

    expect(SampleRecord.constructed).toBe(4);
    expect(d.map((r) => r.text)).toEqual(["abc", "abc", "abc", "abc"]);
    expect(d.map((r) => r.count)).toEqual([6, 6, 6, 6]);
    expect(a[0].text).toBe("a");
    expect(b[0].text).toBe("b");
  });

  it("builds one value per index when accumulating", () => {
    const a = make(3, 1, "a");
    const b = make(3, 2, "b");
    const d = make(3, 0, "_");
    SampleRecord.constructed = 0;

    lazy(d, sampleRecordOps).addAssign(lazy(a, sampleRecordOps).add(lazy(b, sampleRecordOps)));

    expect(SampleRecord.constructed).toBe(3);
    expect(d.map((r) => r.text)).toEqual(["_ab", "_ab", "_ab"]);
  });

  it("keeps a borrowed source intact across later in-place updates", () => {
    const a = make(2, 1, "a");
    const b = make(2, 2, "b");
    const d = new Array<SampleRecord>(2);
    const target = lazy(d, sampleRecordOps);

    target.assign(lazy(a, sampleRecordOps));
    target.addAssign(lazy(b, sampleRecordOps));

    expect(a.map((r) => r.text)).toEqual(["a", "a"]);
    expect(a.map((r) => r.count)).toEqual([1, 1]);
    expect(d.map((r) => r.text)).toEqual(["ab", "ab"]);
    expect(d[0]).not.toBe(a[0]);
  });

  it("gives every index its own copy of a scalar", () => {
    const seed = new SampleRecord(5, 0, "s");
    const d = new Array<SampleRecord>(2);
    const target = lazy(d, sampleRecordOps);

    target.assign(new ScalarOperand(seed, sampleRecordOps));
    target.addAssign(lazy(make(2, 1, "!"), sampleRecordOps));

    expect(d[0]).not.toBe(d[1]);
    expect(d.map((r) => r.text)).toEqual(["s!", "s!"]);
    expect(seed.text).toBe("s");
  });

  it("does not copy temporaries", () => {
    const a = make(3, 1, "a");
    const b = make(3, 2, "b");
    SampleRecord.constructed = 0;

    materialize(lazy(a, sampleRecordOps).add(lazy(b, sampleRecordOps)), new Array<SampleRecord>(3));

    expect(SampleRecord.constructed).toBe(3);
  });

  it("builds one value per operator without an in-place variant", () => {
    const plainOps = {
      name: "PlainRecord",
      add: sampleRecordOps.add,
    } satisfies ElementOps<SampleRecord>;
    const a = make(2, 1, "a");
    const b = make(2, 2, "b");
    const c = make(2, 3, "c");
    const d = new Array<SampleRecord>(2);
    SampleRecord.constructed = 0;

    materialize(lazy(a, plainOps).add(lazy(b, plainOps)).add(lazy(c, plainOps)), d);

    expect(SampleRecord.constructed).toBe(4);
  });
});

// ===========================================================================
// Length policy
// ===========================================================================

describe("length policy", () => {
  it("rejects a short operand before writing anything", () => {
    const d = [0, 0, 0];
    const target = lazy(d, numberOps);
    const expr = lazy([1, 2, 3], numberOps).add(lazy([1, 2], numberOps, { label: "b" }));

    expect(() => target.assign(expr)).toThrow(LengthMismatchError);
    expect(() => target.assign(expr)).toThrow("Operand b has 2 elements, destination has 3");
    expect(d).toEqual([0, 0, 0]);
  });

  it("rejects a long operand", () => {
    const error = (() => {
      try {
        lazy([0], numberOps, { label: "d" }).addAssign(lazy([1, 2], numberOps, { label: "a" }));
      } catch (e) {
        return e;
      }
      return undefined;
    })();

    expect(error).toBeInstanceOf(LengthMismatchError);
    expect(error).toMatchObject({ expected: 1, actual: 2, operand: "a", code: "length_mismatch" });
  });

  it("reports a single element in the singular", () => {
    expect(() => lazy([0, 0], numberOps).assign(lazy([1], numberOps, { label: "one" }))).toThrow(
      "Operand one has 1 element, destination has 2"
    );
  });

  it("skips the check when configured unchecked", () => {
    config.set({ materialize: { checks: "unchecked" } });
    const d = [0, 0];

    lazy(d, numberOps).assign(lazy([1, 2, 3], numberOps).add(lazy([10, 20, 30], numberOps)));

    expect(d).toEqual([11, 22]);
  });
});

// ===========================================================================
// Wrapping
// ===========================================================================

describe("wrapping", () => {
  it("rejects values without a collection shape", () => {
    const emptyObject: Collection<number> = JSON.parse("{}");
    const plainNumber: Collection<number> = JSON.parse("42");

    expect(() => lazy(emptyObject, numberOps)).toThrow(CapabilityError);
    expect(() => lazy(plainNumber, numberOps)).toThrow(
      "Cannot wrap number: expected an array-like value or an object with size(), get() and set()"
    );
  });

  it("recognizes both collection shapes", () => {
    expect(isCollection([1])).toBe(true);
    expect(isCollection(new Float64Array(2))).toBe(true);
    expect(isCollection(new Slots([1]))).toBe(true);
    expect(isCollection(null)).toBe(false);
    expect(isCollection({})).toBe(false);
  });

  it("reads and writes through to the collection", () => {
    const items = [1, 2, 3];
    const wrapped = lazy(items, numberOps);

    wrapped.set(0, 7);

    expect(wrapped.size).toBe(3);
    expect(wrapped.get(0)).toBe(7);
    expect(items[0]).toBe(7);
    expect([...wrapped]).toEqual([7, 2, 3]);
    expect(wrapped.describe()).toBe("number[3]");
  });
});

// ===========================================================================
// Logging
// ===========================================================================

describe("logging", () => {
  it("describes each materialization at debug level", () => {
    const lines: string[] = [];
    setLogWriter((_severity, line) => {
      lines.push(line);
    });
    config.set({ debug: true });

    const d = lazy([0, 0, 0], numberOps, { label: "d" });
    d.addAssign(
      lazy([1, 2, 3], numberOps, { label: "a" }).add(lazy([1, 2, 3], numberOps, { label: "b" }))
    );

    expect(lines).toEqual(["[exprfuse/lazy] DEBUG: materialize d += (a + b) over 3 elements"]);
  });

  it("stays quiet at the default level", () => {
    const lines: string[] = [];
    setLogWriter((_severity, line) => {
      lines.push(line);
    });

    lazy([0], numberOps).assign(lazy([1], numberOps));

    expect(lines).toEqual([]);
  });
});
