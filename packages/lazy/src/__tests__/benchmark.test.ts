import { describe, it, expect, afterEach } from "vitest";
import { config, setLogWriter } from "@exprfuse/core";
import {
  SampleRecord,
  formatBenchmark,
  recordCase,
  runBenchmark,
  stringCase,
  type BenchmarkResult,
} from "../benchmark.js";

afterEach(() => {
  config.reset();
  setLogWriter();
});

describe("runBenchmark", () => {
  it("agrees across strategies on strings", () => {
    const result = runBenchmark(stringCase(20));

    expect(result.name).toBe("strings");
    expect(result.size).toBe(20);
    expect(result.consistent).toBe(true);
    expect(["lazy", "eager", "handwritten"]).toContain(result.fastest);
  });

  it("agrees across strategies on records", () => {
    const result = runBenchmark(recordCase(10));
    expect(result.consistent).toBe(true);
  });

  it("logs timings at debug level", () => {
    const lines: string[] = [];
    setLogWriter((severity, line) => {
      if (severity === "debug") lines.push(line);
    });
    config.set({ debug: true });

    runBenchmark(recordCase(2));

    expect(lines.filter((line) => line.startsWith("[exprfuse/bench] DEBUG: records: lazy "))).toHaveLength(1);
  });

  it("constructs records for every strategy", () => {
    SampleRecord.constructed = 0;
    runBenchmark(recordCase(1));
    // 6 fills, then 1 (lazy) + 3 (eager) + 1 (handwritten)
    expect(SampleRecord.constructed).toBe(11);
  });
});

describe("formatBenchmark", () => {
  const result: BenchmarkResult = {
    name: "strings",
    size: 4,
    timings: { lazy: 1.5, eager: 3, handwritten: 1.25 },
    fastest: "handwritten",
    consistent: true,
  };

  it("prints one line per strategy", () => {
    expect(formatBenchmark(result).split("\n")).toEqual([
      "strings (4 elements)",
      "  lazy         1.50 ms",
      "  eager        3.00 ms",
      "  handwritten  1.25 ms",
      "  fastest: handwritten",
    ]);
  });

  it("flags disagreeing strategies", () => {
    expect(formatBenchmark({ ...result, consistent: false }).split("\n").at(-1)).toBe(
      "  fastest: handwritten (results differ!)"
    );
  });
});
