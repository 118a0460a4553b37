#!/usr/bin/env node

/**
 * Lazy vs eager benchmark
 *
 * Usage:
 *   tsx examples/benchmark.ts [--size 100000] [--case strings|records|all] [--verbose]
 */

import { config } from "@exprfuse/core";
import { formatBenchmark, recordCase, runBenchmark, stringCase } from "../src/index.js";

type CaseName = "strings" | "records" | "all";

interface BenchOptions {
  size: number;
  cases: CaseName;
  verbose: boolean;
}

const CASE_NAMES: readonly CaseName[] = ["strings", "records", "all"];

function printHelp(): void {
  console.log(`
exprfuse benchmark -- compare fused, eager and handwritten loops

Usage:
  tsx examples/benchmark.ts [options]

Options:
  --size, -n <count>    Elements per collection (default: 100000)
  --case <name>         strings, records or all (default: all)
  --verbose, -v         Log each materialization and timing
  --help, -h            Show this help
`);
}

function parseArgs(args: string[]): BenchOptions {
  let size = 100_000;
  let cases: CaseName = "all";
  let verbose = false;

  for (let i = 0; i < args.length; i++) {
    if (args[i] === "--size" || args[i] === "-n") {
      const value = Number(args[++i]);
      if (!Number.isInteger(value) || value < 0) {
        console.error(`Invalid size: ${args[i]}`);
        process.exit(1);
      }
      size = value;
    } else if (args[i] === "--case") {
      const name = CASE_NAMES.find((candidate) => candidate === args[i + 1]);
      if (name === undefined) {
        console.error(`Unknown case: ${args[i + 1]}\nExpected one of: ${CASE_NAMES.join(", ")}`);
        process.exit(1);
      }
      cases = name;
      i++;
    } else if (args[i] === "--verbose" || args[i] === "-v") {
      verbose = true;
    } else if (args[i] === "--help" || args[i] === "-h") {
      printHelp();
      process.exit(0);
    }
  }

  return { size, cases, verbose };
}

function main(): void {
  const options = parseArgs(process.argv.slice(2));
  if (options.verbose) {
    config.set({ log: { level: "debug" } });
  }

  const results = [];
  if (options.cases !== "records") results.push(runBenchmark(stringCase(options.size)));
  if (options.cases !== "strings") results.push(runBenchmark(recordCase(options.size)));

  console.log(results.map(formatBenchmark).join("\n\n"));
  if (results.some((result) => !result.consistent)) {
    process.exit(1);
  }
}

main();
