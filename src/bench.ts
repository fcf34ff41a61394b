import fs from "fs";
import { benchmark } from "./benchmark.js";
import { compile } from "./compile.js";
import { interpret } from "./interp.js";
import type { Mode, Source } from "./types.js";

// load example programs
const dice = fs.readFileSync("examples/dice.bloop");
const countdown = fs.readFileSync("examples/countdown.bloop");
const forever = fs.readFileSync("examples/forever.bloop");

const engines: Record<Mode, (bytes: Source) => unknown> = {
  interp: (bytes) => interpret(bytes),
  aot: (bytes) => compile(bytes)(),
};

interface Marks {
  [key: string]: { interp: number; aot: number };
}

const marks: Marks = {};

const measure = (name: string, iterations: number, bytes: Buffer): void => {
  console.log(`Testing ${name}...`);
  marks[name] = {
    interp: benchmark(engines.interp, iterations, bytes),
    aot: benchmark(engines.aot, iterations, bytes),
  };
};

console.log("Running benchmarks (with warmup)...\n");

measure("dice", 10000, dice);
measure("countdown", 10000, countdown);
// runs into the default step ceiling every time
measure("forever", 5, forever);

console.log("\nBenchmark results (ms):");
console.table(marks);
