// src/benchmark.ts
import type { Source } from './types.js';

export type Runner = (source: Source) => unknown;

export const WARMUP_ITERATIONS = 3;

// returns ms
export const benchmark = (
    method: Runner,
    iterations: number,
    source: Source,
    warmup: number = WARMUP_ITERATIONS
): number => {
    for (let i = 0; i < warmup; i++) {
        method(source);
    }

    const start = process.hrtime.bigint();
    for (let i = 0; i < iterations; i++) {
        method(source);
    }
    const end = process.hrtime.bigint();

    return Number(end - start) / 1e6;
};
