// src/interp.ts
import { exitValue, glyph, isOdd, parityOf, wrap } from './arith.js';
import { checkMaxSteps, DEFAULT_MAX_STEPS } from './config.js';
import { StepLimitError } from './errors.js';
import { parseProgram } from './program.js';
import { LoopEntry, Op, OpType, RunOptions, RunResult, Source } from './types.js';

export const execute = (prog: Op[], maxSteps: number): RunResult => {
    let acc = 1;
    let pc = 0;
    let steps = 0;
    const stack: LoopEntry[] = [];
    const out: string[] = [];

    while (pc < prog.length) {
        const op = prog[pc];
        let next = pc + 1;

        switch (op.type) {
            case OpType.GROW:
                acc = wrap(acc, isOdd(acc) ? 1 : 2);
                break;

            case OpType.SHRINK:
                acc = wrap(acc, isOdd(acc) ? -1 : -2);
                break;

            case OpType.BRIDGE:
                acc = wrap(acc, isOdd(acc) ? 1 : -1);
                break;

            case OpType.OUTPUT:
                out.push(glyph(acc));
                break;

            case OpType.OPEN:
                stack.push({ returnTo: pc + 1, parity: parityOf(acc) });
                break;

            case OpType.CLOSE: {
                // unmatched ')' falls through as a plain step
                const top = stack[stack.length - 1];
                if (top === undefined) {
                    break;
                }
                if (acc === exitValue(top.parity)) {
                    stack.pop();
                } else {
                    next = top.returnTo;
                }
                break;
            }
        }

        steps++;
        if (steps >= maxSteps) {
            return { status: 'step-limit', output: out.join(''), steps, acc, maxSteps, pos: op.pos };
        }
        pc = next;
    }

    return { status: 'ok', output: out.join(''), steps, acc };
};

export const interpret = (source: Source, options: RunOptions = {}): RunResult =>
    execute(parseProgram(source), checkMaxSteps(options.maxSteps ?? DEFAULT_MAX_STEPS));

// throws StepLimitError instead of returning a step-limit result
export const run = (source: Source, options: RunOptions = {}): string => {
    const result = interpret(source, options);
    if (result.status === 'step-limit') {
        throw new StepLimitError(result.maxSteps, result.steps, result.output);
    }
    return result.output;
};
