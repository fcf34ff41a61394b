// src/compile.ts
import { glyph, wrap } from './arith.js';
import { checkMaxSteps, DEFAULT_MAX_STEPS } from './config.js';
import { execute } from './interp.js';
import { parseProgram } from './program.js';
import { Op, OpType, RunResult, Source } from './types.js';

interface Runtime {
    wrap: (value: number, delta: number) => number;
    glyph: (value: number) => string;
    done: (output: string, steps: number, acc: number) => RunResult;
    halt: (output: string, steps: number, acc: number, maxSteps: number, pos: number) => RunResult;
}

type CompiledBody = (rt: Runtime, maxSteps: number) => RunResult;

export type CompiledProgram = (maxSteps?: number) => RunResult;

// deeper loop nests than this overflow the JS parser, so they run on the interpreter instead
export const MAX_COMPILED_DEPTH = 256;

const runtime: Runtime = {
    wrap,
    glyph,
    done: (output, steps, acc) => ({ status: 'ok', output, steps, acc }),
    halt: (output, steps, acc, maxSteps, pos) => ({ status: 'step-limit', output, steps, acc, maxSteps, pos }),
};

export class AOTCompiler {
    private code: string[] = [];

    private emit(line: string): void {
        this.code.push('  ' + line);
    }

    // every command costs one step, checked right after it runs
    private tick(op: Op): void {
        this.emit(`if (++steps >= maxSteps) return rt.halt(out, steps, acc, maxSteps, ${op.pos});`);
    }

    // matched (...) becomes a do/while on the entry parity, a lone bracket only costs its step
    source(prog: Op[]): string {
        this.code = ['(function(rt, maxSteps) {'];
        this.emit('"use strict";');
        this.emit('let acc = 1;');
        this.emit('let steps = 0;');
        this.emit('let out = "";');

        for (const op of prog) {
            switch (op.type) {
                case OpType.GROW:
                    this.emit('acc = rt.wrap(acc, acc % 2 !== 0 ? 1 : 2);');
                    this.tick(op);
                    break;

                case OpType.SHRINK:
                    this.emit('acc = rt.wrap(acc, acc % 2 !== 0 ? -1 : -2);');
                    this.tick(op);
                    break;

                case OpType.BRIDGE:
                    this.emit('acc = rt.wrap(acc, acc % 2 !== 0 ? 1 : -1);');
                    this.tick(op);
                    break;

                case OpType.OUTPUT:
                    this.emit('out += rt.glyph(acc);');
                    this.tick(op);
                    break;

                case OpType.OPEN:
                    if (op.match < 0) {
                        this.tick(op);
                        break;
                    }
                    this.emit(`const odd${op.pos} = acc % 2 !== 0;`);
                    this.tick(op);
                    this.emit('do {');
                    break;

                case OpType.CLOSE:
                    this.tick(op);
                    if (op.match < 0) {
                        break;
                    }
                    this.emit(`} while (acc !== (odd${prog[op.match].pos} ? 1 : 6));`);
                    break;
            }
        }

        this.emit('return rt.done(out, steps, acc);');
        this.code.push('})');
        return this.code.join('\n');
    }

    compile(prog: Op[]): CompiledBody {
        const code = this.source(prog);
        try {
            return eval(code);
        } catch (e) {
            console.error('Generated code:\n', code);
            throw e;
        }
    }
}

export const nestingDepth = (prog: Op[]): number => {
    let depth = 0;
    let max = 0;
    for (const op of prog) {
        if (op.match < 0) {
            continue;
        }
        if (op.type === OpType.OPEN) {
            depth++;
            max = Math.max(max, depth);
        } else if (op.type === OpType.CLOSE) {
            depth--;
        }
    }
    return max;
};

export const compile = (source: Source): CompiledProgram => {
    const prog = parseProgram(source);
    if (nestingDepth(prog) > MAX_COMPILED_DEPTH) {
        return (maxSteps = DEFAULT_MAX_STEPS) => execute(prog, checkMaxSteps(maxSteps));
    }
    const body = new AOTCompiler().compile(prog);
    return (maxSteps = DEFAULT_MAX_STEPS) => body(runtime, checkMaxSteps(maxSteps));
};
