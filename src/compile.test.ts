import { describe, expect, it } from 'vitest';
import { AOTCompiler, compile, MAX_COMPILED_DEPTH, nestingDepth } from './compile.js';
import { interpret } from './interp.js';
import { parseProgram } from './program.js';

const programs = [
    '',
    'OBOBO',
    'LO(LO)',
    'B(BB)O',
    'B(B)O',
    'B(P(OP)L)O',
    '()',
    ')O',
    'B)O',
    '(BO',
    '(B)',
    'O(B)',
    'PO((LO)B(P)O)',
    'a noisy O with P(B) inside',
];

describe('compile', () => {
    it('generates a do/while per matched loop', () => {
        expect(new AOTCompiler().source(parseProgram('(B)'))).toBe([
            '(function(rt, maxSteps) {',
            '  "use strict";',
            '  let acc = 1;',
            '  let steps = 0;',
            '  let out = "";',
            '  const odd0 = acc % 2 !== 0;',
            '  if (++steps >= maxSteps) return rt.halt(out, steps, acc, maxSteps, 0);',
            '  do {',
            '  acc = rt.wrap(acc, acc % 2 !== 0 ? 1 : 2);',
            '  if (++steps >= maxSteps) return rt.halt(out, steps, acc, maxSteps, 1);',
            '  if (++steps >= maxSteps) return rt.halt(out, steps, acc, maxSteps, 2);',
            '  } while (acc !== (odd0 ? 1 : 6));',
            '  return rt.done(out, steps, acc);',
            '})',
        ].join('\n'));
    });

    it('prints the same as the interpreter', () => {
        expect(compile('OBOBO')()).toEqual({ status: 'ok', output: '1BD', steps: 5, acc: 4 });
        expect(compile('B(P(OP)L)O')()).toEqual({ status: 'ok', output: '1BF', steps: 13, acc: 6 });
    });

    it.each(programs)('matches the interpreter on %j', (source) => {
        const compiled = compile(source);
        for (const maxSteps of [1, 2, 3, 5, 8, 13, 100, 1000]) {
            expect(compiled(maxSteps)).toEqual(interpret(source, { maxSteps }));
        }
    });

    it('can be called repeatedly', () => {
        const compiled = compile('(B)');
        expect(compiled(100)).toEqual(compiled(100));
        expect(compiled(100)).toMatchObject({ status: 'step-limit', steps: 100, acc: 4, pos: 1 });
    });

    it('measures the nesting of matched loops only', () => {
        expect(nestingDepth(parseProgram(''))).toBe(0);
        expect(nestingDepth(parseProgram('(B(L))(O)'))).toBe(2);
        expect(nestingDepth(parseProgram('(((O)'))).toBe(1);
        expect(nestingDepth(parseProgram('))(O'))).toBe(0);
    });

    it.each([MAX_COMPILED_DEPTH, MAX_COMPILED_DEPTH + 1, 20000])('matches the interpreter at nesting depth %i', (depth) => {
        const source = '('.repeat(depth) + 'O' + ')'.repeat(depth);
        expect(compile(source)()).toEqual({ status: 'ok', output: '1', steps: 2 * depth + 1, acc: 1 });
        expect(compile(source)(depth)).toEqual(interpret(source, { maxSteps: depth }));
    });

    it('rejects a ceiling that is not a positive integer', () => {
        expect(() => compile('O')(-1)).toThrow(RangeError);
    });
});
