// src/program.ts
import { CharCode, Op, OpType, Source } from './types.js';

const opMap: Record<number, OpType> = {
    [CharCode.B]: OpType.GROW,
    [CharCode.L]: OpType.SHRINK,
    [CharCode.O]: OpType.OUTPUT,
    [CharCode.P]: OpType.BRIDGE,
    [CharCode.LP]: OpType.OPEN,
    [CharCode.RP]: OpType.CLOSE,
};

const codeAt = (source: Source, i: number): number =>
    typeof source === 'string' ? source.charCodeAt(i) : source[i] & 0xFF;

// stray brackets keep match = -1
export const parseProgram = (source: Source): Op[] => {
    const prog: Op[] = [];
    const bracketStack: number[] = [];

    for (let i = 0; i < source.length; i++) {
        const opType = opMap[codeAt(source, i)];
        if (!opType) {
            continue;
        }

        prog.push(new Op(opType, i));
        if (opType === OpType.OPEN) {
            bracketStack.push(prog.length - 1);
        } else if (opType === OpType.CLOSE) {
            const openIdx = bracketStack.pop();
            if (openIdx !== undefined) {
                prog[openIdx].match = prog.length - 1;
                prog[prog.length - 1].match = openIdx;
            }
        }
    }

    return prog;
};

export const hasCommands = (source: Source): boolean => {
    for (let i = 0; i < source.length; i++) {
        if (opMap[codeAt(source, i)]) {
            return true;
        }
    }
    return false;
};
