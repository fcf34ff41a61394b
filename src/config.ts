// src/config.ts

export const DEFAULT_MAX_STEPS = 1_000_000;

// doubles the CLI's step budget
export const KONAMI_CODE = 'BBLLBBLL';

export const PROGRAM_EXTENSION = '.bloop';

export interface ResolvedLimits {
    maxSteps: number;
    konami: boolean;
}

export const checkMaxSteps = (maxSteps: number): number => {
    if (!Number.isInteger(maxSteps) || maxSteps < 1) {
        throw new RangeError(`maxSteps must be a positive integer, got ${maxSteps}`);
    }
    return maxSteps;
};

export const resolveLimits = (source: string, maxSteps?: number): ResolvedLimits => {
    const base = checkMaxSteps(maxSteps ?? DEFAULT_MAX_STEPS);
    const konami = source.includes(KONAMI_CODE);
    return {
        maxSteps: konami ? base * 2 : base,
        konami,
    };
};
