// src/errors.ts
export class StepLimitError extends Error {
    constructor(
        readonly maxSteps: number,
        readonly steps: number,
        // output produced before the budget ran out
        readonly output: string
    ) {
        super(`step limit reached (${maxSteps} steps)`);
        this.name = 'StepLimitError';
    }
}
