// src/cli.ts
import path from 'path';
import { compile } from './compile.js';
import { DEFAULT_MAX_STEPS, PROGRAM_EXTENSION, resolveLimits } from './config.js';
import { StepLimitError } from './errors.js';
import { existentialize, pick, rickRoll, blame, type Random, speedrunComment, stepLimitMessages, zenKoans } from './flavor.js';
import { interpret } from './interp.js';
import { hasCommands } from './program.js';
import type { Mode } from './types.js';

export interface CliIO {
    stdout: (text: string) => void;
    stderr: (text: string) => void;
    readFile: (file: string) => string;
    random: Random;
    // nanoseconds, monotonic
    clock: () => bigint;
}

export interface CliOptions {
    mode: Mode;
    file: string | null;
    code: string | null;
    maxSteps?: number;
    showTime: boolean;
    speedrun: boolean;
    existential: boolean;
    help: boolean;
    rick: boolean;
    blame: boolean;
}

export class UsageError extends Error {
    constructor(message: string) {
        super(message);
        this.name = 'UsageError';
    }
}

export const usage = (): string => `
BLOOP Interpreter

Usage: bloop [options] <file${PROGRAM_EXTENSION}>

Options:
  --code, -c <src>     Run inline BLOOP code
  --max-steps, -s <N>  Step limit [default: ${DEFAULT_MAX_STEPS}] (also -max)
  --mode, -m           Mode: 'interp' or 'aot' [default: interp]
  --time, -t           Show execution time
  --speedrun           Race the die
  --existential        Enable existential commentary
  --rick               You know what this does
  --blame              It's not a bug

Single-dash spellings (-speedrun, -existential, -rick, -blame) are accepted too.
  --help, -h           Show this help
`;

export const parseArgs = (args: string[]): CliOptions => {
    const options: CliOptions = {
        mode: 'interp',
        file: null,
        code: null,
        showTime: false,
        speedrun: false,
        existential: false,
        help: false,
        rick: false,
        blame: false,
    };

    for (let i = 0; i < args.length; i++) {
        const arg = args[i];
        if (arg === '--help' || arg === '-h') {
            options.help = true;
        } else if (arg === '--mode' || arg === '-m') {
            i++;
            const mode = args[i];
            if (mode !== 'interp' && mode !== 'aot') {
                throw new UsageError('Invalid mode. Use "interp" or "aot"');
            }
            options.mode = mode;
        } else if (arg === '--code' || arg === '-c') {
            i++;
            if (i >= args.length) {
                throw new UsageError(`${arg} requires a code string argument`);
            }
            options.code = args[i];
        } else if (arg === '--max-steps' || arg === '-s' || arg === '-max') {
            i++;
            const value = args[i] ?? '';
            const n = /^\d+$/.test(value) ? Number(value) : NaN;
            if (!Number.isSafeInteger(n) || n <= 0) {
                throw new UsageError(`${arg} value must be a positive integer, got "${value}"`);
            }
            options.maxSteps = n;
        } else if (arg === '--time' || arg === '-t') {
            options.showTime = true;
        } else if (arg === '--speedrun' || arg === '-speedrun') {
            options.speedrun = true;
        } else if (arg === '--existential' || arg === '-existential') {
            options.existential = true;
        } else if (arg === '--rick' || arg === '-rick') {
            options.rick = true;
        } else if (arg === '--blame' || arg === '-blame') {
            options.blame = true;
        } else if (arg.startsWith('-')) {
            throw new UsageError(`Unknown option: ${arg}`);
        } else {
            options.file = arg;
        }
    }

    if (options.file !== null && options.code !== null) {
        throw new UsageError('Use either --code or a file, not both');
    }
    return options;
};

const loadCode = (options: CliOptions, io: CliIO): string => {
    if (options.file === null) {
        return options.code ?? '';
    }
    if (path.extname(options.file).toLowerCase() !== PROGRAM_EXTENSION) {
        io.stderr(`warning: file "${options.file}" does not have a ${PROGRAM_EXTENSION} extension\n`);
    }
    return io.readFile(options.file);
};

// exit codes: 0 ok, 1 usage or I/O error, 2 step limit
export const runCli = (args: string[], io: CliIO): number => {
    if (args.length === 0) {
        io.stderr(usage());
        return 1;
    }

    let options: CliOptions;
    try {
        options = parseArgs(args);
    } catch (err) {
        if (err instanceof UsageError) {
            io.stderr(`error: ${err.message}\n`);
            return 1;
        }
        throw err;
    }

    if (options.help) {
        io.stdout(usage());
        return 0;
    }
    if (options.rick) {
        io.stdout(`${rickRoll}\n`);
        return 0;
    }
    if (options.blame) {
        io.stdout(`${blame}\n`);
        return 0;
    }

    let code: string;
    try {
        code = loadCode(options, io);
    } catch (err) {
        io.stderr(`Error: ${err instanceof Error ? err.message : 'Unknown error'}\n`);
        return 1;
    }

    if (code === '') {
        io.stderr(`error: no BLOOP code provided\n${usage()}`);
        return 1;
    }
    if (!hasCommands(code)) {
        io.stdout(`${pick(zenKoans, io.random)}\n`);
        return 0;
    }

    const limits = resolveLimits(code, options.maxSteps);
    if (limits.konami) {
        io.stderr('+30 lives! Step limit doubled.\n');
    }

    const start = io.clock();
    const result = options.mode === 'aot'
        ? compile(code)(limits.maxSteps)
        : interpret(code, { maxSteps: limits.maxSteps });
    const elapsed = io.clock() - start;

    io.stdout(options.existential ? existentialize(result.output, io.random) : result.output);

    if (options.showTime || options.speedrun) {
        const timeMs = Number(elapsed) / 1e6;
        const comment = options.speedrun ? ` - ${speedrunComment(elapsed)}` : '';
        io.stderr(`\nExecution time: ${timeMs.toFixed(2)}ms${comment}\n`);
    }

    if (result.status === 'step-limit') {
        const err = new StepLimitError(result.maxSteps, result.steps, result.output);
        io.stderr(`\n${pick(stepLimitMessages, io.random)}\n${err.message}\n`);
        return 2;
    }
    return 0;
};
