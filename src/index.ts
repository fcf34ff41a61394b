export { FACES, exitValue, glyph, isOdd, parityOf, wrap } from './arith.js';
export { AOTCompiler, compile, MAX_COMPILED_DEPTH, nestingDepth } from './compile.js';
export type { CompiledProgram } from './compile.js';
export { DEFAULT_MAX_STEPS, KONAMI_CODE, resolveLimits } from './config.js';
export type { ResolvedLimits } from './config.js';
export { StepLimitError } from './errors.js';
export { execute, interpret, run } from './interp.js';
export { hasCommands, parseProgram } from './program.js';
export { Op, OpType, Parity } from './types.js';
export type { LoopEntry, Mode, RunOptions, RunResult, Source } from './types.js';
