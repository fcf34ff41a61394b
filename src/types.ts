// src/types.ts
export enum OpType {
  GROW = 'GROW',     // B
  SHRINK = 'SHRINK', // L
  OUTPUT = 'OUTPUT', // O
  BRIDGE = 'BRIDGE', // P
  OPEN = 'OPEN',
  CLOSE = 'CLOSE',
}

export enum Parity {
  ODD = 'ODD',
  EVEN = 'EVEN',
}

export class Op {
  constructor(
    public type: OpType,
    public pos: number,
    // index of the matching bracket op, -1 when unmatched or not a bracket
    public match: number = -1
  ) {}
}

export enum CharCode {
  LP = 40,  // '('
  RP = 41,  // ')'
  A = 65,   // 'A'
  B = 66,   // 'B'
  L = 76,   // 'L'
  O = 79,   // 'O'
  P = 80,   // 'P'
}

export interface LoopEntry {
  returnTo: number;
  parity: Parity;
}

export interface RunOptions {
  maxSteps?: number;
}

export type Source = string | Uint8Array;

export type RunResult =
  | {
      status: 'ok';
      output: string;
      steps: number;
      acc: number;
    }
  | {
      status: 'step-limit';
      output: string;
      steps: number;
      acc: number;
      maxSteps: number;
      // source offset of the command that exhausted the budget
      pos: number;
    };

export type Mode = 'interp' | 'aot';
