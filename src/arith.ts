// src/arith.ts
import { CharCode, Parity } from './types.js';

export const FACES = 6;

export const isOdd = (value: number): boolean => value % 2 !== 0;

export const parityOf = (value: number): Parity => (isOdd(value) ? Parity.ODD : Parity.EVEN);

// % keeps the dividend's sign, so fold the remainder back with + FACES before the final modulo
export const wrap = (value: number, delta: number): number =>
    ((((value - 1 + delta) % FACES) + FACES) % FACES) + 1;

// 1 -> "1", 2 -> "B", 3 -> "3", 4 -> "D", ...
export const glyph = (value: number): string =>
    isOdd(value) ? String(value) : String.fromCharCode(CharCode.A - 1 + value);

export const exitValue = (parity: Parity): number => (parity === Parity.ODD ? 1 : FACES);
