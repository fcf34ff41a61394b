import { describe, expect, it } from 'vitest';
import { DEFAULT_MAX_STEPS, resolveLimits } from './config.js';

describe('resolveLimits', () => {
    it('falls back to the default ceiling', () => {
        expect(resolveLimits('OBO')).toEqual({ maxSteps: DEFAULT_MAX_STEPS, konami: false });
    });

    it('keeps a requested ceiling', () => {
        expect(resolveLimits('OBO', 500)).toEqual({ maxSteps: 500, konami: false });
    });

    it('doubles the ceiling for the Konami code', () => {
        expect(resolveLimits('O BBLLBBLL O', 500)).toEqual({ maxSteps: 1000, konami: true });
        expect(resolveLimits('BBLL BBLL')).toEqual({ maxSteps: DEFAULT_MAX_STEPS, konami: false });
    });

    it('rejects a non-positive ceiling', () => {
        expect(() => resolveLimits('O', 0)).toThrow('maxSteps must be a positive integer, got 0');
    });
});
