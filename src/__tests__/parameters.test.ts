import { describe, it, expect } from 'vitest';
import {
    DEFAULT_MAX_TOKENS,
    collectDefaults,
    findParameter,
    resolveInteger,
    resolveNumber,
} from '../services/llm/parameters';
import { param } from './helpers';

describe('model parameters', () => {
    it('should find parameters by name regardless of case', () => {
        const params = [param('Temperature', 0.3), param('temperature', 0.9)];

        expect(findParameter(params, 'TEMPERATURE')?.default).toBe(0.3);
        expect(findParameter(params, 'top_p')).toBeUndefined();
    });

    it('should fall back when an integer default is missing or malformed', () => {
        expect(resolveInteger([param('max_tokens', 256)], 'max_tokens', DEFAULT_MAX_TOKENS)).toBe(256);
        expect(resolveInteger([param('max_tokens', '256')], 'max_tokens', DEFAULT_MAX_TOKENS)).toBe(1000);
        expect(resolveInteger([param('max_tokens')], 'max_tokens', DEFAULT_MAX_TOKENS)).toBe(1000);
        expect(resolveInteger([], 'max_tokens', 7)).toBe(7);
    });

    it('should accept any finite number for numeric defaults', () => {
        expect(resolveNumber([param('temperature', 0)], 'temperature', 0.7)).toBe(0);
        expect(resolveNumber([param('temperature', Number.NaN)], 'temperature', 0.7)).toBe(0.7);
        expect(resolveNumber([param('temperature', true)], 'temperature', 0.7)).toBe(0.7);
    });

    it('should collect usable defaults keyed by their first spelling', () => {
        const defaults = collectDefaults([
            param('Top_K', 40),
            param('stop', ''),
            param('seed'),
            param('top_k', 50),
            param('do_sample', true),
            param('ratio', Number.POSITIVE_INFINITY),
        ]);

        expect(defaults).toEqual({ Top_K: 50, do_sample: true });
    });
});
