import { beforeAll, describe, expect, it } from '@jest/globals';
import { setLogLevel } from '@partial-format/syntax';
import { loadEnvConfig, resolveOptions, validateMode } from '../src/config.js';
import { InvalidOptionsError } from '../src/errors.js';

beforeAll(() => {
    setLogLevel('silent');
});

describe('loadEnvConfig', () => {
    it('uses defaults when nothing is set', () => {
        expect(loadEnvConfig({})).toEqual({ globMarker: '*', cacheSize: 256 });
    });

    it('reads the environment', () => {
        expect(loadEnvConfig({ PARTIAL_FORMAT_GLOB_MARKER: '?', PARTIAL_FORMAT_CACHE_SIZE: '10' }))
            .toEqual({ globMarker: '?', cacheSize: 10 });
    });

    it('treats empty variables as unset', () => {
        expect(loadEnvConfig({ PARTIAL_FORMAT_GLOB_MARKER: '', PARTIAL_FORMAT_CACHE_SIZE: '' }))
            .toEqual({ globMarker: '*', cacheSize: 256 });
        expect(loadEnvConfig({ PARTIAL_FORMAT_CACHE_SIZE: '0' })).toEqual({ globMarker: '*', cacheSize: 0 });
    });

    it('ignores invalid values', () => {
        expect(loadEnvConfig({ PARTIAL_FORMAT_CACHE_SIZE: 'lots' })).toEqual({ globMarker: '*', cacheSize: 256 });
    });
});

describe('validateMode', () => {
    it('accepts known modes', () => {
        expect(validateMode('glob')).toBe('glob');
    });

    it('rejects anything else', () => {
        expect(() => validateMode('regex')).toThrow(InvalidOptionsError);
        expect(() => validateMode('regex')).toThrow("Invalid mode 'regex', expected one of: partial, glob, default");
    });
});

describe('resolveOptions', () => {
    it('fills defaults', () => {
        expect(resolveOptions({ args: [1] })).toEqual({
            args: [1],
            globMarker: loadEnvConfig().globMarker,
            enforceConstraints: false,
            cache: true
        });
    });
});
