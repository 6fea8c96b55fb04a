import { describe, expect, it } from 'vitest';
import { ResolvedConfig, ResolvedOption } from '../src/config';
import { StanzaconfError } from '../src/error/StanzaconfError';
import { loadDemoSchema } from './helpers';

const schema = loadDemoSchema();

const build = (): ResolvedConfig => {
    const options = new Map<string, ResolvedOption>([
        ['stanza', { valid: true, indexes: [{ value: 'main', source: 'param', negate: false, reset: false }] }],
        ['pg-path', { valid: false, indexes: [] }],
        ['repo-path', {
            valid: true,
            indexes: [
                { value: '/a', source: 'file', negate: false, reset: false },
                { value: null, source: 'param', negate: false, reset: true },
            ],
        }],
        ['repo-s3-key', { valid: true, indexes: [
            { value: 'test-secret', source: 'env', negate: false, reset: false },
            { value: null, source: null, negate: false, reset: false },
        ] }],
        ['config', { valid: true, indexes: [{ value: null, source: 'param', negate: true, reset: false }] }],
    ]);

    return new ResolvedConfig({
        schema,
        command: 'backup',
        role: 'default',
        help: false,
        params: [],
        options,
        groups: new Map([['repo', [1, 3]]]),
    });
}

describe('ResolvedConfig', () => {
    it('should answer values, sources and modifiers by dense index', () => {
        const config = build();

        expect(config.option('repo-path', 0)).toBe('/a');
        expect(config.optionSource('repo-path', 0)).toBe('file');
        expect(config.optionTest('repo-path', 0)).toBe(true);
        expect(config.option('repo-path', 1)).toBeNull();
        expect(config.optionReset('repo-path', 1)).toBe(true);
        expect(config.optionTest('repo-path', 1)).toBe(false);
        expect(config.optionNegate('config')).toBe(true);
        expect(config.optionSource('config')).toBe('param');
    });

    it('should answer null for indexes that do not exist', () => {
        const config = build();

        expect(config.option('repo-path', 5)).toBeNull();
        expect(config.optionSource('repo-path', 5)).toBeNull();
    });

    it('should report validity and index totals', () => {
        const config = build();

        expect(config.optionValid('stanza')).toBe(true);
        expect(config.optionValid('pg-path')).toBe(false);
        expect(config.optionValid('compress')).toBe(false);
        expect(config.optionIndexTotal('repo-path')).toBe(2);
        expect(config.optionIndexTotal('compress')).toBe(0);
        expect(config.groupIndexTotal('repo')).toBe(2);
        expect(config.groupIndexes('repo')).toEqual([1, 3]);
    });

    it('should name grouped options by their original index', () => {
        const config = build();

        expect(config.optionIndexName('repo-path', 0)).toBe('repo2-path');
        expect(config.optionIndexName('repo-path', 1)).toBe('repo4-path');
        expect(config.optionIndexName('stanza')).toBe('stanza');
    });

    it('should list the entries of valid options in schema order', () => {
        expect(build().entries()).toEqual([
            { optionId: 'config', index: 0, name: 'config', value: null, source: 'param', secure: false },
            { optionId: 'stanza', index: 0, name: 'stanza', value: 'main', source: 'param', secure: false },
            { optionId: 'repo-path', index: 0, name: 'repo2-path', value: '/a', source: 'file', secure: false },
            { optionId: 'repo-path', index: 1, name: 'repo4-path', value: null, source: 'param', secure: false },
            { optionId: 'repo-s3-key', index: 0, name: 'repo2-s3-key', value: 'test-secret', source: 'env', secure: true },
            { optionId: 'repo-s3-key', index: 1, name: 'repo4-s3-key', value: null, source: null, secure: true },
        ]);
    });

    it('should reject names missing from the schema', () => {
        const config = build();

        expect(() => config.option('bogus')).toThrow(StanzaconfError);
        expect(() => config.option('bogus')).toThrow("option 'bogus' is not defined in the schema");
        expect(() => config.groupIndexes('pg')).toThrow("option group 'pg' is not defined in the schema");
    });

    it('should be immutable', () => {
        const config = build();

        expect(Object.isFrozen(config)).toBe(true);
        expect(Object.isFrozen(config.params)).toBe(true);
        expect(Object.isFrozen(config.groupIndexes('repo'))).toBe(true);
    });
});
