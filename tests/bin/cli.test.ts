import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import * as yaml from 'js-yaml';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { CliIo, run } from '../../src/bin/cli';
import { VERSION } from '../../src/constants';
import { DEMO_SCHEMA_PATH } from '../helpers';

describe('stanzaconf cli', () => {
    let tempDir: string;
    let out: string[];
    let err: string[];
    let io: CliIo;

    const cli = (...args: string[]): number => run(['node', 'stanzaconf', ...args], io);

    beforeEach(() => {
        tempDir = fs.mkdtempSync(path.join(os.tmpdir(), 'stanzaconf-cli-'));
        out = [];
        err = [];
        io = {
            out: (text) => { out.push(text); },
            err: (text) => { err.push(text); },
            env: {},
        };
    });

    afterEach(() => {
        fs.rmSync(tempDir, { recursive: true, force: true });
    });

    it('should print the resolved options', () => {
        io.env = { DEMO_PG_PATH: '/pg' };

        const status = cli('--schema', DEMO_SCHEMA_PATH, '--', 'backup', '--stanza=main', '--no-config', '--no-compress', '--exclude=a', '--exclude=b');

        expect(status).toBe(0);
        expect(out.join('')).toBe([
            'config-include-path=/etc/demo/conf.d',
            'stanza=main',
            'pg-path=/pg',
            'compress=n',
            'buffer-size=1048576',
            'archive-timeout=60',
            'log-level=info',
            'online=y',
            'archive-check=y',
            'start-fast=n',
            'type=incr',
            'exclude=a:b',
            '',
        ].join('\n'));
    });

    it('should print the configuration with sources for --check-config', () => {
        const status = cli('--schema', DEMO_SCHEMA_PATH, '--check-config', '--', 'info', '--no-config');

        expect(status).toBe(0);
        expect(yaml.load(out.join(''))).toMatchObject({
            command: 'info',
            role: 'default',
            options: {
                'config': { value: null, source: 'param' },
                'log-level': { value: 'info', source: 'default' },
            },
        });
    });

    it('should use a custom environment prefix', () => {
        io.env = { OTHER_LOG_LEVEL: 'warn', DEMO_LOG_LEVEL: 'error' };

        expect(cli('--schema', DEMO_SCHEMA_PATH, '--env-prefix', 'OTHER', '--', 'info', '--no-config')).toBe(0);
        expect(out.join('')).toContain('log-level=warn\n');
    });

    it('should use a custom legacy config file', () => {
        const legacy = path.join(tempDir, 'legacy.conf');
        const schema = path.join(tempDir, 'schema.yaml');
        fs.writeFileSync(legacy, '[global]\nlog-level=debug\n');
        fs.writeFileSync(schema, fs.readFileSync(DEMO_SCHEMA_PATH, 'utf8')
            .split('/etc/demo/demo.conf').join(path.join(tempDir, 'demo.conf'))
            .split('/etc/demo/conf.d').join(path.join(tempDir, 'conf.d')));

        expect(cli('--schema', schema, '--legacy-config', legacy, '--', 'info')).toBe(0);
        expect(out.join('')).toContain('log-level=debug\n');
    });

    it('should report resolution errors and fail', () => {
        const status = cli('--schema', DEMO_SCHEMA_PATH, '--', 'backup', '--no-config');

        expect(status).toBe(1);
        expect(err.join('')).toBe('ERROR: backup command requires option: stanza\n');
        expect(out).toEqual([]);
    });

    it('should report a missing schema file', () => {
        const missing = path.join(tempDir, 'missing.yaml');

        expect(cli('--schema', missing, '--', 'backup')).toBe(1);
        expect(err.join('')).toBe(`ERROR: unable to open missing file '${missing}' for read\n`);
    });

    it('should report invalid front end arguments', () => {
        expect(cli('--schema', DEMO_SCHEMA_PATH, '--env-prefix', 'lower', '--', 'info')).toBe(1);
        expect(err.join('')).toBe("ERROR: --env-prefix 'lower' must match ^[A-Z][A-Z0-9_]*$\n");
    });

    it('should require the schema option', () => {
        expect(cli('--', 'backup')).toBe(1);
        expect(err.join('')).toContain("required option '-s, --schema <file>' not specified");
    });

    it('should print the version', () => {
        expect(cli('--version')).toBe(0);
        expect(out.join('')).toBe(`${VERSION}\n`);
    });

    it('should redact secure options', () => {
        io.env = { DEMO_REPO1_TYPE: 's3', DEMO_REPO1_S3_KEY: 'test-secret' };

        expect(cli('--schema', DEMO_SCHEMA_PATH, '--', 'info', '--no-config')).toBe(0);
        expect(out.join('')).toContain('repo1-s3-key=<redacted>\n');
        expect(out.join('')).not.toContain('test-secret');
    });
});
