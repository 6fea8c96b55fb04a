import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import { Command } from 'commander';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { CommandError, create, deriveEnvPrefix, FileSystemError, Stanzaconf } from '../src/stanzaconf';
import { createMockLogger, loadDemoSchema, MockLogger } from './helpers';

describe('stanzaconf', () => {
    let tempDir: string;
    let logger: MockLogger;
    let instance: Stanzaconf;

    const write = (relative: string, text: string): string => {
        const file = path.join(tempDir, relative);
        fs.mkdirSync(path.dirname(file), { recursive: true });
        fs.writeFileSync(file, text);
        return file;
    }

    beforeEach(() => {
        tempDir = fs.mkdtempSync(path.join(os.tmpdir(), 'stanzaconf-'));
        logger = createMockLogger();

        const schema = loadDemoSchema({
            '/etc/demo/demo.conf': path.join(tempDir, 'demo.conf'),
            '/etc/demo/conf.d': path.join(tempDir, 'conf.d'),
        });

        instance = create({ schema, logger, defaults: { legacyConfigFile: path.join(tempDir, 'legacy.conf') } });
    });

    afterEach(() => {
        fs.rmSync(tempDir, { recursive: true, force: true });
    });

    describe('deriveEnvPrefix', () => {
        it('should upper case the project name', () => {
            expect(deriveEnvPrefix('demo')).toBe('DEMO');
            expect(deriveEnvPrefix('my-tool')).toBe('MY_TOOL');
        });
    });

    describe('precedence', () => {
        const argv = ['backup', '--stanza=main', '--pg-path=/pg'];

        beforeEach(() => {
            write('demo.conf', '[global]\nlog-level=warn\n');
        });

        it('should prefer the command line', () => {
            const config = instance.resolve([...argv, '--log-level=debug'], { DEMO_LOG_LEVEL: 'error' });

            expect(config.option('log-level')).toBe('debug');
            expect(config.optionSource('log-level')).toBe('param');
        });

        it('should prefer the environment over files', () => {
            const config = instance.resolve(argv, { DEMO_LOG_LEVEL: 'error' });

            expect(config.option('log-level')).toBe('error');
            expect(config.optionSource('log-level')).toBe('env');
        });

        it('should prefer files over defaults', () => {
            const config = instance.resolve(argv, {});

            expect(config.option('log-level')).toBe('warn');
            expect(config.optionSource('log-level')).toBe('file');
        });

        it('should fall back to the default', () => {
            const config = instance.resolve([...argv, '--no-config'], {});

            expect(config.option('log-level')).toBe('info');
            expect(config.optionSource('log-level')).toBe('default');
        });
    });

    describe('configuration files', () => {
        it('should prefer the stanza and command section', () => {
            write('demo.conf', '[global]\nlog-level=warn\n[stanza1:backup]\nlog-level=debug\n');

            const config = instance.resolve(['backup', '--stanza=stanza1', '--pg-path=/pg'], {});

            expect(config.option('log-level')).toBe('debug');
        });

        it('should read stanza options from include files', () => {
            write('demo.conf', '[global]\nlog-level=warn\n');
            write('conf.d/main.conf', '[main]\npg-path=/var/lib/pg\n');

            const config = instance.resolve(['backup', '--stanza=main'], {});

            expect(config.option('pg-path')).toBe('/var/lib/pg');
            expect(config.optionSource('pg-path')).toBe('file');
        });

        it('should never consult the include directory for an explicit config file alone', () => {
            write('conf.d/broken.conf', 'not an ini line\n');
            const file = write('explicit.conf', '[main]\npg-path=/pg\n');

            const config = instance.resolve(['backup', '--stanza=main', `--config=${file}`], {});

            expect(config.option('pg-path')).toBe('/pg');
        });

        it('should fail when an explicit config file is missing', () => {
            const missing = path.join(tempDir, 'x.conf');

            expect(() => instance.resolve(['backup', '--stanza=main', `--config=${missing}`], {}))
                .toThrow(FileSystemError);
        });

        it('should use the legacy file when the default is missing', () => {
            write('legacy.conf', '[main]\npg-path=/legacy\n');

            expect(instance.resolve(['backup', '--stanza=main'], {}).option('pg-path')).toBe('/legacy');
        });

        it('should take the config location from the environment', () => {
            const file = write('env.conf', '[main]\npg-path=/from-env\n');

            expect(instance.resolve(['backup', '--stanza=main'], { DEMO_CONFIG: file }).option('pg-path')).toBe('/from-env');
        });

        it('should report ignored entries through the logger', () => {
            write('demo.conf', '[global]\nbogus=1\n');

            instance.resolve(['backup', '--stanza=main', '--pg-path=/pg'], {});

            expect(logger.warn).toHaveBeenCalledWith("configuration file contains invalid option 'bogus'");
        });

        it('should keep quiet for local and remote roles', () => {
            write('demo.conf', '[global]\nbogus=1\n');

            instance.resolve(['backup:local', '--stanza=main', '--pg-path=/pg'], { DEMO_BOGUS: 'x' });

            expect(logger.warn).not.toHaveBeenCalled();
        });
    });

    describe('groups', () => {
        it('should compact sparse group indexes', () => {
            const config = instance.resolve(
                ['backup', '--stanza=main', '--pg-path=/pg', '--repo1-path=/a', '--no-config'],
                { DEMO_REPO3_PATH: '/c' }
            );

            expect(config.groupIndexTotal('repo')).toBe(2);
            expect(config.groupIndexes('repo')).toEqual([0, 2]);
            expect(config.optionIndexTotal('repo-path')).toBe(2);
            expect(config.option('repo-path', 0)).toBe('/a');
            expect(config.option('repo-path', 1)).toBe('/c');
            expect(config.optionSource('repo-path', 1)).toBe('env');
            expect(config.optionIndexName('repo-path', 1)).toBe('repo3-path');
        });
    });

    describe('commands', () => {
        it('should treat no arguments as a help request', () => {
            const config = instance.resolve([], {});

            expect(config.help).toBe(true);
            expect(config.command).toBeUndefined();
        });

        it('should skip option resolution for version', () => {
            write('demo.conf', 'broken');

            const config = instance.resolve(['version'], {});

            expect(config.command).toBe('version');
            expect(config.optionValid('stanza')).toBe(false);
            expect(config.option('stanza')).toBeNull();
        });

        it('should resolve options for help on a command without requiring any', () => {
            const config = instance.resolve(['help', 'backup', '--no-config'], {});

            expect(config.help).toBe(true);
            expect(config.command).toBe('backup');
            expect(config.optionValid('pg-path')).toBe(true);
            expect(config.option('compress')).toBe(true);
        });

        it('should keep the role and parameters', () => {
            const config = instance.resolve(['archive-get:async', '--stanza=main', '--no-config', 'segment', '/tmp/segment'], {});

            expect(config.command).toBe('archive-get');
            expect(config.role).toBe('async');
            expect(config.params).toEqual(['segment', '/tmp/segment']);
        });

        it('should reject parameters for commands that take none', () => {
            expect(() => instance.resolve(['backup', 'extra'], {})).toThrow(CommandError);
        });
    });

    describe('setLogger', () => {
        it('should send later warnings to the new logger', () => {
            const replacement = createMockLogger();
            write('demo.conf', '[global]\nbogus=1\n');

            instance.setLogger(replacement);
            instance.resolve(['backup', '--stanza=main', '--pg-path=/pg'], {});

            expect(logger.warn).not.toHaveBeenCalled();
            expect(replacement.warn).toHaveBeenCalledWith("configuration file contains invalid option 'bogus'");
        });
    });

    describe('defaults', () => {
        it('should take a custom environment prefix', () => {
            const custom = create({
                schema: loadDemoSchema(),
                logger,
                defaults: { envPrefix: 'OTHER' },
            });

            const config = custom.resolve(['backup', '--no-config'], { OTHER_STANZA: 'main', OTHER_PG_PATH: '/pg', DEMO_STANZA: 'ignored' });

            expect(config.option('stanza')).toBe('main');
        });
    });

    describe('checkConfig', () => {
        it('should render the resolved configuration', () => {
            const text = instance.checkConfig(['backup', '--stanza=main', '--pg-path=/pg', '--no-config'], {});

            expect(text.split('\n').slice(0, 5)).toEqual([
                'command: backup',
                'role: default',
                'help: false',
                'parameters: []',
                'options:',
            ]);
        });
    });

    describe('configure', () => {
        it('should add the front end options with instance defaults', () => {
            const command = instance.configure(new Command());

            expect(command.options.map((option) => option.long)).toEqual(['--env-prefix', '--legacy-config', '--check-config', '--verbose']);
            expect(command.getOptionValue('envPrefix')).toBe('DEMO');
            expect(command.getOptionValue('legacyConfig')).toBe(path.join(tempDir, 'legacy.conf'));
        });
    });
});
