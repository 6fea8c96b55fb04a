import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import { DEFAULT_OPTION_NAMES } from '../../src/constants';
import { FileSystemError } from '../../src/error/FileSystemError';
import { IniFormatError } from '../../src/error/IniFormatError';
import { ConfigFileLocations, loadConfigFiles } from '../../src/file/loader';
import { ParseContext } from '../../src/parse/context';
import * as Storage from '../../src/util/storage';
import { createMockLogger, loadDemoSchema } from '../helpers';

const MAIN = '[global]\nlog-level=warn\n';
const INCLUDE_A = '[global]\nexclude=a\n';
const INCLUDE_B = '[main]\npg-path=/pg\n';

describe('loadConfigFiles', () => {
    const schema = loadDemoSchema();
    let tempDir: string;
    let context: ParseContext;
    let locations: ConfigFileLocations;
    const storage = Storage.create({ log: vi.fn() });

    const give = (optionId: string, value: string): void => {
        Object.assign(context.store.getOrCreate(optionId, 0), { found: true, source: 'param', values: [value] });
    }

    const negate = (optionId: string): void => {
        Object.assign(context.store.getOrCreate(optionId, 0), { found: true, source: 'param', negate: true });
    }

    const write = (relative: string, text: string): string => {
        const file = path.join(tempDir, relative);
        fs.mkdirSync(path.dirname(file), { recursive: true });
        fs.writeFileSync(file, text);
        return file;
    }

    const load = () => loadConfigFiles(context, storage, locations, DEFAULT_OPTION_NAMES);

    beforeEach(() => {
        tempDir = fs.mkdtempSync(path.join(os.tmpdir(), 'stanzaconf-loader-'));
        context = new ParseContext(schema, createMockLogger());
        context.command = schema.commands.get('backup');
        locations = {
            configDefault: path.join(tempDir, 'demo.conf'),
            includeDefault: path.join(tempDir, 'conf.d'),
            legacyConfig: path.join(tempDir, 'legacy.conf'),
            includeDirectory: 'conf.d',
            includePattern: /.+\.conf$/,
        };

        write('demo.conf', MAIN);
        write('conf.d/b.conf', INCLUDE_B);
        write('conf.d/a.conf', INCLUDE_A);
        write('conf.d/notes.txt', 'not ini');
    });

    afterEach(() => {
        fs.rmSync(tempDir, { recursive: true, force: true });
    });

    it('should load the default file followed by include files in name order', () => {
        expect(load()).toBe(`${MAIN}\n${INCLUDE_A}\n${INCLUDE_B}`);
    });

    it('should only load an explicit config file', () => {
        give('config', write('other.conf', '[global]\nlog-level=debug\n'));

        expect(load()).toBe('[global]\nlog-level=debug\n');
    });

    it('should require an explicit config file to exist', () => {
        const missing = path.join(tempDir, 'missing.conf');
        give('config', missing);

        expect(() => load()).toThrow(FileSystemError);
        expect(() => load()).toThrow(`unable to open missing file '${missing}' for read`);
    });

    it('should load nothing with --no-config alone', () => {
        negate('config');

        expect(load()).toBeNull();
    });

    it('should still load the include path with --no-config', () => {
        negate('config');
        give('config-include-path', path.join(tempDir, 'conf.d'));

        expect(load()).toBe(`\n${INCLUDE_A}\n${INCLUDE_B}`);
    });

    it('should load an explicit config file and an explicit include path', () => {
        give('config', write('other.conf', MAIN));
        give('config-include-path', path.join(tempDir, 'conf.d'));

        expect(load()).toBe(`${MAIN}\n${INCLUDE_A}\n${INCLUDE_B}`);
    });

    it('should require include files when both config and include path are explicit', () => {
        const empty = path.join(tempDir, 'empty.d');
        fs.mkdirSync(empty);
        give('config', path.join(tempDir, 'demo.conf'));
        give('config-include-path', empty);

        expect(() => load()).toThrow(`no configuration files found in include path '${empty}'`);
    });

    it('should require an explicit include path to exist', () => {
        const missing = path.join(tempDir, 'missing.d');
        give('config-include-path', missing);

        expect(() => load()).toThrow(`unable to list file info for missing path '${missing}'`);
    });

    it('should tolerate a missing default include path', () => {
        fs.rmSync(path.join(tempDir, 'conf.d'), { recursive: true });

        expect(load()).toBe(MAIN);
    });

    it('should fall back to the legacy file when the default is missing', () => {
        fs.rmSync(path.join(tempDir, 'demo.conf'));
        write('legacy.conf', '[global]\nlog-level=error\n');

        expect(load()).toBe(`[global]\nlog-level=error\n\n${INCLUDE_A}\n${INCLUDE_B}`);
    });

    it('should load only include files when no main file exists', () => {
        fs.rmSync(path.join(tempDir, 'demo.conf'));

        expect(load()).toBe(`\n${INCLUDE_A}\n${INCLUDE_B}`);
    });

    it('should move both defaults under --config-path', () => {
        write('alt/demo.conf', '[global]\nlog-level=off\n');
        write('alt/conf.d/z.conf', INCLUDE_B);
        give('config-path', path.join(tempDir, 'alt'));

        expect(load()).toBe(`[global]\nlog-level=off\n\n${INCLUDE_B}`);
    });

    it('should not use the legacy file under --config-path', () => {
        write('legacy.conf', '[global]\nlog-level=error\n');
        give('config-path', path.join(tempDir, 'alt'));

        expect(load()).toBeNull();
    });

    it('should load includes along with an explicit config file under --config-path', () => {
        write('alt/conf.d/z.conf', INCLUDE_B);
        give('config', path.join(tempDir, 'demo.conf'));
        give('config-path', path.join(tempDir, 'alt'));

        expect(load()).toBe(`${MAIN}\n${INCLUDE_B}`);
    });

    it('should skip empty include files', () => {
        write('conf.d/c.conf', '');

        expect(load()).toBe(`${MAIN}\n${INCLUDE_A}\n${INCLUDE_B}`);
    });

    it('should reject a malformed include file', () => {
        write('conf.d/c.conf', 'orphan=1\n');

        expect(() => load()).toThrow(IniFormatError);
        expect(() => load()).toThrow('key/value found outside of section at line 1: orphan=1');
    });

    it('should reject a malformed main file before reading includes', () => {
        write('demo.conf', '[global\n');

        expect(() => load()).toThrow('ini section should end with ] at line 1: [global');
    });

    it('should treat a reset config option as not given', () => {
        Object.assign(context.store.getOrCreate('config', 0), { found: true, source: 'param', reset: true });

        expect(load()).toBe(`${MAIN}\n${INCLUDE_A}\n${INCLUDE_B}`);
    });
});
