#!/usr/bin/env node
import { Command, CommanderError } from 'commander';
import { ResolvedConfig } from '../config';
import { REDACTED, renderConfig } from '../check-config';
import { configure, validateFilePath } from '../configure';
import { DEFAULT_LOGGER, PROGRAM_NAME, VERSION } from '../constants';
import { StanzaconfError } from '../error/StanzaconfError';
import { loadSchemaFile } from '../schema/loader';
import { OptionValue } from '../schema/types';
import { create } from '../stanzaconf';
import { Environment, Logger } from '../types';

interface CliOptions {
    schema: string;
    envPrefix?: string;
    legacyConfig?: string;
    checkConfig?: boolean;
    verbose?: boolean;
}

/** Where the front end writes; replaced in tests */
export interface CliIo {
    out: (text: string) => void;
    err: (text: string) => void;
    env: Environment;
}

const formatValue = (value: OptionValue): string => {
    if (typeof value === 'boolean') {
        return value ? 'y' : 'n';
    }

    if (typeof value === 'string' || typeof value === 'number') {
        return String(value);
    }

    if (Array.isArray(value)) {
        return value.join(':');
    }

    return Object.entries(value).map(([key, entry]) => `${key}=${entry}`).join(':');
}

/**
 * One `name=value` line per option with a value, as it would be written in
 * a configuration file section.
 */
export const renderOptionLines = (config: ResolvedConfig): string =>
    config.entries()
        .map((entry) => entry.value === null ? undefined : `${entry.name}=${entry.secure ? REDACTED : formatValue(entry.value)}\n`)
        .filter((line): line is string => line !== undefined)
        .join('');

const cliLogger = (io: CliIo, verbose: boolean): Logger => ({
    ...DEFAULT_LOGGER,
    debug: verbose ? (message: string) => io.err(`${message}\n`) : () => { },
    info: (message: string) => io.err(`${message}\n`),
    warn: (message: string) => io.err(`WARN: ${message}\n`),
    error: (message: string) => io.err(`ERROR: ${message}\n`),
    verbose: verbose ? (message: string) => io.err(`${message}\n`) : () => { },
});

/**
 * Builds the `stanzaconf` command: loads an option schema and resolves the
 * arguments given after `--` against it, printing the resolved options.
 *
 * @example
 * ```sh
 * stanzaconf --schema options.yaml --check-config -- backup --stanza=main
 * ```
 */
export const createProgram = (io: CliIo): Command => {
    const program = new Command(PROGRAM_NAME)
        .description('Resolve command line, environment and configuration file options against an option schema')
        .version(VERSION)
        .requiredOption('-s, --schema <file>', 'Option schema file (YAML)', (value: string) => validateFilePath(value, 'schema'))
        .argument('[args...]', 'Command and options to resolve, given after --')
        .exitOverride()
        .configureOutput({
            writeOut: io.out,
            writeErr: io.err,
        });

    configure(program);

    program.action((args: string[]) => {
        const cliOptions = program.opts<CliOptions>();
        const instance = create({
            schema: loadSchemaFile(cliOptions.schema),
            defaults: {
                ...(cliOptions.envPrefix === undefined ? {} : { envPrefix: cliOptions.envPrefix }),
                ...(cliOptions.legacyConfig === undefined ? {} : { legacyConfigFile: cliOptions.legacyConfig }),
            },
            logger: cliLogger(io, cliOptions.verbose === true),
        });

        const config = instance.resolve(args, io.env);
        io.out(cliOptions.checkConfig ? renderConfig(config) : renderOptionLines(config));
    });

    return program;
}

/**
 * Runs the front end and returns the exit status.
 *
 * @param argv - Full process arguments, including the node executable and script
 */
export const run = (argv: readonly string[], io: CliIo): number => {
    try {
        createProgram(io).parse([...argv]);
        return 0;
    } catch (error) {
        if (error instanceof CommanderError) {
            return error.exitCode;
        }

        if (error instanceof StanzaconfError) {
            io.err(`ERROR: ${error.message}\n`);
            return 1;
        }

        throw error;
    }
}

if (require.main === module) {
    process.exitCode = run(process.argv, {
        out: (text) => process.stdout.write(text),
        err: (text) => process.stderr.write(text),
        env: process.env,
    });
}
