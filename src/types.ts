import type { Command } from 'commander';
import type { OptionSchema } from './schema/types';
import type { ResolvedConfig } from './config';

/**
 * Names of the options that steer configuration file loading and section
 * lookup. An option that is missing from the schema simply disables the
 * behaviour it drives.
 */
export interface ConfigOptionNames {
    /** Main configuration file (`--config`, negatable as `--no-config`) */
    config: string;
    /** Base path overriding the default main file and include directory */
    configPath: string;
    /** Include directory scanned for additional files */
    configIncludePath: string;
    /** Stanza selecting the stanza-qualified file sections */
    stanza: string;
}

/**
 * Default configuration options for stanzaconf.
 */
export interface DefaultOptions {
    /** Environment variable prefix without the trailing underscore, e.g. `PGXYZ` */
    envPrefix: string;
    /** Include directory name used when `--config-path` overrides the base path */
    includeDirectory: string;
    /** Pattern an include directory entry must match to be loaded */
    includePattern: RegExp;
    /** Old well-known main file location tried when the current default is missing */
    legacyConfigFile: string;
    /** File encoding for reading configuration files */
    encoding: BufferEncoding;
    /** Role names whose configuration warnings are not reported */
    quietRoles: string[];
    optionNames: ConfigOptionNames;
}

/**
 * Complete options object passed to the resolution functions.
 */
export interface Options {
    defaults: DefaultOptions;
    schema: OptionSchema;
    logger: Logger;
}

/**
 * Logger interface for stanzaconf's internal logging.
 * Compatible with popular logging libraries like Winston, Bunyan, etc.
 */
export interface Logger {
    /** Debug-level logging for detailed troubleshooting information */
    debug: (message: string, ...args: unknown[]) => void;
    /** Info-level logging for general information */
    info: (message: string, ...args: unknown[]) => void;
    /** Warning-level logging for ignored configuration entries */
    warn: (message: string, ...args: unknown[]) => void;
    /** Error-level logging for critical problems */
    error: (message: string, ...args: unknown[]) => void;
    /** Verbose-level logging for extensive detail */
    verbose: (message: string, ...args: unknown[]) => void;
    /** Silly-level logging for maximum detail */
    silly: (message: string, ...args: unknown[]) => void;
}

/** Process environment as seen by the resolver. */
export type Environment = Record<string, string | undefined>;

/**
 * Main stanzaconf interface.
 */
export interface Stanzaconf {
    /**
     * Resolves the configuration for one invocation. `argv` excludes the
     * executable, i.e. `process.argv.slice(2)`.
     */
    resolve: (argv: string[], env?: Environment) => ResolvedConfig;
    /** Adds the front end options (`--env-prefix`, `--check-config`, ...) to a Commander.js command */
    configure: (command: Command) => Command;
    /** Resolves and renders the configuration with the source of each value */
    checkConfig: (argv: string[], env?: Environment) => string;
    /** Sets a custom logger for warnings and diagnostics */
    setLogger: (logger: Logger) => void;
}
