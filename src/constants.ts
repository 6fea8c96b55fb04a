import { ConfigOptionNames, DefaultOptions, Logger } from './types';

/** Version reported by the command line front end */
export const VERSION = '0.1.0';

/** The program name used in CLI help and error messages */
export const PROGRAM_NAME = 'stanzaconf';

/** Default file encoding for reading configuration files */
export const DEFAULT_ENCODING = 'utf8';

/** Include directory name placed beside the main configuration file */
export const DEFAULT_INCLUDE_DIRECTORY = 'conf.d';

/** Include directory entries that are loaded */
export const DEFAULT_INCLUDE_PATTERN = /.+\.conf$/;

/** Section holding options that apply to every stanza */
export const GLOBAL_SECTION = 'global';

/** Command that requests help for the command following it */
export const HELP_COMMAND = 'help';

/** Command that reports the version and needs no option resolution */
export const VERSION_COMMAND = 'version';

/** Role assumed when the command carries no `:<role>` suffix */
export const DEFAULT_ROLE = 'default';

/** Roles known to every schema */
export const DEFAULT_ROLES = ['default', 'async', 'local', 'remote'];

/** Spelling prefixes of the option modifiers */
export const NEGATE_PREFIX = 'no-';
export const RESET_PREFIX = 'reset-';

export const DEFAULT_OPTION_NAMES: ConfigOptionNames = {
    config: 'config',
    configPath: 'config-path',
    configIncludePath: 'config-include-path',
    stanza: 'stanza',
};

/**
 * Default configuration options. The environment prefix and legacy file
 * location depend on the schema's project name and are filled in by `create`.
 */
export const DEFAULT_OPTIONS: Omit<DefaultOptions, 'envPrefix' | 'legacyConfigFile'> = {
    includeDirectory: DEFAULT_INCLUDE_DIRECTORY,
    includePattern: DEFAULT_INCLUDE_PATTERN,
    encoding: DEFAULT_ENCODING,
    quietRoles: ['local', 'remote'],
    optionNames: DEFAULT_OPTION_NAMES,
}

/**
 * Default logger implementation using console methods.
 * The verbose and silly methods are no-ops to avoid excessive output.
 */
export const DEFAULT_LOGGER: Logger = {
    // eslint-disable-next-line no-console
    debug: console.debug,
    // eslint-disable-next-line no-console
    info: console.info,
    // eslint-disable-next-line no-console
    warn: console.warn,
    // eslint-disable-next-line no-console
    error: console.error,

    verbose: () => { },

    silly: () => { },
}
