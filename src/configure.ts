import { Command } from "commander";
import { ArgumentError } from "./error/ArgumentError";
import { Options } from "./types";
export { ArgumentError };

const ENV_PREFIX_PATTERN = /^[A-Z][A-Z0-9_]*$/;

/**
 * Validates a file path given to the front end.
 *
 * @param value - The path as typed by the user
 * @param argumentName - Option name reported in the error
 * @returns The trimmed path
 * @throws {ArgumentError} When the path is empty, contains a null byte or is too long
 *
 * @example
 * ```typescript
 * validateFilePath('./schema.yaml', 'schema'); // Returns './schema.yaml'
 * validateFilePath('', 'schema'); // Throws ArgumentError
 * ```
 */
export function validateFilePath(value: string, argumentName: string): string {
    const trimmed = value.trim();
    if (trimmed.length === 0) {
        throw new ArgumentError(argumentName, `--${argumentName} cannot be empty or whitespace only`);
    }

    if (trimmed.includes('\0')) {
        throw new ArgumentError(argumentName, `--${argumentName} contains invalid null character`);
    }

    if (trimmed.length > 1000) {
        throw new ArgumentError(argumentName, `--${argumentName} path is too long (max 1000 characters)`);
    }

    return trimmed;
}

/**
 * Validates an environment variable prefix: upper case letters, digits and
 * underscores, starting with a letter.
 *
 * @throws {ArgumentError} When the prefix does not have that form
 */
export function validateEnvPrefix(value: string): string {
    if (!ENV_PREFIX_PATTERN.test(value)) {
        throw new ArgumentError('env-prefix', `--env-prefix '${value}' must match ${ENV_PREFIX_PATTERN.source}`);
    }

    return value;
}

/**
 * Adds stanzaconf's own options to a Commander.js command:
 * - `--env-prefix <prefix>`: environment variable prefix
 * - `--legacy-config <file>`: main file tried when the default one is missing
 * - `--check-config`: print the resolved configuration with sources
 * - `-v, --verbose`: report every file read
 *
 * With `options`, the instance defaults become the option defaults.
 *
 * @example
 * ```typescript
 * const program = configure(new Command(), options);
 * // Now the program accepts: --env-prefix DEMO --check-config
 * ```
 */
export const configure = (command: Command, options?: Options): Command => {
    if (typeof command.option !== 'function') {
        throw new ArgumentError('command', 'Command must be a valid Commander.js Command instance');
    }

    const envPrefix = options ? validateEnvPrefix(options.defaults.envPrefix) : undefined;
    const legacyConfig = options ? validateFilePath(options.defaults.legacyConfigFile, 'legacy-config') : undefined;

    return command
        .option('--env-prefix <prefix>', 'Environment variable prefix (default: derived from the project name)',
            validateEnvPrefix, envPrefix)
        .option('--legacy-config <file>', 'Main configuration file tried when the default one is missing',
            (value: string) => validateFilePath(value, 'legacy-config'), legacyConfig)
        .option('--check-config', 'Display resolved configuration with source tracking and exit')
        .option('-v, --verbose', 'Report every configuration file read');
}
