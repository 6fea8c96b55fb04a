import { ResolvedConfig } from './config';
import { HELP_COMMAND, VERSION_COMMAND } from './constants';
import { parseEnvironment } from './env/mapper';
import { loadConfigFiles } from './file/loader';
import { parseConfigText } from './file/sections';
import { parseCommandLine } from './parse/command-line';
import { ParseContext } from './parse/context';
import { compactGroups } from './parse/groups';
import { tokenize } from './parse/tokenizer';
import { Environment, Options } from './types';
import * as Storage from './util/storage';
import { validateOptions } from './validate';

const defaultString = (context: ParseContext, optionId: string): string | undefined => {
    const value = context.rule(optionId)?.default;
    return typeof value === 'string' ? value : undefined;
}

/**
 * Resolves the configuration of one invocation.
 *
 * Runs the command line, environment and configuration file phases, compacts
 * group indexes and validates every option in dependency order. Help,
 * version and a missing command stop after the command line phase.
 *
 * @param argv - Arguments without the executable
 * @param env - Environment variables to consult
 * @param options - Schema, defaults and logger of the instance
 * @returns The immutable resolved configuration
 * @throws {StanzaconfError} On any hard error; nothing is partially resolved
 */
export const resolve = (argv: readonly string[], env: Environment, options: Options): ResolvedConfig => {
    const { schema, defaults, logger } = options;
    const context = new ParseContext(schema, logger, defaults.quietRoles);

    parseCommandLine(context, tokenize(argv, schema.optionTable));

    const command = context.command;
    const base = { schema, command: command?.name, role: context.role, help: context.help, params: context.params };

    if (command === undefined || command.name === HELP_COMMAND || command.name === VERSION_COMMAND) {
        logger.verbose(`Skipping option resolution for ${command?.name ?? 'help'}`);
        return new ResolvedConfig({ ...base, options: new Map(), groups: new Map() });
    }

    logger.verbose(`Resolving options for command ${command.name}:${context.role}`);

    parseEnvironment(context, env, defaults.envPrefix);

    const storage = Storage.create({ log: logger.debug, encoding: defaults.encoding });
    const text = loadConfigFiles(context, storage, {
        configDefault: defaultString(context, defaults.optionNames.config),
        includeDefault: defaultString(context, defaults.optionNames.configIncludePath),
        legacyConfig: defaults.legacyConfigFile,
        includeDirectory: defaults.includeDirectory,
        includePattern: defaults.includePattern,
    }, defaults.optionNames);

    if (text !== null) {
        parseConfigText(context, text, defaults.optionNames.stanza);
    }

    const groups = compactGroups(context);

    return new ResolvedConfig({ ...base, options: validateOptions(context, command, groups), groups });
}
