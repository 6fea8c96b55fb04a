import { Command } from 'commander';
import { renderConfig } from './check-config';
import { configure } from './configure';
import { DEFAULT_LOGGER, DEFAULT_OPTIONS } from './constants';
import { resolve } from './resolve';
import { OptionSchema } from './schema/types';
import { DefaultOptions, Environment, Logger, Options, Stanzaconf } from './types';

export * from './types';
export * from './error';
export type { ConfigSource, ResolvedEntry, ResolvedOption, ResolvedOptionValue } from './config';
export { ResolvedConfig } from './config';
export type {
    CommandDefinition, GroupDefinition, LongOption, OptionCommandRule, OptionDefinition,
    OptionDependency, OptionKind, OptionRange, OptionSchema, OptionSection, OptionValue,
} from './schema/types';
export { createSchema, loadSchema, loadSchemaFile } from './schema/loader';
export { IniDocument, parseIni } from './ini/parser';
export { renderConfig } from './check-config';
export { DEFAULT_OPTIONS, DEFAULT_LOGGER } from './constants';

/**
 * Environment prefix for a project: upper case with `-` turned into `_`,
 * e.g. `my-tool` -> `MY_TOOL`.
 */
export const deriveEnvPrefix = (project: string): string => project.toUpperCase().replace(/-/g, '_');

/**
 * Creates a stanzaconf instance for one option schema.
 *
 * @param pOptions.schema - Option schema, from `loadSchema`, `loadSchemaFile` or `createSchema`
 * @param pOptions.defaults - Overrides of `DEFAULT_OPTIONS`; the env prefix and legacy file derive from the project
 * @param pOptions.logger - Custom logger implementation (optional, defaults to console logger)
 *
 * @example
 * ```typescript
 * import { create, loadSchemaFile } from 'stanzaconf';
 *
 * const stanzaconf = create({ schema: loadSchemaFile('./options.yaml') });
 * const config = stanzaconf.resolve(process.argv.slice(2));
 *
 * for (let idx = 0; idx < config.optionIndexTotal('repo-path'); idx++) {
 *     console.log(config.optionIndexName('repo-path', idx), config.option('repo-path', idx));
 * }
 * ```
 */
export const create = (pOptions: {
    schema: OptionSchema,
    defaults?: Partial<DefaultOptions>,
    logger?: Logger,
}): Stanzaconf => {
    const schema = pOptions.schema;

    const defaults: DefaultOptions = {
        ...DEFAULT_OPTIONS,
        envPrefix: deriveEnvPrefix(schema.project),
        legacyConfigFile: `/etc/${schema.project}.conf`,
        ...pOptions.defaults,
    };
    let logger = pOptions.logger || DEFAULT_LOGGER;

    const options: Options = {
        defaults,
        schema,
        logger,
    }

    const setLogger = (pLogger: Logger) => {
        logger = pLogger;
        options.logger = pLogger;
    }

    return {
        setLogger,
        configure: (command: Command) => configure(command, options),
        resolve: (argv: string[], env: Environment = process.env) => resolve(argv, env, options),
        checkConfig: (argv: string[], env: Environment = process.env) => renderConfig(resolve(argv, env, options)),
    }
}
