import { OptionValueError } from '../error/OptionValueError';
import { ParseContext } from '../parse/context';
import { Environment } from '../types';
import { envKeyToOptionName } from './naming';

/**
 * Records options set through `<PREFIX>_<NAME>` environment variables.
 *
 * Entries that do not name an option, or name a `no-` / `reset-` spelling,
 * are reported and skipped. Options not valid for the command are skipped
 * quietly, as are options already given on the command line. Booleans take
 * `y` or `n`; list and map values are split on `:`.
 *
 * @param context - Parse context after the command line phase
 * @param env - Environment to scan, usually `process.env`
 * @param prefix - Environment prefix without the trailing underscore
 * @throws {OptionValueError} For empty values and booleans other than `y` / `n`
 */
export const parseEnvironment = (context: ParseContext, env: Environment, prefix: string): void => {
    const keyPrefix = `${prefix}_`;

    for (const [envKey, value] of Object.entries(env)) {
        if (!envKey.startsWith(keyPrefix) || value === undefined) {
            continue;
        }

        const key = envKeyToOptionName(envKey, keyPrefix);
        const option = context.schema.optionTable.get(key);

        if (!option) {
            context.warn(`environment contains invalid option '${key}'`);
            continue;
        }

        if (option.negate) {
            context.warn(`environment contains invalid negate option '${key}'`);
            continue;
        }

        if (option.reset) {
            context.warn(`environment contains invalid reset option '${key}'`);
            continue;
        }

        if (!context.isValid(option.optionId)) {
            continue;
        }

        if (value.length === 0) {
            throw OptionValueError.environmentEmpty(key);
        }

        const occurrence = context.store.getOrCreate(option.optionId, option.index);

        // The command line wins
        if (occurrence.found) {
            continue;
        }

        occurrence.found = true;
        occurrence.source = 'env';

        const definition = context.definition(option.optionId);

        if (definition.kind === 'boolean') {
            if (value === 'n') {
                occurrence.negate = true;
            } else if (value !== 'y') {
                throw OptionValueError.environmentBoolean(key, value);
            }
        } else if (definition.multi) {
            occurrence.values = value.split(':');
        } else {
            occurrence.values = [value];
        }

        context.logger.debug(`Option '${key}' set from environment variable ${envKey}`);
    }
}
