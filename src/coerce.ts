import { OptionError } from './error/OptionError';
import { OptionValueError } from './error/OptionValueError';
import { OptionCommandRule, OptionDefinition, OptionValue } from './schema/types';
import { normalizeOptionPath } from './util/option-path';
import { convertToBytes } from './util/size';

const INTEGER_PATTERN = /^[-+]?[0-9]+$/;
const FLOAT_PATTERN = /^[-+]?([0-9]+(\.[0-9]*)?|\.[0-9]+)([eE][-+]?[0-9]+)?$/;

const parseNumeric = (definition: OptionDefinition, value: string): number | null => {
    switch (definition.kind) {
        case 'integer':
            return INTEGER_PATTERN.test(value) ? Number(value) : null;
        case 'float':
            return FLOAT_PATTERN.test(value) ? Number(value) : null;
        default:
            return convertToBytes(value);
    }
}

const checkAllowList = (rule: OptionCommandRule, value: string, name: string): void => {
    if (rule.allowList && !rule.allowList.includes(value)) {
        throw OptionValueError.notAllowed(value, name);
    }
}

/**
 * Converts the raw values recorded for a non-boolean option into its typed value.
 *
 * - `map`: each entry is split on its first `=`
 * - `list`: the entries are kept in order
 * - `integer`, `float`, `size`: parsed and checked against the allowed range
 * - `path`: must be absolute and free of `//`, one trailing `/` is dropped
 *
 * Scalar values are then checked against the allow-list as given, except
 * sizes, which are checked by their byte count.
 *
 * @param definition - Definition of the option being coerced
 * @param rule - Rules that apply to the option under the active command
 * @param values - Raw values, in the order they were given
 * @param name - Option name as shown to the user (indexed for grouped options)
 */
export const coerceValue = (
    definition: OptionDefinition,
    rule: OptionCommandRule,
    values: readonly string[],
    name: string
): OptionValue => {
    if (definition.kind === 'map') {
        const result: Record<string, string> = {};

        for (const pair of values) {
            const equal = pair.indexOf('=');

            if (equal === -1) {
                throw OptionError.keyValue(pair, name);
            }

            result[pair.slice(0, equal)] = pair.slice(equal + 1);
        }

        return Object.freeze(result);
    }

    if (definition.kind === 'list') {
        return Object.freeze([...values]);
    }

    const raw = values[0] ?? '';

    if (definition.kind === 'integer' || definition.kind === 'float' || definition.kind === 'size') {
        const parsed = parseNumeric(definition, raw);

        if (parsed === null || !Number.isFinite(parsed)) {
            throw OptionValueError.invalid(raw, name);
        }

        // Integers and sizes past 2^53 cannot be held without rounding
        if (definition.kind !== 'float' && !Number.isSafeInteger(parsed)) {
            throw OptionValueError.invalid(raw, name);
        }

        if (rule.allowRange && (parsed < rule.allowRange.min || parsed > rule.allowRange.max)) {
            throw OptionValueError.outOfRange(raw, name);
        }

        checkAllowList(rule, definition.kind === 'size' ? String(parsed) : raw, name);
        return parsed;
    }

    const value = definition.kind === 'path' ? normalizeOptionPath(raw, name) : raw;

    checkAllowList(rule, value, name);
    return value;
}
