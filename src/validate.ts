import { ConfigSource, ResolvedOption, ResolvedOptionValue } from './config';
import { coerceValue } from './coerce';
import { NEGATE_PREFIX } from './constants';
import { OptionError } from './error/OptionError';
import { OptionRequiredError } from './error/OptionRequiredError';
import { ParseContext } from './parse/context';
import { CommandDefinition, OptionCommandRule, OptionDefinition } from './schema/types';

const NOT_SET: ResolvedOptionValue = { value: null, source: null, negate: false, reset: false };

/**
 * Value of the dependency as compared against a dependency value list, or
 * `null` when the dependency has no value.
 */
const dependencyValue = (
    resolved: ReadonlyMap<string, ResolvedOption>,
    definition: OptionDefinition,
    dependDefinition: OptionDefinition,
    denseIndex: number
): string | null => {
    const depend = resolved.get(dependDefinition.id);

    if (!depend?.valid) {
        return null;
    }

    const sameGroup = dependDefinition.group !== undefined && dependDefinition.group === definition.group;
    const value = depend.indexes[sameGroup ? denseIndex : 0]?.value ?? null;

    if (typeof value === 'boolean') {
        return value ? '1' : '0';
    }

    return typeof value === 'string' || typeof value === 'number' ? String(value) : null;
}

const dependencyError = (name: string, dependDefinition: OptionDefinition, dependName: string, values?: readonly string[]): OptionError => {
    if (values === undefined) {
        return OptionError.dependency(name, dependName);
    }

    if (dependDefinition.kind === 'boolean') {
        return OptionError.dependency(name, values.includes('0') ? `${NEGATE_PREFIX}${dependName}` : dependName);
    }

    const quoted = values.map((value) => `'${value}'`);

    return OptionError.dependency(name, dependName, quoted.length === 1 ? ` = ${quoted[0]}` : ` in (${quoted.join(', ')})`);
}

/**
 * Name of the dependency as reported in an error: the same index for a
 * dependency in the option's own group, else the index its value was read from.
 */
const dependencyName = (
    context: ParseContext,
    groupIndexes: ReadonlyMap<string, readonly number[]>,
    definition: OptionDefinition,
    dependDefinition: OptionDefinition,
    sparseIndex: number
): string => {
    if (dependDefinition.group === undefined) {
        return context.optionName(dependDefinition.id, 0);
    }

    if (dependDefinition.group === definition.group) {
        return context.optionName(dependDefinition.id, sparseIndex);
    }

    return context.optionName(dependDefinition.id, groupIndexes.get(dependDefinition.group)?.[0] ?? 0);
}

const resolveIndex = (
    context: ParseContext,
    command: CommandDefinition,
    groupIndexes: ReadonlyMap<string, readonly number[]>,
    resolved: ReadonlyMap<string, ResolvedOption>,
    definition: OptionDefinition,
    rule: OptionCommandRule,
    sparseIndex: number,
    denseIndex: number
): ResolvedOptionValue => {
    const occurrence = context.store.get(definition.id, sparseIndex);
    const name = context.optionName(definition.id, sparseIndex);
    const negate = occurrence?.negate ?? false;
    const reset = occurrence?.reset ?? false;
    const source: ConfigSource | null = occurrence?.source ?? null;
    const set = occurrence !== undefined && occurrence.found && (definition.kind === 'boolean' || !negate) && !reset;

    if (rule.depend) {
        const dependDefinition = context.definition(rule.depend.option);
        const value = dependencyValue(resolved, definition, dependDefinition, denseIndex);

        if (value === null || (rule.depend.values !== undefined && !rule.depend.values.includes(value))) {
            if (set && source === 'param') {
                const dependName = dependencyName(context, groupIndexes, definition, dependDefinition, sparseIndex);
                throw dependencyError(name, dependDefinition, dependName, value === null ? undefined : rule.depend.values);
            }

            return { value: null, source: null, negate, reset };
        }
    }

    if (set) {
        const value = definition.kind === 'boolean' ? !negate : coerceValue(definition, rule, occurrence.values, name);
        return { value, source, negate, reset };
    }

    // Reset clears the value without falling back to the default, negate keeps its source
    if (reset || negate) {
        return { value: null, source, negate, reset };
    }

    if (rule.default !== undefined) {
        return { value: rule.default, source: 'default', negate, reset };
    }

    if (rule.required && !context.help) {
        throw new OptionRequiredError(command.name, name, definition.section === 'stanza');
    }

    return NOT_SET;
}

/**
 * Final phase: rejects command line options the command does not take, then
 * walks the options in resolve order so that every dependency is resolved
 * before its dependents, checking dependencies, coercing values and applying
 * defaults and required rules.
 *
 * @param context - Parse context after the command line, environment and file phases
 * @param command - The command being resolved
 * @param groupIndexes - Per group, the sparse index of each dense index
 * @throws {OptionError} For options invalid for the command or missing their dependency
 * @throws {OptionValueError} For values that do not fit the option
 * @throws {OptionRequiredError} For required options without a value
 */
export const validateOptions = (
    context: ParseContext,
    command: CommandDefinition,
    groupIndexes: ReadonlyMap<string, readonly number[]>
): Map<string, ResolvedOption> => {
    for (const optionId of context.schema.options.keys()) {
        const paramIndex = context.rule(optionId) === undefined ? context.store.firstIndexFrom(optionId, 'param') : undefined;

        if (paramIndex !== undefined) {
            throw OptionError.invalidForCommand(context.optionName(optionId, paramIndex), command.name);
        }
    }

    const resolved = new Map<string, ResolvedOption>();

    for (const optionId of context.schema.resolveOrder) {
        const definition = context.definition(optionId);
        const rule = context.rule(optionId);

        if (rule === undefined) {
            resolved.set(optionId, { valid: false, indexes: [] });
            continue;
        }

        const sparseIndexes = definition.group === undefined ? [0] : groupIndexes.get(definition.group) ?? [];

        resolved.set(optionId, {
            valid: true,
            indexes: sparseIndexes.map((sparseIndex, denseIndex) =>
                resolveIndex(context, command, groupIndexes, resolved, definition, rule, sparseIndex, denseIndex)),
        });
    }

    return resolved;
}
