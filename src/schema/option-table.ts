import { NEGATE_PREFIX, RESET_PREFIX } from '../constants';
import { SchemaError } from '../error/SchemaError';
import { indexedName } from './names';
import { GroupDefinition, LongOption, OptionDefinition } from './types';

/**
 * Builds the table of every spelling accepted on the command line, in the
 * environment and in configuration files.
 *
 * For each option name (canonical and deprecated) and each group index this
 * adds the plain spelling, `no-<name>` when the option is negatable and
 * `reset-<name>` when it is resettable. Deprecated names of grouped options
 * are only indexed when they start with the group prefix; otherwise they
 * address the first index.
 *
 * @throws {SchemaError} When two options claim the same spelling
 */
export const buildOptionTable = (
    options: Map<string, OptionDefinition>,
    groups: Map<string, GroupDefinition>
): Map<string, LongOption> => {
    const table = new Map<string, LongOption>();

    const add = (entry: LongOption): void => {
        const existing = table.get(entry.name);
        if (existing) {
            throw SchemaError.reference(
                `option name '${entry.name}' is used by both '${existing.optionId}' and '${entry.optionId}'`
            );
        }
        table.set(entry.name, entry);
    }

    for (const definition of options.values()) {
        const group = definition.group === undefined ? undefined : groups.get(definition.group);
        const names = [definition.id, ...definition.deprecatedNames];

        for (const name of names) {
            const deprecated = name !== definition.id;
            const indexed = group !== undefined && name.startsWith(`${group.prefix}-`);
            const indexTotal = indexed ? group.indexTotal : 1;

            for (let index = 0; index < indexTotal; index++) {
                const spelling = indexed ? indexedName(group.prefix, name, index) : name;
                const base = { optionId: definition.id, index, deprecated };

                add({ ...base, name: spelling, negate: false, reset: false, takesValue: definition.kind !== 'boolean' });

                if (definition.negate) {
                    add({ ...base, name: `${NEGATE_PREFIX}${spelling}`, negate: true, reset: false, takesValue: false });
                }

                if (definition.reset) {
                    add({ ...base, name: `${RESET_PREFIX}${spelling}`, negate: false, reset: true, takesValue: false });
                }
            }
        }
    }

    return table;
}
