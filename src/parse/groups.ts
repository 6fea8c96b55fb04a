import { ParseContext } from './context';

/**
 * Collects, per group, the sparse indexes used by any option of the group
 * that is valid for the command. The position in the returned list is the
 * dense index, so `[0, 2]` means `repo1-*` and `repo3-*` become group
 * indexes 0 and 1.
 */
export const compactGroups = (context: ParseContext): Map<string, number[]> => {
    const used = new Map<string, Set<number>>();

    for (const groupId of context.schema.groups.keys()) {
        used.set(groupId, new Set());
    }

    for (const definition of context.schema.options.values()) {
        if (definition.group === undefined || !context.isValid(definition.id)) {
            continue;
        }

        const indexes = used.get(definition.group);

        for (const index of context.store.foundIndexes(definition.id)) {
            indexes?.add(index);
        }
    }

    const result = new Map<string, number[]>();

    for (const [groupId, indexes] of used) {
        result.set(groupId, [...indexes].sort((a, b) => a - b));
    }

    return result;
}
