import { OptionSchema } from './types';

/**
 * Builds the name of one instance of a grouped option.
 *
 * The index is one-based in the name and inserted after the group prefix:
 * `indexedName('repo', 'repo-path', 0)` is `repo1-path`.
 */
export const indexedName = (prefix: string, name: string, index: number): string =>
    `${prefix}${index + 1}${name.slice(prefix.length)}`;

/**
 * Returns the name the user sees for an option at a (sparse) index.
 * Ungrouped options are returned unchanged.
 */
export const optionIndexName = (schema: OptionSchema, optionId: string, index: number): string => {
    const groupId = schema.options.get(optionId)?.group;
    const group = groupId === undefined ? undefined : schema.groups.get(groupId);

    return group ? indexedName(group.prefix, optionId, index) : optionId;
}
