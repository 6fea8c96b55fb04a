import { StanzaconfError } from './error/StanzaconfError';
import { optionIndexName } from './schema/names';
import { OptionSchema, OptionValue } from './schema/types';

/**
 * Where a resolved value came from, highest precedence first.
 */
export type ConfigSource = 'param' | 'env' | 'file' | 'default';

export interface ResolvedOptionValue {
    readonly value: OptionValue | null;
    readonly source: ConfigSource | null;
    readonly negate: boolean;
    readonly reset: boolean;
}

export interface ResolvedOption {
    readonly valid: boolean;
    /** One entry per dense group index, a single entry for ungrouped options */
    readonly indexes: readonly ResolvedOptionValue[];
}

/** One resolved option index, as listed by `ResolvedConfig.entries`. */
export interface ResolvedEntry {
    readonly optionId: string;
    /** Dense index */
    readonly index: number;
    /** Name as given by the user, e.g. `repo2-path` */
    readonly name: string;
    readonly value: OptionValue | null;
    readonly source: ConfigSource | null;
    readonly secure: boolean;
}

export interface ResolvedConfigInit {
    schema: OptionSchema;
    command?: string;
    role: string;
    help: boolean;
    params: readonly string[];
    options: ReadonlyMap<string, ResolvedOption>;
    /** Per group, the sparse index of each dense index */
    groups: ReadonlyMap<string, readonly number[]>;
}

const UNSET: ResolvedOptionValue = Object.freeze({ value: null, source: null, negate: false, reset: false });

/**
 * The outcome of one resolution: command, role, parameters and the typed
 * value of every option valid for the command. Immutable once built.
 *
 * Option indexes are dense: with `repo1-path` and `repo3-path` set, the
 * `repo` group has indexes 0 and 1, and `groupIndexes('repo')` maps them
 * back to `[0, 2]`.
 */
export class ResolvedConfig {
    readonly command?: string;
    readonly role: string;
    readonly help: boolean;
    readonly params: readonly string[];

    private readonly schema: OptionSchema;
    private readonly options: ReadonlyMap<string, ResolvedOption>;
    private readonly groups: ReadonlyMap<string, readonly number[]>;

    constructor(init: ResolvedConfigInit) {
        this.schema = init.schema;
        this.command = init.command;
        this.role = init.role;
        this.help = init.help;
        this.params = Object.freeze([...init.params]);

        const options = new Map<string, ResolvedOption>();

        for (const [optionId, option] of init.options) {
            options.set(optionId, Object.freeze({
                valid: option.valid,
                indexes: Object.freeze(option.indexes.map((value) => Object.freeze({ ...value }))),
            }));
        }

        const groups = new Map<string, readonly number[]>();

        for (const [groupId, indexes] of init.groups) {
            groups.set(groupId, Object.freeze([...indexes]));
        }

        this.options = options;
        this.groups = groups;
        Object.freeze(this);
    }

    private lookup(optionId: string): ResolvedOption | undefined {
        if (!this.schema.options.has(optionId)) {
            throw new StanzaconfError(`option '${optionId}' is not defined in the schema`);
        }

        return this.options.get(optionId);
    }

    private indexValue(optionId: string, index: number): ResolvedOptionValue {
        return this.lookup(optionId)?.indexes[index] ?? UNSET;
    }

    /** Whether the option is valid for the resolved command */
    optionValid(optionId: string): boolean {
        return this.lookup(optionId)?.valid ?? false;
    }

    /** Typed value, `null` when the option is unset, invalid or the index does not exist */
    option(optionId: string, index = 0): OptionValue | null {
        return this.indexValue(optionId, index).value;
    }

    optionSource(optionId: string, index = 0): ConfigSource | null {
        return this.indexValue(optionId, index).source;
    }

    /** Whether the option has a value */
    optionTest(optionId: string, index = 0): boolean {
        return this.option(optionId, index) !== null;
    }

    optionNegate(optionId: string, index = 0): boolean {
        return this.indexValue(optionId, index).negate;
    }

    optionReset(optionId: string, index = 0): boolean {
        return this.indexValue(optionId, index).reset;
    }

    /** Number of resolved indexes of the option */
    optionIndexTotal(optionId: string): number {
        return this.lookup(optionId)?.indexes.length ?? 0;
    }

    /** Name of the option at a dense index, as the user would spell it */
    optionIndexName(optionId: string, index = 0): string {
        const group = this.schema.options.get(optionId)?.group;
        const sparse = group === undefined ? 0 : this.groups.get(group)?.[index] ?? index;

        return optionIndexName(this.schema, optionId, sparse);
    }

    groupIndexTotal(groupId: string): number {
        return this.groupIndexes(groupId).length;
    }

    /** Sparse index of each dense index of the group */
    groupIndexes(groupId: string): readonly number[] {
        if (!this.schema.groups.has(groupId)) {
            throw new StanzaconfError(`option group '${groupId}' is not defined in the schema`);
        }

        return this.groups.get(groupId) ?? [];
    }

    /** Every index of every valid option, in schema declaration order */
    entries(): ResolvedEntry[] {
        const result: ResolvedEntry[] = [];

        for (const definition of this.schema.options.values()) {
            const option = this.options.get(definition.id);

            if (!option?.valid) {
                continue;
            }

            option.indexes.forEach((resolved, index) => {
                result.push({
                    optionId: definition.id,
                    index,
                    name: this.optionIndexName(definition.id, index),
                    value: resolved.value,
                    source: resolved.source,
                    secure: definition.secure,
                });
            });
        }

        return result;
    }
}
