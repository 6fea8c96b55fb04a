/**
 * Value kinds an option can carry. `list` and `map` options are always
 * multi-valued.
 */
export type OptionKind = 'boolean' | 'string' | 'integer' | 'float' | 'size' | 'path' | 'list' | 'map';

/**
 * Where an option may be specified in a configuration file.
 * - `global`: any section
 * - `stanza`: only stanza sections
 * - `command-line`: never in a file (arguments and environment only)
 */
export type OptionSection = 'global' | 'stanza' | 'command-line';

/** Typed value of a resolved option. */
export type OptionValue = boolean | number | string | readonly string[] | Readonly<Record<string, string>>;

export interface OptionRange {
    min: number;
    max: number;
}

/**
 * Dependency of one option on another. When `values` is present the
 * dependency only resolves when the other option's value is in the list.
 * Boolean values are stored as `'0'` / `'1'`.
 */
export interface OptionDependency {
    option: string;
    values?: string[];
}

/** Rules for an option that apply under one particular command. */
export interface OptionCommandRule {
    required: boolean;
    default?: OptionValue;
    allowList?: string[];
    allowRange?: OptionRange;
    depend?: OptionDependency;
}

export interface OptionDefinition {
    /** Canonical option name, e.g. `repo-path` */
    id: string;
    kind: OptionKind;
    multi: boolean;
    /** Group id for options that can be instantiated several times */
    group?: string;
    /** Secure options can never be given on the command line */
    secure: boolean;
    section: OptionSection;
    /** Whether `--no-<name>` is accepted */
    negate: boolean;
    /** Whether `--reset-<name>` is accepted */
    reset: boolean;
    /** Alternate spellings that still map to this option */
    deprecatedNames: string[];
    /** Commands the option is valid for, with the rules under each */
    commands: Map<string, OptionCommandRule>;
}

export interface CommandDefinition {
    name: string;
    parameterAllowed: boolean;
    roles: string[];
}

export interface GroupDefinition {
    id: string;
    /** Leading name segment that receives the index, e.g. `repo` in `repo1-path` */
    prefix: string;
    indexTotal: number;
}

/**
 * One spelling accepted for an option, with its modifiers spelled out.
 * `index` is the zero-based group index (0 for ungrouped options).
 */
export interface LongOption {
    name: string;
    optionId: string;
    index: number;
    negate: boolean;
    reset: boolean;
    deprecated: boolean;
    takesValue: boolean;
}

export interface OptionSchema {
    project: string;
    roles: string[];
    commands: Map<string, CommandDefinition>;
    groups: Map<string, GroupDefinition>;
    options: Map<string, OptionDefinition>;
    /** Every accepted spelling, keyed by the name as written after `--` */
    optionTable: Map<string, LongOption>;
    /** Option ids ordered so that dependencies always come first */
    resolveOrder: string[];
}
