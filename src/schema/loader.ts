import * as yaml from 'js-yaml';
import { z } from 'zod';
import { coerceValue } from '../coerce';
import { DEFAULT_ENCODING, DEFAULT_ROLE, DEFAULT_ROLES, HELP_COMMAND, VERSION_COMMAND } from '../constants';
import { SchemaError } from '../error/SchemaError';
import { StanzaconfError } from '../error/StanzaconfError';
import * as Storage from '../util/storage';
import { buildOptionTable } from './option-table';
import { computeResolveOrder } from './resolve-order';
import {
    CommandDefinition,
    GroupDefinition,
    OptionCommandRule,
    OptionDefinition,
    OptionDependency,
    OptionSchema,
    OptionValue,
} from './types';

const OPTION_KINDS = ['boolean', 'string', 'integer', 'float', 'size', 'path', 'list', 'map'] as const;
const OPTION_SECTIONS = ['global', 'stanza', 'command-line'] as const;
const NAME_PATTERN = /^[a-z][a-z0-9-]*$/;

const ScalarSchema = z.union([z.string(), z.number(), z.boolean()]);

const DefaultSchema = z.union([ScalarSchema, z.array(ScalarSchema), z.record(z.string(), ScalarSchema)]);

const ruleShape = {
    required: z.boolean().optional(),
    default: DefaultSchema.optional(),
    allowList: z.array(ScalarSchema).min(1).optional(),
    allowRange: z.object({ min: z.number(), max: z.number() }).strict().optional(),
    depend: z.object({
        option: z.string().min(1),
        values: z.array(ScalarSchema).min(1).optional(),
    }).strict().optional(),
};

const CommandRuleSchema = z.object(ruleShape).strict();

const OptionDocumentSchema = z.object({
    ...ruleShape,
    kind: z.enum(OPTION_KINDS),
    group: z.string().min(1).optional(),
    secure: z.boolean().optional(),
    section: z.enum(OPTION_SECTIONS).optional(),
    negate: z.boolean().optional(),
    reset: z.boolean().optional(),
    deprecatedNames: z.array(z.string().regex(NAME_PATTERN)).optional(),
    commands: z.union([z.array(z.string().min(1)), z.record(z.string(), CommandRuleSchema.nullable())]),
}).strict();

const CommandDocumentSchema = z.object({
    parameterAllowed: z.boolean().optional(),
    roles: z.array(z.string().min(1)).optional(),
}).strict();

const GroupDocumentSchema = z.object({
    prefix: z.string().regex(NAME_PATTERN),
    indexTotal: z.number().int().min(1).max(256),
}).strict();

/**
 * Zod schema for an option schema document.
 *
 * @example
 * ```yaml
 * project: demo
 * commands:
 *   backup: {}
 *   archive-get: { parameterAllowed: true }
 * groups:
 *   repo: { prefix: repo, indexTotal: 4 }
 * options:
 *   stanza: { kind: string, section: command-line, commands: [backup, archive-get] }
 *   repo-path: { kind: path, group: repo, default: /var/lib/demo, commands: [backup] }
 *   compress-level:
 *     kind: integer
 *     allowRange: { min: 0, max: 9 }
 *     commands:
 *       backup: { default: 6 }
 * ```
 */
export const SchemaDocumentSchema = z.object({
    project: z.string().regex(NAME_PATTERN),
    roles: z.array(z.string().min(1)).optional(),
    commands: z.record(z.string(), CommandDocumentSchema.nullable()),
    groups: z.record(z.string(), GroupDocumentSchema).optional(),
    options: z.record(z.string(), OptionDocumentSchema),
}).strict();

export type SchemaDocument = z.infer<typeof SchemaDocumentSchema>;
type RuleDocument = z.infer<typeof CommandRuleSchema>;
type DefaultDocument = z.infer<typeof DefaultSchema>;

const formatIssues = (issues: z.ZodError['issues']): string =>
    issues.map((issue) => `${issue.path.map(String).join('.') || '<root>'}: ${issue.message}`).join('; ');

const mergeRule = (base: RuleDocument, override: RuleDocument | null): RuleDocument => {
    if (!override) {
        return base;
    }

    return {
        required: override.required ?? base.required,
        default: override.default ?? base.default,
        allowList: override.allowList ?? base.allowList,
        allowRange: override.allowRange ?? base.allowRange,
        depend: override.depend ?? base.depend,
    };
}

const booleanDependValue = (optionId: string, value: string | number | boolean): string => {
    if (value === true || value === 'y' || value === '1' || value === 1) {
        return '1';
    }

    if (value === false || value === 'n' || value === '0' || value === 0) {
        return '0';
    }

    throw SchemaError.reference(`option '${optionId}' has non-boolean dependency value '${String(value)}'`);
}

const normalizeDependency = (
    optionId: string,
    depend: NonNullable<RuleDocument['depend']>,
    options: Map<string, OptionDefinition>
): OptionDependency => {
    const dependDefinition = options.get(depend.option);

    if (!dependDefinition) {
        throw SchemaError.reference(`option '${optionId}' depends on unknown option '${depend.option}'`);
    }

    if (dependDefinition.multi) {
        throw SchemaError.reference(`option '${optionId}' cannot depend on list or map option '${depend.option}'`);
    }

    if (!depend.values) {
        return { option: depend.option };
    }

    return {
        option: depend.option,
        values: depend.values.map((value) =>
            dependDefinition.kind === 'boolean' ? booleanDependValue(optionId, value) : String(value)
        ),
    };
}

const defaultToValues = (value: DefaultDocument): string[] => {
    if (Array.isArray(value)) {
        return value.map(String);
    }

    if (typeof value === 'object') {
        return Object.entries(value).map(([key, item]) => `${key}=${String(item)}`);
    }

    return [String(value)];
}

/**
 * Converts a default literal to the option's typed value, so that a bad
 * default is reported when the schema loads rather than when it is used.
 */
const coerceDefault = (definition: OptionDefinition, rule: OptionCommandRule, value: DefaultDocument): OptionValue => {
    if (definition.kind === 'boolean') {
        if (typeof value === 'boolean') {
            return value;
        }
        if (value === 'y' || value === 'n') {
            return value === 'y';
        }
        throw SchemaError.invalidDefault(definition.id, new Error(`'${String(value)}' is not a boolean`));
    }

    if (!definition.multi && typeof value === 'object') {
        throw SchemaError.invalidDefault(definition.id, new Error('expected a single value'));
    }

    try {
        return coerceValue(definition, rule, defaultToValues(value), definition.id);
    } catch (error) {
        if (error instanceof StanzaconfError) {
            throw SchemaError.invalidDefault(definition.id, error);
        }
        throw error;
    }
}

const buildCommands = (document: SchemaDocument, roles: string[]): Map<string, CommandDefinition> => {
    const commands = new Map<string, CommandDefinition>();

    for (const [name, command] of Object.entries(document.commands)) {
        if (!NAME_PATTERN.test(name)) {
            throw SchemaError.reference(`invalid command name '${name}'`);
        }

        const commandRoles = command?.roles ?? roles;
        for (const role of commandRoles) {
            if (!roles.includes(role)) {
                throw SchemaError.reference(`command '${name}' uses unknown role '${role}'`);
            }
        }

        commands.set(name, { name, parameterAllowed: command?.parameterAllowed ?? false, roles: commandRoles });
    }

    for (const name of [HELP_COMMAND, VERSION_COMMAND]) {
        if (!commands.has(name)) {
            commands.set(name, { name, parameterAllowed: name === HELP_COMMAND, roles: [DEFAULT_ROLE] });
        }
    }

    return commands;
}

/**
 * Builds an option schema from a parsed schema document.
 *
 * Besides validating the document shape this checks every cross reference
 * (commands, groups, dependencies), converts each default to its typed
 * value, builds the long-option table and computes the resolve order.
 *
 * @param document - Parsed document, typically the result of loading YAML
 * @throws {SchemaError} When the document is invalid
 */
export const createSchema = (document: unknown): OptionSchema => {
    const parsed = SchemaDocumentSchema.safeParse(document);

    if (!parsed.success) {
        throw SchemaError.validation(`Schema validation failed: ${formatIssues(parsed.error.issues)}`, parsed.error.issues);
    }

    const schemaDocument = parsed.data;
    const roles = schemaDocument.roles ?? DEFAULT_ROLES;

    if (!roles.includes(DEFAULT_ROLE)) {
        throw SchemaError.reference(`roles must include '${DEFAULT_ROLE}'`);
    }

    const commands = buildCommands(schemaDocument, roles);

    const groups = new Map<string, GroupDefinition>();
    for (const [id, group] of Object.entries(schemaDocument.groups ?? {})) {
        groups.set(id, { id, prefix: group.prefix, indexTotal: group.indexTotal });
    }

    const options = new Map<string, OptionDefinition>();
    const rawRules = new Map<string, Map<string, RuleDocument>>();

    for (const [name, option] of Object.entries(schemaDocument.options)) {
        if (!NAME_PATTERN.test(name)) {
            throw SchemaError.reference(`invalid option name '${name}'`);
        }

        if (option.group !== undefined) {
            const group = groups.get(option.group);
            if (!group) {
                throw SchemaError.reference(`option '${name}' refers to unknown group '${option.group}'`);
            }
            if (!name.startsWith(`${group.prefix}-`)) {
                throw SchemaError.reference(`grouped option '${name}' must start with '${group.prefix}-'`);
            }
        }

        const section = option.section ?? 'global';

        options.set(name, {
            id: name,
            kind: option.kind,
            multi: option.kind === 'list' || option.kind === 'map',
            group: option.group,
            secure: option.secure ?? false,
            section,
            negate: option.negate ?? option.kind === 'boolean',
            reset: option.reset ?? section !== 'command-line',
            deprecatedNames: option.deprecatedNames ?? [],
            commands: new Map(),
        });

        const base: RuleDocument = {
            required: option.required,
            default: option.default,
            allowList: option.allowList,
            allowRange: option.allowRange,
            depend: option.depend,
        };

        const entries: Array<[string, RuleDocument | null]> = Array.isArray(option.commands)
            ? option.commands.map((command): [string, RuleDocument | null] => [command, null])
            : Object.entries(option.commands);

        const rules = new Map<string, RuleDocument>();
        for (const [command, override] of entries) {
            if (!commands.has(command)) {
                throw SchemaError.reference(`option '${name}' refers to unknown command '${command}'`);
            }
            rules.set(command, mergeRule(base, override));
        }
        rawRules.set(name, rules);
    }

    // Rules are finished in a second pass since dependencies may point forward
    for (const definition of options.values()) {
        for (const [command, raw] of rawRules.get(definition.id) ?? []) {
            const rule: OptionCommandRule = {
                required: raw.required ?? false,
                allowList: raw.allowList?.map(String),
                allowRange: raw.allowRange,
                depend: raw.depend ? normalizeDependency(definition.id, raw.depend, options) : undefined,
            };

            if (raw.default !== undefined) {
                rule.default = coerceDefault(definition, rule, raw.default);
            }

            definition.commands.set(command, rule);
        }
    }

    return {
        project: schemaDocument.project,
        roles,
        commands,
        groups,
        options,
        optionTable: buildOptionTable(options, groups),
        resolveOrder: computeResolveOrder(options),
    };
}

/**
 * Parses a YAML schema document and builds the option schema from it.
 *
 * @throws {SchemaError} When the text is not valid YAML or the document is invalid
 */
export const loadSchema = (text: string): OptionSchema => {
    let document: unknown;

    try {
        document = yaml.load(text);
    } catch (error) {
        if (error instanceof yaml.YAMLException) {
            throw SchemaError.validation(`Failed to parse schema: ${error.message}`, error);
        }
        throw error;
    }

    return createSchema(document);
}

/**
 * Reads a YAML schema document from disk and builds the option schema.
 *
 * @throws {FileSystemError} When the file cannot be read
 * @throws {SchemaError} When the document is invalid
 */
export const loadSchemaFile = (path: string, encoding: BufferEncoding = DEFAULT_ENCODING): OptionSchema => {
    const storage = Storage.create({ log: () => { }, encoding });
    const text = storage.readFile(path) ?? '';

    return loadSchema(text);
}
