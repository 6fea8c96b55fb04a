import { GLOBAL_SECTION } from '../constants';
import { OptionError } from '../error/OptionError';
import { OptionValueError } from '../error/OptionValueError';
import { IniDocument, parseIni } from '../ini/parser';
import { ParseContext } from '../parse/context';

/** A file section consulted while resolving options. */
export interface SearchSection {
    name: string;
    /** Section name carries a `:<command>` suffix */
    commandQualified: boolean;
    /** Section applies to every stanza */
    global: boolean;
}

/**
 * Sections in the order they are searched, most specific first:
 * `[<stanza>:<command>]`, `[<stanza>]`, `[global:<command>]`, `[global]`.
 * Stanza sections are only searched when a stanza is set.
 */
export const buildSectionList = (command: string, stanza?: string): SearchSection[] => {
    const sections: SearchSection[] = [];

    if (stanza !== undefined) {
        sections.push({ name: `${stanza}:${command}`, commandQualified: true, global: false });
        sections.push({ name: stanza, commandQualified: false, global: false });
    }

    sections.push({ name: `${GLOBAL_SECTION}:${command}`, commandQualified: true, global: true });
    sections.push({ name: GLOBAL_SECTION, commandQualified: false, global: true });

    return sections;
}

const resolveSection = (context: ParseContext, ini: IniDocument, section: SearchSection): void => {
    // Option id and index -> spelling that first set it in this section
    const claimed = new Map<string, string>();

    for (const key of ini.sectionKeyList(section.name)) {
        const option = context.schema.optionTable.get(key);

        if (!option) {
            context.warn(`configuration file contains invalid option '${key}'`);
            continue;
        }

        if (option.negate) {
            context.warn(`configuration file contains negate option '${key}'`);
            continue;
        }

        if (option.reset) {
            context.warn(`configuration file contains reset option '${key}'`);
            continue;
        }

        const definition = context.definition(option.optionId);

        if (definition.section === 'command-line') {
            context.warn(`configuration file contains command-line only option '${key}'`);
            continue;
        }

        const claimKey = `${option.optionId}#${option.index}`;
        const otherKey = claimed.get(claimKey);

        if (otherKey !== undefined) {
            throw OptionError.duplicate(key, otherKey, section.name);
        }

        claimed.set(claimKey, key);

        if (!context.isValid(option.optionId)) {
            // Plain sections are shared by every command, so only qualified ones are suspicious
            if (section.commandQualified) {
                context.warn(`configuration file contains option '${key}' invalid for section '${section.name}'`);
            }
            continue;
        }

        if (definition.section === 'stanza' && section.global) {
            context.warn(`configuration file contains stanza-only option '${key}' in global section '${section.name}'`);
            continue;
        }

        const occurrence = context.store.getOrCreate(option.optionId, option.index);

        if (occurrence.found) {
            continue;
        }

        occurrence.found = true;
        occurrence.source = 'file';

        if (ini.isList(section.name, key)) {
            if (!definition.multi) {
                throw OptionError.multiple(context.optionName(option.optionId, option.index));
            }

            occurrence.values = ini.getList(section.name, key);
            continue;
        }

        const value = ini.get(section.name, key) ?? '';

        if (value.length === 0) {
            throw OptionValueError.sectionEmpty(section.name, key);
        }

        if (definition.kind === 'boolean') {
            if (value === 'n') {
                occurrence.negate = true;
            } else if (value !== 'y') {
                throw OptionValueError.fileBoolean(key, value);
            }
        } else {
            occurrence.values = [value];
        }
    }
}

/**
 * Resolves options from loaded configuration text, filling only occurrences
 * the command line and environment left unset. The stanza, when given,
 * selects the stanza sections searched before the global ones.
 *
 * @throws {OptionError} For duplicate spellings in one section and lists given to single-valued options
 * @throws {OptionValueError} For empty values and booleans other than `y` / `n`
 */
export const parseConfigText = (context: ParseContext, text: string, stanzaOptionId: string): void => {
    if (!context.command) {
        return;
    }

    const ini = parseIni(text);
    const stanza = context.store.value(stanzaOptionId);

    for (const section of buildSectionList(context.command.name, stanza)) {
        resolveSection(context, ini, section);
    }
}
