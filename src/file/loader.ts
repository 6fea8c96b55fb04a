import * as path from 'path';
import { FileSystemError } from '../error/FileSystemError';
import { parseIni } from '../ini/parser';
import { ParseContext } from '../parse/context';
import { ConfigOptionNames } from '../types';
import { Utility as StorageUtility } from '../util/storage';

/**
 * Where configuration files are looked for when the command line and
 * environment do not say otherwise.
 */
export interface ConfigFileLocations {
    /** Default main file, from the schema default of the `config` option */
    configDefault?: string;
    /** Default include directory, from the schema default of `config-include-path` */
    includeDefault?: string;
    /** Old main file location tried when the default main file is missing */
    legacyConfig: string;
    /** Include directory name placed under an overriding `config-path` */
    includeDirectory: string;
    /** Include directory entries to load */
    includePattern: RegExp;
}

// An option counts as given only when it carries a value (reset clears it)
const givenValue = (context: ParseContext, optionId: string): string | undefined => {
    const occurrence = context.store.get(optionId, 0);
    return occurrence?.found && !occurrence.negate && !occurrence.reset ? occurrence.values[0] : undefined;
}

const appendPart = (result: string | null, part: string | null): string | null => {
    if (part === null || part.length === 0) {
        return result;
    }

    // Fail on the file that is malformed rather than on the combined text
    parseIni(part);

    return `${result ?? ''}\n${part}`;
}

/**
 * Locates and reads the main configuration file and the include directory,
 * returning their concatenated text or `null` when nothing was loaded.
 *
 * - `--config` makes the main file required and, unless `--config-path` or
 *   `--config-include-path` is also given, skips the include directory
 * - `--no-config` skips the main file, and the include directory too unless
 *   an include or base path is given
 * - `--config-path` moves the default main file and include directory under
 *   a new base path
 * - `--config-include-path` makes the include directory required
 *
 * A missing default main file falls back to the legacy location. Include
 * files are read in name order and appended after the main file.
 *
 * @throws {FileSystemError} When a required file or directory is missing
 * @throws {IniFormatError} When a loaded file is not valid INI text
 */
export const loadConfigFiles = (
    context: ParseContext,
    storage: StorageUtility,
    locations: ConfigFileLocations,
    optionNames: ConfigOptionNames
): string | null => {
    const configValue = givenValue(context, optionNames.config);
    const configPathValue = givenValue(context, optionNames.configPath);
    const includeValue = givenValue(context, optionNames.configIncludePath);
    const configNegated = context.store.get(optionNames.config, 0)?.negate === true;

    let configDefault = locations.configDefault;
    let includeDefault = locations.includeDefault;

    if (configPathValue !== undefined) {
        configDefault = configDefault === undefined ? undefined : `${configPathValue}/${path.basename(configDefault)}`;
        includeDefault = `${configPathValue}/${locations.includeDirectory}`;
    }

    let loadConfig = true;
    let loadInclude = true;
    let configRequired = configValue !== undefined;
    const includeRequired = includeValue !== undefined;

    if (configNegated) {
        loadConfig = false;
        configRequired = false;

        if (configPathValue === undefined && !includeRequired) {
            loadInclude = false;
        }
    }

    if (configRequired && configPathValue === undefined && !includeRequired) {
        loadInclude = false;
    }

    let result: string | null = null;

    if (loadConfig) {
        const fileName = configValue ?? configDefault;

        if (fileName !== undefined) {
            context.logger.verbose(`Loading configuration file ${fileName}`);
            result = storage.readFile(fileName, { ignoreMissing: !configRequired });

            if (result === null && fileName === locations.configDefault && fileName !== locations.legacyConfig) {
                context.logger.verbose(`Loading legacy configuration file ${locations.legacyConfig}`);
                result = storage.readFile(locations.legacyConfig, { ignoreMissing: true });
            }
        }
    }

    if (loadInclude) {
        if (result !== null && result.length > 0) {
            parseIni(result);
        }

        const includePath = includeValue ?? includeDefault;

        if (includePath !== undefined) {
            const list = storage.list(includePath, { expression: locations.includePattern, errorOnMissing: includeRequired });

            if (list !== null) {
                if (list.length === 0 && configRequired && includeRequired) {
                    throw FileSystemError.noIncludeFiles(includePath);
                }

                for (const name of [...list].sort()) {
                    context.logger.verbose(`Loading include file ${includePath}/${name}`);
                    result = appendPart(result, storage.readFile(`${includePath}/${name}`, { ignoreMissing: true }));
                }
            }
        }
    }

    return result;
}
