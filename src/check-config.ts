import * as yaml from 'js-yaml';
import { ConfigSource, ResolvedConfig } from './config';
import { OptionValue } from './schema/types';

/** Shown in place of the value of secure options */
export const REDACTED = '<redacted>';

interface RenderedOption {
    value: OptionValue | null;
    source: ConfigSource;
}

/**
 * Renders a resolved configuration as YAML: the command, role and
 * parameters, then every option that has a source with its value and where
 * it came from. Secure values are redacted.
 *
 * @example
 * ```yaml
 * command: backup
 * role: default
 * help: false
 * parameters: []
 * options:
 *   repo1-path:
 *     value: /var/lib/backup
 *     source: file
 * ```
 */
export const renderConfig = (config: ResolvedConfig): string => {
    const options: Record<string, RenderedOption> = {};

    for (const entry of config.entries()) {
        if (entry.source === null) {
            continue;
        }

        options[entry.name] = {
            value: entry.secure && entry.value !== null ? REDACTED : entry.value,
            source: entry.source,
        };
    }

    return yaml.dump({
        command: config.command ?? null,
        role: config.role,
        help: config.help,
        parameters: [...config.params],
        options,
    }, {
        indent: 2,
        lineWidth: 120,
        noRefs: true,
    });
}
