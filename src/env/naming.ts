/**
 * Convert an environment variable name to the option name it sets.
 *
 * Examples (prefix `DEMO_`):
 *   DEMO_REPO1_PATH -> repo1-path
 *   DEMO_LOG_LEVEL_CONSOLE -> log-level-console
 *
 * @param key - Full environment variable name, starting with the prefix
 * @param keyPrefix - Prefix including the trailing underscore
 */
export function envKeyToOptionName(key: string, keyPrefix: string): string {
    return key.slice(keyPrefix.length).toLowerCase().replace(/_/g, '-');
}

