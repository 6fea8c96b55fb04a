import { OptionValueError } from '../error/OptionValueError';

/**
 * Validates an absolute path option value and strips one trailing slash.
 *
 * @param value - Raw value as given by the user
 * @param name - Option name used in error messages
 * @returns The normalized path
 * @throws {OptionValueError} When the value is empty, relative, or contains `//`
 */
export const normalizeOptionPath = (value: string, name: string): string => {
    if (value.length === 0) {
        throw OptionValueError.pathEmpty(value, name);
    }

    if (!value.startsWith('/')) {
        throw OptionValueError.pathNotAbsolute(value, name);
    }

    if (value.includes('//')) {
        throw OptionValueError.pathDoubleSlash(value, name);
    }

    if (value.endsWith('/') && value.length !== 1) {
        return value.slice(0, -1);
    }

    return value;
}
