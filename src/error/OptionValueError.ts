import { StanzaconfError } from './StanzaconfError';

export type OptionValueErrorType =
    | 'invalid_value'
    | 'out_of_range'
    | 'invalid_path'
    | 'not_allowed'
    | 'missing_value'
    | 'invalid_boolean';

/**
 * Error thrown when an option carries a value that cannot be accepted.
 */
export class OptionValueError extends StanzaconfError {
    public readonly errorType: OptionValueErrorType;
    public readonly option: string;
    public readonly value: string;

    constructor(errorType: OptionValueErrorType, message: string, option: string, value: string) {
        super(message);
        this.name = 'OptionValueError';
        this.errorType = errorType;
        this.option = option;
        this.value = value;
    }

    static invalid(value: string, name: string): OptionValueError {
        return new OptionValueError('invalid_value', `'${value}' is not valid for '${name}' option`, name, value);
    }

    static outOfRange(value: string, name: string): OptionValueError {
        return new OptionValueError('out_of_range', `'${value}' is out of range for '${name}' option`, name, value);
    }

    static pathEmpty(value: string, name: string): OptionValueError {
        return new OptionValueError('invalid_path', `'${value}' must be >= 1 character for '${name}' option`, name, value);
    }

    static pathNotAbsolute(value: string, name: string): OptionValueError {
        return new OptionValueError('invalid_path', `'${value}' must begin with / for '${name}' option`, name, value);
    }

    static pathDoubleSlash(value: string, name: string): OptionValueError {
        return new OptionValueError('invalid_path', `'${value}' cannot contain // for '${name}' option`, name, value);
    }

    static notAllowed(value: string, name: string): OptionValueError {
        return new OptionValueError('not_allowed', `'${value}' is not allowed for '${name}' option`, name, value);
    }

    static environmentEmpty(key: string): OptionValueError {
        return new OptionValueError('missing_value', `environment variable '${key}' must have a value`, key, '');
    }

    static environmentBoolean(key: string, value: string): OptionValueError {
        return new OptionValueError('invalid_boolean', `environment boolean option '${key}' must be 'y' or 'n'`, key, value);
    }

    static sectionEmpty(section: string, key: string): OptionValueError {
        return new OptionValueError('missing_value', `section '${section}', key '${key}' must have a value`, key, '');
    }

    static fileBoolean(key: string, value: string): OptionValueError {
        return new OptionValueError('invalid_boolean', `boolean option '${key}' must be 'y' or 'n'`, key, value);
    }
}
