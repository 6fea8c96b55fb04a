import { StanzaconfError } from './StanzaconfError';

export type OptionErrorType =
    | 'invalid'
    | 'requires_argument'
    | 'no_argument'
    | 'multiple'
    | 'modifier_conflict'
    | 'secure'
    | 'invalid_for_command'
    | 'dependency'
    | 'duplicate'
    | 'key_value';

/**
 * Error thrown when an option is used in a way its definition forbids.
 *
 * `option` holds the offending token or option name as the user spelled it.
 */
export class OptionError extends StanzaconfError {
    public readonly errorType: OptionErrorType;
    public readonly option: string;

    constructor(errorType: OptionErrorType, message: string, option: string) {
        super(message);
        this.name = 'OptionError';
        this.errorType = errorType;
        this.option = option;
    }

    static invalid(token: string): OptionError {
        return new OptionError('invalid', `invalid option '${token}'`, token);
    }

    static requiresArgument(token: string): OptionError {
        return new OptionError('requires_argument', `option '${token}' requires argument`, token);
    }

    static noArgument(token: string): OptionError {
        return new OptionError('no_argument', `option '${token}' does not allow an argument`, token);
    }

    static multiple(name: string): OptionError {
        return new OptionError('multiple', `option '${name}' cannot be set multiple times`, name);
    }

    static negatedMultiple(name: string): OptionError {
        return new OptionError('modifier_conflict', `option '${name}' is negated multiple times`, name);
    }

    static resetMultiple(name: string): OptionError {
        return new OptionError('modifier_conflict', `option '${name}' is reset multiple times`, name);
    }

    static negatedAndReset(name: string): OptionError {
        return new OptionError('modifier_conflict', `option '${name}' cannot be negated and reset`, name);
    }

    static setAndNegated(name: string): OptionError {
        return new OptionError('modifier_conflict', `option '${name}' cannot be set and negated`, name);
    }

    static setAndReset(name: string): OptionError {
        return new OptionError('modifier_conflict', `option '${name}' cannot be set and reset`, name);
    }

    static secure(name: string): OptionError {
        return new OptionError(
            'secure',
            `option '${name}' is not allowed on the command-line\n` +
            'HINT: this option could expose secrets in the process list.\n' +
            'HINT: specify the option in a configuration file or an environment variable instead.',
            name
        );
    }

    static invalidForCommand(name: string, command: string): OptionError {
        return new OptionError('invalid_for_command', `option '${name}' not valid for command '${command}'`, name);
    }

    static dependency(name: string, dependName: string, valueText = ''): OptionError {
        return new OptionError('dependency', `option '${name}' not valid without option '${dependName}'${valueText}`, name);
    }

    static duplicate(key: string, otherKey: string, section: string): OptionError {
        return new OptionError(
            'duplicate',
            `configuration file contains duplicate options ('${key}', '${otherKey}') in section '[${section}]'`,
            key
        );
    }

    static keyValue(value: string, name: string): OptionError {
        return new OptionError('key_value', `key/value '${value}' not valid for '${name}' option`, name);
    }
}
