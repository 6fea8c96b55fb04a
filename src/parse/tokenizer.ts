import { HELP_COMMAND } from '../constants';
import { OptionError } from '../error/OptionError';
import { LongOption } from '../schema/types';

/**
 * One classified command-line argument.
 */
export type Token =
    | { type: 'command'; value: string }
    | { type: 'parameter'; value: string }
    | { type: 'option'; token: string; option: LongOption; value?: string };

/**
 * Classifies the argument vector against the long-option table.
 *
 * The first non-option argument is the command (`help` lets the next one
 * name a command too), later ones are command parameters, as is everything
 * after a bare `--`. Options are `--name`, `--name=value` or `--name value`
 * for options that take a value.
 *
 * @param argv - Arguments without the executable
 * @param optionTable - Every accepted option spelling
 * @throws {OptionError} For unknown options and options missing their value
 */
export const tokenize = (argv: readonly string[], optionTable: ReadonlyMap<string, LongOption>): Token[] => {
    const tokens: Token[] = [];
    let commandSet = false;
    let optionsEnded = false;

    for (let argIdx = 0; argIdx < argv.length; argIdx++) {
        const arg = argv[argIdx];

        if (optionsEnded) {
            tokens.push({ type: 'parameter', value: arg });
            continue;
        }

        if (arg === '--') {
            optionsEnded = true;
            continue;
        }

        if (arg.startsWith('--')) {
            const body = arg.slice(2);
            const equal = body.indexOf('=');
            const name = equal === -1 ? body : body.slice(0, equal);
            const option = optionTable.get(name);

            if (!option) {
                throw OptionError.invalid(arg);
            }

            if (!option.takesValue) {
                if (equal !== -1) {
                    throw OptionError.noArgument(`--${name}`);
                }
                tokens.push({ type: 'option', token: arg, option });
                continue;
            }

            let value: string | undefined;

            if (equal !== -1) {
                value = body.slice(equal + 1);
            } else if (argIdx + 1 < argv.length) {
                argIdx++;
                value = argv[argIdx];
            } else {
                throw OptionError.requiresArgument(arg);
            }

            tokens.push({ type: 'option', token: arg, option, value });
            continue;
        }

        if (arg.startsWith('-') && arg.length > 1) {
            throw OptionError.invalid(arg);
        }

        if (!commandSet) {
            tokens.push({ type: 'command', value: arg });
            commandSet = arg.split(':')[0] !== HELP_COMMAND;
        } else {
            tokens.push({ type: 'parameter', value: arg });
        }
    }

    return tokens;
}
