import { DEFAULT_ROLE, HELP_COMMAND } from '../constants';
import { CommandError } from '../error/CommandError';
import { OptionError } from '../error/OptionError';
import { CommandDefinition, OptionSchema } from '../schema/types';
import { ParseContext } from './context';
import { Token } from './tokenizer';

/**
 * Looks up a command given as `<command>` or `<command>:<role>`.
 *
 * @throws {CommandError} When the command or the role is unknown
 */
export const lookupCommand = (schema: OptionSchema, value: string): { command: CommandDefinition; role: string } => {
    const direct = schema.commands.get(value);

    if (direct) {
        if (!direct.roles.includes(DEFAULT_ROLE)) {
            throw CommandError.invalidRole(direct.name, DEFAULT_ROLE);
        }
        return { command: direct, role: DEFAULT_ROLE };
    }

    const parts = value.split(':');

    if (parts.length === 2) {
        const command = schema.commands.get(parts[0]);

        if (command) {
            if (!command.roles.includes(parts[1])) {
                throw CommandError.invalidRole(command.name, parts[1]);
            }
            return { command, role: parts[1] };
        }
    }

    throw CommandError.invalidCommand(value);
}

const recordOption = (context: ParseContext, token: Extract<Token, { type: 'option' }>): void => {
    const { option } = token;
    const definition = context.definition(option.optionId);
    const name = context.optionName(option.optionId, option.index);

    if (definition.secure) {
        throw OptionError.secure(name);
    }

    const occurrence = context.store.getOrCreate(option.optionId, option.index);

    if (!occurrence.found) {
        occurrence.found = true;
        occurrence.negate = option.negate;
        occurrence.reset = option.reset;
        occurrence.source = 'param';

        if (token.value !== undefined) {
            occurrence.values = [token.value];
        }
        return;
    }

    if (occurrence.negate && option.negate) {
        throw OptionError.negatedMultiple(name);
    }

    if (occurrence.reset && option.reset) {
        throw OptionError.resetMultiple(name);
    }

    if ((occurrence.reset && option.negate) || (occurrence.negate && option.reset)) {
        throw OptionError.negatedAndReset(name);
    }

    if (occurrence.negate !== option.negate) {
        throw OptionError.setAndNegated(name);
    }

    if (occurrence.reset !== option.reset) {
        throw OptionError.setAndReset(name);
    }

    if (token.value !== undefined && definition.multi) {
        occurrence.values.push(token.value);
        return;
    }

    throw OptionError.multiple(name);
}

/**
 * Applies classified command-line tokens to the parse context: sets the
 * command, role, help flag and parameters and records every option
 * occurrence with source `param`.
 *
 * No arguments at all is a help request.
 *
 * @throws {CommandError} For unknown commands, a missing command, or parameters the command does not take
 * @throws {OptionError} For secure options and conflicting repeated options
 */
export const parseCommandLine = (context: ParseContext, tokens: readonly Token[]): void => {
    let commandSet = false;

    for (const token of tokens) {
        switch (token.type) {
            case 'command': {
                const { command, role } = lookupCommand(context.schema, token.value);
                context.command = command;
                context.role = role;

                if (command.name === HELP_COMMAND) {
                    context.help = true;
                } else {
                    commandSet = true;
                }
                break;
            }
            case 'parameter':
                context.params.push(token.value);
                break;
            case 'option':
                recordOption(context, token);
                break;
        }
    }

    if (!commandSet && !context.help) {
        if (tokens.length > 0) {
            throw CommandError.noCommand();
        }
        context.help = true;
    }

    if (context.params.length > 0 && !context.help && context.command && !context.command.parameterAllowed) {
        throw CommandError.parametersNotAllowed(context.command.name);
    }
}
