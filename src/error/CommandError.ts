import { StanzaconfError } from './StanzaconfError';

export type CommandErrorType = 'invalid_command' | 'invalid_role' | 'no_command' | 'param_invalid';

/**
 * Error thrown when the command portion of the argument list cannot be used.
 */
export class CommandError extends StanzaconfError {
    public readonly errorType: CommandErrorType;
    public readonly command?: string;

    constructor(errorType: CommandErrorType, message: string, command?: string) {
        super(message);
        this.name = 'CommandError';
        this.errorType = errorType;
        this.command = command;
    }

    static invalidCommand(command: string): CommandError {
        return new CommandError('invalid_command', `invalid command '${command}'`, command);
    }

    static invalidRole(command: string, role: string): CommandError {
        return new CommandError('invalid_role', `invalid command role '${role}' for command '${command}'`, command);
    }

    static noCommand(): CommandError {
        return new CommandError('no_command', 'no command found');
    }

    static parametersNotAllowed(command: string): CommandError {
        return new CommandError('param_invalid', 'command does not allow parameters', command);
    }
}
