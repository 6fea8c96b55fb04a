import { StanzaconfError } from './StanzaconfError';

/**
 * Error thrown when a required option resolves to no value and has no default.
 */
export class OptionRequiredError extends StanzaconfError {
    public readonly command: string;
    public readonly option: string;

    constructor(command: string, option: string, stanzaScoped: boolean) {
        super(`${command} command requires option: ${option}${stanzaScoped ? '\nHINT: does this stanza exist?' : ''}`);
        this.name = 'OptionRequiredError';
        this.command = command;
        this.option = option;
    }
}
