import { StanzaconfError } from './StanzaconfError';

/**
 * Error thrown when an argument passed to the stanzaconf front end is invalid.
 */
export class ArgumentError extends StanzaconfError {
    private argumentName: string;

    constructor(argumentName: string, message: string) {
        super(message);
        this.name = 'ArgumentError';
        this.argumentName = argumentName;
    }

    get argument(): string {
        return this.argumentName;
    }
}
