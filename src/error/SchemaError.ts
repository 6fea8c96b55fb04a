import { StanzaconfError } from './StanzaconfError';

export type SchemaErrorType = 'validation' | 'reference' | 'cycle' | 'default';

/**
 * Error thrown when an option schema document cannot be loaded.
 */
export class SchemaError extends StanzaconfError {
    public readonly errorType: SchemaErrorType;
    public readonly details?: unknown;

    constructor(errorType: SchemaErrorType, message: string, details?: unknown) {
        super(message);
        this.name = 'SchemaError';
        this.errorType = errorType;
        this.details = details;
    }

    static validation(message: string, details?: unknown): SchemaError {
        return new SchemaError('validation', message, details);
    }

    static reference(message: string): SchemaError {
        return new SchemaError('reference', message);
    }

    static cycle(chain: string[]): SchemaError {
        return new SchemaError('cycle', `option dependency cycle detected: ${chain.join(' -> ')}`, chain);
    }

    static invalidDefault(option: string, cause: Error): SchemaError {
        return new SchemaError('default', `default for option '${option}' is invalid: ${cause.message}`, cause);
    }
}
