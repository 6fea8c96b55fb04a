/**
 * Base class for every hard error raised while resolving a configuration.
 *
 * Catching this class is enough to tell a resolution failure apart from an
 * unexpected runtime error.
 */
export class StanzaconfError extends Error {
    constructor(message: string) {
        super(message);
        this.name = 'StanzaconfError';
    }
}
