import { StanzaconfError } from './StanzaconfError';

/**
 * Error thrown when configuration text is not well-formed INI.
 *
 * `line` is 1-based and refers to the text that was being parsed, which for
 * merged include files is the concatenated text.
 */
export class IniFormatError extends StanzaconfError {
    public readonly line: number;

    constructor(message: string, line: number) {
        super(message);
        this.name = 'IniFormatError';
        this.line = line;
    }

    static outsideSection(line: number, text: string): IniFormatError {
        return new IniFormatError(`key/value found outside of section at line ${line}: ${text}`, line);
    }

    static unterminatedSection(line: number, text: string): IniFormatError {
        return new IniFormatError(`ini section should end with ] at line ${line}: ${text}`, line);
    }

    static missingEquals(line: number, text: string): IniFormatError {
        return new IniFormatError(`missing '=' in key/value at line ${line}: ${text}`, line);
    }

    static emptyKey(line: number, text: string): IniFormatError {
        return new IniFormatError(`key is zero-length at line ${line}: ${text}`, line);
    }
}
