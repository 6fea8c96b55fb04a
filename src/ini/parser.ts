import { IniFormatError } from '../error/IniFormatError';

/**
 * Parsed INI text: section → key → values, in the order they first appeared.
 * A key that appears more than once in a section is a list.
 */
export class IniDocument {
    private readonly sections = new Map<string, Map<string, string[]>>();

    /** @internal used by the parser */
    add(section: string, key: string, value: string): void {
        let keys = this.sections.get(section);

        if (!keys) {
            keys = new Map();
            this.sections.set(section, keys);
        }

        const values = keys.get(key);

        if (values) {
            values.push(value);
        } else {
            keys.set(key, [value]);
        }
    }

    sectionList(): string[] {
        return [...this.sections.keys()];
    }

    /** Keys of a section, empty when the section does not exist */
    sectionKeyList(section: string): string[] {
        return [...(this.sections.get(section)?.keys() ?? [])];
    }

    /** First value of a key */
    get(section: string, key: string): string | undefined {
        return this.sections.get(section)?.get(key)?.[0];
    }

    getList(section: string, key: string): string[] {
        return [...(this.sections.get(section)?.get(key) ?? [])];
    }

    isList(section: string, key: string): boolean {
        return (this.sections.get(section)?.get(key)?.length ?? 0) > 1;
    }
}

/**
 * Parses INI text.
 *
 * Lines are trimmed. Blank lines and lines starting with `#` are skipped,
 * `[name]` starts a section (repeated headers continue the same section) and
 * every other line must be `key=value` inside a section. Whitespace around
 * the key and the value is dropped.
 *
 * @throws {IniFormatError} When a line cannot be parsed
 */
export const parseIni = (text: string): IniDocument => {
    const document = new IniDocument();
    const lines = text.split('\n');
    let section: string | undefined;

    lines.forEach((rawLine, lineIdx) => {
        const line = rawLine.trim();
        const lineNumber = lineIdx + 1;

        if (line.length === 0 || line.startsWith('#')) {
            return;
        }

        if (line.startsWith('[')) {
            if (!line.endsWith(']')) {
                throw IniFormatError.unterminatedSection(lineNumber, line);
            }

            section = line.slice(1, -1).trim();
            return;
        }

        if (section === undefined) {
            throw IniFormatError.outsideSection(lineNumber, line);
        }

        const equal = line.indexOf('=');

        if (equal === -1) {
            throw IniFormatError.missingEquals(lineNumber, line);
        }

        const key = line.slice(0, equal).trim();

        if (key.length === 0) {
            throw IniFormatError.emptyKey(lineNumber, line);
        }

        document.add(section, key, line.slice(equal + 1).trim());
    });

    return document;
}
