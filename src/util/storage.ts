import * as fs from 'fs';
import { FileSystemError } from '../error/FileSystemError';

export interface ReadFileOptions {
    /** Return `null` instead of throwing when the file does not exist */
    ignoreMissing?: boolean;
}

export interface ListOptions {
    /** Only names matching this expression are returned */
    expression?: RegExp;
    /** Throw when the directory does not exist, else return `null` */
    errorOnMissing?: boolean;
}

/**
 * Synchronous file-system accessor used by the configuration loader.
 */
export interface Utility {
    readFile: (path: string, options?: ReadFileOptions) => string | null;
    list: (path: string, options?: ListOptions) => string[] | null;
}

const isErrnoException = (error: unknown): error is NodeJS.ErrnoException =>
    error instanceof Error && 'code' in error;

const isMissing = (error: unknown): boolean =>
    isErrnoException(error) && (error.code === 'ENOENT' || error.code === 'ENOTDIR');

const asError = (error: unknown): Error =>
    error instanceof Error ? error : new Error(String(error));

export const create = (params: { log?: (message: string, ...args: unknown[]) => void; encoding?: BufferEncoding }): Utility => {
    // eslint-disable-next-line no-console
    const log = params.log || console.log;
    const encoding = params.encoding || 'utf8';

    const readFile = (path: string, options: ReadFileOptions = {}): string | null => {
        try {
            const content = fs.readFileSync(path, { encoding });
            log(`Read file ${path}`);
            return content;
        } catch (error) {
            if (isMissing(error)) {
                if (options.ignoreMissing) {
                    log(`File ${path} is missing, ignoring`);
                    return null;
                }
                throw FileSystemError.fileNotFound(path);
            }
            throw FileSystemError.operationFailed('read file', path, asError(error));
        }
    }

    const list = (path: string, options: ListOptions = {}): string[] | null => {
        let names: string[];

        try {
            names = fs.readdirSync(path);
        } catch (error) {
            if (isMissing(error)) {
                if (options.errorOnMissing) {
                    throw FileSystemError.directoryNotFound(path);
                }
                log(`Directory ${path} is missing, ignoring`);
                return null;
            }
            throw FileSystemError.operationFailed('list directory', path, asError(error));
        }

        const expression = options.expression;
        return expression ? names.filter((name) => expression.test(name)) : names;
    }

    return {
        readFile,
        list,
    };
}
