import { StanzaconfError } from './StanzaconfError';

export type FileSystemErrorType = 'not_found' | 'no_files' | 'operation_failed';

/**
 * Error thrown when a configuration file or include directory cannot be read.
 */
export class FileSystemError extends StanzaconfError {
    public readonly errorType: FileSystemErrorType;
    public readonly path: string;
    public readonly operation: string;
    public readonly originalError?: Error;

    constructor(
        errorType: FileSystemErrorType,
        message: string,
        path: string,
        operation: string,
        originalError?: Error
    ) {
        super(message);
        this.name = 'FileSystemError';
        this.errorType = errorType;
        this.path = path;
        this.operation = operation;
        this.originalError = originalError;
    }

    static fileNotFound(path: string): FileSystemError {
        return new FileSystemError('not_found', `unable to open missing file '${path}' for read`, path, 'file_read');
    }

    static directoryNotFound(path: string): FileSystemError {
        return new FileSystemError('not_found', `unable to list file info for missing path '${path}'`, path, 'directory_list');
    }

    static noIncludeFiles(path: string): FileSystemError {
        return new FileSystemError('no_files', `no configuration files found in include path '${path}'`, path, 'directory_list');
    }

    static operationFailed(operation: string, path: string, originalError: Error): FileSystemError {
        return new FileSystemError(
            'operation_failed',
            `Failed to ${operation}: ${originalError.message || 'Unknown error'}`,
            path,
            operation,
            originalError
        );
    }
}
