export { StanzaconfError } from './StanzaconfError';
export { ArgumentError } from './ArgumentError';
export { CommandError } from './CommandError';
export { OptionError } from './OptionError';
export { OptionValueError } from './OptionValueError';
export { OptionRequiredError } from './OptionRequiredError';
export { FileSystemError } from './FileSystemError';
export { IniFormatError } from './IniFormatError';
export { SchemaError } from './SchemaError';

export type { CommandErrorType } from './CommandError';
export type { OptionErrorType } from './OptionError';
export type { OptionValueErrorType } from './OptionValueError';
export type { FileSystemErrorType } from './FileSystemError';
export type { SchemaErrorType } from './SchemaError';
