import { DEFAULT_ROLE } from '../constants';
import { optionIndexName } from '../schema/names';
import { CommandDefinition, OptionCommandRule, OptionDefinition, OptionSchema } from '../schema/types';
import { Logger } from '../types';

/** Where a parsed option value came from. */
export type OccurrenceSource = 'param' | 'env' | 'file';

/**
 * What was seen for one option at one (sparse) index while parsing.
 */
export interface OptionOccurrence {
    found: boolean;
    negate: boolean;
    reset: boolean;
    source?: OccurrenceSource;
    values: string[];
}

/**
 * Per option, per sparse index record of every occurrence seen by the
 * command-line, environment and configuration file phases.
 */
export class OccurrenceStore {
    private readonly options = new Map<string, Map<number, OptionOccurrence>>();

    get(optionId: string, index: number): OptionOccurrence | undefined {
        return this.options.get(optionId)?.get(index);
    }

    getOrCreate(optionId: string, index: number): OptionOccurrence {
        let indexes = this.options.get(optionId);

        if (!indexes) {
            indexes = new Map();
            this.options.set(optionId, indexes);
        }

        let occurrence = indexes.get(index);

        if (!occurrence) {
            occurrence = { found: false, negate: false, reset: false, values: [] };
            indexes.set(index, occurrence);
        }

        return occurrence;
    }

    /** Sparse indexes at which the option was found, ascending */
    foundIndexes(optionId: string): number[] {
        const indexes = this.options.get(optionId);

        if (!indexes) {
            return [];
        }

        return [...indexes.entries()]
            .filter(([, occurrence]) => occurrence.found)
            .map(([index]) => index)
            .sort((a, b) => a - b);
    }

    /** Lowest sparse index at which the option was found from `source` */
    firstIndexFrom(optionId: string, source: OccurrenceSource): number | undefined {
        return this.foundIndexes(optionId).find((index) => this.get(optionId, index)?.source === source);
    }

    /** First value given for an ungrouped option, if any */
    value(optionId: string): string | undefined {
        const occurrence = this.get(optionId, 0);
        return occurrence?.found ? occurrence.values[0] : undefined;
    }
}

/**
 * State of one resolution pass, created once per call and threaded through
 * every phase.
 */
export class ParseContext {
    readonly store = new OccurrenceStore();
    command?: CommandDefinition;
    role = DEFAULT_ROLE;
    help = false;
    readonly params: string[] = [];

    constructor(
        readonly schema: OptionSchema,
        readonly logger: Logger,
        private readonly quietRoles: readonly string[] = []
    ) { }

    /** Reports an ignored entry unless the active role keeps quiet */
    warn(message: string): void {
        if (!this.quietRoles.includes(this.role)) {
            this.logger.warn(message);
        }
    }

    definition(optionId: string): OptionDefinition {
        const definition = this.schema.options.get(optionId);

        if (!definition) {
            throw new Error(`option '${optionId}' is not defined in the schema`);
        }

        return definition;
    }

    /** Rules of the option under the active command, undefined when not valid */
    rule(optionId: string): OptionCommandRule | undefined {
        return this.command === undefined ? undefined : this.schema.options.get(optionId)?.commands.get(this.command.name);
    }

    isValid(optionId: string): boolean {
        return this.rule(optionId) !== undefined;
    }

    optionName(optionId: string, index: number): string {
        return optionIndexName(this.schema, optionId, index);
    }
}
