import { SchemaError } from '../error/SchemaError';
import { OptionDefinition } from './types';

/**
 * Computes the order in which options are resolved so that every option
 * comes after the options it depends on under any command.
 *
 * The order is a depth-first post-order over the declared dependency edges,
 * visiting options in declaration order, so unrelated options keep their
 * declared order.
 *
 * @throws {SchemaError} When the dependencies form a cycle
 */
export const computeResolveOrder = (options: Map<string, OptionDefinition>): string[] => {
    const dependsOn = new Map<string, string[]>();

    for (const definition of options.values()) {
        const depends = new Set<string>();
        for (const rule of definition.commands.values()) {
            if (rule.depend) {
                depends.add(rule.depend.option);
            }
        }
        dependsOn.set(definition.id, [...depends]);
    }

    const order: string[] = [];
    const state = new Map<string, 'visiting' | 'done'>();

    const visit = (optionId: string, chain: string[]): void => {
        const current = state.get(optionId);

        if (current === 'done') {
            return;
        }

        if (current === 'visiting') {
            throw SchemaError.cycle([...chain.slice(chain.indexOf(optionId)), optionId]);
        }

        state.set(optionId, 'visiting');

        for (const dependId of dependsOn.get(optionId) ?? []) {
            visit(dependId, [...chain, optionId]);
        }

        state.set(optionId, 'done');
        order.push(optionId);
    }

    for (const optionId of options.keys()) {
        visit(optionId, []);
    }

    return order;
}
