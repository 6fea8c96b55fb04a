import * as fs from 'fs';
import * as path from 'path';
import { Mock, vi } from 'vitest';
import { loadSchema } from '../src/schema/loader';
import { OptionSchema } from '../src/schema/types';
import type { Logger } from '../src/types';

export const DEMO_SCHEMA_PATH = path.join(__dirname, 'fixtures', 'demo-schema.yaml');

/**
 * Loads the demo schema, optionally with text replacements applied first
 * (used to point default file locations into a temporary directory).
 */
export const loadDemoSchema = (replacements: Record<string, string> = {}): OptionSchema => {
    let text = fs.readFileSync(DEMO_SCHEMA_PATH, 'utf8');

    for (const [from, to] of Object.entries(replacements)) {
        text = text.split(from).join(to);
    }

    return loadSchema(text);
}

export type MockLogger = { [K in keyof Logger]: Mock };

export const createMockLogger = (): MockLogger => ({
    debug: vi.fn(),
    info: vi.fn(),
    warn: vi.fn(),
    error: vi.fn(),
    verbose: vi.fn(),
    silly: vi.fn(),
});
