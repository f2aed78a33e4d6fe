import * as fs from 'fs';
import * as path from 'path';

import { CompdbEditError, errorMessage, IOFailureError } from './errors';

export const DEFAULT_DATABASE_FILE = 'compile_commands.json';

/**
 * Decode a compilation database. A lone top-level object is accepted as a
 * one-entry database.
 */
export function parseDatabase(text: string, source: string): unknown[] {
    let parsed: unknown;
    try {
        parsed = JSON.parse(text);
    } catch (error) {
        throw new CompdbEditError(`Could not parse ${source} as JSON: ${errorMessage(error)}`, 'CONFIG', error);
    }

    if (Array.isArray(parsed)) return parsed;
    if (typeof parsed === 'object' && parsed !== null) return [parsed];
    throw new CompdbEditError(`${source} is not a compilation database: the top level must be an array or object`, 'CONFIG');
}

export function formatDatabase(entries: readonly unknown[]): string {
    return JSON.stringify(entries, null, 2) + '\n';
}

export function loadDatabase(filePath: string): unknown[] {
    let text: string;
    try {
        text = fs.readFileSync(filePath, 'utf8');
    } catch (error) {
        throw new IOFailureError(`Could not read ${filePath}: ${errorMessage(error)}`, filePath, error);
    }
    return parseDatabase(text, filePath);
}

/**
 * Serialize first, then write a sibling temp file and rename it over the target so a
 * failure at any point leaves the previous database in place.
 */
export function writeDatabaseAtomic(filePath: string, entries: readonly unknown[]): void {
    const content = formatDatabase(entries);
    const target = path.resolve(filePath);
    const tmp = path.join(path.dirname(target), `.${path.basename(target)}.${process.pid}.tmp`);

    try {
        fs.mkdirSync(path.dirname(target), { recursive: true });
        fs.writeFileSync(tmp, content, 'utf8');
        fs.renameSync(tmp, target);
    } catch (error) {
        fs.rmSync(tmp, { force: true });
        throw new IOFailureError(`Could not write ${filePath}: ${errorMessage(error)}`, filePath, error);
    }
}
