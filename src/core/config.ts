import * as fs from 'fs';
import * as path from 'path';

import { parse as parseJsonc } from 'jsonc-parser';
import type { ParseError } from 'jsonc-parser';

import { DEFAULT_INCLUDE_FLAGS } from './classify';
import type { IncludeFlagSpec } from './classify';
import { CompdbEditError, errorMessage } from './errors';
import type { FlagForm } from './model';

export const DEFAULT_CONFIG_FILE = '.compdbeditrc.json';

export interface CompdbEditConfig {
    includeFlags: IncludeFlagSpec[];
    addFlag: string;
    addStyle: FlagForm;
    bestEffort: boolean;
    failFast: boolean;
}

export interface LoadedConfig {
    config: CompdbEditConfig;
    configFile?: string;
}

export const DEFAULTS: CompdbEditConfig = {
    includeFlags: DEFAULT_INCLUDE_FLAGS.map(f => ({ ...f })),
    addFlag: '-I',
    addStyle: 'separate',
    bestEffort: false,
    failFast: false
};

export type CliOverrides = Partial<Pick<CompdbEditConfig, 'bestEffort' | 'failFast'>>;

function isPlainObject(value: unknown): value is Record<string, unknown> {
    return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function isFlagForm(value: unknown): value is FlagForm {
    return value === 'joined' || value === 'separate';
}

function isIncludeFlagSpec(value: unknown): value is IncludeFlagSpec {
    return isPlainObject(value)
        && typeof value.prefix === 'string'
        && value.prefix.length > 0
        && (value.arity === 1 || value.arity === 2);
}

function parseBoolean(value: string | undefined): boolean | undefined {
    if (value === undefined) return undefined;
    const v = value.trim().toLowerCase();
    if (v === '1' || v === 'true' || v === 'yes') return true;
    if (v === '0' || v === 'false' || v === 'no') return false;
    return undefined;
}

function configFromEnv(env: NodeJS.ProcessEnv): Partial<CompdbEditConfig> {
    const partial: Partial<CompdbEditConfig> = {};

    const bestEffort = parseBoolean(env.COMPDB_EDIT_BEST_EFFORT);
    const failFast = parseBoolean(env.COMPDB_EDIT_FAIL_FAST);
    const addStyle = env.COMPDB_EDIT_ADD_STYLE;

    if (bestEffort !== undefined) partial.bestEffort = bestEffort;
    if (failFast !== undefined) partial.failFast = failFast;
    if (isFlagForm(addStyle)) partial.addStyle = addStyle;

    return partial;
}

/** Keep only the keys of a parsed config file that have a usable value. */
function configFromFile(parsed: Record<string, unknown>): Partial<CompdbEditConfig> {
    const partial: Partial<CompdbEditConfig> = {};
    const { includeFlags, addFlag, addStyle, bestEffort, failFast } = parsed;

    if (Array.isArray(includeFlags)) {
        const specs = includeFlags.filter(isIncludeFlagSpec);
        if (specs.length !== includeFlags.length) {
            throw new Error('includeFlags entries must look like { "prefix": "-I", "arity": 1 | 2 }');
        }
        partial.includeFlags = specs;
    }
    if (typeof addFlag === 'string' && addFlag.length > 0) partial.addFlag = addFlag;
    if (isFlagForm(addStyle)) partial.addStyle = addStyle;
    if (typeof bestEffort === 'boolean') partial.bestEffort = bestEffort;
    if (typeof failFast === 'boolean') partial.failFast = failFast;

    return partial;
}

function mergeConfig(base: CompdbEditConfig, next: Partial<CompdbEditConfig>): CompdbEditConfig {
    const merged: CompdbEditConfig = { ...base };
    if (next.includeFlags) merged.includeFlags = next.includeFlags;
    if (next.addFlag !== undefined) merged.addFlag = next.addFlag;
    if (next.addStyle !== undefined) merged.addStyle = next.addStyle;
    if (next.bestEffort !== undefined) merged.bestEffort = next.bestEffort;
    if (next.failFast !== undefined) merged.failFast = next.failFast;
    return merged;
}

/**
 * The flag used for added directories must itself be in `includeFlags`, otherwise a
 * directory added on one run is not seen on the next and gets added again.
 */
export function assertAddFlagRecognized(config: CompdbEditConfig, configFile?: string): void {
    const where = configFile ? ` (${configFile})` : '';
    if (config.includeFlags.length === 0) {
        throw new CompdbEditError(`includeFlags must not be empty${where}`, 'CONFIG');
    }
    const arity = config.addStyle === 'joined' ? 1 : 2;
    if (!config.includeFlags.some(f => f.prefix === config.addFlag && f.arity === arity)) {
        throw new CompdbEditError(
            `addFlag ${config.addFlag} with addStyle ${config.addStyle} needs { "prefix": "${config.addFlag}", "arity": ${arity} } in includeFlags${where}`,
            'CONFIG'
        );
    }
}

export function findConfigFile(startDir: string): string | undefined {
    let cur = path.resolve(startDir);
    while (true) {
        const candidate = path.join(cur, DEFAULT_CONFIG_FILE);
        if (fs.existsSync(candidate)) return candidate;

        const parent = path.dirname(cur);
        if (parent === cur) break;
        cur = parent;
    }

    return undefined;
}

export function parseConfigText(text: string): Partial<CompdbEditConfig> {
    const errors: ParseError[] = [];
    const parsed: unknown = parseJsonc(text, errors, { allowTrailingComma: true });
    if (errors.length > 0) {
        throw new Error(`invalid JSON at offset ${errors[0].offset}`);
    }
    if (!isPlainObject(parsed)) {
        throw new Error('Config root must be a JSON object');
    }
    return configFromFile(parsed);
}

/**
 * Precedence: defaults < environment < config file < command-line overrides.
 */
export function loadConfig(startDir: string, overrides: CliOverrides = {}, env: NodeJS.ProcessEnv = process.env): LoadedConfig {
    let config = mergeConfig(DEFAULTS, configFromEnv(env));

    const configFile = findConfigFile(startDir);
    if (configFile) {
        try {
            config = mergeConfig(config, parseConfigText(fs.readFileSync(configFile, 'utf8')));
        } catch (error) {
            throw new CompdbEditError(`Failed to load config at ${configFile}: ${errorMessage(error)}`, 'CONFIG', error);
        }
    }

    config = mergeConfig(config, overrides);
    assertAddFlagRecognized(config, configFile);

    return { config, configFile };
}

export function defaultConfigJson(): string {
    return JSON.stringify(DEFAULTS, null, 2) + '\n';
}

export function writeDefaultConfig(rootPath: string, force = false): string {
    const filePath = path.join(rootPath, DEFAULT_CONFIG_FILE);
    if (!force && fs.existsSync(filePath)) {
        throw new CompdbEditError(`Config file already exists at ${filePath}`, 'CONFIG');
    }
    fs.writeFileSync(filePath, defaultConfigJson(), 'utf8');
    return filePath;
}
