import * as path from 'path';

import { Command, CommanderError } from 'commander';

import { loadConfig, writeDefaultConfig } from '../core/config';
import { DEFAULT_DATABASE_FILE } from '../core/database';
import { runEdit } from '../core/editEngine';
import { CompdbEditError } from '../core/errors';
import { formatJson } from '../core/formatters/json';
import { formatPretty } from '../core/formatters/pretty';
import type { Logger } from '../core/logger';
import { createStreamLogger, NullLogger } from '../core/logger';
import type { EditOperation } from '../core/model';
import { addArgument, addInclude, removeArgument, removeInclude } from '../core/operations';

export interface CliIO {
    stdout: { write(chunk: string): void };
    stderr: { write(chunk: string): void };
}

export interface CliDeps {
    tool: { name: string; version: string };
    io: CliIO;
    env: NodeJS.ProcessEnv;
    cwd?: string;
    logger?: Logger;
}

interface EditCommandOptions {
    compileCommands: string;
    output?: string;
    dryRun?: boolean;
    bestEffort?: boolean;
    failFast?: boolean;
    format: string;
}

// `--add-arg Wall` means `-Wall`; values that already start with a dash are kept.
function withLeadingDash(arg: string): string {
    return arg.startsWith('-') ? arg : `-${arg}`;
}

export async function runCli(argv: string[], deps: CliDeps): Promise<number> {
    const io = deps.io;
    const env = deps.env;
    const cwd = deps.cwd ?? process.cwd();
    const baseLogger = deps.logger || new NullLogger();

    let exitCode = 0;
    // Filled while commander parses, so the order matches the command line across flags.
    const operations: EditOperation[] = [];
    const collect = (make: (value: string) => EditOperation) =>
        (value: string, previous: string[]): string[] => {
            operations.push(make(value));
            return [...previous, value];
        };

    const program = new Command();
    program
        .name(deps.tool.name)
        .description('Add or remove include directories in a clang compilation database')
        .version(deps.tool.version)
        .option('-v, --verbose', 'Enable verbose logging')
        .configureOutput({
            writeOut: (s) => io.stdout.write(s),
            writeErr: (s) => io.stderr.write(s)
        });
    program.exitOverride();

    program
        .command('edit', { isDefault: true })
        .description('Edit the include directories of every entry in a compilation database')
        .option('-c, --compile-commands <file>', 'Input compilation database', DEFAULT_DATABASE_FILE)
        .option('-o, --output <file>', 'Where to write the edited database (default: the input file)')
        .option('-i, --add-include <dir>', 'Add an include directory to every entry (repeatable)', collect(addInclude), [])
        .option('-d, --delete-include <dir>', 'Remove an include directory or glob from every entry (repeatable)', collect(removeInclude), [])
        .option('--add-arg <arg>', 'Append a compiler argument to every entry (repeatable)', collect(v => addArgument(withLeadingDash(v))), [])
        .option('--delete-arg <arg>', 'Remove a compiler argument from every entry (repeatable)', collect(v => removeArgument(withLeadingDash(v))), [])
        .option('--dry-run', 'Report what would change without writing')
        .option('--best-effort', 'Write the database even if some entries could not be edited')
        .option('--fail-fast', 'Stop at the first entry that cannot be edited')
        .option('--format <format>', 'pretty|json', 'pretty')
        .allowExcessArguments(false)
        .action((opts: EditCommandOptions) => {
            const verbose = Boolean(program.opts<{ verbose?: boolean }>().verbose);
            const logger = verbose ? createStreamLogger(io.stderr) : baseLogger;

            const format = String(opts.format || 'pretty').toLowerCase();
            if (format !== 'pretty' && format !== 'json') {
                throw new CompdbEditError(`Unknown format: ${format}`, 'CONFIG');
            }

            if (operations.length === 0) {
                io.stdout.write('No modifications requested, exiting.\n');
                return;
            }

            const input = path.resolve(cwd, opts.compileCommands);
            const output = opts.output ? path.resolve(cwd, opts.output) : undefined;
            const { config, configFile } = loadConfig(path.dirname(input), {
                bestEffort: opts.bestEffort,
                failFast: opts.failFast
            }, env);
            if (configFile) logger.debug('Using config file', { configFile });

            const result = runEdit({
                input,
                output,
                operations,
                config,
                configFile,
                dryRun: opts.dryRun,
                tool: deps.tool,
                logger
            });

            io.stdout.write(format === 'json' ? formatJson(result) : formatPretty(result));
            exitCode = result.failures.length > 0 ? 1 : 0;
        });

    program
        .command('config')
        .description('Configuration helpers')
        .command('init')
        .description('Create a default .compdbeditrc.json in the current directory')
        .option('-f, --force', 'Overwrite if it already exists')
        .action((opts: { force?: boolean }) => {
            const written = writeDefaultConfig(cwd, Boolean(opts.force));
            io.stdout.write(`Wrote config: ${written}\n`);
        });

    try {
        await program.parseAsync(argv, { from: 'node' });
        return exitCode;
    } catch (error) {
        if (error instanceof CommanderError) {
            if (error.code === 'commander.helpDisplayed' || error.code === 'commander.version') {
                return 0;
            }
            // commander has already printed its own message.
            return 2;
        }
        if (error instanceof CompdbEditError) {
            io.stderr.write(`${error.message}\n`);
            return 2;
        }
        throw error;
    }
}
