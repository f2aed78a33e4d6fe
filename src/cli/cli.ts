#!/usr/bin/env node
import { readPackageInfo } from './packageInfo';
import { runCli } from './runCli';

async function main(): Promise<void> {
    const exitCode = await runCli(process.argv, {
        tool: readPackageInfo(),
        io: process,
        env: process.env
    });
    process.exitCode = exitCode;
}

void main();
