#!/usr/bin/env node

import { Command, InvalidArgumentError } from 'commander';
import { initHome } from './cli/init.js';
import { runBridges } from './cli/run.js';
import { showStatus } from './cli/status.js';
import { showHistory } from './cli/history.js';
import { listTasks } from './cli/tasks.js';
import { errorMessage, isAbortError } from './utils/errors.js';

const program = new Command();

program
    .name('notebridge')
    .description('Convert handwritten note exports into vault Markdown and sync their tasks')
    .version('0.1.0');

function fail(error: unknown): never {
    if (isAbortError(error)) {
        console.error('Run cancelled');
        process.exit(130);
    }
    console.error('Error:', errorMessage(error));
    process.exit(1);
}

function parseLimit(value: string): number {
    const limit = Number.parseInt(value, 10);
    if (!Number.isInteger(limit) || limit < 1) {
        throw new InvalidArgumentError('Must be a positive integer.');
    }
    return limit;
}

// init command
program
    .command('init')
    .description('Create NOTEBRIDGE_HOME with a default config and database')
    .action(async () => {
        try {
            await initHome();
        } catch (error) {
            fail(error);
        }
    });

// run command
program
    .command('run')
    .description('Run all enabled bridges')
    .option('-b, --bridge <name>', 'Run a single bridge')
    .option('-c, --config <path>', 'Config file path')
    .option('-v, --verbose', 'Enable debug logging')
    .action(async (options: { bridge?: string; config?: string; verbose?: boolean }) => {
        try {
            process.exitCode = await runBridges(options);
        } catch (error) {
            fail(error);
        }
    });

// status command
program
    .command('status')
    .description('Show the latest run summary of every bridge')
    .action(async () => {
        try {
            await showStatus();
        } catch (error) {
            fail(error);
        }
    });

// history command
program
    .command('history')
    .description('Show recent runs of a bridge')
    .argument('<bridge>', 'Bridge name')
    .option('-n, --limit <number>', 'Limit number of runs', parseLimit)
    .action(async (bridge: string, options: { limit?: number }) => {
        try {
            await showHistory(bridge, options);
        } catch (error) {
            fail(error);
        }
    });

// tasks command
program
    .command('tasks')
    .description('List extracted tasks and their sync state')
    .option('-b, --bridge <name>', 'Filter by bridge')
    .option('-p, --provider <name>', 'Todo provider (defaults to the configured one)')
    .option('-c, --config <path>', 'Config file path')
    .option('--pending', 'Only tasks still waiting to be synced')
    .action(async (options: { bridge?: string; provider?: string; config?: string; pending?: boolean }) => {
        try {
            await listTasks(options);
        } catch (error) {
            fail(error);
        }
    });

program.parseAsync().catch(fail);
