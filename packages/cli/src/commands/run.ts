import type { Command } from 'commander';
import { MccError, type Collection } from '@mcc-registry/core';
import { openCollection } from '../workspace/session.js';
import { error } from '../utils/console.js';
import type { GlobalOptions } from '../types.js';

/**
 * Runs a command body against the configured collection and sets the exit
 * code. Registry errors are reported; anything else propagates.
 */
export function runCommand(program: Command, body: (collection: Collection) => number): void {
    const { config } = program.opts<GlobalOptions>();
    try {
        process.exitCode = body(openCollection({ configPath: config }));
    } catch (err) {
        if (err instanceof MccError) {
            error(err.message);
            process.exitCode = 1;
            return;
        }
        throw err;
    }
}

/**
 * Comma-separated option value: "gambling, adult" -> ['gambling', 'adult']
 */
export function parseList(value: string): string[] {
    return value
        .split(',')
        .map((item) => item.trim())
        .filter((item) => item !== '');
}
