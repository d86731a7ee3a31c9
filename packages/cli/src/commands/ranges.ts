import type { Command } from 'commander';
import { serializeCollection, serializeRange, type Collection } from '@mcc-registry/core';
import { arrow, error, json, log } from '../utils/console.js';
import { printCodes, rangeLine } from './format.js';
import { runCommand } from './run.js';
import type { JsonOptions, RangesOptions } from '../types.js';

/**
 * Show one ISO 18245 range and the known codes inside it.
 */
export function showRange(collection: Collection, name: string, options: JsonOptions = {}): number {
    const range = collection.findRange(name);
    if (range === undefined) {
        error(`Range not found: "${name}"`);
        return 1;
    }
    const codes = collection.inRange(range.name);

    if (options.json) {
        json({ ...serializeRange(range), codes: serializeCollection(codes, { includeRange: false }) });
        return 0;
    }

    log(rangeLine(range));
    if (range.description !== '') {
        arrow(range.description);
    }
    printCodes(codes);
    return 0;
}

export function listRanges(collection: Collection, options: RangesOptions = {}): number {
    const ranges = options.all ? collection.ranges() : collection.eligibleRanges();
    for (const range of ranges) {
        log(rangeLine(range));
    }
    return 0;
}

export function registerRangeCommands(program: Command): void {
    program
        .command('range')
        .description('Show an ISO 18245 range by name')
        .argument('<name>', 'range name, case-insensitive')
        .option('--json', 'print JSON')
        .action((name: string, options: JsonOptions) => {
            runCommand(program, (collection) => showRange(collection, name, options));
        });

    program
        .command('ranges')
        .description('List ISO 18245 ranges')
        .option('-a, --all', 'include reserved ranges')
        .action((options: RangesOptions) => {
            runCommand(program, (collection) => listRanges(collection, options));
        });
}
