import type { Command } from 'commander';
import { serializeCollection, type Collection } from '@mcc-registry/core';
import { info, json, log, warn } from '../utils/console.js';
import { codeLine } from './format.js';
import { runCommand } from './run.js';
import type { JsonOptions } from '../types.js';

export function searchCodes(collection: Collection, query: string, options: JsonOptions = {}): number {
    const codes = collection.search(query);

    if (options.json) {
        json(serializeCollection(codes));
        return 0;
    }
    if (codes.length === 0) {
        warn(`No codes match "${query}"`);
        return 0;
    }

    for (const code of codes) {
        log(codeLine(code));
    }
    info(`${codes.length} code(s) found`);
    return 0;
}

export function registerSearchCommand(program: Command): void {
    program
        .command('search')
        .description('Search codes by number, description or identifier')
        .argument('<query>', 'case-insensitive text')
        .option('--json', 'print JSON')
        .action((query: string, options: JsonOptions) => {
            runCommand(program, (collection) => searchCodes(collection, query, options));
        });
}
