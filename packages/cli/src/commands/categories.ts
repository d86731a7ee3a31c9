import type { Command } from 'commander';
import { serializeCategory, serializeCollection, type Collection } from '@mcc-registry/core';
import { arrow, json, log } from '../utils/console.js';
import { printCodes } from './format.js';
import { runCommand } from './run.js';
import type { JsonOptions } from '../types.js';

/**
 * Show a risk category and the known codes it contains.
 *
 * @throws CategoryNotFoundError for unknown ids
 */
export function showCategory(collection: Collection, id: string, options: JsonOptions = {}): number {
    const category = collection.getCategory(id);
    const codes = collection.inCategory(category);

    if (options.json) {
        json({
            ...serializeCategory(category, { includeCodes: true }),
            members: serializeCollection(codes, { includeCategories: false }),
        });
        return 0;
    }

    log(`${category.name} (${category.id})`);
    if (category.description !== '') {
        arrow(category.description);
    }
    arrow(`Entries: ${category.codes.join(', ')}`);
    printCodes(codes);
    return 0;
}

export function listCategories(collection: Collection): number {
    for (const category of collection.categories()) {
        log(`${category.id}  ${category.name} (${collection.inCategory(category).length} codes)`);
    }
    return 0;
}

export function registerCategoryCommands(program: Command): void {
    program
        .command('category')
        .description('Show a risk category')
        .argument('<id>', 'category id, e.g. gambling')
        .option('--json', 'print JSON')
        .action((id: string, options: JsonOptions) => {
            runCommand(program, (collection) => showCategory(collection, id, options));
        });

    program
        .command('categories')
        .description('List risk categories')
        .action(() => {
            runCommand(program, (collection) => listCategories(collection));
        });
}
