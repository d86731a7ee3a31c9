import { Option, type Command } from 'commander';
import { DESCRIPTION_SOURCES, serializeCode, type Collection } from '@mcc-registry/core';
import { arrow, json, log } from '../utils/console.js';
import { runCommand } from './run.js';
import type { FindOptions } from '../types.js';

/**
 * Look up a single code.
 *
 * @throws NotFoundError when the code is unknown or malformed
 */
export function findCode(collection: Collection, value: string, options: FindOptions = {}): number {
    const code = collection.findOrThrow(value);
    const description = code.description(options.source) ?? null;

    if (options.json) {
        json({ ...serializeCode(code, { includeAllDescriptions: true }), description });
        return 0;
    }

    const categories = code.categories().map((c) => c.id);
    log(`${code.mcc}  ${description ?? '(no description)'}`);
    arrow(`Range:          ${code.range()?.name ?? '-'}`);
    arrow(`Categories:     ${categories.length > 0 ? categories.join(', ') : '-'}`);
    if (code.stripe_code !== undefined) {
        arrow(`Stripe code:    ${code.stripe_code}`);
    }
    arrow(`IRS reportable: ${code.irsReportable() ? 'yes' : 'no'}`);
    return 0;
}

export function registerFindCommand(program: Command): void {
    program
        .command('find')
        .description('Look up a merchant category code')
        .argument('<code>', 'MCC code, 1 to 4 digits')
        .addOption(new Option('-s, --source <source>', 'description source').choices(DESCRIPTION_SOURCES))
        .option('--json', 'print JSON')
        .action((value: string, options: FindOptions) => {
            runCommand(program, (collection) => findCode(collection, value, options));
        });
}
