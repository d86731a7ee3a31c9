import type { Command } from 'commander';
import { Validator, type Collection } from '@mcc-registry/core';
import { error, success } from '../utils/console.js';
import { parseList, runCommand } from './run.js';
import type { ValidateOptions } from '../types.js';

/**
 * Run the validator rules on one value. Exit code 1 on any failure.
 */
export function validateValue(collection: Collection, value: string, options: ValidateOptions = {}): number {
    const validator = new Validator(collection, {
        strict: !options.lenient,
        denyCategories: options.deny ?? [],
        allowCategories: options.allow,
    });

    const messages = validator.validate(value);
    if (messages.length === 0) {
        success(`${value} is valid`);
        return 0;
    }
    for (const message of messages) {
        error(`${value} ${message}`);
    }
    return 1;
}

export function registerValidateCommand(program: Command): void {
    program
        .command('validate')
        .description('Validate a value as an MCC code')
        .argument('<value>', 'value to check')
        .option('--lenient', 'check the format only')
        .option('--deny <ids>', 'comma-separated category ids to reject', parseList)
        .option('--allow <ids>', 'comma-separated category ids to accept exclusively', parseList)
        .action((value: string, options: ValidateOptions) => {
            runCommand(program, (collection) => validateValue(collection, value, options));
        });
}
