import { Command } from 'commander';
import { registerFindCommand } from './commands/find.js';
import { registerSearchCommand } from './commands/search.js';
import { registerRangeCommands } from './commands/ranges.js';
import { registerCategoryCommands } from './commands/categories.js';
import { registerValidateCommand } from './commands/validate.js';

export function createProgram(): Command {
    const program = new Command();
    program
        .name('mcc')
        .description('Merchant category code lookup, classification and validation')
        .version('1.0.0')
        .option('-c, --config <path>', 'config file (default: ./mcc.config.yaml)');

    registerFindCommand(program);
    registerSearchCommand(program);
    registerRangeCommands(program);
    registerCategoryCommands(program);
    registerValidateCommand(program);

    return program;
}
