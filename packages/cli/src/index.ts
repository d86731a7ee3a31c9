#!/usr/bin/env node
/**
 * MCC CLI
 *
 * The CLI owns all I/O. The core receives raw records and never logs.
 */

import { createProgram } from './program.js';
import { error } from './utils/console.js';

async function main() {
    await createProgram().parseAsync();
}

main().catch((err: unknown) => {
    error(`Unexpected error: ${err instanceof Error ? err.message : String(err)}`);
    process.exit(1);
});
