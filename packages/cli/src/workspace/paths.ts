import { join, dirname, resolve } from 'node:path';
import { fileURLToPath } from 'node:url';
import { existsSync } from 'node:fs';

const __dirname = dirname(fileURLToPath(import.meta.url));

export const CONFIG_FILE_NAME = 'mcc.config.yaml';

/**
 * Dataset shipped with the CLI.
 */
export function bundledDataPath(): string {
    // packages/cli/src/workspace/paths.ts -> packages/cli/assets/data
    const pkgRoot = join(__dirname, '..', '..');
    return join(pkgRoot, 'assets', 'data');
}

/**
 * Config file to read, or null when none applies.
 * An explicit path is returned as given (resolved against cwd) even if missing.
 */
export function resolveConfigPath(cwd: string, explicit?: string): string | null {
    if (explicit !== undefined) {
        return resolve(cwd, explicit);
    }
    const candidate = join(cwd, CONFIG_FILE_NAME);
    return existsSync(candidate) ? candidate : null;
}
