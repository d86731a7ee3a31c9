import type { Code, Range } from '@mcc-registry/core';
import { log } from '../utils/console.js';

export function codeLine(code: Code): string {
    return `${code.mcc}  ${code.description() ?? '(no description)'}`;
}

export function rangeLine(range: Range): string {
    return `${range.toString()}  ${range.name}${range.reserved ? ' (reserved)' : ''}`;
}

export function printCodes(codes: readonly Code[]): void {
    for (const code of codes) {
        log(`  ${codeLine(code)}`);
    }
}
