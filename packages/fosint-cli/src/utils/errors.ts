import chalk from 'chalk';
import { FosintError, Logger, REMEDIATION_HINTS, errorMessage } from '@fosint/core';

export const EXIT_FAILURE = 1;
export const EXIT_USAGE = 2;
export const EXIT_INTERNAL = 3;

export function exitCodeFor(error: unknown): number {
    if (error instanceof FosintError) {
        return error.code === 'CONFIG' || error.code === 'VALIDATION' ? EXIT_USAGE : EXIT_FAILURE;
    }
    return EXIT_INTERNAL;
}

/** Print an error with its remediation hint and set the process exit code. */
export function reportError(error: unknown): void {
    console.error(chalk.red(`Error: ${errorMessage(error)}`));
    if (error instanceof FosintError) {
        console.error(chalk.dim(`  ${REMEDIATION_HINTS[error.code]}`));
    } else if (error instanceof Error && error.stack) {
        Logger.debug(error.stack);
    }
    process.exitCode = exitCodeFor(error);
}

/** Wrap a command action so thrown errors become a message and an exit code. */
export function run<A extends unknown[]>(action: (...args: A) => Promise<void>): (...args: A) => Promise<void> {
    return async (...args: A) => {
        try {
            await action(...args);
        } catch (error) {
            reportError(error);
        }
    };
}
