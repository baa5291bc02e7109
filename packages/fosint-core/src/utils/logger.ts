import chalk from 'chalk';

export enum LogLevel {
    DEBUG = 0,
    INFO = 1,
    WARN = 2,
    ERROR = 3,
}

/**
 * Resolve the starting level from FOSINT_DEBUG ("1", "true", "yes" enable debug output).
 */
export function levelFromEnv(env: NodeJS.ProcessEnv = process.env): LogLevel {
    const flag = (env.FOSINT_DEBUG ?? '').trim().toLowerCase();
    return flag === '1' || flag === 'true' || flag === 'yes' ? LogLevel.DEBUG : LogLevel.INFO;
}

/** Info goes to stdout; warnings, errors and debug output go to stderr so exports on stdout stay parseable. */
export class Logger {
    private static level: LogLevel = levelFromEnv();

    static setLevel(level: LogLevel) {
        this.level = level;
    }

    static getLevel(): LogLevel {
        return this.level;
    }

    static info(message: string) {
        if (this.level <= LogLevel.INFO) {
            console.log(chalk.blue('info: ') + message);
        }
    }

    static warn(message: string) {
        if (this.level <= LogLevel.WARN) {
            console.error(chalk.yellow('warn: ') + message);
        }
    }

    static error(message: string, error?: unknown) {
        if (this.level <= LogLevel.ERROR) {
            console.error(chalk.red('error: ') + message);
            if (error !== undefined && this.level <= LogLevel.DEBUG) {
                console.error(error);
            }
        }
    }

    static debug(message: string) {
        if (this.level <= LogLevel.DEBUG) {
            console.error(chalk.dim('debug: ') + message);
        }
    }
}
