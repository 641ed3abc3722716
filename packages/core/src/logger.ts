import { z } from 'zod';

export const LogLevelSchema = z.enum(['debug', 'info', 'warn', 'error', 'none']);

export type LogLevel = z.infer<typeof LogLevelSchema>;

const LEVELS: readonly LogLevel[] = LogLevelSchema.options;

export class Logger {
    private level: LogLevel | undefined;
    private name: string;
    private parent: Logger | undefined;

    constructor(name: string, level?: LogLevel, parent?: Logger) {
        this.name = name;
        this.level = level;
        this.parent = parent;
    }

    /**
     * the level set on this logger, or else its parent's; info if neither has one
     */
    getLevel(): LogLevel {
        return this.level ?? this.parent?.getLevel() ?? 'info';
    }

    setLevel(level: LogLevel) {
        this.level = level;
    }

    /**
     * a logger whose lines are tagged `parent:name`, following this logger's level until given its own
     */
    child(name: string): Logger {
        return new Logger(`${this.name}:${name}`, undefined, this);
    }

    private shouldLog(level: LogLevel): boolean {
        return LEVELS.indexOf(level) >= LEVELS.indexOf(this.getLevel());
    }

    private formatMessage(level: LogLevel, message: string): string {
        const timestamp = new Date().toISOString();
        return `[${timestamp}] [${this.name}] [${level.toUpperCase()}] ${message}`;
    }

    debug(message: string, ...optionalParams: unknown[]) {
        if (this.shouldLog('debug')) {
            // biome-ignore lint/suspicious/noConsole: This is a logger
            console.debug(this.formatMessage('debug', message), ...optionalParams);
        }
    }

    info(message: string, ...optionalParams: unknown[]) {
        if (this.shouldLog('info')) {
            // biome-ignore lint/suspicious/noConsole: This is a logger
            console.info(this.formatMessage('info', message), ...optionalParams);
        }
    }

    warn(message: string, ...optionalParams: unknown[]) {
        if (this.shouldLog('warn')) {
            // biome-ignore lint/suspicious/noConsole: This is a logger
            console.warn(this.formatMessage('warn', message), ...optionalParams);
        }
    }

    error(message: string, ...optionalParams: unknown[]) {
        if (this.shouldLog('error')) {
            // biome-ignore lint/suspicious/noConsole: This is a logger
            console.error(this.formatMessage('error', message), ...optionalParams);
        }
    }
}

export const logger = new Logger('regionlink');

export function createLogger(name: string): Logger {
    return logger.child(name);
}
