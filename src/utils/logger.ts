export enum LogLevel {
    DEBUG = 'debug',
    INFO = 'info',
    WARN = 'warn',
    ERROR = 'error',
    SILENT = 'silent',
}

const PRIORITY: Record<LogLevel, number> = {
    [LogLevel.DEBUG]: 0,
    [LogLevel.INFO]: 1,
    [LogLevel.WARN]: 2,
    [LogLevel.ERROR]: 3,
    [LogLevel.SILENT]: 4,
};

/**
 * Parse a level name, falling back when it is unknown
 */
export function parseLogLevel(value: string | undefined, fallback: LogLevel = LogLevel.INFO): LogLevel {
    if (!value) {
        return fallback;
    }
    const normalized = value.trim().toLowerCase();
    const match = Object.values(LogLevel).find(level => level === normalized);
    return match ?? fallback;
}

/**
 * Leveled console logger. Bridge code logs through a child carrying a
 * "[bridge]" prefix so concurrent runs stay readable.
 */
export class Logger {
    constructor(
        private level: LogLevel = LogLevel.INFO,
        private prefix: string = ''
    ) { }

    child(prefix: string): Logger {
        return new Logger(this.level, `${this.prefix}[${prefix}] `);
    }

    getLevel(): LogLevel {
        return this.level;
    }

    debug(message: string): void {
        if (this.shouldLog(LogLevel.DEBUG)) {
            console.log(`[DEBUG] ${this.prefix}${message}`);
        }
    }

    info(message: string): void {
        if (this.shouldLog(LogLevel.INFO)) {
            console.log(`[INFO] ${this.prefix}${message}`);
        }
    }

    warn(message: string): void {
        if (this.shouldLog(LogLevel.WARN)) {
            console.error(`[WARN] ${this.prefix}${message}`);
        }
    }

    error(message: string): void {
        if (this.shouldLog(LogLevel.ERROR)) {
            console.error(`[ERROR] ${this.prefix}${message}`);
        }
    }

    private shouldLog(level: LogLevel): boolean {
        if (this.level === LogLevel.SILENT) {
            return false;
        }
        return PRIORITY[level] >= PRIORITY[this.level];
    }
}

export const silentLogger = new Logger(LogLevel.SILENT);
