export enum LogLevel {
    DEBUG = 'DEBUG',
    INFO = 'INFO',
    WARN = 'WARN',
    ERROR = 'ERROR'
}

const LEVELS = [LogLevel.DEBUG, LogLevel.INFO, LogLevel.WARN, LogLevel.ERROR];

export function parseLogLevel(value: string | undefined): LogLevel | null {
    if (value === undefined || value === '') return LogLevel.INFO;
    const upper = value.toUpperCase();
    return LEVELS.find(level => level === upper) ?? null;
}

export class Logger {
    constructor(
        private readonly logLevel: LogLevel = LogLevel.INFO,
        private readonly scope?: string
    ) { }

    /** Logger sharing this one's level, prefixing every line with `[scope]`. */
    withScope(scope: string): Logger {
        return new Logger(this.logLevel, scope);
    }

    getLogLevel(): LogLevel {
        return this.logLevel;
    }

    debug(message: string, data?: unknown): void {
        if (this.shouldLog(LogLevel.DEBUG)) {
            this.log(LogLevel.DEBUG, message, data);
        }
    }

    info(message: string, data?: unknown): void {
        if (this.shouldLog(LogLevel.INFO)) {
            this.log(LogLevel.INFO, message, data);
        }
    }

    warn(message: string, data?: unknown): void {
        if (this.shouldLog(LogLevel.WARN)) {
            this.log(LogLevel.WARN, message, data);
        }
    }

    error(message: string, error?: unknown): void {
        if (this.shouldLog(LogLevel.ERROR)) {
            this.log(LogLevel.ERROR, message, error);
        }
    }

    private shouldLog(level: LogLevel): boolean {
        return LEVELS.indexOf(level) >= LEVELS.indexOf(this.logLevel);
    }

    private log(level: LogLevel, message: string, data?: unknown): void {
        const timestamp = new Date().toISOString().replace('T', ' ').substring(0, 19);
        const prefix = this.scope ? `[${this.scope}] ` : '';
        const logMessage = `[${timestamp}] [${level}] ${prefix}${message}`;

        switch (level) {
            case LogLevel.DEBUG:
            case LogLevel.INFO:
                console.log(logMessage, data ?? '');
                break;
            case LogLevel.WARN:
                console.warn(logMessage, data ?? '');
                break;
            case LogLevel.ERROR:
                console.error(logMessage, data ?? '');
                break;
        }
    }
}
