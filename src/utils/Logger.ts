/**
 * 📝 Logger - Unified logging
 *
 * Categorized logs with emoji prefixes. One instance per thread.
 */

export const LogLevel = {
    DEBUG: 0,
    INFO: 1,
    SUCCESS: 2,
    WARNING: 3,
    ERROR: 4,
    SILENT: 5
} as const;

export type LogLevel = typeof LogLevel[keyof typeof LogLevel];

/**
 * Plain-data logger state, handed to worker threads so they log like the host.
 */
export interface LoggerSettings {
    level: LogLevel;
    showRowDetails: boolean;
}

export class Logger {
    private static instance: Logger | undefined;
    private logLevel: LogLevel = LogLevel.INFO;
    private showRowDetails: boolean = false;

    private constructor() { }

    public static getInstance(): Logger {
        if (!Logger.instance) {
            Logger.instance = new Logger();
        }
        return Logger.instance;
    }

    public setLogLevel(level: LogLevel): void {
        this.logLevel = level;
    }

    public setShowRowDetails(enabled: boolean): void {
        this.showRowDetails = enabled;
    }

    public getSettings(): LoggerSettings {
        return { level: this.logLevel, showRowDetails: this.showRowDetails };
    }

    public applySettings(settings: LoggerSettings): void {
        this.logLevel = settings.level;
        this.showRowDetails = settings.showRowDetails;
    }

    private log(level: LogLevel, emoji: string, category: string, message: string, ...args: unknown[]): void {
        if (level < this.logLevel) return;

        // Per-batch flushes are far too chatty unless explicitly requested
        if (category.startsWith('ROW') && !this.showRowDetails) {
            return;
        }

        const prefix = `${emoji} [${category}]`;
        if (level >= LogLevel.ERROR) {
            console.error(`${prefix} ${message}`, ...args);
        } else {
            console.log(`${prefix} ${message}`, ...args);
        }
    }

    // ===== CATEGORIZED LOGGING METHODS =====

    public init(message: string, ...args: unknown[]): void {
        this.log(LogLevel.INFO, '🔧', 'INIT', message, ...args);
    }

    public job(message: string, ...args: unknown[]): void {
        this.log(LogLevel.INFO, '🎬', 'JOB', message, ...args);
    }

    public row(row: number, message: string, ...args: unknown[]): void {
        this.log(LogLevel.DEBUG, '🧵', `ROW ${row}`, message, ...args);
    }

    public stats(message: string, ...args: unknown[]): void {
        this.log(LogLevel.INFO, '📊', 'STATS', message, ...args);
    }

    public debug(message: string, ...args: unknown[]): void {
        this.log(LogLevel.DEBUG, '🔍', 'DEBUG', message, ...args);
    }

    public info(message: string, ...args: unknown[]): void {
        this.log(LogLevel.INFO, 'ℹ️', 'INFO', message, ...args);
    }

    public success(message: string, ...args: unknown[]): void {
        this.log(LogLevel.SUCCESS, '✅', 'SUCCESS', message, ...args);
    }

    public warning(message: string, ...args: unknown[]): void {
        this.log(LogLevel.WARNING, '⚠️', 'WARNING', message, ...args);
    }

    public error(message: string, ...args: unknown[]): void {
        this.log(LogLevel.ERROR, '❌', 'ERROR', message, ...args);
    }
}
