// Create a centralized logging system
export enum LogLevel {
    DEBUG = 0,
    INFO = 1,
    WARN = 2,
    ERROR = 3
}

const LEVEL_NAMES: Record<string, LogLevel> = {
    debug: LogLevel.DEBUG,
    info: LogLevel.INFO,
    warn: LogLevel.WARN,
    error: LogLevel.ERROR
};

export function parseLogLevel(name: string | undefined, fallback: LogLevel = LogLevel.INFO): LogLevel {
    if (!name) return fallback;
    return LEVEL_NAMES[name.toLowerCase()] ?? fallback;
}

export type LogContext = Record<string, unknown>;

export class Logger {
    private static instance: Logger;
    private currentLevel: LogLevel = LogLevel.INFO;
    
    private constructor() {}
    
    static getInstance(): Logger {
        if (!Logger.instance) {
            Logger.instance = new Logger();
        }
        return Logger.instance;
    }
    
    setLevel(level: LogLevel): void {
        this.currentLevel = level;
    }

    debug(message: string, context?: LogContext): void {
        if (this.currentLevel <= LogLevel.DEBUG) {
            console.log(`[DEBUG] ${message}`, context || '');
        }
    }
    
    info(message: string, context?: LogContext): void {
        if (this.currentLevel <= LogLevel.INFO) {
            console.log(`[INFO] ${message}`, context || '');
        }
    }
    
    warn(message: string, context?: LogContext): void {
        if (this.currentLevel <= LogLevel.WARN) {
            console.warn(`[WARN] ${message}`, context || '');
        }
    }
    
    error(message: string, error?: unknown): void {
        if (this.currentLevel <= LogLevel.ERROR) {
            console.error(`[ERROR] ${message}`, error || '');
        }
    }
}

export const logger = Logger.getInstance();

// Shortens free text (prompts, model output) before it goes into a log line
export function excerpt(text: string, length = 50): string {
    return text.length > length ? text.substring(0, length) + '...' : text;
}
