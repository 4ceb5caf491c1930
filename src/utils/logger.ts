export enum LogLevel {
    DEBUG = 0,
    LOG = 1,
    INFO = 2,
    WARN = 3,
    ERROR = 4,
    NONE = 5,
}

type LogFormat = 'text' | 'json';

type LoggerConfig = {
    minLevel: LogLevel;
    format: LogFormat;
    useColors: boolean;
    includeTimestamp: boolean;
    includeContext: boolean;
};

type LevelName = 'debug' | 'log' | 'info' | 'warn' | 'error';

const LEVELS: Record<LevelName, LogLevel> = {
    debug: LogLevel.DEBUG,
    log: LogLevel.LOG,
    info: LogLevel.INFO,
    warn: LogLevel.WARN,
    error: LogLevel.ERROR,
};

const parseLevel = (value: string | undefined): LogLevel => {
    switch ((value || '').toLowerCase()) {
        case 'debug':
            return LogLevel.DEBUG;
        case 'log':
            return LogLevel.LOG;
        case 'warn':
            return LogLevel.WARN;
        case 'error':
            return LogLevel.ERROR;
        case 'none':
        case 'silent':
            return LogLevel.NONE;
        case 'info':
            return LogLevel.INFO;
        default:
            return process.env.NODE_ENV === 'test'
                ? LogLevel.NONE
                : LogLevel.DEBUG;
    }
};

const serialize = (value: unknown): string => {
    if (value instanceof Error) {
        return JSON.stringify({ name: value.name, message: value.message });
    }
    if (typeof value === 'object' && value !== null) {
        try {
            return JSON.stringify(value);
        } catch {
            return '[unserializable]';
        }
    }
    return String(value);
};

export default class Logger {
    private static config: LoggerConfig = {
        minLevel: parseLevel(process.env.LOG_LEVEL),
        format: process.env.LOG_FORMAT === 'json' ? 'json' : 'text',
        useColors: Boolean(process.stdout.isTTY),
        includeTimestamp: true,
        includeContext: true,
    };

    private static readonly COLORS: Record<LevelName | 'reset', string> = {
        debug: '\x1b[90m', // Gray
        log: '\x1b[36m', // Cyan
        info: '\x1b[33m', // Yellow
        warn: '\x1b[35m', // Magenta
        error: '\x1b[31m', // Red
        reset: '\x1b[0m',
    };

    public static configure(options: Partial<LoggerConfig>): void {
        Logger.config = { ...Logger.config, ...options };
    }

    public static getConfig(): LoggerConfig {
        return { ...Logger.config };
    }

    /**
     * Builds one output line. Text lines look like
     * `[2024-05-01T10:00:00.000Z] [INFO] [BookingService - create] Starting {"id":1}`.
     */
    public static formatLogEntry(
        level: LevelName,
        message: unknown,
        context?: string,
        data?: unknown,
    ): string {
        const timestamp = Logger.config.includeTimestamp
            ? new Date().toISOString()
            : undefined;

        if (Logger.config.format === 'json') {
            const entry: Record<string, unknown> = {
                level,
                message: typeof message === 'string' ? message : serialize(message),
            };
            if (timestamp) entry.time = timestamp;
            if (context && Logger.config.includeContext) entry.context = context;
            if (data !== undefined) {
                entry.data = data instanceof Error ? data.message : data;
            }
            return serialize(entry);
        }

        const parts: string[] = [];
        if (timestamp) parts.push(`[${timestamp}]`);
        parts.push(`[${level.toUpperCase()}]`);
        if (context && Logger.config.includeContext) {
            parts.push(`[${context}]`);
        }
        parts.push(typeof message === 'string' ? message : serialize(message));
        if (data !== undefined) {
            parts.push(serialize(data));
        }
        return parts.join(' ');
    }

    private static write(
        level: LevelName,
        message: unknown,
        context?: string,
        data?: unknown,
    ): void {
        if (Logger.config.minLevel > LEVELS[level]) return;

        let line = Logger.formatLogEntry(level, message, context, data);
        if (Logger.config.useColors && Logger.config.format === 'text') {
            line = `${Logger.COLORS[level]}${line}${Logger.COLORS.reset}`;
        }

        switch (level) {
            case 'debug':
                console.debug(line);
                break;
            case 'info':
                console.info(line);
                break;
            case 'warn':
                console.warn(line);
                break;
            case 'error':
                console.error(line);
                break;
            default:
                console.log(line);
        }
    }

    public static debug(message: unknown, context?: string, data?: unknown): void {
        Logger.write('debug', message, context, data);
    }

    public static log(message: unknown, context?: string, data?: unknown): void {
        Logger.write('log', message, context, data);
    }

    public static info(message: unknown, context?: string, data?: unknown): void {
        Logger.write('info', message, context, data);
    }

    public static warn(message: string, context?: string, error?: unknown): void {
        Logger.write('warn', message, context, error);
    }

    public static error(message: string, context?: string, error?: unknown): void {
        Logger.write('error', message, context, error);

        if (
            error instanceof Error &&
            error.stack &&
            Logger.config.minLevel <= LogLevel.ERROR &&
            Logger.config.format === 'text'
        ) {
            console.error(`Stack trace: ${error.stack}`);
        }
    }
}
