/**
 * Returns the current timestamp in ISO format.
 * @returns string - Current ISO timestamp
 * @example
 * const ts = GetTimestamp(); // '2025-06-24T12:34:56.789Z'
 */
export function GetTimestamp(): string {
    return new Date().toISOString();
}

/**
 * Log levels for application logging.
 */
export enum LogLevel {
    Critical = 'CRITICAL',
    Error = 'ERROR',
    Warning = 'WARNING',
    Info = 'INFO',
    Debug = 'DEBUG',
}

/** Configuration-facing level names (as written in config files). */
export type ConfiguredLogLevel = `debug` | `info` | `warn` | `error`;

const LEVEL_RANK: Record<LogLevel, number> = {
    [LogLevel.Critical]: 0,
    [LogLevel.Error]: 1,
    [LogLevel.Warning]: 2,
    [LogLevel.Info]: 3,
    [LogLevel.Debug]: 4,
};

const CONFIGURED_TO_LEVEL: Record<ConfiguredLogLevel, LogLevel> = {
    debug: LogLevel.Debug,
    info: LogLevel.Info,
    warn: LogLevel.Warning,
    error: LogLevel.Error,
};

let _threshold: LogLevel = LogLevel.Info; // messages above this rank are dropped

/**
 * Sets the process-wide verbosity threshold.
 * @param level LogLevel | ConfiguredLogLevel - Either an enum member or a config-file name ('debug', 'info', 'warn', 'error')
 * @example
 * SetLogLevel('warn'); // only warnings, errors and critical messages are written
 */
export function SetLogLevel(level: LogLevel | ConfiguredLogLevel): void {
    _threshold = IsConfiguredLevel(level) ? CONFIGURED_TO_LEVEL[level] : level;
}

/** Current verbosity threshold. */
export function GetLogLevel(): LogLevel {
    return _threshold;
}

function IsConfiguredLevel(level: LogLevel | ConfiguredLogLevel): level is ConfiguredLogLevel {
    return level in CONFIGURED_TO_LEVEL;
}

/**
 * Formats one log line without writing it.
 * @param message string - Message body
 * @param from string - Source identifier (service or module name)
 * @param context string - Optional additional context, rendered in brackets before the message
 * @param timestamp string - ISO timestamp to stamp the line with
 * @returns string - `[timestamp] [from] [context] message`
 */
export function FormatLogLine(message: string, from: string, context: string | undefined, timestamp: string): string {
    const body = context ? `[${context}] ${message}` : message;
    return `[${timestamp}] [${from}] ${body}`;
}

/**
 * Logs a message at the specified log level to the console, prepending a timestamp.
 * @param level LogLevel - Level of the log
 * @param message string - Message to log
 * @param from string - Source identifier
 * @param context string - Optional context or details
 * @example
 * log(LogLevel.Info, 'Batch committed', 'RenumberService', 'project=p-1');
 */
export function log(level: LogLevel, message: string, from: string, context?: string): void {
    if (LEVEL_RANK[level] > LEVEL_RANK[_threshold]) {
        return;
    }
    const formatted = FormatLogLine(message, from, context, GetTimestamp());
    const logger = console;

    switch (level) {
        case LogLevel.Critical:
        case LogLevel.Error:
            logger.error(formatted);
            break;
        case LogLevel.Warning:
            logger.warn(formatted);
            break;
        case LogLevel.Info:
            logger.info(formatted);
            break;
        case LogLevel.Debug:
            logger.debug(formatted);
            break;
    }
}

export namespace log {
    /**
     * Logs a critical level message.
     * @param message string - Message to log
     * @param from string - Context or source identifier
     * @param context string - Optional additional context or details
     */
    export function critical(message: string, from: string, context?: string): void {
        log(LogLevel.Critical, message, from, context);
    }

    /**
     * Logs an error level message.
     * @param message string - Message to log
     * @param from string - Context or source identifier
     * @param context string - Optional additional context or details
     */
    export function error(message: string, from: string, context?: string): void {
        log(LogLevel.Error, message, from, context);
    }

    /**
     * Logs a warning level message.
     * @param message string - Message to log
     * @param from string - Context or source identifier
     * @param context string - Optional additional context or details
     */
    export function warning(message: string, from: string, context?: string): void {
        log(LogLevel.Warning, message, from, context);
    }

    /**
     * Logs an informational level message.
     * @param message string - Message to log
     * @param from string - Context or source identifier
     * @param context string - Optional additional context or details
     */
    export function info(message: string, from: string, context?: string): void {
        log(LogLevel.Info, message, from, context);
    }

    /**
     * Logs a debug level message.
     * @param message string - Message to log
     * @param from string - Context or source identifier
     * @param context string - Optional additional context or details
     */
    export function debug(message: string, from: string, context?: string): void {
        log(LogLevel.Debug, message, from, context);
    }
}
