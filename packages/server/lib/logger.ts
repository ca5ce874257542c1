/**
 * Structured Logging for the Transcription Service
 *
 * Provides structured logging with consistent formatting, log levels,
 * and a specialized logger that follows one transcription job through
 * the pipeline.
 *
 * - JSON output outside development, human-readable output in development
 * - Context-aware entries with timestamps and component identification
 * - Sensitive keys (credentials, tokens) are redacted from metadata
 */

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';
export type LogContext =
    | 'webhook'
    | 'transcription'
    | 'orchestrator'
    | 'media_quality'
    | 'nlp'
    | 'storage'
    | 'system';

/**
 * Base log entry structure for consistent formatting
 */
export interface LogEntry {
    timestamp: string;
    level: LogLevel;
    context: LogContext;
    message: string;
    component?: string;
    job_id?: string;
    duration_ms?: number;
    success?: boolean;
    error?: string;
    metadata?: Record<string, unknown>;
}

/**
 * Pipeline stages a job moves through, used by the job logger
 */
export type PipelineState =
    | 'received'
    | 'validated'
    | 'submitted'
    | 'polling'
    | 'awaiting_callback'
    | 'reconciled'
    | 'stored'
    | 'failed';

/**
 * Configuration for the logging system
 */
export interface LoggerConfig {
    minLevel: LogLevel;
    enableConsoleLogging: boolean;
    enableStructuredLogging: boolean;
    enableTimestamps: boolean;
    enableStackTraces: boolean;
    redactSensitiveData: boolean;
}

const LOG_LEVELS: readonly LogLevel[] = ['debug', 'info', 'warn', 'error'];

function isLogLevel(value: string | undefined): value is LogLevel {
    return value !== undefined && (LOG_LEVELS as readonly string[]).includes(value);
}

/**
 * Default logger configuration with environment-aware settings
 *
 * In test mode, default to 'warn' unless LOG_LEVEL is explicitly set.
 */
function defaultLoggerConfig(): LoggerConfig {
    const envLevel = process.env.LOG_LEVEL;
    const isDevelopment = process.env.NODE_ENV === 'development';
    return {
        minLevel: isLogLevel(envLevel)
            ? envLevel
            : (process.env.NODE_ENV === 'test' ? 'warn' : (isDevelopment ? 'debug' : 'info')),
        enableConsoleLogging: true,
        enableStructuredLogging: !isDevelopment,
        enableTimestamps: true,
        enableStackTraces: isDevelopment,
        redactSensitiveData: !isDevelopment
    };
}

/**
 * Log level priorities for filtering
 */
const LOG_LEVEL_PRIORITY: Record<LogLevel, number> = {
    debug: 0,
    info: 1,
    warn: 2,
    error: 3
};

/**
 * Sensitive data patterns to redact from logs
 */
const SENSITIVE_PATTERNS = [
    /api_?key/i,
    /access_token/i,
    /client_secret/i,
    /private_key/i,
    /password/i,
    /bearer/i,
    /authorization/i,
    /credential/i
];

/**
 * Redact sensitive data from log metadata
 */
export function redactSensitiveData(data: unknown): unknown {
    if (!data || typeof data !== 'object') {
        return data;
    }

    if (Array.isArray(data)) {
        return data.map(redactSensitiveData);
    }

    const redacted: Record<string, unknown> = {};

    for (const [key, value] of Object.entries(data)) {
        // Presence flags such as api_key_present are safe to keep
        const isSensitiveKey = typeof value !== 'boolean' && SENSITIVE_PATTERNS.some(pattern => pattern.test(key));

        if (isSensitiveKey) {
            redacted[key] = '[REDACTED]';
        } else if (typeof value === 'object' && value !== null) {
            redacted[key] = redactSensitiveData(value);
        } else {
            redacted[key] = value;
        }
    }

    return redacted;
}

type ConsoleFunction = (...args: unknown[]) => void;

/**
 * Core logger class
 */
export class Logger {
    private readonly config: LoggerConfig;

    constructor(config: Partial<LoggerConfig> = {}) {
        this.config = { ...defaultLoggerConfig(), ...config };
    }

    get stackTracesEnabled(): boolean {
        return this.config.enableStackTraces;
    }

    private shouldLog(level: LogLevel): boolean {
        return LOG_LEVEL_PRIORITY[level] >= LOG_LEVEL_PRIORITY[this.config.minLevel];
    }

    private createLogEntry(
        level: LogLevel,
        context: LogContext,
        message: string,
        additional: Partial<LogEntry> = {}
    ): LogEntry {
        const entry: LogEntry = {
            timestamp: new Date().toISOString(),
            level,
            context,
            message,
            ...additional
        };

        if (this.config.redactSensitiveData && entry.metadata) {
            const redacted = redactSensitiveData(entry.metadata);
            entry.metadata = redacted && typeof redacted === 'object' && !Array.isArray(redacted)
                ? Object.fromEntries(Object.entries(redacted))
                : {};
        }

        return entry;
    }

    /**
     * Output a log entry to console with proper formatting
     */
    private outputLog(entry: LogEntry): void {
        if (!this.shouldLog(entry.level) || !this.config.enableConsoleLogging) {
            return;
        }

        const logFunction = this.getConsoleFunction(entry.level);

        if (this.config.enableStructuredLogging) {
            logFunction(JSON.stringify(entry));
        } else {
            const timestamp = this.config.enableTimestamps ? `[${entry.timestamp}] ` : '';
            const contextPrefix = `[${entry.context.toUpperCase()}]`;
            const componentSuffix = entry.component ? ` (${entry.component})` : '';
            const jobSuffix = entry.job_id ? ` [Job: ${entry.job_id}]` : '';
            const durationSuffix = entry.duration_ms ? ` (${entry.duration_ms}ms)` : '';

            const prefix = `${timestamp}${contextPrefix}${componentSuffix}${jobSuffix}`;

            if (entry.metadata) {
                logFunction(`${prefix} ${entry.message}${durationSuffix}`, entry.metadata);
            } else {
                logFunction(`${prefix} ${entry.message}${durationSuffix}`);
            }
        }
    }

    private getConsoleFunction(level: LogLevel): ConsoleFunction {
        switch (level) {
            case 'debug':
                return console.debug;
            case 'info':
                return console.log;
            case 'warn':
                return console.warn;
            case 'error':
                return console.error;
        }
    }

    debug(context: LogContext, message: string, additional: Partial<LogEntry> = {}): void {
        this.outputLog(this.createLogEntry('debug', context, message, additional));
    }

    info(context: LogContext, message: string, additional: Partial<LogEntry> = {}): void {
        this.outputLog(this.createLogEntry('info', context, message, additional));
    }

    warn(context: LogContext, message: string, additional: Partial<LogEntry> = {}): void {
        this.outputLog(this.createLogEntry('warn', context, message, additional));
    }

    error(context: LogContext, message: string, additional: Partial<LogEntry> = {}): void {
        this.outputLog(this.createLogEntry('error', context, message, additional));
    }
}

// Global logger instance
const globalLogger = new Logger();

/**
 * Logger bound to a single transcription job
 *
 * Every pipeline transition for the job is logged with the job id so one
 * submission can be followed from webhook to stored row.
 */
export class TranscriptionJobLogger {
    private logger: Logger;
    private jobId?: string;

    constructor(jobId?: string, logger: Logger = globalLogger) {
        this.logger = logger;
        this.jobId = jobId;
    }

    /**
     * Attach the provider job id once it is known
     */
    setJobId(jobId: string): void {
        this.jobId = jobId;
    }

    private base(component: string): Partial<LogEntry> {
        const entry: Partial<LogEntry> = { component };
        if (this.jobId) {
            entry.job_id = this.jobId;
        }
        return entry;
    }

    /**
     * Log a pipeline state transition
     */
    transition(state: PipelineState, metadata: Record<string, unknown> = {}): void {
        const entry: Partial<LogEntry> = { ...this.base('orchestrator'), metadata: { state, ...metadata } };
        if (state === 'failed') {
            this.logger.warn('orchestrator', `Job entered state: ${state}`, entry);
        } else {
            this.logger.info('orchestrator', `Job entered state: ${state}`, entry);
        }
    }

    /**
     * Log a call to the speech-to-text provider
     */
    providerCall(operation: string, success: boolean, durationMs: number, error?: string): void {
        const entry: Partial<LogEntry> = {
            ...this.base('transcription_client'),
            success,
            duration_ms: durationMs,
            metadata: { operation }
        };
        if (error) {
            entry.error = error;
        }
        this.logger.info('transcription',
            success ? `Provider call succeeded: ${operation}` : `Provider call failed: ${operation}`,
            entry
        );
    }

    /**
     * Log the outcome of a result store write
     */
    storeWrite(email: string, question: string, success: boolean): void {
        this.logger.info('storage',
            success ? 'Transcript stored' : 'Transcript not stored',
            { ...this.base('result_store'), success, metadata: { email, question } }
        );
    }

    /**
     * Log an error with the job context attached
     */
    logError(message: string, error?: Error, metadata: Record<string, unknown> = {}): void {
        const entry: Partial<LogEntry> = {
            ...this.base('orchestrator'),
            metadata: {
                ...metadata,
                stack_trace: this.logger.stackTracesEnabled ? error?.stack : undefined
            }
        };
        if (error?.message) {
            entry.error = error.message;
        }
        this.logger.error('orchestrator', message, entry);
    }
}

/**
 * Quick logging functions for common use cases
 */
export const log = {
    debug: (context: LogContext, message: string, metadata?: Record<string, unknown>) =>
        globalLogger.debug(context, message, { metadata }),

    info: (context: LogContext, message: string, metadata?: Record<string, unknown>) =>
        globalLogger.info(context, message, { metadata }),

    warn: (context: LogContext, message: string, metadata?: Record<string, unknown>) =>
        globalLogger.warn(context, message, { metadata }),

    error: (context: LogContext, message: string, error?: Error, metadata?: Record<string, unknown>) => {
        const logEntry: Partial<LogEntry> = {
            metadata: {
                ...metadata,
                stack_trace: error?.stack
            }
        };
        if (error?.message) {
            logEntry.error = error.message;
        }
        globalLogger.error(context, message, logEntry);
    }
};

// Export the global logger instance for direct use
export { globalLogger as logger };
