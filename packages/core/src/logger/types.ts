/**
 * Logger Types and Interfaces
 *
 * Defines the core abstractions for the multi-transport logger architecture.
 */

/**
 * Log levels in order of severity
 * Following Winston convention: error < warn < info < debug < silly
 */
export type LogLevel = 'debug' | 'info' | 'warn' | 'error' | 'silly';

export const LOG_LEVELS = ['error', 'warn', 'info', 'debug', 'silly'] as const satisfies readonly LogLevel[];

/**
 * Component identifiers for structured logging
 * Mirrors ErrorScope for consistency, with additional execution context components
 */
export enum LogComponent {
    CONFIG = 'config',
    RESOURCES = 'resources',
    DATABASE = 'database',
    CACHE = 'cache',
    OBJECT_STORAGE = 'object_storage',
    LIFECYCLE = 'lifecycle',
    TELEMETRY = 'telemetry',
}

/**
 * Structured log entry
 * All logs are converted to this format before being sent to transports
 */
export interface LogEntry {
    level: LogLevel;
    message: string;
    /** ISO timestamp */
    timestamp: string;
    component: LogComponent;
    /** Service name, so several processes can share one sink */
    service: string;
    context?: Record<string, unknown> | undefined;
}

/**
 * Logger type
 * All logger implementations must implement this shape.
 */
export type Logger = {
    debug(message: string, context?: Record<string, unknown>): void;

    /**
     * Most verbose level, for detailed dumps
     */
    silly(message: string, context?: Record<string, unknown>): void;

    info(message: string, context?: Record<string, unknown>): void;

    warn(message: string, context?: Record<string, unknown>): void;

    error(message: string, context?: Record<string, unknown>): void;

    /**
     * Log an error with its name, type and stack attached to the context
     */
    trackException(error: Error, context?: Record<string, unknown>): void;

    /**
     * Create a child logger with a different component.
     * Shares transports, service name and level with the parent.
     */
    createChild(component: LogComponent): Logger;

    /**
     * Set the log level dynamically.
     * Affects this logger and every logger sharing its level reference.
     */
    setLevel(level: LogLevel): void;

    getLevel(): LogLevel;

    /**
     * Cleanup resources and close transports
     */
    destroy(): Promise<void>;
};

/**
 * Base transport interface
 * All transport implementations must implement this interface
 */
export type LoggerTransport = {
    write(entry: LogEntry): void | Promise<void>;

    /**
     * Cleanup resources when logger is destroyed
     */
    destroy?(): void | Promise<void>;
};
