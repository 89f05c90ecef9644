/**
 * Quay Logger
 *
 * Main logger implementation with multi-transport support.
 * Supports structured logging and component-based categorization.
 */

import type { Logger, LoggerTransport, LogEntry, LogLevel, LogComponent } from './types.js';

export interface QuayLoggerConfig {
    /** Minimum log level to record */
    level: LogLevel;
    component: LogComponent;
    service: string;
    transports: LoggerTransport[];
}

/**
 * Level holder shared between a logger and its children,
 * so setLevel() on any of them applies to the whole tree.
 */
interface LevelRef {
    current: LogLevel;
}

/**
 * QuayLogger - Multi-transport logger with structured logging
 */
export class QuayLogger implements Logger {
    private levelRef: LevelRef;
    private component: LogComponent;
    private service: string;
    private transports: LoggerTransport[];

    // Log level hierarchy for filtering
    // Following Winston convention: lower number = more severe
    private static readonly LEVELS: Record<LogLevel, number> = {
        error: 0,
        warn: 1,
        info: 2,
        debug: 3,
        silly: 4,
    };

    constructor(config: QuayLoggerConfig, levelRef?: LevelRef) {
        this.levelRef = levelRef ?? { current: config.level };
        this.component = config.component;
        this.service = config.service;
        this.transports = config.transports;
    }

    debug(message: string, context?: Record<string, unknown>): void {
        this.log('debug', message, context);
    }

    silly(message: string, context?: Record<string, unknown>): void {
        this.log('silly', message, context);
    }

    info(message: string, context?: Record<string, unknown>): void {
        this.log('info', message, context);
    }

    warn(message: string, context?: Record<string, unknown>): void {
        this.log('warn', message, context);
    }

    error(message: string, context?: Record<string, unknown>): void {
        this.log('error', message, context);
    }

    trackException(error: Error, context?: Record<string, unknown>): void {
        this.error(error.message, {
            ...context,
            errorName: error.name,
            errorStack: error.stack,
            errorType: error.constructor.name,
        });
    }

    private log(level: LogLevel, message: string, context?: Record<string, unknown>): void {
        if (!this.shouldLog(level)) {
            return;
        }

        const entry: LogEntry = {
            level,
            message,
            timestamp: new Date().toISOString(),
            component: this.component,
            service: this.service,
            context,
        };

        for (const transport of this.transports) {
            try {
                const pending = transport.write(entry);
                if (pending instanceof Promise) {
                    pending.catch((error: unknown) => {
                        console.error('Logger transport error:', error);
                    });
                }
            } catch (error) {
                // Don't let transport errors break logging
                console.error('Logger transport error:', error);
            }
        }
    }

    /**
     * Winston convention: log if level number <= configured level number
     */
    private shouldLog(level: LogLevel): boolean {
        return QuayLogger.LEVELS[level] <= QuayLogger.LEVELS[this.levelRef.current];
    }

    createChild(component: LogComponent): QuayLogger {
        return new QuayLogger(
            {
                level: this.levelRef.current,
                component,
                service: this.service,
                transports: this.transports,
            },
            this.levelRef
        );
    }

    setLevel(level: LogLevel): void {
        this.levelRef.current = level;
    }

    getLevel(): LogLevel {
        return this.levelRef.current;
    }

    async destroy(): Promise<void> {
        for (const transport of this.transports) {
            if (transport.destroy) {
                try {
                    await transport.destroy();
                } catch (error) {
                    console.error('Error destroying transport:', error);
                }
            }
        }
    }
}
