/**
 * Logger Factory
 *
 * Creates logger instances from (unvalidated) logger configuration.
 */

import { LoggerConfigSchema } from './schemas.js';
import type { LoggerConfig } from './schemas.js';
import type { Logger } from './types.js';
import { LogComponent } from './types.js';
import { QuayLogger } from './logger.js';
import { createTransport } from './transport-factory.js';
import { LoggerError } from './errors.js';

export interface CreateLoggerOptions {
    config?: LoggerConfig;
    /** Service name attached to every entry */
    service: string;
    /** Component identifier (defaults to RESOURCES) */
    component?: LogComponent;
}

/**
 * Create a logger instance from configuration
 *
 * @example
 * ```typescript
 * const logger = createLogger({ service: 'billing-api', config: { level: 'debug' } });
 * logger.info('Bring-up started');
 * ```
 */
export function createLogger(options: CreateLoggerOptions): Logger {
    const { service, component = LogComponent.RESOURCES } = options;

    const parsed = LoggerConfigSchema.safeParse(options.config ?? {});
    if (!parsed.success) {
        throw LoggerError.invalidConfig(parsed.error.message);
    }

    return new QuayLogger({
        level: parsed.data.level,
        component,
        service,
        transports: parsed.data.transports.map(createTransport),
    });
}
