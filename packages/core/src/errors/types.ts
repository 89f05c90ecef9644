/**
 * Error scopes representing functional domains in the system
 * Each scope owns its validation and error logic
 */
export enum ErrorScope {
    CONFIG = 'config', // Configuration file operations, parsing, validation
    RESOURCES = 'resources', // Bring-up, registry lookups and shutdown
    DATABASE = 'database', // Relational database drivers and pools
    CACHE = 'cache', // Cache connections
    OBJECT_STORAGE = 'object_storage', // Object storage providers
    LOGGER = 'logger', // Logging system operations, transports, and configuration
}

/**
 * Error types that map directly to HTTP status codes
 * Each type represents the nature of the error
 */
export enum ErrorType {
    USER = 'user', // 400 - bad input, config errors, validation failures
    NOT_FOUND = 'not_found', // 404 - resource doesn't exist
    TIMEOUT = 'timeout', // 408 - operation timed out
    SYSTEM = 'system', // 500 - bugs, internal failures, unexpected states
    THIRD_PARTY = 'third_party', // 502 - upstream provider failures, driver errors
    UNKNOWN = 'unknown', // 500 - unclassified errors, fallback
}

/** Severity of an issue */
export type Severity = 'error' | 'warning';

/** Generic issue type for validation results */
export interface Issue<C = Record<string, unknown>> {
    code: string;
    message: string;
    scope: ErrorScope | string; // Domain that generated this issue
    type: ErrorType; // HTTP status mapping
    severity: Severity;
    path?: Array<string | number>;
    context?: C;
}
