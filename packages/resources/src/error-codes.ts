/**
 * Resource bring-up error codes
 * Covers config validation, provider resolution, connect, lookup and shutdown
 */
export enum ResourceErrorCode {
    // Configuration (fatal, raised before any resource connects)
    CONFIG_INVALID = 'resources_config_invalid',
    CONFIG_DEFAULTS_CONFLICT = 'resources_config_defaults_conflict',

    // Provider resolution
    PROVIDER_NOT_FOUND = 'resources_provider_not_found',
    PROVIDER_ALREADY_REGISTERED = 'resources_provider_already_registered',
    DRIVER_NOT_FOUND = 'resources_driver_not_found',
    DRIVER_ALREADY_REGISTERED = 'resources_driver_already_registered',

    // Connect (scoped to one resource)
    CREDENTIALS_LOAD_FAILED = 'resources_credentials_load_failed',
    PROVIDER_CONFIG_INVALID = 'resources_provider_config_invalid',
    CONNECT_FAILED = 'resources_connect_failed',

    // Aggregates
    BRING_UP_INCOMPLETE = 'resources_bring_up_incomplete',
    CLOSE_FAILED = 'resources_close_failed',

    // Lookup
    NOT_FOUND = 'resources_not_found',
    CLOSED = 'resources_closed',

    // Object storage operations
    OBJECT_KEY_INVALID = 'resources_object_key_invalid',
    OBJECT_NOT_FOUND = 'resources_object_not_found',
}

/**
 * Config file error codes
 */
export enum ConfigErrorCode {
    FILE_NOT_FOUND = 'config_file_not_found',
    FILE_READ_ERROR = 'config_file_read_error',
    PARSE_ERROR = 'config_parse_error',
}
