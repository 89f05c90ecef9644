import type { Issue } from '@quay/core';
import { ErrorScope, ErrorType, QuayRuntimeError, QuayValidationError, errorMessage } from '@quay/core';
import { ConfigErrorCode, ResourceErrorCode } from './error-codes.js';
import type { ResourceFailure, ResourceFailureSummary, ResourceFamily } from './types.js';
import { summarizeFailure } from './types.js';

export type ConnectStage = 'credentials' | 'config' | 'connect';

export interface ResourceErrorContext extends Record<string, unknown> {
    family: ResourceFamily;
    name: string;
}

export interface AggregatedFailuresContext extends Record<string, unknown> {
    failures: ResourceFailureSummary[];
}

const FAMILY_SCOPE: Record<ResourceFamily, ErrorScope> = {
    database: ErrorScope.DATABASE,
    cache: ErrorScope.CACHE,
    object_storage: ErrorScope.OBJECT_STORAGE,
};

const FAMILY_LABEL: Record<ResourceFamily, string> = {
    database: 'sql database',
    cache: 'redis',
    object_storage: 'object storage',
};

/**
 * Resource error factory with typed methods for creating bring-up errors
 * Each method creates a properly typed error with the scope of the resource family
 */
export class ResourceError {
    // ==================== Configuration ====================

    /**
     * Config failed schema validation (fatal; bring-up does not start)
     */
    static configInvalid(issues: Issue[]): QuayValidationError {
        return new QuayValidationError(
            issues.map((issue) => ({
                ...issue,
                code: issue.code === 'schema_validation' ? ResourceErrorCode.CONFIG_INVALID : issue.code,
            }))
        );
    }

    /**
     * Defaults could not be resolved because explicit values conflict
     */
    static defaultsConflict(
        path: Array<string | number>,
        message: string,
        context: Record<string, unknown>
    ): Issue {
        return {
            code: ResourceErrorCode.CONFIG_DEFAULTS_CONFLICT,
            message,
            scope: ErrorScope.CONFIG,
            type: ErrorType.USER,
            severity: 'error',
            path,
            context,
        };
    }

    // ==================== Provider resolution ====================

    static providerNotFound(provider: string, available: string[]) {
        return new QuayRuntimeError(
            ResourceErrorCode.PROVIDER_NOT_FOUND,
            ErrorScope.OBJECT_STORAGE,
            ErrorType.USER,
            `Object storage provider '${provider}' not found`,
            { provider, available },
            `Use one of: ${available.join(', ') || 'none'}`
        );
    }

    static providerAlreadyRegistered(provider: string) {
        return new QuayRuntimeError(
            ResourceErrorCode.PROVIDER_ALREADY_REGISTERED,
            ErrorScope.OBJECT_STORAGE,
            ErrorType.USER,
            `Object storage provider '${provider}' is already registered`,
            { provider }
        );
    }

    static driverNotFound(driver: string, available: string[]) {
        return new QuayRuntimeError(
            ResourceErrorCode.DRIVER_NOT_FOUND,
            ErrorScope.DATABASE,
            ErrorType.USER,
            `Database driver '${driver}' not found`,
            { driver, available },
            `Use one of: ${available.join(', ') || 'none'}`
        );
    }

    static driverAlreadyRegistered(driver: string) {
        return new QuayRuntimeError(
            ResourceErrorCode.DRIVER_ALREADY_REGISTERED,
            ErrorScope.DATABASE,
            ErrorType.USER,
            `Database driver '${driver}' is already registered`,
            { driver }
        );
    }

    // ==================== Connect ====================

    static credentialsLoadFailed(family: ResourceFamily, name: string, cause: unknown) {
        return new QuayRuntimeError<ResourceErrorContext>(
            ResourceErrorCode.CREDENTIALS_LOAD_FAILED,
            FAMILY_SCOPE[family],
            ErrorType.USER,
            `Failed to load credentials for ${FAMILY_LABEL[family]} '${name}': ${errorMessage(cause)}`,
            { family, name, stage: 'credentials' },
            undefined,
            { cause }
        );
    }

    static providerConfigInvalid(family: ResourceFamily, name: string, cause: unknown) {
        return new QuayRuntimeError<ResourceErrorContext>(
            ResourceErrorCode.PROVIDER_CONFIG_INVALID,
            FAMILY_SCOPE[family],
            ErrorType.USER,
            `Invalid provider configuration for ${FAMILY_LABEL[family]} '${name}': ${errorMessage(cause)}`,
            { family, name, stage: 'config' },
            undefined,
            { cause }
        );
    }

    static connectFailed(
        family: ResourceFamily,
        name: string,
        cause: unknown,
        details?: Record<string, unknown>
    ) {
        return new QuayRuntimeError<ResourceErrorContext>(
            ResourceErrorCode.CONNECT_FAILED,
            FAMILY_SCOPE[family],
            ErrorType.THIRD_PARTY,
            `Failed to connect to ${FAMILY_LABEL[family]} '${name}': ${errorMessage(cause)}`,
            { family, name, stage: 'connect', ...details },
            undefined,
            { cause }
        );
    }

    /**
     * Wrap a failure from a given connect stage, keeping errors that are already classified
     */
    static fromStage(stage: ConnectStage, family: ResourceFamily, name: string, cause: unknown) {
        if (cause instanceof QuayRuntimeError) {
            return cause;
        }
        switch (stage) {
            case 'credentials':
                return ResourceError.credentialsLoadFailed(family, name, cause);
            case 'config':
                return ResourceError.providerConfigInvalid(family, name, cause);
            case 'connect':
                return ResourceError.connectFailed(family, name, cause);
        }
    }

    // ==================== Aggregates ====================

    /**
     * One or more resources failed during bring-up.
     * Lists every failure, not only the first.
     */
    static bringUpIncomplete(failures: ResourceFailure[], total: number) {
        return new QuayRuntimeError<AggregatedFailuresContext>(
            ResourceErrorCode.BRING_UP_INCOMPLETE,
            ErrorScope.RESOURCES,
            ErrorType.THIRD_PARTY,
            `${failures.length} of ${total} resources failed to start: ${describeFailures(failures)}`,
            { failures: failures.map(summarizeFailure) },
            'Resources that connected remain usable; decide whether a partial bring-up is acceptable'
        );
    }

    static closeFailed(failures: ResourceFailure[]) {
        return new QuayRuntimeError<AggregatedFailuresContext>(
            ResourceErrorCode.CLOSE_FAILED,
            ErrorScope.RESOURCES,
            ErrorType.SYSTEM,
            `${failures.length} resources failed to close: ${describeFailures(failures)}`,
            { failures: failures.map(summarizeFailure) }
        );
    }

    // ==================== Lookup ====================

    static notFound(family: ResourceFamily, name: string) {
        return new QuayRuntimeError<ResourceErrorContext>(
            ResourceErrorCode.NOT_FOUND,
            FAMILY_SCOPE[family],
            ErrorType.NOT_FOUND,
            `${capitalize(FAMILY_LABEL[family])} with name ${name} does not exist`,
            { family, name }
        );
    }

    static closed(family: ResourceFamily, name: string) {
        return new QuayRuntimeError<ResourceErrorContext>(
            ResourceErrorCode.CLOSED,
            FAMILY_SCOPE[family],
            ErrorType.USER,
            `${capitalize(FAMILY_LABEL[family])} ${name} is closed`,
            { family, name }
        );
    }

    // ==================== Object storage operations ====================

    static objectKeyInvalid(key: string, reason: string) {
        return new QuayRuntimeError(
            ResourceErrorCode.OBJECT_KEY_INVALID,
            ErrorScope.OBJECT_STORAGE,
            ErrorType.USER,
            `Invalid object key '${key}': ${reason}`,
            { key, reason }
        );
    }

    static objectNotFound(bucket: string, key: string) {
        return new QuayRuntimeError(
            ResourceErrorCode.OBJECT_NOT_FOUND,
            ErrorScope.OBJECT_STORAGE,
            ErrorType.NOT_FOUND,
            `Object not found: ${bucket}/${key}`,
            { bucket, key }
        );
    }
}

/**
 * Config file error factory
 */
export class ConfigError {
    static fileNotFound(configPath: string) {
        return new QuayRuntimeError(
            ConfigErrorCode.FILE_NOT_FOUND,
            ErrorScope.CONFIG,
            ErrorType.USER,
            `Configuration file not found: ${configPath}`,
            { configPath },
            'Ensure the configuration file exists at the specified path'
        );
    }

    static fileReadError(configPath: string, cause: string) {
        return new QuayRuntimeError(
            ConfigErrorCode.FILE_READ_ERROR,
            ErrorScope.CONFIG,
            ErrorType.SYSTEM,
            `Failed to read configuration file: ${cause}`,
            { configPath, cause },
            'Check file permissions and ensure the file is not corrupted'
        );
    }

    static parseError(configPath: string, cause: string) {
        return new QuayRuntimeError(
            ConfigErrorCode.PARSE_ERROR,
            ErrorScope.CONFIG,
            ErrorType.USER,
            `Failed to parse configuration file: ${cause}`,
            { configPath, cause },
            'Ensure the configuration file contains valid YAML syntax'
        );
    }
}

function describeFailures(failures: ResourceFailure[]): string {
    return failures
        .map((failure) => `${failure.family}/${failure.name} (${failure.error.message})`)
        .join('; ');
}

function capitalize(value: string): string {
    return value.charAt(0).toUpperCase() + value.slice(1);
}
