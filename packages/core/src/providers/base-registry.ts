/**
 * Base provider interface - all providers must have a type identifier.
 */
export interface BaseProvider {
    /** Unique type identifier for this provider */
    type: string;
    /** Additional identifiers that resolve to the same provider */
    aliases?: readonly string[];
}

/**
 * Error factory interface for customizing registry errors.
 * Each registry can provide its own error implementations.
 */
export interface RegistryErrorFactory {
    /** Called when attempting to register a provider (or alias) that already exists */
    alreadyRegistered(type: string): Error;
    /** Called when resolving a provider that doesn't exist */
    notFound(type: string, availableTypes: string[]): Error;
}

/**
 * Default error factory that throws plain Error instances.
 * Used when no custom error factory is provided.
 */
export const defaultErrorFactory: RegistryErrorFactory = {
    alreadyRegistered: (type: string) => new Error(`Provider '${type}' is already registered`),
    notFound: (type: string, availableTypes: string[]) =>
        new Error(
            `Provider '${type}' not found. Available: ${availableTypes.join(', ') || 'none'}`
        ),
};

export interface BaseRegistryOptions {
    errorFactory?: RegistryErrorFactory;
    /** Match identifiers ignoring case (default: false) */
    caseInsensitive?: boolean;
}

/**
 * Generic base registry for provider patterns.
 *
 * A strategy table keyed by provider identifier: adding a backend means
 * registering a provider, not editing a switch.
 *
 * Features:
 * - Type-safe provider registration and retrieval
 * - Aliases resolving to the same provider
 * - Optional case-insensitive lookup
 * - Duplicate registration prevention
 * - Customizable error handling via error factory
 *
 * @example
 * ```typescript
 * class DriverRegistry extends BaseRegistry<DatabaseDriver> {
 *   constructor() {
 *     super({
 *       caseInsensitive: true,
 *       errorFactory: {
 *         alreadyRegistered: (type) => new Error(`Driver ${type} exists`),
 *         notFound: (type) => new Error(`Unknown driver: ${type}`),
 *       },
 *     });
 *   }
 * }
 * ```
 */
export class BaseRegistry<TProvider extends BaseProvider> {
    protected providers = new Map<string, TProvider>();
    protected aliases = new Map<string, string>();
    protected errorFactory: RegistryErrorFactory;
    protected caseInsensitive: boolean;

    constructor(options: BaseRegistryOptions = {}) {
        this.errorFactory = options.errorFactory ?? defaultErrorFactory;
        this.caseInsensitive = options.caseInsensitive ?? false;
    }

    /**
     * Register a provider.
     *
     * @throws Error if the type or one of its aliases is already registered
     */
    register(provider: TProvider): void {
        const key = this.normalize(provider.type);
        const aliasKeys = (provider.aliases ?? []).map((alias) => this.normalize(alias));

        for (const candidate of [key, ...aliasKeys]) {
            if (this.providers.has(candidate) || this.aliases.has(candidate)) {
                throw this.errorFactory.alreadyRegistered(candidate);
            }
        }

        this.providers.set(key, provider);
        for (const alias of aliasKeys) {
            this.aliases.set(alias, key);
        }
    }

    /**
     * Unregister a provider and its aliases.
     *
     * @returns true if the provider was unregistered, false if it wasn't registered
     */
    unregister(type: string): boolean {
        const key = this.normalize(type);
        if (!this.providers.delete(key)) {
            return false;
        }
        for (const [alias, target] of this.aliases) {
            if (target === key) {
                this.aliases.delete(alias);
            }
        }
        return true;
    }

    /**
     * Get a registered provider by type or alias.
     *
     * @returns The provider if found, undefined otherwise
     */
    get(type: string): TProvider | undefined {
        const key = this.normalize(type);
        return this.providers.get(this.aliases.get(key) ?? key);
    }

    /**
     * Get a registered provider, failing through the error factory when absent.
     */
    resolve(type: string): TProvider {
        const provider = this.get(type);
        if (!provider) {
            throw this.errorFactory.notFound(type, this.getTypes());
        }
        return provider;
    }

    has(type: string): boolean {
        return this.get(type) !== undefined;
    }

    /**
     * All registered provider types (aliases excluded).
     */
    getTypes(): string[] {
        return Array.from(this.providers.keys());
    }

    getAll(): TProvider[] {
        return Array.from(this.providers.values());
    }

    get size(): number {
        return this.providers.size;
    }

    /**
     * Clear all registered providers.
     * Primarily useful for testing.
     */
    clear(): void {
        this.providers.clear();
        this.aliases.clear();
    }

    protected normalize(type: string): string {
        return this.caseInsensitive ? type.trim().toLowerCase() : type;
    }
}
