export {
    BaseRegistry,
    defaultErrorFactory,
    type BaseProvider,
    type BaseRegistryOptions,
    type RegistryErrorFactory,
} from './base-registry.js';
