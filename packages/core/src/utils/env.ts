import { z } from 'zod';

const ENV_REFERENCE = /\$(?:\{([A-Za-z_][A-Za-z0-9_]*)\}|([A-Za-z_][A-Za-z0-9_]*))/g;

/**
 * Expand `$VAR` and `${VAR}` references from the given environment.
 * Unset variables expand to an empty string.
 */
export function expandEnvVars(value: string, env: NodeJS.ProcessEnv = process.env): string {
    return value.replace(ENV_REFERENCE, (_match, braced: string | undefined, bare: string | undefined) => {
        const name = braced ?? bare ?? '';
        return env[name] ?? '';
    });
}

/**
 * String schema that expands environment references during parsing.
 * Lets DSNs and secrets live in the environment instead of the config file.
 */
export function EnvExpandedString(env?: NodeJS.ProcessEnv) {
    return z.string().transform((value) => expandEnvVars(value, env));
}
