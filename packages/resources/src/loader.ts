import { promises as fs } from 'fs';
import path from 'path';
import { parse as parseYaml } from 'yaml';
import type { Logger } from '@quay/core';
import { errorMessage } from '@quay/core';
import { ConfigError } from './errors.js';

/**
 * Read a resource config file and parse it as YAML.
 *
 * Returns the raw document; validation and env expansion happen in `bringUp`.
 * An empty file yields an empty config.
 *
 * @throws {QuayRuntimeError} `config_file_not_found` if the file does not exist
 * @throws {QuayRuntimeError} `config_file_read_error` if it cannot be read
 * @throws {QuayRuntimeError} `config_parse_error` if it is not valid YAML
 */
export async function loadResourceConfig(configPath: string, logger?: Logger): Promise<unknown> {
    const absolutePath = path.resolve(configPath);

    try {
        await fs.access(absolutePath);
    } catch {
        throw ConfigError.fileNotFound(absolutePath);
    }

    let fileContent: string;
    try {
        fileContent = await fs.readFile(absolutePath, 'utf-8');
    } catch (error) {
        throw ConfigError.fileReadError(absolutePath, errorMessage(error));
    }

    let config: unknown;
    try {
        config = parseYaml(fileContent);
    } catch (error) {
        throw ConfigError.parseError(absolutePath, errorMessage(error));
    }

    logger?.debug(`Loaded resource config from ${absolutePath}`);
    return config ?? {};
}
