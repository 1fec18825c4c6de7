/**
 * Configuration loader for service discovery
 *
 * Loads and validates discovery configuration from YAML files.
 */

import { readFile } from 'fs/promises';
import { parse as parseYaml } from 'yaml';
import { ZodError } from 'zod';
import { createLogger } from '../utils/logger.js';
import { ConfigurationError, ValidationError } from '../utils/errors.js';
import { validateDiscoveryConfig, type DiscoveryConfig } from '../types/index.js';

const logger = createLogger('ConfigLoader');

function toValidationError(error: ZodError): ValidationError {
  const validationErrors = error.errors.map((err) => ({
    path: err.path.join('.'),
    message: err.message,
  }));
  return new ValidationError('Configuration validation failed', validationErrors);
}

function asError(error: unknown): Error {
  return error instanceof Error ? error : new Error(String(error));
}

async function loadFrom(path: string, transform: (content: string) => string): Promise<DiscoveryConfig> {
  try {
    const fileContent = transform(await readFile(path, 'utf-8'));
    logger.debug({ path }, 'Configuration file read successfully');

    // An empty document parses to null; treat it as "all defaults"
    const rawConfig: unknown = parseYaml(fileContent) ?? {};

    const config = validateConfig(rawConfig);
    logger.info(
      {
        defaultLookupTimeoutMs: config.defaultLookupTimeoutMs,
        refreshIntervalMs: config.refreshIntervalMs,
      },
      'Configuration validated successfully'
    );
    return config;
  } catch (error) {
    if (error instanceof ValidationError) {
      logger.error({ errors: error.errors }, 'Configuration validation failed');
      throw error;
    }

    const cause = asError(error);
    logger.error({ err: cause, path }, 'Failed to load configuration');
    throw new ConfigurationError(
      `Failed to load configuration from ${path}: ${cause.message}`,
      cause
    );
  }
}

/**
 * Load discovery configuration from YAML file
 *
 * @param path - Path to YAML configuration file
 * @throws {ConfigurationError} if file cannot be read or parsed
 * @throws {ValidationError} if configuration is invalid
 *
 * @example
 * ```typescript
 * const config = await loadDiscoveryConfig('config/discovery.yaml');
 * console.log('Refresh every', config.refreshIntervalMs, 'ms');
 * ```
 */
export async function loadDiscoveryConfig(path: string): Promise<DiscoveryConfig> {
  logger.info({ path }, 'Loading discovery configuration');
  return loadFrom(path, (content) => content);
}

/**
 * Load configuration with environment variable interpolation
 *
 * Supports ${ENV_VAR} syntax in YAML files.
 */
export async function loadDiscoveryConfigWithEnv(path: string): Promise<DiscoveryConfig> {
  logger.info({ path }, 'Loading discovery configuration with env interpolation');
  return loadFrom(path, interpolateEnvVars);
}

/**
 * Interpolate environment variables in string
 *
 * Replaces ${VAR_NAME} with process.env.VAR_NAME
 */
export function interpolateEnvVars(content: string): string {
  return content.replace(/\$\{([^}]+)\}/g, (_match, varName: string) => {
    const value = process.env[varName];
    if (value === undefined) {
      logger.warn(`Environment variable not found: ${varName}`);
      return '';
    }
    return value;
  });
}

/**
 * Validate configuration object without loading from file
 *
 * @throws {ValidationError} if configuration is invalid
 */
export function validateConfig(config: unknown): DiscoveryConfig {
  try {
    return validateDiscoveryConfig(config);
  } catch (error) {
    if (error instanceof ZodError) {
      throw toValidationError(error);
    }
    throw error;
  }
}
