/**
 * Configuration loader for the tag conformity rule.
 *
 * Loads configuration from AWS Systems Manager (SSM) Parameter Store,
 * validates the structure, and provides caching for performance.
 */

import { SSMClient, GetParameterCommand } from '@aws-sdk/client-ssm';
import { LRUCache } from 'lru-cache';
import yaml from 'js-yaml';
import { z } from 'zod';
import type { Config } from '@shared/types';
import { setupLogger } from '@shared/utils/logger';
import { ConfigError, ConfigValidationError, ParameterNotFoundError } from './errors';

const logger = setupLogger('tag-conformity:config');

/**
 * Configuration schema validation using Zod.
 */
const ConfigSchema = z
  .object({
    version: z.string().optional(),
    required_tags: z.array(z.string().trim().min(1)).nonempty(),
    region: z.string().min(1).optional(),
    credentials: z
      .object({
        profile: z.string().optional(),
      })
      .optional(),
  })
  .passthrough();

/**
 * LRU cache for configuration objects.
 * Prevents unnecessary SSM API calls for the same parameter.
 */
const configCache = new LRUCache<string, Config>({
  max: 128,
  ttl: 1000 * 60 * 5, // 5 minutes TTL
});

/**
 * Loads configuration from an AWS SSM parameter.
 *
 * @param parameterName - The name of the SSM parameter
 * @param client - Optional SSM client for testing
 * @returns Parsed and validated configuration object
 *
 * @throws {ParameterNotFoundError} If the parameter is not found
 * @throws {ConfigError} If the configuration cannot be retrieved or parsed
 * @throws {ConfigValidationError} If required fields are missing
 */
export async function loadConfigFromSsm(
  parameterName: string,
  client?: SSMClient
): Promise<Config> {
  const cached = configCache.get(parameterName);
  if (cached) {
    logger.debug(`Using cached config for parameter: ${parameterName}`);
    return cached;
  }

  logger.info(`Loading config from SSM: ${parameterName}`);

  const ssmClient = client ?? new SSMClient({});

  let parameterValue: string;
  try {
    const response = await ssmClient.send(new GetParameterCommand({ Name: parameterName }));
    parameterValue = response.Parameter?.Value ?? '';
  } catch (error) {
    if (error && typeof error === 'object' && 'name' in error && error.name === 'ParameterNotFound') {
      throw new ParameterNotFoundError(`Could not find SSM parameter: ${parameterName}`, {
        cause: error,
      });
    }
    throw new ConfigError(`Failed to retrieve SSM parameter: ${String(error)}`, {
      cause: error,
    });
  }

  if (!parameterValue) {
    throw new ConfigError(`SSM parameter ${parameterName} exists but has no value`);
  }

  let raw: unknown;
  try {
    raw = yaml.load(parameterValue);
  } catch (error) {
    throw new ConfigError(
      `Failed to parse YAML configuration from parameter ${parameterName}: ${String(error)}`,
      { cause: error }
    );
  }

  const parsed = ConfigSchema.safeParse(raw);
  if (!parsed.success) {
    const invalidFields = parsed.error.errors.map((e) => e.path.join('.') || '(root)');
    throw new ConfigValidationError(
      `Configuration validation failed. Missing or invalid fields: ${invalidFields.join(', ')}`,
      { cause: parsed.error }
    );
  }

  const config: Config = parsed.data;
  configCache.set(parameterName, config);

  logger.info({ requiredTags: config.required_tags }, 'Config loaded successfully');
  return config;
}

/**
 * Clears the configuration cache.
 * Useful for testing or forcing a fresh config reload.
 */
export function clearConfigCache(): void {
  configCache.clear();
  logger.debug('Config cache cleared');
}
