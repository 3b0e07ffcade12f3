/**
 * Configuration loader
 *
 * Merges, lowest precedence first: defaults, the config file, environment
 * variables and explicit overrides.
 */

import * as fs from 'node:fs';
import * as path from 'node:path';
import * as YAML from 'js-yaml';
import { z } from 'zod';
import { getErrorMessage, GraphBuildError } from '../errors.js';
import { getDefaultConfig } from './defaults.js';
import type { FluxgenConfig, PartialFluxgenConfig } from './types.js';

/**
 * Configuration file names to search for
 */
export const CONFIG_FILE_NAMES = ['fluxgen.config.yaml', 'fluxgen.config.yml'];

/**
 * Environment variable prefix
 */
const ENV_PREFIX = 'FLUXGEN_';

const configFileSchema = z
  .object({
    catalog: z.string().min(1).optional(),
    lint: z
      .object({
        disabled: z.array(z.string()).optional(),
      })
      .strict()
      .optional(),
  })
  .strict();

/**
 * Load configuration.
 * @param overrides - Highest-precedence values, typically from the caller
 * @param configPath - Explicit config file; otherwise the working directory is searched
 * @throws GraphBuildError INVALID_CONFIG for unreadable or malformed config files
 */
export function loadConfig(overrides?: PartialFluxgenConfig, configPath?: string): FluxgenConfig {
  let config = getDefaultConfig();

  const fileConfig = loadConfigFile(configPath);
  if (fileConfig) {
    config = mergeConfig(config, fileConfig);
  }

  config = mergeConfig(config, loadEnvConfig());

  if (overrides) {
    config = mergeConfig(config, overrides);
  }

  return config;
}

function loadConfigFile(configPath?: string): PartialFluxgenConfig | null {
  if (configPath) {
    return loadConfigFromPath(configPath);
  }

  const cwd = process.cwd();
  for (const fileName of CONFIG_FILE_NAMES) {
    const configFilePath = path.join(cwd, fileName);
    if (fs.existsSync(configFilePath)) {
      return loadConfigFromPath(configFilePath);
    }
  }

  return null;
}

/**
 * Parse and validate one YAML config file. A relative `catalog` path is
 * resolved against the file's directory.
 */
export function loadConfigFromPath(filePath: string): PartialFluxgenConfig {
  const absolutePath = path.resolve(filePath);

  let raw: unknown;
  try {
    raw = YAML.load(fs.readFileSync(absolutePath, 'utf8'));
  } catch (error) {
    throw new GraphBuildError(
      'INVALID_CONFIG',
      `Cannot read config ${absolutePath}: ${getErrorMessage(error)}`,
      {},
      { cause: error }
    );
  }

  // An empty file parses to undefined
  const result = configFileSchema.safeParse(raw ?? {});
  if (!result.success) {
    const issues = result.error.issues
      .map((issue) => `${issue.path.join('.') || '<root>'}: ${issue.message}`)
      .join('; ');
    throw new GraphBuildError('INVALID_CONFIG', `Invalid config ${absolutePath}: ${issues}`);
  }

  const { catalog, lint } = result.data;
  return {
    ...(catalog !== undefined ? { catalog: path.resolve(path.dirname(absolutePath), catalog) } : {}),
    ...(lint ? { lint } : {}),
  };
}

/**
 * Load configuration from environment variables
 */
export function loadEnvConfig(env: NodeJS.ProcessEnv = process.env): PartialFluxgenConfig {
  const config: PartialFluxgenConfig = {};

  const catalog = env[`${ENV_PREFIX}CATALOG`];
  if (catalog) {
    config.catalog = path.resolve(catalog);
  }

  const disabled = env[`${ENV_PREFIX}LINT_DISABLE`];
  if (disabled) {
    config.lint = {
      disabled: disabled
        .split(',')
        .map((name) => name.trim())
        .filter((name) => name.length > 0),
    };
  }

  return config;
}

export function mergeConfig(base: FluxgenConfig, override: PartialFluxgenConfig): FluxgenConfig {
  return {
    catalog: override.catalog ?? base.catalog,
    lint: {
      ...base.lint,
      ...override.lint,
      disabled: override.lint?.disabled ?? base.lint.disabled,
    },
  };
}
