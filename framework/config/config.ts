/**
 * Configuration Management
 *
 * Loads and manages framework configuration from defaults, a JSON file
 * and environment variables. The merged values are validated with zod
 * before use.
 */

import { readFile } from 'node:fs/promises';
import { z } from 'zod';

export const ConfigSchema = z
  .object({
    env: z.enum(['development', 'production', 'test']).default('development'),
    logLevel: z.enum(['debug', 'info', 'warn', 'error']).default('info'),
    logFormat: z.enum(['json', 'pretty']).default('pretty'),
    database: z
      .object({
        path: z.string().min(1).default(':memory:'),
      })
      .default({}),
    dispatcher: z
      .object({
        unboundParameters: z.enum(['null', 'error']).default('null'),
      })
      .default({}),
  })
  .passthrough();

/** Validated configuration */
export type TrellisConfig = z.infer<typeof ConfigSchema>;

/** Configuration as written by callers; every key is optional */
export type ConfigOptions = z.input<typeof ConfigSchema>;

/**
 * Raised when merged configuration fails validation or a config file
 * cannot be read
 */
export class ConfigurationError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'ConfigurationError';
  }
}

type ConfigTree = Record<string, unknown>;

/**
 * Configuration manager
 */
export class Config {
  private config: ConfigTree;

  constructor(options: ConfigOptions = {}) {
    this.config = { ...validate(options) };
  }

  /**
   * Get a configuration value by dotted path
   */
  get(key: string, defaultValue?: unknown): unknown {
    return this.getNestedValue(this.config, key) ?? defaultValue;
  }

  /**
   * Set a configuration value by dotted path
   */
  set(key: string, value: unknown): void {
    this.setNestedValue(this.config, key, value);
  }

  /**
   * Check if a configuration key exists
   */
  has(key: string): boolean {
    return this.getNestedValue(this.config, key) !== undefined;
  }

  /**
   * Get all configuration, validated
   */
  all(): TrellisConfig {
    return validate(this.config);
  }

  /**
   * Get nested value by path
   */
  private getNestedValue(obj: ConfigTree, path: string): unknown {
    let current: unknown = obj;
    for (const key of path.split('.')) {
      if (!isTree(current)) return undefined;
      current = current[key];
    }
    return current;
  }

  /**
   * Set nested value by path
   */
  private setNestedValue(obj: ConfigTree, path: string, value: unknown): void {
    const parts = path.split('.');
    const last = parts.pop() ?? path;
    let current = obj;

    for (const part of parts) {
      const next = current[part];
      if (isTree(next)) {
        current = next;
      } else {
        const created: ConfigTree = {};
        current[part] = created;
        current = created;
      }
    }

    current[last] = value;
  }
}

/**
 * Load configuration from a JSON file and environment variables.
 * A missing file is not an error; an unreadable or malformed one is.
 */
export async function loadConfig(
  configPath = 'config/app.json',
  env: NodeJS.ProcessEnv = process.env
): Promise<Config> {
  const config = new Config(await readConfigFile(configPath));

  const envConfig: Record<string, string | undefined> = {
    env: env.TRELLIS_ENV,
    logLevel: env.LOG_LEVEL,
    logFormat: env.LOG_FORMAT,
    'database.path': env.TRELLIS_DB_PATH,
    'dispatcher.unboundParameters': env.TRELLIS_UNBOUND_PARAMETERS,
  };

  for (const [key, value] of Object.entries(envConfig)) {
    if (value !== undefined && value !== '') {
      config.set(key, value);
    }
  }

  // Fail at load time rather than on first use
  config.all();
  return config;
}

async function readConfigFile(path: string): Promise<ConfigOptions> {
  let content: string;
  try {
    content = await readFile(path, 'utf8');
  } catch (error) {
    if (isNotFound(error)) {
      return {};
    }
    throw new ConfigurationError(`Cannot read config file ${path}`, { cause: error });
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(content);
  } catch (error) {
    throw new ConfigurationError(`Config file ${path} is not valid JSON`, { cause: error });
  }

  const result = ConfigSchema.safeParse(parsed);
  if (!result.success) {
    throw new ConfigurationError(`Invalid configuration in ${path}: ${formatIssues(result.error)}`);
  }
  return result.data;
}

function validate(values: unknown): TrellisConfig {
  const result = ConfigSchema.safeParse(values);
  if (!result.success) {
    throw new ConfigurationError(`Invalid configuration: ${formatIssues(result.error)}`);
  }
  return result.data;
}

function formatIssues(error: z.ZodError): string {
  return error.issues
    .map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
    .join('; ');
}

function isTree(value: unknown): value is ConfigTree {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function isNotFound(error: unknown): boolean {
  return error instanceof Error && 'code' in error && error.code === 'ENOENT';
}
