import { cosmiconfig } from 'cosmiconfig';
import { GcovsmithConfigSchema, type GcovsmithConfig, type PartialGcovsmithConfig } from '../types/config.js';
import { ConfigError } from '../types/errors.js';
import { debug, error } from './logger.js';

export interface LoadConfigOptions {
  /** Explicit config file; skips the search when set */
  configPath?: string;
  /** Directory the search starts from */
  cwd?: string;
  /** Values that win over both the file and the environment (CLI flags) */
  overrides?: PartialGcovsmithConfig;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Settings taken from the environment. AWS credentials and region follow the
 * SDK's own variable names and take priority over the config file.
 */
function readEnvironment(fileConfig: Record<string, unknown>): Record<string, unknown> {
  const env: Record<string, unknown> = {};

  if (process.env.AWS_ACCESS_KEY_ID) {
    env.awsAccessKeyId = process.env.AWS_ACCESS_KEY_ID;
  }
  if (process.env.AWS_SECRET_ACCESS_KEY) {
    env.awsSecretAccessKey = process.env.AWS_SECRET_ACCESS_KEY;
  }
  if (process.env.AWS_DEFAULT_REGION) {
    env.region = process.env.AWS_DEFAULT_REGION;
  }
  if (!fileConfig.apiKey && process.env.GCOVSMITH_API_KEY) {
    env.apiKey = process.env.GCOVSMITH_API_KEY;
  }
  if (process.env.GCOVSMITH_PROVIDER) {
    env.provider = process.env.GCOVSMITH_PROVIDER;
  }
  if (process.env.GCOVSMITH_MODEL) {
    env.modelId = process.env.GCOVSMITH_MODEL;
  }

  return env;
}

/**
 * Load and validate gcovsmith configuration
 */
export async function loadConfig(options: LoadConfigOptions = {}): Promise<GcovsmithConfig> {
  const explorer = cosmiconfig('gcovsmith', {
    searchPlaces: [
      'gcovsmith.config.js',
      '.gcovsmithrc',
      '.gcovsmithrc.json',
      '.gcovsmith.config.json',
      'package.json',
    ],
  });

  const result = options.configPath
    ? await explorer.load(options.configPath)
    : await explorer.search(options.cwd ?? process.cwd());

  const fileConfig: unknown = result?.config ?? {};
  if (!isRecord(fileConfig)) {
    throw new ConfigError(`Config in ${result?.filepath ?? 'unknown file'} must be an object`);
  }

  if (result) {
    debug(`Loaded config from ${result.filepath}`);
  }

  const overrides = Object.fromEntries(
    Object.entries(options.overrides ?? {}).filter(([, value]) => value !== undefined)
  );

  const merged = {
    ...fileConfig,
    ...readEnvironment(fileConfig),
    ...overrides,
  };

  const parsed = GcovsmithConfigSchema.safeParse(merged);
  if (!parsed.success) {
    const details = parsed.error.issues
      .map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
      .join('; ');
    error(`Invalid configuration: ${details}`);
    throw new ConfigError(`Invalid configuration: ${details}`);
  }

  return parsed.data;
}
