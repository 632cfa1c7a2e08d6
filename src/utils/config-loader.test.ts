import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { loadConfig } from './config-loader.js';
import { cosmiconfig } from 'cosmiconfig';
import { ConfigError } from '../types/errors.js';

vi.mock('cosmiconfig');
vi.mock('./logger.js', () => ({
  debug: vi.fn(),
  error: vi.fn(),
}));

function mockExplorer(result: { config: unknown; filepath: string } | null) {
  const explorer = {
    search: vi.fn().mockResolvedValue(result),
    load: vi.fn().mockResolvedValue(result),
  };
  vi.mocked(cosmiconfig).mockReturnValue(explorer as never);
  return explorer;
}

describe('config-loader', () => {
  const originalEnv = process.env;

  beforeEach(() => {
    vi.clearAllMocks();
    process.env = { ...originalEnv };
    delete process.env.AWS_ACCESS_KEY_ID;
    delete process.env.AWS_SECRET_ACCESS_KEY;
    delete process.env.AWS_DEFAULT_REGION;
    delete process.env.GCOVSMITH_API_KEY;
    delete process.env.GCOVSMITH_PROVIDER;
    delete process.env.GCOVSMITH_MODEL;
  });

  afterEach(() => {
    process.env = originalEnv;
  });

  it('should return defaults when no config file is found', async () => {
    mockExplorer(null);

    const config = await loadConfig({ cwd: '/project' });

    expect(config.provider).toBe('bedrock');
    expect(config.region).toBe('us-east-1');
    expect(config.outputDir).toBe('coverage_output');
  });

  it('should search from the given directory', async () => {
    const explorer = mockExplorer(null);

    await loadConfig({ cwd: '/project' });

    expect(explorer.search).toHaveBeenCalledWith('/project');
    expect(explorer.load).not.toHaveBeenCalled();
  });

  it('should load an explicit config path', async () => {
    const explorer = mockExplorer({
      config: { modelId: 'custom-model' },
      filepath: '/etc/gcovsmith.json',
    });

    const config = await loadConfig({ configPath: '/etc/gcovsmith.json' });

    expect(explorer.load).toHaveBeenCalledWith('/etc/gcovsmith.json');
    expect(config.modelId).toBe('custom-model');
  });

  it('should let AWS environment variables win over the file', async () => {
    process.env.AWS_ACCESS_KEY_ID = 'env-access-key';
    process.env.AWS_SECRET_ACCESS_KEY = 'env-secret';
    process.env.AWS_DEFAULT_REGION = 'eu-central-1';
    mockExplorer({
      config: { awsAccessKeyId: 'file-access-key', awsSecretAccessKey: 'file-secret', region: 'us-west-2' },
      filepath: '/project/.gcovsmithrc.json',
    });

    const config = await loadConfig();

    expect(config.awsAccessKeyId).toBe('env-access-key');
    expect(config.awsSecretAccessKey).toBe('env-secret');
    expect(config.region).toBe('eu-central-1');
  });

  it('should only use GCOVSMITH_API_KEY when the file has no apiKey', async () => {
    process.env.GCOVSMITH_API_KEY = 'env-key';
    mockExplorer({ config: { apiKey: 'file-key' }, filepath: '/project/.gcovsmithrc' });

    const config = await loadConfig();

    expect(config.apiKey).toBe('file-key');
  });

  it('should take provider and model from the environment', async () => {
    process.env.GCOVSMITH_PROVIDER = 'anthropic';
    process.env.GCOVSMITH_MODEL = 'claude-3-5-sonnet-20241022';
    mockExplorer(null);

    const config = await loadConfig();

    expect(config.provider).toBe('anthropic');
    expect(config.modelId).toBe('claude-3-5-sonnet-20241022');
  });

  it('should apply overrides last and ignore undefined ones', async () => {
    mockExplorer({
      config: { outputDir: 'from-file', autoApplySuggestions: false },
      filepath: '/project/.gcovsmithrc',
    });

    const config = await loadConfig({
      overrides: { outputDir: undefined, autoApplySuggestions: true },
    });

    expect(config.outputDir).toBe('from-file');
    expect(config.autoApplySuggestions).toBe(true);
  });

  it('should throw ConfigError for invalid values', async () => {
    mockExplorer({ config: { maxTokens: -1 }, filepath: '/project/.gcovsmithrc' });

    await expect(loadConfig()).rejects.toBeInstanceOf(ConfigError);
  });

  it('should throw ConfigError when the file is not an object', async () => {
    mockExplorer({ config: ['not', 'an', 'object'], filepath: '/project/.gcovsmithrc' });

    await expect(loadConfig()).rejects.toThrow('must be an object');
  });
});
