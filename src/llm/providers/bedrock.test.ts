import { describe, it, expect, vi, beforeEach } from 'vitest';
import { BedrockRuntimeClient, InvokeModelCommand } from '@aws-sdk/client-bedrock-runtime';
import { BedrockProvider, toProviderError } from './bedrock.js';
import { ProviderError, RateLimitError } from '../../types/errors.js';

const send = vi.hoisted(() => vi.fn());

vi.mock('@aws-sdk/client-bedrock-runtime', () => ({
  BedrockRuntimeClient: vi.fn(function () {
    return { send };
  }),
  InvokeModelCommand: vi.fn(function (input: unknown) {
    return { input };
  }),
}));

vi.mock('../../utils/logger.js', () => ({
  debug: vi.fn(),
  error: vi.fn(),
  warn: vi.fn(),
  describeError: (err: unknown) => (err instanceof Error ? err.message : String(err)),
}));

const MODEL = 'anthropic.claude-3-haiku-20240307-v1:0';

function replyWith(body: unknown): void {
  send.mockResolvedValue({ body: new TextEncoder().encode(JSON.stringify(body)) });
}

describe('BedrockProvider', () => {
  beforeEach(() => {
    vi.clearAllMocks();
  });

  it('should configure the client with region and explicit keys', () => {
    new BedrockProvider(MODEL, {
      region: 'eu-west-1',
      credentials: { accessKeyId: 'test-key-id', secretAccessKey: 'test-secret' },
    });

    expect(BedrockRuntimeClient).toHaveBeenCalledWith({
      region: 'eu-west-1',
      credentials: { accessKeyId: 'test-key-id', secretAccessKey: 'test-secret' },
    });
  });

  it('should leave credentials to the default chain when none are given', () => {
    new BedrockProvider(MODEL, { region: 'us-east-1' });

    expect(BedrockRuntimeClient).toHaveBeenCalledWith({ region: 'us-east-1' });
  });

  it('should send an Anthropic messages body and return the first text block', async () => {
    replyWith({
      content: [{ type: 'text', text: '{"modifications":{}}' }],
      usage: { input_tokens: 120, output_tokens: 30 },
    });
    const provider = new BedrockProvider(MODEL, {
      region: 'us-east-1',
      defaultOptions: { maxTokens: 4000, temperature: 0.1 },
    });

    const result = await provider.generate([{ role: 'user', content: 'make it gcov ready' }]);

    expect(result).toEqual({
      content: '{"modifications":{}}',
      usage: { promptTokens: 120, completionTokens: 30, totalTokens: 150 },
    });
    expect(InvokeModelCommand).toHaveBeenCalledWith({
      modelId: MODEL,
      contentType: 'application/json',
      accept: 'application/json',
      body: JSON.stringify({
        anthropic_version: 'bedrock-2023-05-31',
        max_tokens: 4000,
        temperature: 0.1,
        messages: [{ role: 'user', content: 'make it gcov ready' }],
      }),
    });
  });

  it('should reject a body that is not an Anthropic response', async () => {
    send.mockResolvedValue({ body: new TextEncoder().encode('not json') });
    const provider = new BedrockProvider(MODEL, { region: 'us-east-1' });

    await expect(provider.generate([{ role: 'user', content: 'x' }])).rejects.toThrow(
      'Bedrock returned an unexpected response body'
    );
  });

  it('should retry throttled requests', async () => {
    const throttled = Object.assign(new Error('Rate exceeded'), { name: 'ThrottlingException' });
    send
      .mockRejectedValueOnce(throttled)
      .mockResolvedValueOnce({ body: new TextEncoder().encode(JSON.stringify({ content: [{ type: 'text', text: 'ok' }] })) });
    const provider = new BedrockProvider(MODEL, { region: 'us-east-1', baseRetryDelay: 0 });

    const result = await provider.generate([{ role: 'user', content: 'x' }]);

    expect(result.content).toBe('ok');
    expect(send).toHaveBeenCalledTimes(2);
  });

  it('should not retry access errors', async () => {
    const denied = Object.assign(new Error('not authorized'), {
      name: 'AccessDeniedException',
      $metadata: { httpStatusCode: 403 },
    });
    send.mockRejectedValue(denied);
    const provider = new BedrockProvider(MODEL, { region: 'us-east-1', baseRetryDelay: 0 });

    await expect(provider.generate([{ role: 'user', content: 'x' }])).rejects.toThrow(
      'Bedrock request failed: not authorized'
    );
    expect(send).toHaveBeenCalledTimes(1);
  });
});

describe('toProviderError', () => {
  it('should map throttling to a rate limit error', () => {
    const err = toProviderError(Object.assign(new Error('slow'), { name: 'ThrottlingException' }));
    expect(err).toBeInstanceOf(RateLimitError);
  });

  it('should keep the HTTP status of service errors', () => {
    const err = toProviderError(Object.assign(new Error('down'), { $metadata: { httpStatusCode: 503 } }));
    expect(err.status).toBe(503);
    expect(err.isServerError).toBe(true);
  });

  it('should pass provider errors through', () => {
    const original = new ProviderError('already mapped', 400);
    expect(toProviderError(original)).toBe(original);
  });
});
