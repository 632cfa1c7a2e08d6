import { z } from 'zod';

export const GcovsmithConfigSchema = z.object({
  provider: z.enum(['bedrock', 'anthropic', 'none']).default('bedrock'),
  region: z.string().default('us-east-1'),
  modelId: z.string().default('anthropic.claude-3-haiku-20240307-v1:0'),
  maxTokens: z.number().int().min(1).max(100000).default(4000),
  temperature: z.number().min(0).max(1).default(0.1),
  autoApplySuggestions: z.boolean().default(false),
  awsAccessKeyId: z.string().optional(),
  awsSecretAccessKey: z.string().optional(),
  apiKey: z.string().optional(),
  repositoryUrl: z.string().optional(),
  outputDir: z.string().default('coverage_output'),
  makeCommands: z.array(z.string().min(1)).min(1).default(['make']),
  debug: z.boolean().default(false),
});

export type GcovsmithConfig = z.infer<typeof GcovsmithConfigSchema>;

export type PartialGcovsmithConfig = z.input<typeof GcovsmithConfigSchema>;
