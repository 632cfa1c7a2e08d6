/**
 * Suggestion providers: where modification plans come from
 */

import { readFileSync, statSync } from 'fs';
import { join } from 'path';
import type { GcovsmithConfig } from '../types/config.js';
import type { LLMProvider } from '../types/llm.js';
import type { RepositoryAnalysis } from '../types/analysis.js';
import type {
  BuildFileExcerpt,
  ModificationPlan,
  SuggestionProvider,
  SuggestionRequest,
} from '../types/modification.js';
import { createFallbackPlan } from './fallback-plan.js';
import { createLLMProvider, type ProviderConfig } from './factory.js';
import { parseModificationPlan } from './parser.js';
import { buildGcovModificationPrompt } from './prompts/gcov-modifications.js';
import { debug, describeError, info, warn } from '../utils/logger.js';

/** Build files read for the prompt */
export const MAX_EXCERPT_FILES = 3;

/** Build files at or above this size are not read */
export const MAX_EXCERPT_BYTES = 10000;

/**
 * Contents of the first build files of `analysis` that are small enough to
 * quote. Files that cannot be read are skipped.
 */
export function collectBuildFileExcerpts(rootPath: string, analysis: RepositoryAnalysis): BuildFileExcerpt[] {
  const excerpts: BuildFileExcerpt[] = [];

  for (const buildFile of analysis.buildFiles.slice(0, MAX_EXCERPT_FILES)) {
    const filePath = join(rootPath, buildFile);
    try {
      if (statSync(filePath).size >= MAX_EXCERPT_BYTES) {
        debug(`Not quoting ${buildFile}: too large`);
        continue;
      }
      excerpts.push({ path: buildFile, content: readFileSync(filePath, 'utf-8') });
    } catch (err) {
      debug(`Could not read ${buildFile}: ${describeError(err)}`);
    }
  }

  return excerpts;
}

export class FallbackSuggestionProvider implements SuggestionProvider {
  async suggest(request: SuggestionRequest): Promise<ModificationPlan> {
    return createFallbackPlan(request.analysis);
  }
}

/**
 * Asks a model for the plan. Transport failures and unparseable replies
 * degrade to the fallback plan.
 */
export class LLMSuggestionProvider implements SuggestionProvider {
  constructor(
    private readonly llm: LLMProvider,
    private readonly fallback: SuggestionProvider = new FallbackSuggestionProvider()
  ) {}

  async suggest(request: SuggestionRequest): Promise<ModificationPlan> {
    const messages = buildGcovModificationPrompt(request);

    let content: string;
    try {
      const response = await this.llm.generate(messages);
      content = response.content;
    } catch (err) {
      warn(`LLM call failed: ${describeError(err)}`);
      info('Using basic Gcov modifications instead');
      return this.fallback.suggest(request);
    }

    debug(`LLM response: ${content.length} characters`);
    const plan = parseModificationPlan(content);
    if (plan === null) {
      warn('Could not parse LLM response');
      info('Using basic Gcov modifications instead');
      return this.fallback.suggest(request);
    }
    return plan;
  }
}

export interface SuggestionProviderOptions {
  /** Use the deterministic plan even when a model is configured */
  disableLlm?: boolean;
  /** Factory used to build the model client */
  createProvider?: (config: ProviderConfig) => LLMProvider;
}

/**
 * Pick the suggestion provider for `config`. A model client that cannot be
 * created leaves the deterministic provider in place.
 */
export function createSuggestionProvider(
  config: GcovsmithConfig,
  options: SuggestionProviderOptions = {}
): SuggestionProvider {
  if (options.disableLlm || config.provider === 'none') {
    info('LLM suggestions disabled, using basic Gcov modifications');
    return new FallbackSuggestionProvider();
  }

  const createProvider = options.createProvider ?? createLLMProvider;
  try {
    return new LLMSuggestionProvider(createProvider(config));
  } catch (err) {
    warn(`Could not initialise LLM provider: ${describeError(err)}`);
    return new FallbackSuggestionProvider();
  }
}
