/**
 * Parse model output into a modification plan
 */

import { z } from 'zod';
import type { ModificationPlan } from '../types/modification.js';
import { createModificationPlan } from './fallback-plan.js';
import { debug, warn } from '../utils/logger.js';

const lines = z.array(z.string()).default([]);

const ModificationReplySchema = z.object({
  modifications: z
    .object({
      makefile_changes: lines,
      cmake_changes: lines,
      test_compilation: z.string().nullish(),
      gcov_commands: lines,
      missing_files: z.array(z.object({ path: z.string().min(1), content: z.string() })).default([]),
    })
    .default({}),
  explanation: z.string().default(''),
});

export type ModificationReply = z.infer<typeof ModificationReplySchema>;

/**
 * The text between the first `{` and the last `}`, if there is one.
 */
export function extractJsonObject(response: string): string | null {
  const start = response.indexOf('{');
  const end = response.lastIndexOf('}');
  return start !== -1 && end > start ? response.slice(start, end + 1) : null;
}

/**
 * Read a plan from a model reply. Returns null for replies without a JSON
 * object, with malformed JSON, or whose object does not have the expected
 * shape.
 */
export function parseModificationPlan(response: string): ModificationPlan | null {
  const json = extractJsonObject(response);
  if (json === null) {
    warn('LLM response contained no JSON object');
    return null;
  }

  let data: unknown;
  try {
    data = JSON.parse(json);
  } catch (err) {
    warn('LLM response contained malformed JSON');
    debug(`JSON error: ${err instanceof Error ? err.message : String(err)}`);
    return null;
  }

  const parsed = ModificationReplySchema.safeParse(data);
  if (!parsed.success) {
    warn('LLM response did not match the expected modification format');
    debug(parsed.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`).join('; '));
    return null;
  }

  const { modifications, explanation } = parsed.data;
  return createModificationPlan({
    makefileChanges: modifications.makefile_changes,
    cmakeChanges: modifications.cmake_changes,
    testCompilation: modifications.test_compilation ?? undefined,
    gcovCommands: modifications.gcov_commands,
    missingFiles: modifications.missing_files,
    explanation,
  });
}
