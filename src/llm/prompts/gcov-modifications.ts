/**
 * Prompt asking a model for the build changes that make a repository gcov-ready
 */

import type { LLMMessage } from '../../types/llm.js';
import type { SuggestionRequest } from '../../types/modification.js';

/** Source files listed in the prompt */
export const MAX_PROMPT_SOURCE_FILES = 10;

/** Characters of each build file quoted in the prompt */
export const MAX_EXCERPT_CHARS = 1000;

export function buildGcovModificationPrompt(request: SuggestionRequest): LLMMessage[] {
  return [
    { role: 'system', content: buildSystemPrompt() },
    { role: 'user', content: buildUserPrompt(request) },
  ];
}

function buildSystemPrompt(): string {
  return 'You are a C/C++ build system expert. Help make this repository compatible with Gcov code coverage.';
}

function buildUserPrompt(request: SuggestionRequest): string {
  const { analysis, issues, buildFiles } = request;
  const sourceFiles = analysis.sourceFiles.slice(0, MAX_PROMPT_SOURCE_FILES);

  let prompt = `Repository Analysis:
- Project Type: ${analysis.projectType}
- Build System: ${analysis.buildSystem}
- Source Files: ${sourceFiles.join(', ')}
- Has Tests: ${analysis.hasTests ? 'yes' : 'no'}

Compatibility Issues Found:
${issues.map((issue) => `- ${issue}`).join('\n')}

Current Build Files:
`;

  for (const file of buildFiles) {
    prompt += `\n=== ${file.path} ===\n${file.content.slice(0, MAX_EXCERPT_CHARS)}...\n`;
  }

  prompt += `

Please provide SPECIFIC modifications to make this repository Gcov-compatible:

1. MAKEFILE_CHANGES: Exact lines to add to the Makefile (if applicable)
2. CMAKE_CHANGES: Exact lines to add to CMakeLists.txt (if applicable)
3. TEST_COMPILATION: A shell command that compiles the tests with coverage
4. GCOV_COMMANDS: Exact commands to generate coverage data
5. MISSING_FILES: Any files that need to be created, with paths relative to the repository root

Respond in JSON format:
{
    "modifications": {
        "makefile_changes": ["line1", "line2"],
        "cmake_changes": ["line1", "line2"],
        "test_compilation": "exact command",
        "gcov_commands": ["cmd1", "cmd2"],
        "missing_files": [{"path": "filename", "content": "file content"}]
    },
    "explanation": "Brief explanation of changes"
}`;

  return prompt;
}
