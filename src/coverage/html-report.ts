import type { CoverageModel, FileCoverage, LineRecord } from '../types/coverage.js';
import { coverageLevel } from './gcov-parser.js';

/** Line records shown per file; the rest are summarised in a note */
export const MAX_RENDERED_LINES = 50;

export interface HtmlReportOptions {
  /** Repository name shown in the page title and header */
  repositoryName: string;
}

export function escapeHtml(text: string): string {
  return text
    .replace(/&/g, '&amp;')
    .replace(/</g, '&lt;')
    .replace(/>/g, '&gt;')
    .replace(/"/g, '&quot;')
    .replace(/'/g, '&#39;');
}

function formatPercentage(percentage: number): string {
  return `${percentage.toFixed(1)}%`;
}

function renderLine(line: LineRecord): string {
  const lineClass = line.covered ? 'line-covered' : 'line-uncovered';
  const lineNumber = String(line.lineNumber).padStart(3);
  const count = line.countText.padStart(6);
  return (
    `<div class="line ${lineClass}"><span class="line-number">${lineNumber}:</span>` +
    ` ${escapeHtml(count)} | ${escapeHtml(line.sourceText)}</div>`
  );
}

function renderFile(file: FileCoverage): string {
  const shown = file.lines.slice(0, MAX_RENDERED_LINES);
  const omitted = file.lines.length - shown.length;

  const parts = [
    `    <div class="file coverage-${coverageLevel(file.percentage)}">`,
    `        <h3>${escapeHtml(file.name)}</h3>`,
    `        <p>Coverage: ${formatPercentage(file.percentage)} (${file.coveredLines}/${file.totalLines} lines)</p>`,
    '        <div class="code">',
    ...shown.map(renderLine),
  ];

  if (omitted > 0) {
    parts.push(`<p><em>... and ${omitted} more lines</em></p>`);
  }

  parts.push('        </div>', '    </div>');
  return parts.join('\n');
}

/**
 * Render a coverage model as a single static HTML page.
 */
export function renderHtmlReport(model: CoverageModel, options: HtmlReportOptions): string {
  const repositoryName = escapeHtml(options.repositoryName);

  return `<!DOCTYPE html>
<html>
<head>
    <meta charset="utf-8">
    <title>Code Coverage Report - ${repositoryName}</title>
    <style>
        body { font-family: Arial, sans-serif; margin: 40px; }
        .header { background: #f0f0f0; padding: 20px; border-radius: 5px; }
        .summary { margin: 20px 0; }
        .file { margin: 10px 0; padding: 15px; border: 1px solid #ddd; border-radius: 5px; }
        .coverage-high { background-color: #d4edda; }
        .coverage-medium { background-color: #fff3cd; }
        .coverage-low { background-color: #f8d7da; }
        .line { font-family: monospace; font-size: 12px; white-space: pre; }
        .line-covered { background-color: #d4edda; }
        .line-uncovered { background-color: #f8d7da; }
        .line-number { color: #666; width: 50px; display: inline-block; }
    </style>
</head>
<body>
    <div class="header">
        <h1>Code Coverage Report</h1>
        <h2>Repository: ${repositoryName}</h2>
        <div class="summary">
            <strong>Overall Coverage: ${formatPercentage(model.percentage)}</strong>
            (${model.coveredLines}/${model.totalLines} lines)
        </div>
    </div>
${model.files.map(renderFile).join('\n')}
</body>
</html>
`;
}
