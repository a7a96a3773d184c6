import { UnsupportedOutputFormatError } from '../errors.js';
import { SearchResult } from '../parser/types.js';
import { relativize } from '../utils/files.js';
import { buildTreeMap, normalizeSummary, renderTree, SummaryMap } from './tree.js';

export const OUTPUT_FORMATS = ['print', 'text', 'json'] as const;
export type OutputFormat = (typeof OUTPUT_FORMATS)[number];

export interface SearchReport {
  summary: Record<string, string[]>;
  visited: string[];
  tree: string[];
}

export function parseOutputFormat(value: string): OutputFormat {
  const format = OUTPUT_FORMATS.find(f => f === value);
  if (!format) {
    throw new UnsupportedOutputFormatError(value);
  }
  return format;
}

/** Root-relative `file → dependency names`, in discovery order. */
export function buildSummary(result: SearchResult): SummaryMap {
  const summary: SummaryMap = new Map();
  for (const [filePath, dependencies] of result.graph) {
    summary.set(
      relativize(filePath, result.rootPath),
      dependencies.map(dep => dep.name)
    );
  }
  return normalizeSummary(summary);
}

export function visitedList(result: SearchResult): string[] {
  return Array.from(result.visited, filePath => relativize(filePath, result.rootPath)).sort();
}

export function buildReport(result: SearchResult): SearchReport {
  return {
    summary: Object.fromEntries(buildSummary(result)),
    visited: visitedList(result),
    tree: renderTree(buildTreeMap(result), relativize(result.entryFile, result.rootPath)),
  };
}

export function formatJson(report: SearchReport): string {
  return JSON.stringify({ summary: report.summary, visited: report.visited }, null, 2);
}

const RULE = '-----------------------';

export function formatText(report: SearchReport): string {
  const lines: string[] = [];

  for (const [file, names] of Object.entries(report.summary)) {
    lines.push(`File: ${file}`);
    for (const name of names) {
      lines.push(`  ${name}`);
    }
    lines.push(RULE);
  }

  lines.push(`Visited files (${report.visited.length}):`);
  for (const file of report.visited) {
    lines.push(`  ${file}`);
  }
  lines.push(RULE);

  lines.push('Import tree:');
  lines.push(...report.tree);

  return lines.join('\n') + '\n';
}
