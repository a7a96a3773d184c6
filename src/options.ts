import { resolve } from 'path';
import { coerceEntryPath } from './parser/resolver.js';
import { OutputFormat, parseOutputFormat } from './graph/serializer.js';

export interface RawSearchOptions {
  root?: string;
  outputFormat?: string;
  outputFile?: string;
  exclude?: string[];
  stats?: boolean;
  importers?: string;
  verbose?: boolean;
}

export interface SearchOptions {
  rootPath: string;
  entryFile: string;
  outputFormat: OutputFormat;
  outputFile: string;
  exclude: string[];
  stats: boolean;
  importers: string | null; // Root-relative file whose importers are listed
  verbose: boolean;
}

export const DEFAULT_OUTPUT_FILE = 'output';

/**
 * Validate CLI input before any traversal happens. Root defaults to `cwd`,
 * the entry is taken relative to root.
 */
export function resolveSearchOptions(
  file: string,
  raw: RawSearchOptions,
  cwd: string = process.cwd()
): SearchOptions {
  const outputFormat = parseOutputFormat(raw.outputFormat ?? 'print');
  const rootPath = resolve(cwd, raw.root ?? '.');

  return {
    rootPath,
    entryFile: coerceEntryPath(file, rootPath),
    outputFormat,
    outputFile: resolve(cwd, raw.outputFile ?? DEFAULT_OUTPUT_FILE),
    exclude: raw.exclude ?? [],
    stats: raw.stats ?? false,
    importers: raw.importers ?? null,
    verbose: raw.verbose ?? false,
  };
}
