import { writeFileSync } from 'fs';
import { basename, dirname, extname, join } from 'path';
import { SearchResult } from './parser/types.js';
import { buildReport, formatJson, formatText, OutputFormat } from './graph/serializer.js';

export interface EmitOptions {
  outputFormat: OutputFormat;
  outputFile: string;
  verbose?: boolean;
  write?: (line: string) => void;
}

export interface EmitResult {
  content: string;
  written: string | null; // Path of the file written, null when none was
}

/**
 * Print the report and, for `text` and `json`, also write it to
 * `<outputFile>.txt` / `<outputFile>.json`. A failed write is reported and
 * does not fail the run.
 */
export function emitReport(result: SearchResult, options: EmitOptions): EmitResult {
  const write = options.write ?? ((line: string) => process.stdout.write(line));
  const report = buildReport(result);

  const content = options.outputFormat === 'json' ? formatJson(report) + '\n' : formatText(report);
  write(content);

  if (options.outputFormat === 'print') {
    return { content, written: null };
  }

  const target = withSuffix(options.outputFile, options.outputFormat === 'json' ? '.json' : '.txt');
  try {
    writeFileSync(target, content, 'utf-8');
    if (options.verbose) {
      console.error(`[Output] Summary written to ${target}`);
    }
    return { content, written: target };
  } catch (err) {
    console.error(`Error writing to ${target}: ${err instanceof Error ? err.message : err}`);
    return { content, written: null };
  }
}

function withSuffix(filePath: string, suffix: string): string {
  const ext = extname(filePath);
  return join(dirname(filePath), basename(filePath, ext) + suffix);
}
