import { Command } from 'commander';
import { DEFAULT_OUTPUT_FILE } from './options.js';

/** Options shared by the `search` and `watch` commands. */
export function addSearchOptions(command: Command): Command {
  return command
    .argument('<file>', 'Entry Python file (relative paths are taken from --root)')
    .option('-r, --root <path>', 'Root directory imports are resolved against (default: cwd)')
    .option('-o, --output-format <format>', 'Output format: print | text | json', 'print')
    .option('-f, --output-file <path>', 'File to write text/json output to (suffix is replaced)', DEFAULT_OUTPUT_FILE)
    .option('--exclude <patterns...>', 'Glob patterns of files to record but not descend into (e.g., "tests/**")')
    .option('--stats', 'Print summary statistics')
    .option('--importers <file>', 'List the searched files that import <file> (root-relative path)')
    .option('-v, --verbose', 'Show detailed search progress');
}
