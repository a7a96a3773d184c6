#!/usr/bin/env node

import { Command } from 'commander';
import { dirname, join } from 'path';
import { readFileSync } from 'fs';
import { fileURLToPath } from 'url';
import { searchImports } from './graph/index.js';
import { getImporters, getSearchStats, toDirectedGraph } from './graph/queries.js';
import { emitReport } from './output.js';
import { addSearchOptions } from './cli.js';
import { RawSearchOptions, resolveSearchOptions, SearchOptions } from './options.js';
import { SearchResult } from './parser/types.js';
import { watchProject } from './watcher.js';

// Read version from package.json
const __filename = fileURLToPath(import.meta.url);
const __dirname = dirname(__filename);
const packageJsonPath = join(__dirname, '../package.json');
const packageJson: { version: string } = JSON.parse(readFileSync(packageJsonPath, 'utf-8'));

const program = new Command();

program
  .name('importscope')
  .description('Trace the Python modules an entry file transitively imports')
  .version(packageJson.version);

function runSearch(options: SearchOptions): SearchResult {
  const startTime = Date.now();

  const result = searchImports({
    rootPath: options.rootPath,
    entryFile: options.entryFile,
    exclude: options.exclude,
    verbose: options.verbose,
  });

  emitReport(result, {
    outputFormat: options.outputFormat,
    outputFile: options.outputFile,
    verbose: options.verbose,
  });

  if (options.stats) {
    const stats = getSearchStats(toDirectedGraph(result));

    console.log('\n=== Import Statistics ===');
    console.log(`Local files: ${stats.fileCount}`);
    console.log(`Import edges: ${stats.edgeCount}`);
    console.log(`External modules: ${stats.externalModules.length}`);
    console.log(`Time: ${Date.now() - startTime}ms`);

    if (stats.mostImported.length > 0) {
      console.log('\nMost Imported Files:');
      for (const file of stats.mostImported) {
        console.log(`  ${file.filePath} (${file.importers} importers)`);
      }
    }

    if (stats.leafFiles.length > 0) {
      console.log(`\nLeaf Files (no local imports): ${stats.leafFiles.length}`);
    }
  }

  if (options.importers) {
    const importers = getImporters(toDirectedGraph(result), options.importers);

    console.log(`\n=== Importers of ${options.importers} ===`);
    if (importers.length === 0) {
      console.log('  (none)');
    }
    for (const importer of importers) {
      console.log(`  ${importer}`);
    }
  }

  return result;
}

addSearchOptions(
  program
    .command('search', { isDefault: true })
    .description('Search the import graph of an entry file and report it')
).action((file: string, raw: RawSearchOptions) => {
  try {
    runSearch(resolveSearchOptions(file, raw));
  } catch (err) {
    console.error('Error searching imports:', err instanceof Error ? err.message : err);
    process.exit(1);
  }
});

addSearchOptions(
  program
    .command('watch')
    .description('Search once, then search again whenever a Python file under the root changes')
).action((file: string, raw: RawSearchOptions) => {
  try {
    const options = resolveSearchOptions(file, raw);
    runSearch(options);

    watchProject(options.rootPath, {
      onPythonFileEvent: (event, relativePath) => {
        console.error(`File ${event}: ${relativePath}`);
        try {
          runSearch(options);
        } catch (err) {
          // Keep watching; the next save may fix the file
          console.error('Error searching imports:', err instanceof Error ? err.message : err);
        }
      },
    });
  } catch (err) {
    console.error('Error searching imports:', err instanceof Error ? err.message : err);
    process.exit(1);
  }
});

program.parse();
