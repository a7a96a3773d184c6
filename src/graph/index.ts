import { resolve } from 'path';
import { minimatch } from 'minimatch';
import { readImports } from '../parser/index.js';
import { resolveDeclaration } from '../parser/resolver.js';
import { Dependency, DependencyGraph, SearchResult } from '../parser/types.js';
import { fileExists, relativize } from '../utils/files.js';

export interface SearchImportsOptions {
  rootPath: string;       // Absolute
  entryFile: string;      // Absolute, already coerced to a .py path
  exclude?: string[];     // Root-relative globs recorded but never descended into
  verbose?: boolean;
}

/**
 * Depth-first search of the import graph starting at the entry file.
 *
 * Uses an explicit stack so deep import chains never hit the call-stack
 * limit. Siblings are visited in declaration order; a file is processed at
 * most once, which is what stops cycles.
 */
export function searchImports(options: SearchImportsOptions): SearchResult {
  const rootPath = resolve(options.rootPath);
  const graph: DependencyGraph = new Map();
  const visited = new Set<string>();
  const stack: string[] = [resolve(options.entryFile)];

  while (stack.length > 0) {
    const filePath = stack.pop();
    if (filePath === undefined || visited.has(filePath)) continue;

    if (!fileExists(filePath)) {
      if (options.verbose) {
        console.error(`[Search] Skipping missing file: ${filePath}`);
      }
      continue;
    }

    visited.add(filePath);

    const context = { rootPath, importingFile: filePath };
    const dependencies: Dependency[] = readImports(filePath, { verbose: options.verbose }).map(
      declaration => resolveDeclaration(declaration, context)
    );

    if (dependencies.length > 0) {
      graph.set(filePath, dependencies);
    }

    // Reverse so the first declared dependency is popped first
    for (let i = dependencies.length - 1; i >= 0; i--) {
      const dependency = dependencies[i];
      if (dependency.kind !== 'resolved') continue;

      if (isExcluded(dependency.path, rootPath, options.exclude)) {
        if (options.verbose) {
          console.error(`[Search] Excluded: ${dependency.name}`);
        }
        continue;
      }

      stack.push(dependency.path);
    }
  }

  if (options.verbose) {
    console.error(`[Search] Visited ${visited.size} files, ${graph.size} with imports`);
  }

  return {
    rootPath,
    entryFile: resolve(options.entryFile),
    graph,
    visited,
  };
}

function isExcluded(filePath: string, rootPath: string, patterns?: string[]): boolean {
  if (!patterns || patterns.length === 0) return false;
  const rel = relativize(filePath, rootPath);
  return patterns.some(pattern => minimatch(rel, pattern, { matchBase: true }));
}
