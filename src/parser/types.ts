export type RawImportDeclaration =
  | {
      kind: 'absolute';
      module: string;        // "a.b.c" in `import a.b.c as x`
    }
  | {
      kind: 'from';
      module: string | null; // null for `from . import x`
      level: number;         // Leading dot count
      importedName: string;  // "*" for star imports
    };

/**
 * Outcome of resolving one import.
 * - resolved: a file under the root; `name` is its root-relative posix path
 * - external: stdlib, third-party or anything else not found under the root
 */
export type Dependency =
  | { readonly kind: 'resolved'; readonly path: string; readonly name: string }
  | { readonly kind: 'external'; readonly name: string };

export interface ResolutionContext {
  rootPath: string;      // Absolute
  importingFile: string; // Absolute
}

export type DependencyGraph = Map<string, Dependency[]>;

export interface SearchResult {
  rootPath: string;
  entryFile: string;
  graph: DependencyGraph;
  visited: Set<string>;
}

export function resolvedDependency(path: string, name: string): Dependency {
  return Object.freeze({ kind: 'resolved' as const, path, name });
}

export function externalDependency(name: string): Dependency {
  return Object.freeze({ kind: 'external' as const, name });
}
