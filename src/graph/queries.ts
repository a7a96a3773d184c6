import { DirectedGraph } from 'graphology';
import { SearchResult } from '../parser/types.js';
import { relativize } from '../utils/files.js';

export type ImportNodeAttributes = {
  kind: 'file' | 'external';
};

export type ImportGraph = DirectedGraph<ImportNodeAttributes>;

export interface ImportedFile {
  filePath: string;
  importers: number;
}

export interface SearchStats {
  fileCount: number;
  edgeCount: number;
  externalModules: string[];
  mostImported: ImportedFile[];
  leafFiles: string[];
}

/**
 * File-level graph of a finished search. Nodes are root-relative files and
 * external module names; repeated imports of the same target collapse into
 * one edge.
 */
export function toDirectedGraph(result: SearchResult): ImportGraph {
  const graph: ImportGraph = new DirectedGraph<ImportNodeAttributes>();

  for (const filePath of result.visited) {
    graph.mergeNode(relativize(filePath, result.rootPath), { kind: 'file' });
  }

  for (const [filePath, dependencies] of result.graph) {
    const source = relativize(filePath, result.rootPath);
    for (const dep of dependencies) {
      graph.mergeNode(dep.name, { kind: dep.kind === 'resolved' ? 'file' : 'external' });
      graph.mergeEdge(source, dep.name);
    }
  }

  return graph;
}

export function getSearchStats(graph: ImportGraph, limit = 5): SearchStats {
  const files: string[] = [];
  const externalModules: string[] = [];

  graph.forEachNode((node, attrs) => {
    if (attrs.kind === 'file') {
      files.push(node);
    } else {
      externalModules.push(node);
    }
  });

  const mostImported = files
    .map(filePath => ({ filePath, importers: graph.inDegree(filePath) }))
    .filter(f => f.importers > 0)
    .sort((a, b) => b.importers - a.importers || a.filePath.localeCompare(b.filePath))
    .slice(0, limit);

  const leafFiles = files
    .filter(filePath =>
      graph.outNeighbors(filePath).every(target => graph.getNodeAttribute(target, 'kind') !== 'file')
    )
    .sort();

  return {
    fileCount: files.length,
    edgeCount: graph.size,
    externalModules: externalModules.sort(),
    mostImported,
    leafFiles,
  };
}

export function getImporters(graph: ImportGraph, filePath: string): string[] {
  if (!graph.hasNode(filePath)) return [];
  return graph.inNeighbors(filePath).sort();
}
