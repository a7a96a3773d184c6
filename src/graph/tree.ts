import { PYTHON_EXTENSION, relativize } from '../utils/files.js';
import { SearchResult } from '../parser/types.js';

export type SummaryMap = Map<string, string[]>;

const INDENT = '  ';
const BRANCH = '|-';

/**
 * Reconcile children recorded as bare module names with file keys:
 * `utils` becomes `utils.py` when `utils.py` is itself a key.
 * Returns a new map; the input is left untouched.
 */
export function normalizeSummary(summary: SummaryMap): SummaryMap {
  const keys = new Set(summary.keys());
  const normalized: SummaryMap = new Map();

  for (const [key, children] of summary) {
    normalized.set(
      key,
      children.map(child => {
        if (child.endsWith(PYTHON_EXTENSION)) return child;
        const withSuffix = child + PYTHON_EXTENSION;
        return keys.has(withSuffix) ? withSuffix : child;
      })
    );
  }

  return normalized;
}

/**
 * Root-relative tree of local files only; external modules are leaves with
 * nothing to expand, so they are left out.
 */
export function buildTreeMap(result: SearchResult): SummaryMap {
  const tree: SummaryMap = new Map();

  for (const [filePath, dependencies] of result.graph) {
    tree.set(
      relativize(filePath, result.rootPath),
      dependencies.flatMap(dep => (dep.kind === 'resolved' ? [dep.name] : []))
    );
  }

  return normalizeSummary(tree);
}

/**
 * Render the tree below `root`, two spaces per level. A node seen earlier in
 * this render is printed again to show the edge, but not expanded.
 */
export function renderTree(tree: SummaryMap, root: string): string[] {
  const lines: string[] = [];
  const printed = new Set<string>();
  const stack: Array<{ node: string; depth: number }> = [{ node: root, depth: 0 }];

  while (stack.length > 0) {
    const entry = stack.pop();
    if (!entry) break;

    lines.push(INDENT.repeat(entry.depth) + BRANCH + entry.node);

    if (printed.has(entry.node)) continue;
    printed.add(entry.node);

    const children = tree.get(entry.node) ?? [];
    for (let i = children.length - 1; i >= 0; i--) {
      stack.push({ node: children[i], depth: entry.depth + 1 });
    }
  }

  return lines;
}
