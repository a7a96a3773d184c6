import { dirname, join, relative, resolve, sep, basename } from 'path';
import { fileExists, relativize, PACKAGE_INITIALIZER, PYTHON_EXTENSION } from '../utils/files.js';
import {
  Dependency,
  RawImportDeclaration,
  ResolutionContext,
  externalDependency,
  resolvedDependency,
} from './types.js';

/**
 * Map a dotted module name to a file under root: `a/b.py` first, then the
 * package initializer `a/b/__init__.py`.
 */
export function resolveModulePath(moduleName: string, rootPath: string): string | null {
  const pieces = moduleName.split('.');
  if (pieces.some(piece => piece === '')) return null;

  const candidates = [
    join(rootPath, ...pieces) + PYTHON_EXTENSION,
    join(rootPath, ...pieces, PACKAGE_INITIALIZER + PYTHON_EXTENSION),
  ];

  for (const candidate of candidates) {
    if (fileExists(candidate)) {
      return resolve(candidate);
    }
  }

  return null;
}

export function resolveAbsolute(moduleName: string, rootPath: string): Dependency {
  const resolvedPath = resolveModulePath(moduleName, rootPath);
  if (resolvedPath) {
    return resolvedDependency(resolvedPath, relativize(resolvedPath, rootPath));
  }
  // Not found under root → stdlib or third-party
  return externalDependency(moduleName);
}

/**
 * Dotted package of the importing file: its directory relative to root.
 * `pkg/mod.py` and `pkg/__init__.py` both live in package `pkg`; a file at
 * the root has the empty package.
 */
export function packageName(context: ResolutionContext): string {
  const rel = relative(context.rootPath, dirname(context.importingFile));
  if (rel === '' || rel.startsWith('..')) return '';
  return rel.split(sep).join('.');
}

/**
 * Turn a possibly relative dotted name into an absolute one. One leading dot
 * is the current package, each further dot one parent up. Returns null when
 * the dots climb past the top-level package.
 */
export function resolveRelativeName(name: string, pkg: string): string | null {
  const candidate = name.trim();

  if (!candidate) {
    return pkg || null;
  }

  if (!candidate.startsWith('.')) {
    return candidate;
  }

  if (!pkg) return null;

  let level = 0;
  while (candidate[level] === '.') level++;

  const segments = pkg.split('.');
  if (segments.length < level) return null;

  const base = segments.slice(0, segments.length - (level - 1)).join('.');
  const remainder = candidate.substring(level);
  return remainder ? `${base}.${remainder}` : base;
}

/**
 * Resolve `from <dots><module> import <importedName>`.
 *
 * The imported name is first tried as a submodule (`pkg/sub/name.py`), then
 * as a symbol inside the module itself (`pkg/sub.py`).
 */
export function resolveFrom(
  context: ResolutionContext,
  module: string | null,
  level: number,
  importedName: string | null
): Dependency {
  const pkg = packageName(context);
  const leading = '.'.repeat(level);
  const base = module ?? '';
  const symbol = importedName === '*' ? null : importedName;

  const candidates: string[] = [];

  if (symbol === null) {
    candidates.push(base ? leading + base : leading || '.');
  } else {
    const qualified = [base, symbol].filter(Boolean).join('.');
    candidates.push(leading || base ? leading + qualified : symbol);
    if (base) {
      candidates.push(leading + base);
    }
  }

  for (const candidate of candidates) {
    const absoluteName = resolveRelativeName(candidate, pkg);
    if (!absoluteName) continue;

    const resolvedPath = resolveModulePath(absoluteName, context.rootPath);
    if (resolvedPath) {
      return resolvedDependency(resolvedPath, relativize(resolvedPath, context.rootPath));
    }
  }

  const fallback = candidates[candidates.length - 1];
  const display = stripLeadingDots(fallback) || pkg;
  return externalDependency(display || symbol || base);
}

export function resolveDeclaration(
  declaration: RawImportDeclaration,
  context: ResolutionContext
): Dependency {
  if (declaration.kind === 'absolute') {
    return resolveAbsolute(declaration.module, context.rootPath);
  }
  return resolveFrom(context, declaration.module, declaration.level, declaration.importedName);
}

/**
 * Normalize an entry path: relative paths are taken from root, a package
 * directory becomes its initializer and any other suffix becomes `.py`.
 */
export function coerceEntryPath(entry: string, rootPath: string): string {
  const absolute = resolve(rootPath, entry);

  const initializer = join(absolute, PACKAGE_INITIALIZER + PYTHON_EXTENSION);
  if (fileExists(initializer)) {
    return initializer;
  }

  const name = basename(absolute);
  const dot = name.lastIndexOf('.');
  if (dot > 0) {
    const suffix = name.substring(dot);
    if (suffix === PYTHON_EXTENSION) return absolute;
    return absolute.substring(0, absolute.length - suffix.length) + PYTHON_EXTENSION;
  }
  return absolute + PYTHON_EXTENSION;
}

function stripLeadingDots(name: string): string {
  let start = 0;
  while (name[start] === '.') start++;
  return name.substring(start);
}
