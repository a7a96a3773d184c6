import { existsSync, statSync } from 'fs';
import { isAbsolute, relative, sep } from 'path';

export const PYTHON_EXTENSION = '.py';
export const PACKAGE_INITIALIZER = '__init__';

export function fileExists(filePath: string): boolean {
  try {
    return existsSync(filePath) && statSync(filePath).isFile();
  } catch {
    return false;
  }
}

/**
 * Path relative to root with forward slashes. Paths outside the root are
 * returned as given (posix-separated).
 */
export function relativize(filePath: string, rootPath: string): string {
  const rel = relative(rootPath, filePath);
  if (rel === '' || rel === '..' || rel.startsWith(`..${sep}`) || isAbsolute(rel)) {
    return filePath.split(sep).join('/');
  }
  return rel.split(sep).join('/');
}
