/**
 * All parser operations are read-only: source files are read, never written.
 */

import { readFileSync } from 'fs';
import { fileExists } from '../utils/files.js';
import { extractImports } from './python.js';
import { RawImportDeclaration } from './types.js';

export interface ReadImportsOptions {
  verbose?: boolean;
}

/**
 * Read a Python file and extract its import declarations.
 * A missing file yields no declarations; a syntax error propagates.
 */
export function readImports(filePath: string, options?: ReadImportsOptions): RawImportDeclaration[] {
  if (!fileExists(filePath)) {
    if (options?.verbose) {
      console.error(`[Parser] File not found: ${filePath}`);
    }
    return [];
  }

  if (options?.verbose) {
    console.error(`[Parser] Parsing: ${filePath}`);
  }

  const sourceCode = readFileSync(filePath, 'utf-8');
  return extractImports(sourceCode, filePath);
}
