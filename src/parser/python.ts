import Parser from 'tree-sitter';
import Python from 'tree-sitter-python';
import { ParseError } from '../errors.js';
import { RawImportDeclaration } from './types.js';

const pyParser = new Parser();
pyParser.setLanguage(Python);

interface Context {
  filePath: string;
  sourceCode: string;
  declarations: RawImportDeclaration[];
}

/**
 * Extract every import declaration of a Python source file, in document
 * order. Imports nested in functions, classes and conditional blocks are
 * included. Throws ParseError when the source contains a syntax error.
 */
export function extractImports(sourceCode: string, filePath: string): RawImportDeclaration[] {
  // Buffer must hold the whole input (UTF-16), or tree-sitter rejects it
  const bufferSize = Math.max(32 * 1024, sourceCode.length * 2 + 1);
  const tree = pyParser.parse(sourceCode, undefined, { bufferSize });

  if (tree.rootNode.hasError) {
    const node = findSyntaxError(tree.rootNode) ?? tree.rootNode;
    throw new ParseError(filePath, node.startPosition.row + 1, node.startPosition.column + 1);
  }

  const context: Context = {
    filePath,
    sourceCode,
    declarations: [],
  };

  walkNode(tree.rootNode, context);

  return context.declarations;
}

function walkNode(node: Parser.SyntaxNode, context: Context): void {
  switch (node.type) {
    case 'import_statement':
      processImportStatement(node, context);
      return;
    case 'import_from_statement':
      processImportFromStatement(node, context);
      return;
    case 'future_import_statement':
      processFutureImportStatement(node, context);
      return;
  }

  for (let i = 0; i < node.childCount; i++) {
    const child = node.child(i);
    if (child) {
      walkNode(child, context);
    }
  }
}

function processImportStatement(node: Parser.SyntaxNode, context: Context): void {
  // import os
  // import os.path as p, json
  for (let i = 0; i < node.childCount; i++) {
    const child = node.child(i);
    if (!child) continue;

    const nameNode = child.type === 'aliased_import' ? findChildByType(child, 'dotted_name') : child;
    if (nameNode && nameNode.type === 'dotted_name') {
      context.declarations.push({ kind: 'absolute', module: dottedName(nameNode, context) });
    }
  }
}

function processImportFromStatement(node: Parser.SyntaxNode, context: Context): void {
  // from pathlib import Path
  // from typing import (List, Dict)
  // from .utils import helper as h
  // from .. import *
  let module: string | null = null;
  let level = 0;
  let seenImportKeyword = false;

  for (let i = 0; i < node.childCount; i++) {
    const child = node.child(i);
    if (!child) continue;

    if (!seenImportKeyword) {
      if (child.type === 'import') {
        seenImportKeyword = true;
      } else if (child.type === 'dotted_name') {
        module = dottedName(child, context);
      } else if (child.type === 'relative_import') {
        const prefix = findChildByType(child, 'import_prefix');
        level = prefix ? countDots(nodeText(prefix, context)) : 0;
        const moduleNode = findChildByType(child, 'dotted_name');
        module = moduleNode ? dottedName(moduleNode, context) : null;
      }
      continue;
    }

    const importedName = importedNameOf(child, context);
    if (importedName) {
      context.declarations.push({ kind: 'from', module, level, importedName });
    }
  }
}

function processFutureImportStatement(node: Parser.SyntaxNode, context: Context): void {
  // from __future__ import annotations
  for (let i = 0; i < node.childCount; i++) {
    const child = node.child(i);
    if (!child) continue;

    const importedName = importedNameOf(child, context);
    if (importedName) {
      context.declarations.push({ kind: 'from', module: '__future__', level: 0, importedName });
    }
  }
}

function importedNameOf(node: Parser.SyntaxNode, context: Context): string | null {
  switch (node.type) {
    case 'wildcard_import':
      return '*';
    case 'dotted_name':
      return dottedName(node, context);
    case 'aliased_import': {
      const nameNode = findChildByType(node, 'dotted_name');
      return nameNode ? dottedName(nameNode, context) : null;
    }
    default:
      return null;
  }
}

// First ERROR or MISSING node in document order
function findSyntaxError(root: Parser.SyntaxNode): Parser.SyntaxNode | null {
  const stack: Parser.SyntaxNode[] = [root];

  while (stack.length > 0) {
    const node = stack.pop();
    if (!node) break;
    if (node.type === 'ERROR' || node.isMissing) return node;

    for (let i = node.childCount - 1; i >= 0; i--) {
      const child = node.child(i);
      if (child) stack.push(child);
    }
  }

  return null;
}

// `a . b` is legal; rebuild from the identifiers
function dottedName(node: Parser.SyntaxNode, context: Context): string {
  const parts: string[] = [];
  for (let i = 0; i < node.childCount; i++) {
    const child = node.child(i);
    if (child && child.type === 'identifier') {
      parts.push(nodeText(child, context));
    }
  }
  return parts.join('.');
}

function countDots(text: string): number {
  let dots = 0;
  for (const ch of text) {
    if (ch === '.') dots++;
  }
  return dots;
}

function findChildByType(node: Parser.SyntaxNode, type: string): Parser.SyntaxNode | null {
  for (let i = 0; i < node.childCount; i++) {
    const child = node.child(i);
    if (child && child.type === type) {
      return child;
    }
  }
  return null;
}

function nodeText(node: Parser.SyntaxNode, context: Context): string {
  return context.sourceCode.substring(node.startIndex, node.endIndex);
}
