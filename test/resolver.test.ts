import { describe, it, expect, afterEach } from 'vitest';
import { join } from 'path';
import {
  coerceEntryPath,
  packageName,
  resolveAbsolute,
  resolveDeclaration,
  resolveFrom,
  resolveRelativeName,
} from '../src/parser/resolver.js';
import { createProject, removeProject } from './helpers.js';

describe('resolver', () => {
  let root = '';

  afterEach(() => {
    if (root) removeProject(root);
    root = '';
  });

  describe('resolveAbsolute', () => {
    it('resolves a dotted name to a module file', () => {
      root = createProject({ 'pkg/sub.py': '' });

      expect(resolveAbsolute('pkg.sub', root)).toEqual({
        kind: 'resolved',
        path: join(root, 'pkg', 'sub.py'),
        name: 'pkg/sub.py',
      });
    });

    it('falls back to the package initializer', () => {
      root = createProject({ 'pkg/__init__.py': '' });

      expect(resolveAbsolute('pkg', root)).toEqual({
        kind: 'resolved',
        path: join(root, 'pkg', '__init__.py'),
        name: 'pkg/__init__.py',
      });
    });

    it('prefers the plain module over the package initializer', () => {
      root = createProject({ 'pkg.py': '', 'pkg/__init__.py': '' });

      expect(resolveAbsolute('pkg', root)).toMatchObject({ kind: 'resolved', name: 'pkg.py' });
    });

    it('leaves names outside the root unresolved', () => {
      root = createProject({});

      expect(resolveAbsolute('json', root)).toEqual({ kind: 'external', name: 'json' });
      expect(resolveAbsolute('os.path', root)).toEqual({ kind: 'external', name: 'os.path' });
    });

    it('is idempotent', () => {
      root = createProject({ 'pkg/sub.py': '' });

      expect(resolveAbsolute('pkg.sub', root)).toEqual(resolveAbsolute('pkg.sub', root));
      expect(resolveAbsolute('yaml', root)).toEqual(resolveAbsolute('yaml', root));
    });
  });

  describe('packageName', () => {
    it('drops the file name', () => {
      expect(packageName({ rootPath: '/proj', importingFile: '/proj/pkg/sub/mod.py' })).toBe('pkg.sub');
    });

    it('treats a package initializer as its own package', () => {
      expect(packageName({ rootPath: '/proj', importingFile: '/proj/pkg/__init__.py' })).toBe('pkg');
    });

    it('is empty at the root', () => {
      expect(packageName({ rootPath: '/proj', importingFile: '/proj/main.py' })).toBe('');
    });
  });

  describe('resolveRelativeName', () => {
    it('returns absolute names unchanged', () => {
      expect(resolveRelativeName('a.b', 'pkg')).toBe('a.b');
    });

    it('resolves one dot against the current package', () => {
      expect(resolveRelativeName('.mod', 'pkg.sub')).toBe('pkg.sub.mod');
      expect(resolveRelativeName('.', 'pkg.sub')).toBe('pkg.sub');
    });

    it('climbs one package per extra dot', () => {
      expect(resolveRelativeName('..mod', 'pkg.sub')).toBe('pkg.mod');
      expect(resolveRelativeName('..', 'pkg.sub')).toBe('pkg');
    });

    it('fails beyond the top-level package', () => {
      expect(resolveRelativeName('...mod', 'pkg.sub')).toBeNull();
      expect(resolveRelativeName('.mod', '')).toBeNull();
    });
  });

  describe('resolveFrom', () => {
    it('treats the imported name as a submodule first', () => {
      root = createProject({ 'pkg/sub.py': '', 'pkg/sub/name.py': '' });
      const context = { rootPath: root, importingFile: join(root, 'main.py') };

      expect(resolveFrom(context, 'pkg.sub', 0, 'name')).toMatchObject({
        kind: 'resolved',
        name: 'pkg/sub/name.py',
      });
    });

    it('falls back to the module when the submodule does not exist', () => {
      root = createProject({ 'pkg/sub.py': '' });
      const context = { rootPath: root, importingFile: join(root, 'main.py') };

      expect(resolveFrom(context, 'pkg.sub', 0, 'name')).toEqual({
        kind: 'resolved',
        path: join(root, 'pkg', 'sub.py'),
        name: 'pkg/sub.py',
      });
    });

    it('resolves `from . import module` inside a package initializer', () => {
      root = createProject({ 'pkg/__init__.py': 'from . import module\n', 'pkg/module.py': '' });
      const context = { rootPath: root, importingFile: join(root, 'pkg', '__init__.py') };

      expect(resolveFrom(context, null, 1, 'module')).toEqual({
        kind: 'resolved',
        path: join(root, 'pkg', 'module.py'),
        name: 'pkg/module.py',
      });
    });

    it('resolves sibling modules from a plain module', () => {
      root = createProject({ 'pkg/a.py': '', 'pkg/b.py': '' });
      const context = { rootPath: root, importingFile: join(root, 'pkg', 'a.py') };

      expect(resolveFrom(context, 'b', 1, 'helper')).toMatchObject({ kind: 'resolved', name: 'pkg/b.py' });
    });

    it('resolves parent-relative star imports to the package', () => {
      root = createProject({ 'pkg/__init__.py': '', 'pkg/sub/mod.py': '' });
      const context = { rootPath: root, importingFile: join(root, 'pkg', 'sub', 'mod.py') };

      expect(resolveFrom(context, null, 2, '*')).toMatchObject({ kind: 'resolved', name: 'pkg/__init__.py' });
    });

    it('reports the module name when nothing resolves', () => {
      root = createProject({});
      const context = { rootPath: root, importingFile: join(root, 'main.py') };

      expect(resolveFrom(context, 'pathlib', 0, 'Path')).toEqual({ kind: 'external', name: 'pathlib' });
      expect(resolveFrom(context, 'package.sub', 0, 'thing')).toEqual({ kind: 'external', name: 'package.sub' });
      expect(resolveFrom(context, 'json', 0, '*')).toEqual({ kind: 'external', name: 'json' });
    });

    it('strips the dots from unresolved relative imports', () => {
      root = createProject({ 'pkg/mod.py': '' });
      const context = { rootPath: root, importingFile: join(root, 'pkg', 'mod.py') };

      expect(resolveFrom(context, 'missing', 1, 'thing')).toEqual({ kind: 'external', name: 'missing' });
      expect(resolveFrom(context, null, 1, 'ghost')).toEqual({ kind: 'external', name: 'ghost' });
    });

    it('does not resolve relative imports that climb past the root package', () => {
      root = createProject({ 'pkg/mod.py': '', 'other.py': '' });
      const context = { rootPath: root, importingFile: join(root, 'pkg', 'mod.py') };

      expect(resolveFrom(context, 'other', 2, 'x')).toEqual({ kind: 'external', name: 'other' });
    });
  });

  describe('resolveDeclaration', () => {
    it('dispatches on the declaration kind', () => {
      root = createProject({ 'utils.py': '' });
      const context = { rootPath: root, importingFile: join(root, 'main.py') };

      expect(resolveDeclaration({ kind: 'absolute', module: 'utils' }, context)).toMatchObject({
        kind: 'resolved',
        name: 'utils.py',
      });
      expect(
        resolveDeclaration({ kind: 'from', module: 'utils', level: 0, importedName: 'helper' }, context)
      ).toMatchObject({ kind: 'resolved', name: 'utils.py' });
    });
  });

  describe('coerceEntryPath', () => {
    it('resolves relative entries against the root', () => {
      expect(coerceEntryPath('main.py', '/proj')).toBe(join('/proj', 'main.py'));
    });

    it('adds or replaces the .py suffix', () => {
      expect(coerceEntryPath('main', '/proj')).toBe(join('/proj', 'main.py'));
      expect(coerceEntryPath('main.txt', '/proj')).toBe(join('/proj', 'main.py'));
    });

    it('maps a package directory to its initializer', () => {
      root = createProject({ 'pkg/__init__.py': '' });

      expect(coerceEntryPath('pkg', root)).toBe(join(root, 'pkg', '__init__.py'));
    });
  });
});
