import { describe, it, expect, vi, afterEach } from 'vitest';
import { join } from 'path';
import { createEventForwarder, isPythonSource, WatchEvent } from '../src/watcher.js';

describe('isPythonSource', () => {
  it('accepts only .py files', () => {
    expect(isPythonSource('/proj/pkg/mod.py')).toBe(true);
    expect(isPythonSource('/proj/pkg/mod.pyc')).toBe(false);
    expect(isPythonSource('/proj/README.md')).toBe(false);
  });
});

describe('createEventForwarder', () => {
  const root = join('/proj');

  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('forwards Python events with root-relative paths', async () => {
    vi.spyOn(console, 'error').mockImplementation(() => undefined);
    const seen: Array<[WatchEvent, string]> = [];
    const forward = createEventForwarder(root, {
      onPythonFileEvent: (event, relativePath) => {
        seen.push([event, relativePath]);
      },
    });

    await forward('change')(join(root, 'pkg', 'mod.py'));
    await forward('add')(join(root, 'main.py'));

    expect(seen).toEqual([
      ['change', 'pkg/mod.py'],
      ['add', 'main.py'],
    ]);
  });

  it('ignores files that are not Python sources', async () => {
    const handler = vi.fn();
    const forward = createEventForwarder(root, { onPythonFileEvent: handler });

    await forward('unlink')(join(root, 'notes.txt'));

    expect(handler).not.toHaveBeenCalled();
  });

  it('logs a rejected handler instead of letting it escape', async () => {
    const errorSpy = vi.spyOn(console, 'error').mockImplementation(() => undefined);
    const failure = new Error('search failed');
    const forward = createEventForwarder(root, {
      onPythonFileEvent: () => Promise.reject(failure),
    });

    await expect(forward('change')(join(root, 'main.py'))).resolves.toBeUndefined();

    expect(errorSpy).toHaveBeenCalledWith('[Watcher] Handler failed for main.py:', failure);
  });

  it('logs a handler that throws synchronously', async () => {
    const errorSpy = vi.spyOn(console, 'error').mockImplementation(() => undefined);
    const failure = new Error('boom');
    const forward = createEventForwarder(root, {
      onPythonFileEvent: () => {
        throw failure;
      },
    });

    await forward('add')(join(root, 'pkg', 'new.py'));

    expect(errorSpy).toHaveBeenCalledWith('[Watcher] Handler failed for pkg/new.py:', failure);
  });
});
