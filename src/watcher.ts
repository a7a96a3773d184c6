import chokidar, { FSWatcher } from 'chokidar';
import { relativize, PYTHON_EXTENSION } from './utils/files.js';

export type WatchEvent = 'add' | 'change' | 'unlink';

export interface WatcherCallbacks {
  onPythonFileEvent: (event: WatchEvent, relativePath: string) => void | Promise<void>;
}

export const IGNORED_PATTERNS = [
  '**/__pycache__/**',
  '**/.venv/**',
  '**/venv/**',
  '**/site-packages/**',
  '**/.git/**',
  '**/build/**',
  '**/dist/**',
  '**/.*',  // Hidden files and directories
];

export function isPythonSource(filePath: string): boolean {
  return filePath.endsWith(PYTHON_EXTENSION);
}

/**
 * Build the chokidar listener for one event kind. Non-Python paths are
 * dropped; handler failures, sync or async, are logged and never escape.
 */
export function createEventForwarder(rootPath: string, callbacks: WatcherCallbacks) {
  return (event: WatchEvent) => (absolutePath: string): Promise<void> => {
    if (!isPythonSource(absolutePath)) return Promise.resolve();

    const relativePath = relativize(absolutePath, rootPath);
    console.error(`[Watcher] ${event}: ${relativePath}`);
    return Promise.resolve()
      .then(() => callbacks.onPythonFileEvent(event, relativePath))
      .catch((err: unknown) => {
        console.error(`[Watcher] Handler failed for ${relativePath}:`, err);
      });
  };
}

export function watchProject(rootPath: string, callbacks: WatcherCallbacks): FSWatcher {
  console.error(`[Watcher] Creating watcher for: ${rootPath}`);

  // Watch the directory directly and filter by extension in the handlers
  const watcher = chokidar.watch(rootPath, {
    ignored: IGNORED_PATTERNS,
    ignoreInitial: true,
    persistent: true,
    followSymlinks: false,
    awaitWriteFinish: {
      stabilityThreshold: 300,  // Wait 300ms after last change before firing
      pollInterval: 100,
    },
  });

  const forward = createEventForwarder(rootPath, callbacks);

  watcher.on('add', forward('add'));
  watcher.on('change', forward('change'));
  watcher.on('unlink', forward('unlink'));

  watcher.on('error', (error: unknown) => {
    console.error('[Watcher] Error:', error);
  });

  watcher.on('ready', () => {
    console.error('[Watcher] Ready, watching for changes');
  });

  return watcher;
}
