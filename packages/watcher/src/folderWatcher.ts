/**
 * Folder Watcher
 *
 * Monitors the input directory with native fs.watch and reports files once
 * they have stopped growing.
 *
 * Features:
 * - Debounced events (prevents duplicate triggers)
 * - Ignore patterns (hidden files, partial copies)
 * - File stability detection (wait for writes to complete)
 */

import { EventEmitter } from 'node:events';
import { watch, type FSWatcher } from 'node:fs';
import { join, extname } from 'node:path';
import { stat } from 'node:fs/promises';

export interface WatchEvent {
  path: string;
  extension: string;
  size: number;
  timestamp: Date;
}

export interface WatcherConfig {
  // Directories to watch (non-recursive)
  paths: string[];

  // Debounce delay in ms
  debounceMs?: number;

  // Interval between size checks; a file must be unchanged for two checks
  stabilityThresholdMs?: number;

  // File extensions to report (empty = all)
  extensions?: string[];

  // Ignore hidden files
  ignoreHidden?: boolean;

  // Ignore partial download / copy files
  ignorePartials?: boolean;
}

export type FileFilterOptions = Pick<WatcherConfig, 'extensions' | 'ignoreHidden' | 'ignorePartials'>;

// Common partial download / copy patterns
const PARTIAL_PATTERNS = [
  /\.part$/i,
  /\.partial$/i,
  /\.crdownload$/i,
  /\.download$/i,
  /\.tmp$/i,
  /\.temp$/i,
  /~$/,
];

/**
 * Predicate over bare file names: false for hidden files, partial copies and
 * (when extensions are given) other extensions
 */
export function createFileFilter(options: FileFilterOptions = {}): (filename: string) => boolean {
  const ignoreHidden = options.ignoreHidden ?? true;
  const ignorePartials = options.ignorePartials ?? true;
  const extensions = (options.extensions ?? []).map(ext => ext.toLowerCase());

  return (filename: string): boolean => {
    if (ignoreHidden && filename.startsWith('.')) {
      return false;
    }

    if (ignorePartials && PARTIAL_PATTERNS.some(pattern => pattern.test(filename))) {
      return false;
    }

    if (extensions.length > 0 && !extensions.includes(extname(filename).toLowerCase())) {
      return false;
    }

    return true;
  };
}

interface PendingFile {
  path: string;
  lastSize: number;
  lastModified: number;
  checkCount: number;
}

/**
 * Emits 'ready', 'add' (WatchEvent), 'error' ({ path, error }) and 'close'
 */
export class FolderWatcher extends EventEmitter {
  private config: Required<WatcherConfig>;
  private watchers: Map<string, FSWatcher> = new Map();
  private debounceTimers: Map<string, NodeJS.Timeout> = new Map();
  private pendingFiles: Map<string, PendingFile> = new Map();
  private stabilityCheckInterval: NodeJS.Timeout | null = null;
  private isRunning = false;

  private readonly filter: (filename: string) => boolean;

  constructor(config: WatcherConfig) {
    super();

    this.config = {
      paths: config.paths,
      debounceMs: config.debounceMs ?? 500,
      stabilityThresholdMs: config.stabilityThresholdMs ?? 3000,
      extensions: (config.extensions ?? []).map(ext => ext.toLowerCase()),
      ignoreHidden: config.ignoreHidden ?? true,
      ignorePartials: config.ignorePartials ?? true,
    };
    this.filter = createFileFilter(this.config);
  }

  /**
   * Start watching configured directories
   */
  start(): void {
    if (this.isRunning) {
      throw new Error('Watcher is already running');
    }

    this.isRunning = true;

    for (const watchPath of this.config.paths) {
      this.watchDirectory(watchPath);
    }

    this.stabilityCheckInterval = setInterval(() => {
      void this.checkFileStability();
    }, this.config.stabilityThresholdMs / 2);

    this.emit('ready', { paths: this.config.paths });
  }

  /**
   * Stop watching all directories
   */
  stop(): void {
    this.isRunning = false;

    for (const [path, watcher] of this.watchers) {
      watcher.close();
      this.watchers.delete(path);
    }

    for (const timer of this.debounceTimers.values()) {
      clearTimeout(timer);
    }
    this.debounceTimers.clear();
    this.pendingFiles.clear();

    if (this.stabilityCheckInterval) {
      clearInterval(this.stabilityCheckInterval);
      this.stabilityCheckInterval = null;
    }

    this.emit('close');
  }

  /**
   * Check if watcher is running
   */
  get running(): boolean {
    return this.isRunning;
  }

  /**
   * Whether a file name would be reported
   */
  accepts(filename: string): boolean {
    return !this.shouldIgnore(filename);
  }

  private watchDirectory(dirPath: string): void {
    if (this.watchers.has(dirPath)) {
      return;
    }

    try {
      const watcher = watch(dirPath, { recursive: false }, (eventType, filename) => {
        if (filename) {
          this.handleFileEvent(eventType, dirPath, filename);
        }
      });

      watcher.on('error', (error) => {
        this.emit('error', { path: dirPath, error });
      });

      this.watchers.set(dirPath, watcher);
    } catch (error) {
      this.emit('error', { path: dirPath, error });
    }
  }

  private handleFileEvent(eventType: string, basePath: string, filename: string): void {
    if (this.shouldIgnore(filename)) {
      return;
    }

    const fullPath = join(basePath, filename);
    const debounceKey = `${eventType}:${fullPath}`;
    const existingTimer = this.debounceTimers.get(debounceKey);

    if (existingTimer) {
      clearTimeout(existingTimer);
    }

    const timer = setTimeout(() => {
      this.debounceTimers.delete(debounceKey);
      void this.trackFile(fullPath);
    }, this.config.debounceMs);

    this.debounceTimers.set(debounceKey, timer);
  }

  private async trackFile(fullPath: string): Promise<void> {
    try {
      const stats = await stat(fullPath).catch(() => null);
      if (!stats || !stats.isFile()) {
        this.pendingFiles.delete(fullPath);
        return;
      }

      // New or modified file - (re)start stability check
      this.pendingFiles.set(fullPath, {
        path: fullPath,
        lastSize: stats.size,
        lastModified: stats.mtimeMs,
        checkCount: 0,
      });
    } catch (error) {
      this.emit('error', { path: fullPath, error });
    }
  }

  private async checkFileStability(): Promise<void> {
    for (const [path, pending] of this.pendingFiles) {
      const stats = await stat(path).catch(() => null);

      if (!stats) {
        // File was deleted
        this.pendingFiles.delete(path);
        continue;
      }

      if (stats.size === pending.lastSize && stats.mtimeMs === pending.lastModified) {
        pending.checkCount++;

        if (pending.checkCount >= 2) {
          this.pendingFiles.delete(path);
          this.emit('add', {
            path,
            extension: extname(path).toLowerCase(),
            size: stats.size,
            timestamp: new Date(),
          });
        }
      } else {
        // File changed, reset
        pending.lastSize = stats.size;
        pending.lastModified = stats.mtimeMs;
        pending.checkCount = 0;
      }
    }
  }

  private shouldIgnore(filename: string): boolean {
    return !this.filter(filename);
  }
}
