import fs from 'fs';
import path from 'path';
import { describeError } from '../common/errors';
import { createLogger } from '../utils/log';
import { normaliseRelativePath, shouldIgnorePath } from './ignoreRules';

const logger = createLogger('watcher');

export interface WatchHandle {
  close: () => void;
}

export type WatchImpl = (
  rootPath: string,
  listener: (eventType: string, fileName: string | null) => void,
) => WatchHandle;

export interface SyncWatcherOptions {
  debounceMs?: number;
  watchImpl?: WatchImpl;
  ignoreJunk?: boolean;
}

const defaultWatch: WatchImpl = (rootPath, listener) =>
  fs.watch(rootPath, { recursive: true }, (eventType, fileName) => listener(eventType, fileName));

/**
 * Collects change events under a root and hands them to `onChange` in
 * debounced batches. Batches never overlap: a batch that arrives while the
 * previous one runs waits for it.
 */
export class SyncWatcher {
  private readonly rootPath: string;
  private readonly onChange: (paths: string[]) => Promise<void>;
  private readonly debounceMs: number;
  private readonly watchImpl: WatchImpl;
  private readonly ignoreJunk: boolean;
  private handle: WatchHandle | null = null;
  private timer: NodeJS.Timeout | null = null;
  private pending = new Set<string>();
  private running: Promise<void> = Promise.resolve();

  constructor(rootPath: string, onChange: (paths: string[]) => Promise<void>, options: SyncWatcherOptions = {}) {
    this.rootPath = path.resolve(rootPath);
    this.onChange = onChange;
    this.debounceMs = options.debounceMs ?? 500;
    this.watchImpl = options.watchImpl ?? defaultWatch;
    this.ignoreJunk = options.ignoreJunk ?? true;
  }

  start(): void {
    if (this.handle) return;
    this.handle = this.watchImpl(this.rootPath, (_eventType, fileName) => this.record(fileName));
    logger.info(`Watching ${this.rootPath}`);
  }

  stop(): void {
    if (this.timer) {
      clearTimeout(this.timer);
      this.timer = null;
    }
    this.pending.clear();
    this.handle?.close();
    this.handle = null;
  }

  isWatching(): boolean {
    return this.handle !== null;
  }

  /** Resolves once every batch handed to `onChange` so far has settled. */
  whenIdle(): Promise<void> {
    return this.running;
  }

  private record(fileName: string | null): void {
    if (!fileName) return;
    const changedPath = path.resolve(this.rootPath, fileName);
    if (this.ignoreJunk && shouldIgnorePath(normaliseRelativePath(this.rootPath, changedPath), false)) return;
    this.pending.add(changedPath);
    if (this.timer) {
      clearTimeout(this.timer);
    }
    this.timer = setTimeout(() => this.flush(), this.debounceMs);
  }

  private flush(): void {
    this.timer = null;
    if (this.pending.size === 0) return;
    const paths = [...this.pending].sort();
    this.pending = new Set();
    this.running = this.running
      .then(() => this.onChange(paths))
      .catch((error: unknown) => {
        logger.error(`Change handler failed: ${describeError(error)}`);
      });
  }
}
